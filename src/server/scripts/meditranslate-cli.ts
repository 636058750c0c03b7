#!/usr/bin/env node
/**
 * MediTranslate CLI
 *
 * Usage:
 *   tsx src/server/scripts/meditranslate-cli.ts <command> [options]
 *
 * Commands:
 *   scan <image> [--lang=Spanish|Hindi] [--high-contrast] [--report=<out.pdf>] [--explain=<term>]
 *   languages                              List target languages and model status
 */

import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { getEnv } from '../config/env.js';
import { initializeServices, type ScannerServices } from '../config/serviceInitialization.js';
import { isSupportedLanguage, listLanguages } from '../config/languages.js';
import { decodeImage } from '../services/image-processing/ImageCodec.js';
import { isPipelineFailure } from '../services/pipeline/PipelineOrchestrator.js';
import type { DocumentImage, PipelineResult } from '../types/document.js';
import { getErrorMessage } from '../types/errors.js';

export interface ScanArgs {
  imagePath: string;
  language: string;
  highContrast: boolean;
  reportPath?: string;
  explainTerm?: string;
}

function getOption(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

export function parseScanArgs(args: string[], defaults: { language: string; highContrast: boolean }): ScanArgs | null {
  const imagePath = args.find((arg) => !arg.startsWith('--'));
  if (!imagePath) return null;
  return {
    imagePath,
    language: getOption(args, 'lang') ?? defaults.language,
    highContrast: args.includes('--high-contrast') || defaults.highContrast,
    reportPath: getOption(args, 'report'),
    explainTerm: getOption(args, 'explain'),
  };
}

function printResult(result: PipelineResult): void {
  console.log(`\n📄 Document Type: ${result.documentTypeLabel}`);
  console.log(`   Skew angle:    ${result.skewAngle.toFixed(2)}°`);
  console.log('─'.repeat(50));

  if (result.insightList.length === 0) {
    console.log('No specific terms found');
  } else {
    console.log('Medical Insights:');
    for (const insight of result.insightList) {
      const translated = insight.translatedTitle ? ` → ${insight.translatedTitle}` : '';
      console.log(`  [${insight.category}] ${insight.title}${translated}`);
      console.log(`      ${insight.description}`);
    }
  }

  console.log('─'.repeat(50));
  console.log(`Translation (${result.targetLanguage}):\n`);
  console.log(result.translatedDocument);
}

async function scanCommand(services: ScannerServices, scan: ScanArgs): Promise<number> {
  let image: DocumentImage;
  try {
    image = await decodeImage(scan.imagePath);
  } catch (error) {
    console.error(`❌ Could not read image ${scan.imagePath}: ${getErrorMessage(error)}`);
    return 1;
  }

  console.log(`\n⏳ Analyzing document...`);
  const handle = services.controller.submitDocument(image, {
    targetLanguage: scan.language,
    highContrast: scan.highContrast,
    languageHint: getEnv().OCR_LANGUAGE,
  });
  if (!handle) {
    console.error('❌ A document is already being processed');
    return 1;
  }

  const outcome = await handle.result;
  if (outcome.status === 'failed') {
    console.error(`❌ Error: ${outcome.error.message}`);
    return 1;
  }
  if (isPipelineFailure(outcome.value)) {
    console.error(`❌ ${outcome.value.message}`);
    return 1;
  }

  const result = outcome.value;
  printResult(result);

  if (scan.reportPath) {
    await services.reports.writeReport(scan.reportPath, {
      originalText: result.rawText,
      translatedText: result.translatedDocument,
      insights: result.insightList,
      documentType: result.documentTypeLabel,
      language: result.targetLanguage,
    });
    console.log(`\n✅ Report saved to ${scan.reportPath}`);
  }

  if (scan.explainTerm) {
    const explanation = services.controller.submitExplanation(scan.explainTerm, scan.language);
    if (!explanation) {
      console.error('❌ Explanations need a document with recognized text');
      return 1;
    }
    console.log(`\n⏳ Asking AI Assistant about '${scan.explainTerm}'...\n`);
    const explained = await explanation.result;
    console.log(explained.status === 'completed' ? explained.value : `Error: ${explained.error.message}`);
  }

  return 0;
}

function languagesCommand(): void {
  const modelRoot = path.resolve(getEnv().TRANSLATION_MODEL_DIR);
  console.log('\n🌐 Target languages');
  console.log('─'.repeat(50));
  for (const language of listLanguages()) {
    const installed = existsSync(path.join(modelRoot, language.modelId));
    console.log(`${language.name.padEnd(10)} ${language.modelId.padEnd(24)} ${installed ? '✅ installed' : '❌ missing'}`);
  }
}

function printUsage(): void {
  console.error('Usage: tsx src/server/scripts/meditranslate-cli.ts <command> [options]');
  console.error('\nCommands:');
  console.error('  scan <image> [options]                   Normalize, read, analyze and translate a document');
  console.error('  languages                                List target languages and model status');
  console.error('\nOptions:');
  console.error('  --lang=Spanish|Hindi                     Target language');
  console.error('  --high-contrast                          Binarize instead of adaptive contrast');
  console.error('  --report=<out.pdf>                       Write a bilingual PDF report');
  console.error('  --explain=<term>                         Ask the AI assistant about a term');
}

async function main(): Promise<number> {
  const command = process.argv[2];
  const args = process.argv.slice(3);

  if (command === 'languages') {
    languagesCommand();
    return 0;
  }

  if (command !== 'scan') {
    printUsage();
    return 1;
  }

  const env = getEnv();
  const scan = parseScanArgs(args, { language: env.DEFAULT_TARGET_LANGUAGE, highContrast: env.HIGH_CONTRAST_DEFAULT });
  if (!scan) {
    console.error('❌ Command "scan" requires an image path');
    return 1;
  }
  if (!isSupportedLanguage(scan.language)) {
    console.error(`❌ Unsupported language: ${scan.language}`);
    return 1;
  }

  const services = await initializeServices();
  try {
    return await scanCommand(services, scan);
  } finally {
    await services.ocr.cleanup();
  }
}

// Run if called directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Error:', getErrorMessage(error));
      process.exitCode = 1;
    });
}
