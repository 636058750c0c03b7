/**
 * Service Initialization
 *
 * Composition root: builds the scanning pipeline from configuration.
 */

import path from 'path';
import { logger } from '../utils/logger.js';
import { getEnv } from './env.js';
import type { ImageNormalizerConfig } from '../services/image-processing/ImageNormalizer.js';
import { WorkerNormalizer } from '../services/image-processing/WorkerNormalizer.js';
import { OCRService } from '../services/content-processing/OCRService.js';
import { loadLexicon } from '../services/analysis/Lexicon.js';
import { DocumentClassifier } from '../services/analysis/DocumentClassifier.js';
import { TermExtractor } from '../services/analysis/TermExtractor.js';
import { TranslationGateway } from '../services/translation/TranslationGateway.js';
import { TransformersModelLoader } from '../services/translation/TransformersModelLoader.js';
import { GeminiClient } from '../services/llm/GeminiClient.js';
import { ExplanationGateway } from '../services/llm/ExplanationGateway.js';
import { TaskRunner } from '../services/pipeline/TaskRunner.js';
import { PipelineOrchestrator } from '../services/pipeline/PipelineOrchestrator.js';
import { ScannerController } from '../services/pipeline/ScannerController.js';
import { ReportService } from '../services/export/ReportService.js';

export interface ScannerServices {
  controller: ScannerController;
  orchestrator: PipelineOrchestrator;
  translator: TranslationGateway;
  ocr: OCRService;
  reports: ReportService;
  runner: TaskRunner;
}

export interface ServiceInitializationOptions {
  normalizer?: ImageNormalizerConfig;
}

/**
 * Initialize all scanner services
 */
export async function initializeServices(options: ServiceInitializationOptions = {}): Promise<ScannerServices> {
  const env = getEnv();

  const lexicon = await loadLexicon({
    primaryPath: path.resolve(env.PRIMARY_LEXICON_PATH),
    backupPath: path.resolve(env.BACKUP_LEXICON_PATH),
  });

  const modelRoot = path.resolve(env.TRANSLATION_MODEL_DIR);
  const translator = new TranslationGateway({ modelRoot, loader: new TransformersModelLoader() });
  const ocr = new OCRService({ langPath: env.OCR_LANG_PATH });
  const runner = new TaskRunner();

  const orchestrator = new PipelineOrchestrator({
    normalizer: new WorkerNormalizer(options.normalizer),
    recognizer: ocr,
    classifier: new DocumentClassifier(),
    extractor: new TermExtractor(lexicon),
    translator,
    explainer: new ExplanationGateway(new GeminiClient()),
    runner,
  });

  logger.info(
    { primaryTerms: lexicon.primary.size, backupCodes: lexicon.backup.length, modelRoot },
    'Scanner services initialized'
  );

  return {
    controller: new ScannerController(orchestrator),
    orchestrator,
    translator,
    ocr,
    reports: new ReportService({ fontDir: path.resolve(env.REPORT_FONT_DIR) }),
    runner,
  };
}
