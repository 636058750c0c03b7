/**
 * Loads MarianMT translation pipelines with @xenova/transformers from local
 * files only. Remote model downloads are disabled.
 */

import { env, pipeline } from '@xenova/transformers';
import path from 'path';
import { z } from 'zod';
import type { LanguageDefinition } from '../../config/languages.js';
import type { TranslationModel, TranslationModelLoader } from './TranslationGateway.js';
import { createChildLogger } from '../../utils/logger.js';

const translationItemSchema = z.object({ translation_text: z.string() });
const translationOutputSchema = z.union([z.array(translationItemSchema), translationItemSchema]);

const log = createChildLogger({ component: 'TransformersModelLoader' });

export function parseTranslationOutput(output: unknown): string[] {
  const parsed = translationOutputSchema.parse(output);
  return Array.isArray(parsed) ? parsed.map((item) => item.translation_text) : [parsed.translation_text];
}

/**
 * The model is read from exactly the directory the gateway checked: its
 * parent becomes the local model root and its name the model id.
 */
export function splitModelPath(modelPath: string): { localModelPath: string; modelName: string } {
  const resolved = path.resolve(modelPath);
  return { localModelPath: path.dirname(resolved) + path.sep, modelName: path.basename(resolved) };
}

export class TransformersModelLoader implements TranslationModelLoader {
  // env.localModelPath is library-global, so builds run one at a time
  private tail: Promise<unknown> = Promise.resolve();

  load(language: LanguageDefinition, modelPath: string): Promise<TranslationModel> {
    const build = this.tail.then(() => this.build(language, modelPath));
    this.tail = build.catch(() => undefined);
    return build;
  }

  private async build(language: LanguageDefinition, modelPath: string): Promise<TranslationModel> {
    const { localModelPath, modelName } = splitModelPath(modelPath);
    env.localModelPath = localModelPath;
    env.allowRemoteModels = false;

    log.info({ language: language.name, modelPath }, 'Building translation pipeline');
    const translator = await pipeline('translation', modelName, { local_files_only: true });

    return {
      async translate(texts: string[]): Promise<string[]> {
        if (texts.length === 0) return [];
        const output: unknown = await translator(texts);
        return parseTranslationOutput(output);
      },
    };
  }
}
