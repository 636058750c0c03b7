/**
 * Translation Gateway
 *
 * English → target-language translation through local MarianMT models.
 * Models load lazily, once per language, and stay cached for the process
 * lifetime. The cache holds the load promise, so concurrent first requests
 * share a single load; a failed load is evicted and reported again on the
 * next call.
 */

import fs from 'fs/promises';
import path from 'path';
import { getLanguage, type LanguageDefinition } from '../../config/languages.js';
import { getEnv } from '../../config/env.js';
import { BadRequestError, ModelMissingError, getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';

export interface TranslationModel {
  /** One output per input, same order */
  translate(texts: string[]): Promise<string[]>;
}

export interface TranslationModelLoader {
  load(language: LanguageDefinition, modelPath: string): Promise<TranslationModel>;
}

export interface TranslationGatewayConfig {
  modelRoot?: string;
  loader: TranslationModelLoader;
}

const log = createChildLogger({ component: 'TranslationGateway' });

async function isDirectory(target: string): Promise<boolean> {
  try {
    const stats = await fs.stat(target);
    return stats.isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export class TranslationGateway {
  private readonly modelRoot: string;
  private readonly loader: TranslationModelLoader;
  private readonly models = new Map<string, Promise<TranslationModel>>();
  private loadCount = 0;

  constructor(config: TranslationGatewayConfig) {
    this.modelRoot = config.modelRoot ?? getEnv().TRANSLATION_MODEL_DIR;
    this.loader = config.loader;
  }

  /**
   * Number of times a model has actually been handed to the loader
   */
  getLoadCount(): number {
    return this.loadCount;
  }

  async isLoaded(language: string): Promise<boolean> {
    const pending = this.models.get(language);
    if (!pending) return false;
    try {
      await pending;
      return true;
    } catch {
      return false;
    }
  }

  loadModel(language: string): Promise<TranslationModel> {
    const definition = getLanguage(language);
    if (!definition) {
      return Promise.reject(new BadRequestError(`Unsupported language: ${language}`, { language }));
    }

    let pending = this.models.get(definition.name);
    if (!pending) {
      pending = this.loadFromDisk(definition);
      this.models.set(definition.name, pending);
      pending.catch(() => this.models.delete(definition.name));
    }
    return pending;
  }

  private async loadFromDisk(definition: LanguageDefinition): Promise<TranslationModel> {
    const modelPath = path.join(this.modelRoot, definition.modelId);
    if (!(await isDirectory(modelPath))) {
      log.error({ modelPath, language: definition.name }, 'Translation model path not found');
      throw new ModelMissingError(definition.name, modelPath);
    }

    log.info({ language: definition.name, modelPath }, 'Loading translation model');
    this.loadCount++;
    const startTime = Date.now();
    const model = await this.loader.load(definition, modelPath);
    log.info({ language: definition.name, durationMs: Date.now() - startTime }, 'Translation model loaded');
    return model;
  }

  /**
   * Translate text, keeping its line structure. Blank input returns "" without
   * loading a model.
   */
  async translate(text: string, targetLanguage: string): Promise<string> {
    if (!text || !text.trim()) {
      return '';
    }

    const model = await this.loadModel(targetLanguage);
    const lines = text.split('\n');
    const indexes: number[] = [];
    const sources: string[] = [];
    lines.forEach((line, index) => {
      if (line.trim()) {
        indexes.push(index);
        sources.push(line.trim());
      }
    });

    const translated = await model.translate(sources);
    if (translated.length !== sources.length) {
      throw new Error(`Translation model returned ${translated.length} results for ${sources.length} inputs`);
    }

    const output = [...lines];
    indexes.forEach((lineIndex, i) => {
      output[lineIndex] = translated[i];
    });
    return output.join('\n');
  }

  /**
   * Stage boundary: failures come back as labelled strings instead of rejections.
   */
  async translateOrError(text: string, targetLanguage: string): Promise<string> {
    try {
      return await this.translate(text, targetLanguage);
    } catch (error) {
      if (error instanceof ModelMissingError || error instanceof BadRequestError) {
        const message = `[System Error]: Translator not active.\nReason: ${error.message}`;
        log.warn({ language: targetLanguage, error: error.message }, 'Translator not active');
        return message;
      }
      log.error({ language: targetLanguage, error: getErrorMessage(error) }, 'Translation runtime error');
      return `[Error]: ${getErrorMessage(error)}`;
    }
  }
}
