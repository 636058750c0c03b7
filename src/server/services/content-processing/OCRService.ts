/**
 * OCR Service
 *
 * Text recognition for normalized page images using tesseract.js.
 * Workers are created lazily, one per language, and reused for the process
 * lifetime. `recognize` never throws: failures come back as an `error`
 * result and empty pages as `no-text`.
 */

import { createWorker } from 'tesseract.js';
import type { DocumentImage, RecognitionResult } from '../../types/document.js';
import { getErrorMessage } from '../../types/errors.js';
import { getEnv } from '../../config/env.js';
import { createChildLogger } from '../../utils/logger.js';
import { encodePng } from '../image-processing/ImageCodec.js';

/**
 * Text-recognition engine consumed by the pipeline
 */
export interface TextRecognizer {
  recognize(image: DocumentImage, languageHint: string): Promise<RecognitionResult>;
}

/**
 * The part of a tesseract.js worker this service uses
 */
export interface OcrWorker {
  recognize(image: Buffer): Promise<{ data: { text: string; confidence: number } }>;
  terminate(): Promise<unknown>;
}

export interface OCRServiceConfig {
  /** Directory holding <lang>.traineddata files; avoids fetching language data at startup */
  langPath?: string;
  workerFactory?: (language: string) => Promise<OcrWorker>;
  encoder?: (image: DocumentImage) => Promise<Buffer>;
}

const log = createChildLogger({ component: 'OCRService' });

/**
 * Service for performing OCR on document images
 */
export class OCRService implements TextRecognizer {
  private readonly workers = new Map<string, Promise<OcrWorker>>();
  private readonly workerFactory: (language: string) => Promise<OcrWorker>;
  private readonly encoder: (image: DocumentImage) => Promise<Buffer>;

  constructor(config: OCRServiceConfig = {}) {
    const langPath = config.langPath ?? getEnv().OCR_LANG_PATH;
    this.workerFactory = config.workerFactory ?? ((language) => OCRService.createTesseractWorker(language, langPath));
    this.encoder = config.encoder ?? encodePng;
  }

  private static async createTesseractWorker(language: string, langPath?: string): Promise<OcrWorker> {
    return createWorker(language, 1, {
      ...(langPath ? { langPath, cachePath: langPath } : {}),
      logger: (message) => {
        if (message.status === 'error') {
          log.warn({ status: message.status, jobId: message.jobId }, 'Tesseract reported an error');
        }
      },
    });
  }

  /**
   * Get (or lazily start) the worker for a language
   */
  private getWorker(language: string): Promise<OcrWorker> {
    let worker = this.workers.get(language);
    if (!worker) {
      log.info({ language }, 'Initializing Tesseract worker');
      worker = this.workerFactory(language);
      this.workers.set(language, worker);
      // A failed start must not poison the cache for later calls
      worker.catch(() => this.workers.delete(language));
    }
    return worker;
  }

  async recognize(image: DocumentImage, languageHint: string): Promise<RecognitionResult> {
    const startTime = Date.now();
    try {
      const worker = await this.getWorker(languageHint);
      const png = await this.encoder(image);
      const result = await worker.recognize(png);
      const text = result.data.text.trim();

      log.debug(
        { language: languageHint, confidence: result.data.confidence, characters: text.length, durationMs: Date.now() - startTime },
        'OCR finished'
      );

      if (!text) {
        return { status: 'no-text' };
      }
      return { status: 'ok', text };
    } catch (error) {
      log.error({ error: getErrorMessage(error), language: languageHint }, 'OCR extraction failed');
      return { status: 'error', message: getErrorMessage(error) };
    }
  }

  /**
   * Cleanup resources (terminate workers)
   */
  async cleanup(): Promise<void> {
    const pending = [...this.workers.entries()];
    this.workers.clear();
    for (const [language, workerPromise] of pending) {
      try {
        const worker = await workerPromise;
        await worker.terminate();
        log.info({ language }, 'Tesseract worker terminated');
      } catch (error) {
        log.error({ error: getErrorMessage(error), language }, 'Error terminating worker');
      }
    }
  }
}
