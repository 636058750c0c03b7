/**
 * Runs ImageNormalizer on a dedicated worker thread, one thread per call.
 *
 * The input pixel buffer is moved to the worker through the transfer list:
 * after `normalize` is called the caller's `image.data` is detached and must
 * not be read again. Views over a larger buffer are copied first so that
 * unrelated memory is never detached.
 */

import { Worker } from 'worker_threads';
import type { DocumentImage, NormalizationResult } from '../../types/document.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ImageNormalizerConfig } from './ImageNormalizer.js';
import { normalizeReplySchema, type NormalizeJob } from './workerProtocol.js';

/**
 * Anything the pipeline can normalize a page with, in-thread or not
 */
export interface DocumentNormalizer {
  normalize(image: DocumentImage, highContrastMode: boolean): NormalizationResult | Promise<NormalizationResult>;
}

const log = createChildLogger({ component: 'WorkerNormalizer' });

/**
 * Worker script beside this module. Under a TypeScript loader (tsx, Vitest)
 * the worker gets the same loader.
 */
function resolveWorkerEntry(): { url: URL; execArgv: string[] } {
  if (import.meta.url.endsWith('.ts')) {
    return { url: new URL('./normalizeWorker.ts', import.meta.url), execArgv: ['--import', 'tsx'] };
  }
  return { url: new URL('./normalizeWorker.js', import.meta.url), execArgv: [] };
}

function toTransferable(data: Uint8Array): { view: Uint8Array; buffer: ArrayBuffer } {
  const { buffer } = data;
  if (buffer instanceof ArrayBuffer && data.byteOffset === 0 && data.byteLength === buffer.byteLength) {
    return { view: data, buffer };
  }
  const copy = new ArrayBuffer(data.byteLength);
  const view = new Uint8Array(copy);
  view.set(data);
  return { view, buffer: copy };
}

export class WorkerNormalizer implements DocumentNormalizer {
  constructor(private readonly config: ImageNormalizerConfig = {}) {}

  normalize(image: DocumentImage, highContrastMode: boolean): Promise<NormalizationResult> {
    const { view, buffer } = toTransferable(image.data);
    const job: NormalizeJob = {
      image: { ...image, data: view },
      highContrast: highContrastMode,
      config: this.config,
    };
    const { url, execArgv } = resolveWorkerEntry();
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void): void => {
        if (settled) return;
        settled = true;
        outcome();
      };

      const worker = new Worker(url, { workerData: job, transferList: [buffer], execArgv });
      log.debug({ threadId: worker.threadId, width: image.width, height: image.height }, 'Normalization worker started');

      worker.once('message', (message: unknown) => {
        const reply = normalizeReplySchema.safeParse(message);
        settle(() => {
          if (!reply.success) {
            reject(new Error('Malformed reply from normalization worker'));
          } else if (reply.data.ok) {
            log.debug({ threadId: worker.threadId, durationMs: Date.now() - startTime }, 'Normalization worker finished');
            resolve(reply.data.result);
          } else {
            reject(new Error(reply.data.message));
          }
        });
      });
      worker.once('error', (error: Error) => {
        log.error({ error: error.message }, 'Normalization worker crashed');
        settle(() => reject(error));
      });
      worker.once('exit', (code: number) => {
        settle(() => reject(new Error(`Normalization worker exited with code ${code} before replying`)));
      });
    });
  }
}
