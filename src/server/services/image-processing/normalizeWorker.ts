/**
 * Worker-thread entry: normalizes one page and exits.
 * The output pixel buffer is transferred back, not copied.
 */

import { parentPort, workerData } from 'worker_threads';
import { ImageNormalizer } from './ImageNormalizer.js';
import { normalizeJobSchema, type NormalizeReply } from './workerProtocol.js';
import { getErrorMessage } from '../../types/errors.js';

function run(): void {
  if (!parentPort) {
    throw new Error('normalizeWorker must be started as a worker thread');
  }

  const transferList: ArrayBuffer[] = [];
  let reply: NormalizeReply;
  try {
    const job = normalizeJobSchema.parse(workerData);
    const result = new ImageNormalizer(job.config).normalize(job.image, job.highContrast);
    const { buffer } = result.image.data;
    if (buffer instanceof ArrayBuffer) {
      transferList.push(buffer);
    }
    reply = { ok: true, result };
  } catch (error) {
    reply = { ok: false, message: getErrorMessage(error) };
  }

  parentPort.postMessage(reply, transferList);
}

run();
