/**
 * Pure classifier for generative-text failures.
 *
 * The caller decides what to do with the kind: retry, switch to the
 * fallback model, or give up.
 */

import { getErrorMessage } from '../../types/errors.js';

export type GenerationFailureKind = 'transient' | 'model-unavailable' | 'other';

const TRANSIENT_STATUSES = new Set([429, 503]);
const TRANSIENT_MARKERS = ['429', 'RESOURCE_EXHAUSTED', '503', 'UNAVAILABLE'];
const MODEL_UNAVAILABLE_MARKERS = ['404', 'NOT_FOUND'];

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function classifyGenerationFailure(error: unknown): GenerationFailureKind {
  const status = statusOf(error);
  const message = getErrorMessage(error);

  if (
    (status !== undefined && TRANSIENT_STATUSES.has(status)) ||
    TRANSIENT_MARKERS.some((marker) => message.includes(marker)) ||
    message.toLowerCase().includes('overloaded')
  ) {
    return 'transient';
  }

  if (status === 404 || MODEL_UNAVAILABLE_MARKERS.some((marker) => message.includes(marker))) {
    return 'model-unavailable';
  }

  return 'other';
}
