/**
 * Scanner Controller
 *
 * Interactive-side state around the orchestrator. At most one document run
 * and one explanation run are in flight; a submit while one is running is
 * refused (returns null) rather than queued. `reset` does not cancel work in
 * flight: it bumps a generation counter and results dispatched before the
 * reset are dropped when they arrive.
 */

import { EventEmitter } from 'events';
import type { DocumentImage, PipelineResult } from '../../types/document.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  isPipelineFailure,
  type DocumentRunResult,
  type PipelineOrchestrator,
  type ProcessOptions,
} from './PipelineOrchestrator.js';
import type { TaskHandle } from './TaskRunner.js';

export interface ExplanationEvent {
  term: string;
  targetLanguage: string;
  text: string;
}

const log = createChildLogger({ component: 'ScannerController' });

export class ScannerController extends EventEmitter {
  private generation = 0;
  private documentInFlight = false;
  private explanationInFlight = false;
  private lastResult: PipelineResult | null = null;

  constructor(private readonly orchestrator: PipelineOrchestrator) {
    super();
  }

  get canSubmitDocument(): boolean {
    return !this.documentInFlight;
  }

  /**
   * Explanations need a processed document with text as context
   */
  get canSubmitExplanation(): boolean {
    return !this.explanationInFlight && this.lastResult !== null && this.lastResult.textDetected;
  }

  get currentResult(): PipelineResult | null {
    return this.lastResult;
  }

  submitDocument(image: DocumentImage, options: ProcessOptions): TaskHandle<DocumentRunResult> | null {
    if (!this.canSubmitDocument) {
      log.debug('Document run already in flight, submission refused');
      return null;
    }

    this.documentInFlight = true;
    const generation = this.generation;
    const handle = this.orchestrator.submitDocument(image, options);

    void handle.result.then((outcome) => {
      this.documentInFlight = false;
      if (generation !== this.generation) {
        log.debug({ taskId: handle.id }, 'Dropping stale document result');
        return;
      }

      if (outcome.status === 'failed') {
        this.notify('documentError', `Error: ${outcome.error.message}`);
      } else if (isPipelineFailure(outcome.value)) {
        this.notify('documentError', outcome.value.message);
      } else {
        this.lastResult = outcome.value;
        this.notify('document', outcome.value);
      }
    });

    return handle;
  }

  submitExplanation(term: string, targetLanguage: string): TaskHandle<string> | null {
    if (!this.canSubmitExplanation) {
      log.debug({ term }, 'Explanation unavailable, submission refused');
      return null;
    }

    this.explanationInFlight = true;
    const generation = this.generation;
    const handle = this.orchestrator.submitExplanation(term, targetLanguage);

    void handle.result.then((outcome) => {
      this.explanationInFlight = false;
      if (generation !== this.generation) {
        log.debug({ taskId: handle.id }, 'Dropping stale explanation');
        return;
      }
      const text = outcome.status === 'completed' ? outcome.value : `Error: ${outcome.error.message}`;
      const event: ExplanationEvent = { term, targetLanguage, text };
      this.notify('explanation', event);
    });

    return handle;
  }

  reset(): void {
    this.generation++;
    this.lastResult = null;
    this.orchestrator.reset();
    this.notify('reset');
  }

  /**
   * Listener failures are logged; they must not surface as rejections of the
   * result handlers above.
   */
  private notify(event: 'document' | 'documentError' | 'explanation' | 'reset', payload?: unknown): void {
    try {
      if (payload === undefined) {
        this.emit(event);
      } else {
        this.emit(event, payload);
      }
    } catch (error) {
      log.warn({ event, error: getErrorMessage(error) }, 'Scanner listener threw');
    }
  }
}
