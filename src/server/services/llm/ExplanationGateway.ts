/**
 * Explanation Gateway
 *
 * Asks the generative-text service for a patient-friendly explanation of a
 * term. Each call walks a small state machine:
 *
 *   Idle → Requesting → Succeeded | RetryWait | Fallback | Failed
 *   RetryWait → Requesting | Fallback
 *   Fallback → Succeeded | Failed
 *
 * Transient failures (rate limit, overload) are retried on the primary model
 * with exponential backoff; after the last retry wait, or straight away when
 * the primary model is unavailable, the same prompt goes to the fallback
 * model once. Every outcome is a string: the gateway never rejects.
 */

import type { GenerativeTextClient } from './GenerativeTextClient.js';
import { classifyGenerationFailure } from './generationFailure.js';
import { buildExplanationPrompt, type ExplanationRequest } from './explanationPrompt.js';
import { getErrorMessage } from '../../types/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { exponentialJitterBackoff, realSleeper, type BackoffStrategy, type Sleeper } from '../../utils/retry.js';
import { getEnv } from '../../config/env.js';

export type ExplanationState = 'Idle' | 'Requesting' | 'RetryWait' | 'Fallback' | 'Succeeded' | 'Failed';

export const ALLOWED_TRANSITIONS: Readonly<Record<ExplanationState, readonly ExplanationState[]>> = {
  Idle: ['Requesting'],
  Requesting: ['Succeeded', 'RetryWait', 'Fallback', 'Failed'],
  RetryWait: ['Requesting', 'Fallback'],
  Fallback: ['Succeeded', 'Failed'],
  Succeeded: [],
  Failed: [],
};

export interface StateTransition {
  from: ExplanationState;
  to: ExplanationState;
  /** Zero-based primary attempt the transition belongs to */
  attempt: number;
}

export interface ExplanationOutcome {
  state: 'Succeeded' | 'Failed';
  text: string;
  /** Number of generate calls made, fallback included */
  attempts: number;
  /** Backoff delays waited, in milliseconds */
  waits: number[];
  usedFallback: boolean;
}

export interface ExplanationGatewayConfig {
  primaryModel?: string;
  fallbackModel?: string;
  temperature?: number;
  maxAttempts?: number;
  backoff?: BackoffStrategy;
  sleeper?: Sleeper;
  onTransition?: (transition: StateTransition) => void;
}

interface RunProgress {
  attempts: number;
  waits: number[];
}

export const CLIENT_NOT_ACTIVE_MESSAGE =
  'AI Error: Client not active. Please add GEMINI_API_KEY to your environment or .env file.';

const log = createChildLogger({ component: 'ExplanationGateway' });

/**
 * Tracks one explanation call. Refuses transitions the table does not list.
 */
class ExplanationRun {
  private current: ExplanationState = 'Idle';

  constructor(private readonly onTransition?: (transition: StateTransition) => void) {}

  get state(): ExplanationState {
    return this.current;
  }

  moveTo(next: ExplanationState, attempt: number): void {
    const from = this.current;
    if (!ALLOWED_TRANSITIONS[from].includes(next)) {
      throw new Error(`Illegal explanation transition ${from} -> ${next}`);
    }
    this.current = next;
    log.debug({ from, to: next, attempt }, 'Explanation state transition');

    if (this.onTransition) {
      try {
        this.onTransition({ from, to: next, attempt });
      } catch (error) {
        log.warn({ error: getErrorMessage(error) }, 'Transition listener threw');
      }
    }
  }
}

export class ExplanationGateway {
  private readonly primaryModel: string;
  private readonly fallbackModel: string;
  private readonly temperature: number;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffStrategy;
  private readonly sleeper: Sleeper;
  private readonly onTransition?: (transition: StateTransition) => void;

  constructor(private readonly client: GenerativeTextClient, config: ExplanationGatewayConfig = {}) {
    const env = getEnv();
    this.primaryModel = config.primaryModel ?? env.GEMINI_MODEL;
    this.fallbackModel = config.fallbackModel ?? env.GEMINI_FALLBACK_MODEL;
    this.temperature = config.temperature ?? env.GEMINI_TEMPERATURE;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 3);
    this.backoff = config.backoff ?? exponentialJitterBackoff();
    this.sleeper = config.sleeper ?? realSleeper;
    this.onTransition = config.onTransition;
  }

  async explain(
    term: string,
    localDefinition: string,
    documentContext: string,
    targetLanguage: string
  ): Promise<string> {
    const outcome = await this.explainDetailed({ term, localDefinition, documentContext, targetLanguage });
    return outcome.text;
  }

  /**
   * Never rejects: a fault outside the classified request failures (a
   * throwing client check, a sleeper that rejects) ends as Failed too.
   */
  async explainDetailed(request: ExplanationRequest): Promise<ExplanationOutcome> {
    const progress: RunProgress = { attempts: 0, waits: [] };
    try {
      return await this.run(request, progress);
    } catch (error) {
      log.error({ error: getErrorMessage(error), term: request.term }, 'Explanation run aborted');
      return {
        state: 'Failed',
        text: `Error connecting to AI: ${getErrorMessage(error)}`,
        attempts: progress.attempts,
        waits: progress.waits,
        usedFallback: false,
      };
    }
  }

  private async run(request: ExplanationRequest, progress: RunProgress): Promise<ExplanationOutcome> {
    if (!this.client.isConfigured()) {
      return { state: 'Failed', text: CLIENT_NOT_ACTIVE_MESSAGE, attempts: 0, waits: [], usedFallback: false };
    }

    const prompt = buildExplanationPrompt(request);
    const run = new ExplanationRun(this.onTransition);
    const { waits } = progress;
    let attempt = 0;

    for (; attempt < this.maxAttempts; attempt++) {
      run.moveTo('Requesting', attempt);
      progress.attempts++;
      try {
        const text = await this.client.generate(prompt, { model: this.primaryModel, temperature: this.temperature });
        run.moveTo('Succeeded', attempt);
        return { state: 'Succeeded', text, attempts: progress.attempts, waits, usedFallback: false };
      } catch (error) {
        const kind = classifyGenerationFailure(error);

        if (kind === 'model-unavailable') {
          log.warn({ model: this.primaryModel, error: getErrorMessage(error) }, 'Primary model unavailable');
          break;
        }

        if (kind === 'other') {
          run.moveTo('Failed', attempt);
          log.error({ error: getErrorMessage(error), term: request.term }, 'Explanation request failed');
          return {
            state: 'Failed',
            text: `Error connecting to AI: ${getErrorMessage(error)}`,
            attempts: progress.attempts,
            waits,
            usedFallback: false,
          };
        }

        run.moveTo('RetryWait', attempt);
        const delay = this.backoff.delayFor(attempt);
        waits.push(delay);
        log.warn({ attempt: attempt + 1, delay: Math.round(delay) }, 'AI busy, waiting before next try');
        await this.sleeper.sleep(delay);
      }
    }

    return this.runFallback(run, prompt, Math.min(attempt, this.maxAttempts - 1), progress.attempts, waits);
  }

  private async runFallback(
    run: ExplanationRun,
    prompt: string,
    attempt: number,
    attempts: number,
    waits: number[]
  ): Promise<ExplanationOutcome> {
    run.moveTo('Fallback', attempt);
    log.info({ model: this.fallbackModel }, 'Falling back to secondary model');
    try {
      const text = await this.client.generate(prompt, { model: this.fallbackModel, temperature: this.temperature });
      run.moveTo('Succeeded', attempt);
      return { state: 'Succeeded', text, attempts: attempts + 1, waits, usedFallback: true };
    } catch (error) {
      run.moveTo('Failed', attempt);
      log.error({ error: getErrorMessage(error) }, 'Fallback model failed');
      return {
        state: 'Failed',
        text: `System Error: All AI models failed. ${getErrorMessage(error)}`,
        attempts: attempts + 1,
        waits,
        usedFallback: true,
      };
    }
  }
}
