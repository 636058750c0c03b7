/**
 * Backoff and sleep primitives.
 *
 * Both are injected into callers that retry, so tests can replace real
 * waiting with a recording fake.
 */

/**
 * Delay before the next try, given the zero-based number of the attempt that just failed
 */
export interface BackoffStrategy {
  delayFor(attempt: number): number;
}

export interface Sleeper {
  sleep(ms: number): Promise<void>;
}

export interface ExponentialBackoffConfig {
  /** Delay for attempt 0 in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Upper bound on the deterministic part in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Upper bound (exclusive) of the random jitter added in milliseconds (default: 1000) */
  maxJitter?: number;
  /** Source of randomness in [0, 1) */
  random?: () => number;
}

const DEFAULT_BACKOFF_CONFIG = {
  initialDelay: 1000,
  multiplier: 2,
  maxDelay: 30000,
  maxJitter: 1000,
} as const;

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  const delay = initialDelay * Math.pow(multiplier, attempt);
  return Math.min(delay, maxDelay);
}

/**
 * `initialDelay * multiplier^attempt` plus uniform jitter in `[0, maxJitter)`.
 * With the defaults: 1–2 s, 2–3 s, 4–5 s.
 */
export function exponentialJitterBackoff(config: ExponentialBackoffConfig = {}): BackoffStrategy {
  const {
    initialDelay = DEFAULT_BACKOFF_CONFIG.initialDelay,
    multiplier = DEFAULT_BACKOFF_CONFIG.multiplier,
    maxDelay = DEFAULT_BACKOFF_CONFIG.maxDelay,
    maxJitter = DEFAULT_BACKOFF_CONFIG.maxJitter,
    random = Math.random,
  } = config;

  return {
    delayFor(attempt: number): number {
      return calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay) + random() * maxJitter;
    },
  };
}

export const realSleeper: Sleeper = {
  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  },
};
