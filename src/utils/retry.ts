/**
 * Retry Logic with Backoff
 *
 * Used for the click layer of the solver: a flaky click inside the
 * challenge frame is retried with a fixed delay before the attempt is
 * declared fatal.
 */

import { logger } from './logger.js';
import { TIMEOUTS } from './timeouts.js';

const log = logger.retry;

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 5 = 1 initial attempt + up to 4 retries
   *
   * @default 5
   */
  maxAttempts?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Caps the backoff.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs).
   * 1 gives a fixed delay.
   * @default 1
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default retries every error
   */
  retryOn?: (error: Error) => boolean;

  /**
   * Invoked after a failed attempt that will be retried, before the delay.
   * May be async; it is awaited.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void | Promise<void>;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 5,
  initialDelayMs: TIMEOUTS.RETRY_WAIT,
  maxDelayMs: 30000,
  backoffMultiplier: 1,
  retryOn: () => true,
  onRetry: () => {},
};

/**
 * Thrown when every attempt failed. `lastError` is the final failure.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(`Failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Execute an async function with automatic retry on failure.
 *
 * @returns Result of the function if successful
 * @throws RetryExhaustedError once maxAttempts is reached, or the original
 *   error when retryOn rejects it
 *
 * @example
 * ```typescript
 * await withRetry(() => session.click(control), {
 *   maxAttempts: 5,
 *   initialDelayMs: 1000,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (!opts.retryOn(lastError)) {
        throw lastError;
      }
      if (attempt >= opts.maxAttempts) {
        throw new RetryExhaustedError(attempt, lastError);
      }

      await opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await sleep(delay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
