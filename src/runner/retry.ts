/**
 * Retry with exponential backoff for queue operations.
 *
 * Every failure of a queue call is treated as transient: the store is an
 * external server and losing the connection is the expected failure mode.
 *
 * @module runner/retry
 */

import { RetryExhaustedError, toError } from '../errors.js';
import { sleep } from './pacing.js';

export interface RetryConfig {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of each delay randomized, 0 to 1. */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 5,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  jitterFactor: 0.2,
};

export interface RetryHooks {
  /**
   * Abandons the backoff wait. The last error is rethrown as
   * RetryExhaustedError without further attempts.
   */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Delay before retry number `attempt` (0-based): base * 2^attempt, capped,
 * then spread by the jitter factor.
 */
export function backoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponential = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
  const jitter = exponential * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + jitter));
}

export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  hooks: RetryHooks = {},
): Promise<T> {
  let attempt = 0;

  for (;;) {
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);
      if (attempt >= config.maxRetries || hooks.signal?.aborted) {
        throw new RetryExhaustedError(operation, attempt + 1, error);
      }

      const delayMs = backoffDelay(attempt, config);
      hooks.onRetry?.(attempt + 1, error, delayMs);
      attempt++;

      if (!(await sleep(delayMs, hooks.signal))) {
        throw new RetryExhaustedError(operation, attempt, error);
      }
    }
  }
}
