/**
 * Newsbrief — Retry with Exponential Backoff
 *
 * Re-invokes a failing async operation up to `retries` more times, waiting
 * min(initial * 2^(k-1), max) seconds before retry k. When every attempt
 * fails the last error is rethrown as-is.
 *
 * The wrapped operation must be safe to repeat. Nothing here checks that.
 */

import { systemClock, type Clock } from '../lib/clock';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

const log = logger.child({ module: 'retry' });

export interface RetryOptions {
  /** Additional attempts after the first (default 3) */
  retries?: number;
  initialBackoffSeconds?: number;
  maxBackoffSeconds?: number;
  /** Errors for which this returns false propagate immediately (default: retry everything) */
  retryOn?: (error: unknown) => boolean;
  /** Operation name used in log lines */
  label?: string;
  clock?: Clock;
}

const DEFAULTS = {
  retries: 3,
  initialBackoffSeconds: 1,
  maxBackoffSeconds: 60,
  retryOn: (_error: unknown) => true,
  label: 'operation',
} satisfies Omit<Required<RetryOptions>, 'clock'>;

/**
 * Delay before retry `attempt` (1-indexed).
 */
export function backoffDelaySeconds(
  attempt: number,
  initialBackoffSeconds: number,
  maxBackoffSeconds: number
): number {
  return Math.min(initialBackoffSeconds * 2 ** (attempt - 1), maxBackoffSeconds);
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const retries = options.retries ?? DEFAULTS.retries;
  const initialBackoffSeconds = options.initialBackoffSeconds ?? DEFAULTS.initialBackoffSeconds;
  const maxBackoffSeconds = options.maxBackoffSeconds ?? DEFAULTS.maxBackoffSeconds;
  const retryOn = options.retryOn ?? DEFAULTS.retryOn;
  const label = options.label ?? DEFAULTS.label;
  const clock = options.clock ?? systemClock;

  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (!retryOn(error)) throw error;

      attempt++;
      if (attempt > retries) {
        log.error(`${label} failed after ${retries} retries`, { error: errorMessage(error) });
        throw error;
      }

      const waitSeconds = backoffDelaySeconds(attempt, initialBackoffSeconds, maxBackoffSeconds);
      log.warn(`${label} attempt ${attempt}/${retries} failed`, {
        error: errorMessage(error),
        waitSeconds,
      });
      await clock.sleep(waitSeconds * 1000);
    }
  }
}

/**
 * Wrapper form: `retryWithBackoff({ retries: 2 })(sendMessage)`.
 */
export function retryWithBackoff(options: RetryOptions = {}) {
  return <A extends unknown[], R>(fn: (...args: A) => Promise<R>) =>
    (...args: A): Promise<R> =>
      withRetry(() => fn(...args), options);
}
