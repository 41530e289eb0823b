/**
 * Retry with exponential backoff for transient transport failures.
 */
import { NetworkError } from '../errors.js';
import { sleep } from './timing.js';

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Base delay in seconds */
  backoffFactor: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  backoffFactor: 1,
  minDelayMs: 1000,
  maxDelayMs: 10_000,
};

/** Delay before the attempt after `attempt`: factor * 2^(attempt-1) s, clamped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.backoffFactor * 1000 * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, raw));
}

/** Connect failures and timeouts (TimeoutError extends NetworkError). */
export function isTransientError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export type RetryListener = (error: NetworkError, attempt: number, delayMs: number) => void;

/**
 * Run `operation` until it succeeds, fails with a non-transient error, or the
 * attempt budget is spent. The last transient error is rethrown as-is. Once
 * `signal` is aborted no further attempt is made.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  onRetry?: RetryListener,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isTransientError(error) || attempt >= policy.maxAttempts || signal?.aborted) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, policy);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
