import { systemClock, type Clock } from './clock.js';

/**
 * Passed to `onBackoff` before each wait.
 */
export interface BackoffDetails {
  /** Attempt that just failed (1-based). */
  attempt: number;
  waitMs: number;
  elapsedMs: number;
  error: unknown;
}

/**
 * Retry policy applied by `withRetry`.
 */
export interface RetryPolicy {
  maxAttempts: number;
  maxTimeMs: number;
  baseDelayMs: number;
  /** Growth per attempt. */
  factor?: number;
  jitter?: 'full' | 'none';
  isRetryable: (error: unknown) => boolean;
  /** Server-provided wait (e.g. Retry-After) that replaces the computed backoff. */
  retryDelayFor?: (error: unknown) => number | undefined;
  onBackoff?: (details: BackoffDetails) => void;
  clock?: Clock;
  signal?: AbortSignal;
  random?: () => number;
}

/** Default multiplier between consecutive backoff intervals. */
const DEFAULT_FACTOR = 2;

/**
 * Exponential backoff interval before the retry that follows `attempt`.
 * Attempt 1 waits `baseDelayMs`, attempt 2 twice that, and so on.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  factor: number = DEFAULT_FACTOR,
): number {
  return baseDelayMs * Math.pow(factor, attempt - 1);
}

/**
 * Wrap an async operation so that retryable failures are re-attempted
 * with exponential backoff.
 *
 * Stops at whichever ceiling triggers first: `maxAttempts`, or
 * `maxTimeMs` of cumulative time since the first attempt. No retry is
 * scheduled whose wait would use up the time remaining. The last error
 * is rethrown as-is.
 *
 * @example
 * ```typescript
 * const load = withRetry(() => client.get(url), {
 *   maxAttempts: 3,
 *   maxTimeMs: 90_000,
 *   baseDelayMs: 1_000,
 *   isRetryable: (error) => error instanceof FetchError && error.retryable,
 * });
 * const body = await load();
 * ```
 */
export function withRetry<TArgs extends unknown[], TResult>(
  operation: (...args: TArgs) => Promise<TResult>,
  policy: RetryPolicy,
): (...args: TArgs) => Promise<TResult> {
  const clock = policy.clock ?? systemClock;
  const random = policy.random ?? Math.random;
  const factor = policy.factor ?? DEFAULT_FACTOR;

  return async (...args: TArgs): Promise<TResult> => {
    const start = clock.now();

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation(...args);
      } catch (error) {
        if (
          policy.signal?.aborted ||
          attempt >= policy.maxAttempts ||
          !policy.isRetryable(error)
        ) {
          throw error;
        }

        const elapsedMs = clock.now() - start;
        const remaining = policy.maxTimeMs - elapsedMs;
        if (remaining <= 0) {
          throw error;
        }

        const interval = backoffDelay(attempt, policy.baseDelayMs, factor);
        const computed =
          policy.jitter === 'none' ? interval : random() * interval;
        const waitMs = policy.retryDelayFor?.(error) ?? computed;
        // The next attempt would start with no budget left
        if (waitMs >= remaining) {
          throw error;
        }

        policy.onBackoff?.({ attempt, waitMs, elapsedMs, error });
        await clock.sleep(waitMs, policy.signal);
      }
    }
  };
}
