import PQueue from 'p-queue';
import type { FetchConfig, FetchOutcome } from '../types.js';
import { fetchPage, type FetchOptions } from '../fetcher/index.js';
import {
  createConnectionContext,
  type ConnectionContext,
} from '../fetcher/connection.js';
import { ConfigError, FetchError } from '../fetcher/errors.js';

/**
 * How a batch reports failed URLs.
 *
 * - collect: every outcome is returned inline, errors included
 * - fail-together: once all fetches finish, the first failure (in input
 *   order) is thrown as a BatchError
 */
export type FailurePolicy = 'collect' | 'fail-together';

/**
 * Options for a batch. Callbacks, signal, logger and clock are handed to
 * every fetch in the batch.
 */
export interface BatchOptions extends Omit<FetchOptions, 'context'> {
  /** Maximum in-flight fetches. Defaults to one per URL. */
  concurrency?: number;
  failurePolicy?: FailurePolicy;
  /** Caller-owned context; when absent the batch creates and closes its own. */
  context?: ConnectionContext;
}

/**
 * Thrown by fail-together batches. Carries every outcome so callers can
 * still use the URLs that succeeded.
 */
export class BatchError extends Error {
  constructor(
    public readonly firstError: FetchError,
    public readonly outcomes: FetchOutcome[],
  ) {
    const failed = outcomes.filter((outcome) => !outcome.success).length;
    super(`${failed} of ${outcomes.length} fetches failed; first: ${firstError.message}`);
    this.name = 'BatchError';
  }
}

/**
 * Fetch many URLs concurrently over one pooled connection context.
 *
 * Every URL gets its own fetch (with its own retries); a failure never
 * cancels its siblings. The returned array lines up with `urls`
 * regardless of completion order.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter('standard');
 * const outcomes = await fetchAll(urls, resolveFetchConfig({ rateLimiter: limiter }));
 * const pages = outcomes.filter((outcome) => outcome.success);
 * ```
 */
export async function fetchAll(
  urls: readonly string[],
  config: FetchConfig,
  options: BatchOptions = {},
): Promise<FetchOutcome[]> {
  const concurrency = options.concurrency ?? Infinity;
  if (!(concurrency === Infinity || (Number.isInteger(concurrency) && concurrency >= 1))) {
    throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const queue = new PQueue({ concurrency });
  const { fetchOptions, context, ownsContext } = shareContext(options);

  try {
    const outcomes = await Promise.all(
      urls.map((url) =>
        queue.add(() => fetchPage(url, config, fetchOptions), { throwOnTimeout: true }),
      ),
    );
    return applyFailurePolicy(outcomes, options.failurePolicy);
  } finally {
    // Let stragglers finish before the pool goes away
    await queue.onIdle();
    if (ownsContext) {
      await context.close();
    }
  }
}

/**
 * Fetch URLs one after another over one pooled connection context.
 * Same outcomes and failure policy as `fetchAll`, without concurrency.
 */
export async function fetchSequential(
  urls: readonly string[],
  config: FetchConfig,
  options: BatchOptions = {},
): Promise<FetchOutcome[]> {
  const { fetchOptions, context, ownsContext } = shareContext(options);

  try {
    const outcomes: FetchOutcome[] = [];
    for (const url of urls) {
      outcomes.push(await fetchPage(url, config, fetchOptions));
    }
    return applyFailurePolicy(outcomes, options.failurePolicy);
  } finally {
    if (ownsContext) {
      await context.close();
    }
  }
}

function shareContext(options: BatchOptions): {
  fetchOptions: FetchOptions;
  context: ConnectionContext;
  ownsContext: boolean;
} {
  const context = options.context ?? createConnectionContext();
  return {
    fetchOptions: {
      context,
      onSuccess: options.onSuccess,
      onFailure: options.onFailure,
      signal: options.signal,
      logger: options.logger,
      validateUrl: options.validateUrl,
      clock: options.clock,
    },
    context,
    ownsContext: options.context === undefined,
  };
}

function applyFailurePolicy(
  outcomes: FetchOutcome[],
  policy: FailurePolicy = 'collect',
): FetchOutcome[] {
  if (policy === 'fail-together') {
    const firstError = outcomes.find(
      (outcome): outcome is FetchError => !outcome.success,
    );
    if (firstError) {
      throw new BatchError(firstError, outcomes);
    }
  }
  return outcomes;
}
