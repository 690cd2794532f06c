import { z } from 'zod';
import {
  CONFIG_DEFAULTS,
  type FetchConfig,
  type FetchOutcome,
  type RateLimitPreset,
  type RetryConfig,
} from '../types.js';
import { fetchPage, type FetchOptions } from '../fetcher/index.js';
import { RateLimiter, createRateLimiter } from '../fetcher/rate-limiter.js';
import {
  createConnectionContext,
  type ConnectionContextOptions,
} from '../fetcher/connection.js';
import { ConfigError } from '../fetcher/errors.js';
import type { Clock } from '../fetcher/clock.js';
import type { Logger } from '../logger.js';
import { fetchAll, type BatchOptions, type FailurePolicy } from '../batch/index.js';

/**
 * What callers may pass: any subset of FetchConfig, with retry settings
 * merged field by field.
 */
export type FetchConfigInput = Partial<Omit<FetchConfig, 'retry'>> & {
  retry?: Partial<RetryConfig>;
};

const cookieSchema = z.object({
  domain: z.string(),
  includeSubdomains: z.boolean(),
  path: z.string(),
  secure: z.boolean(),
  expiry: z.number(),
  name: z.string(),
  value: z.string(),
});

const retrySchema = z.object({
  maxAttempts: z.number().int().min(1).default(CONFIG_DEFAULTS.retry.maxAttempts),
  maxTimeMs: z.number().nonnegative().default(CONFIG_DEFAULTS.retry.maxTimeMs),
  baseDelayMs: z.number().nonnegative().default(CONFIG_DEFAULTS.retry.baseDelayMs),
  jitter: z.enum(['full', 'none']).default(CONFIG_DEFAULTS.retry.jitter),
});

const fetchConfigSchema = z.object({
  headers: z.record(z.string()).optional(),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  cookies: z.record(z.string()).optional(),
  cookieJar: z.array(cookieSchema).optional(),
  timeoutMs: z.number().positive().default(CONFIG_DEFAULTS.timeoutMs),
  followRedirects: z.boolean().default(CONFIG_DEFAULTS.followRedirects),
  verifyTls: z.boolean().default(CONFIG_DEFAULTS.verifyTls),
  proxy: z.string().url().optional(),
  expectedContentType: z.string().min(1).optional(),
  rateLimiter: z.instanceof(RateLimiter).optional(),
  retry: retrySchema.default({}),
});

/**
 * Validate user config and merge it over CONFIG_DEFAULTS.
 *
 * Always returns a fresh, frozen object (nested maps included), so no
 * caller can alter the defaults or another call's config.
 *
 * @param input - Partial config; omitted fields take their defaults
 * @throws ConfigError listing every invalid field
 */
export function resolveFetchConfig(input: FetchConfigInput = {}): FetchConfig {
  const parsed = fetchConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid fetch config: ${issues}`);
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    headers: config.headers && Object.freeze({ ...config.headers }),
    params: config.params && Object.freeze({ ...config.params }),
    cookies: config.cookies && Object.freeze({ ...config.cookies }),
    cookieJar: config.cookieJar && Object.freeze(config.cookieJar.map((cookie) => Object.freeze(cookie))),
    retry: Object.freeze({ ...config.retry }),
  });
}

/**
 * Options for a scrape session. The throttle is picked explicitly:
 * a named preset, a rate, or a ready RateLimiter. With none of them the
 * session is unthrottled.
 */
export interface ScrapeSessionOptions extends FetchConfigInput {
  preset?: RateLimitPreset;
  requestsPerSecond?: number;
  logger?: Logger;
  clock?: Clock;
  connection?: ConnectionContextOptions;
  concurrency?: number;
  failurePolicy?: FailurePolicy;
}

/**
 * A logical scrape session: one rate limiter and one pooled connection
 * context shared by every fetch made through it.
 */
export interface ScrapeSession {
  readonly config: FetchConfig;
  readonly rateLimiter?: RateLimiter;
  fetch(url: string, options?: Omit<FetchOptions, 'context'>): Promise<FetchOutcome>;
  fetchAll(urls: readonly string[], options?: Omit<BatchOptions, 'context'>): Promise<FetchOutcome[]>;
  /** Release pooled connections. Fetches after close fail as `unexpected`. */
  close(): Promise<void>;
}

/**
 * Create a scrape session.
 *
 * @example
 * ```typescript
 * const session = createScrapeSession({ preset: 'standard', expectedContentType: 'text/html' });
 * try {
 *   const outcomes = await session.fetchAll(urls);
 * } finally {
 *   await session.close();
 * }
 * ```
 */
export function createScrapeSession(options: ScrapeSessionOptions = {}): ScrapeSession {
  const {
    preset,
    requestsPerSecond,
    logger,
    clock,
    connection,
    concurrency,
    failurePolicy,
    ...configInput
  } = options;

  if (preset !== undefined && requestsPerSecond !== undefined) {
    throw new ConfigError('Pass either preset or requestsPerSecond, not both');
  }

  const rate = requestsPerSecond ?? preset;
  const rateLimiter =
    configInput.rateLimiter ?? (rate !== undefined ? createRateLimiter(rate, clock) : undefined);
  const config = resolveFetchConfig({ ...configInput, rateLimiter });
  const context = createConnectionContext(connection);

  return {
    config,
    rateLimiter,

    fetch(url, fetchOptions = {}) {
      return fetchPage(url, config, { logger, clock, ...fetchOptions, context });
    },

    fetchAll(urls, batchOptions = {}) {
      return fetchAll(urls, config, {
        logger,
        clock,
        concurrency,
        failurePolicy,
        ...batchOptions,
        context,
      });
    },

    close() {
      return context.close();
    },
  };
}

// Re-export building blocks for advanced usage
export { fetchPage } from '../fetcher/index.js';
export type { FetchOptions } from '../fetcher/index.js';
export {
  FetchError,
  ConfigError,
  isFetchError,
  RateLimiter,
  createRateLimiter,
  parseRetryAfter,
  withRetry,
  backoffDelay,
  createConnectionContext,
  decodeBody,
  MAX_REDIRECTS,
  loadCookieFile,
  parseCookieFile,
  matchCookies,
  isValidUrl,
  systemClock,
} from '../fetcher/index.js';
export type {
  FetchErrorKind,
  RateLimiterConfig,
  RetryPolicy,
  BackoffDetails,
  ConnectionContext,
  ConnectionContextOptions,
  TransportRequest,
  TransportResponse,
  Cookie,
  Clock,
} from '../fetcher/index.js';
export { fetchAll, fetchSequential, BatchError } from '../batch/index.js';
export type { BatchOptions, FailurePolicy } from '../batch/index.js';
export { createLogger, silentLogger, defaultLogger } from '../logger.js';
export type { Logger, LogLevel } from '../logger.js';
export {
  CONFIG_DEFAULTS,
  DEFAULT_HEADERS,
  DEFAULT_RETRY,
  RATE_LIMIT_PRESETS,
} from '../types.js';
export type {
  FetchConfig,
  FetchResult,
  FetchOutcome,
  FailureContext,
  RetryConfig,
  RateLimitPreset,
  SuccessCallback,
  FailureCallback,
} from '../types.js';

export default fetchAll;
