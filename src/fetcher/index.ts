import {
  DEFAULT_HEADERS,
  type FailureCallback,
  type FetchConfig,
  type FetchOutcome,
  type FetchResult,
  type SuccessCallback,
} from '../types.js';
import { defaultLogger, type Logger } from '../logger.js';
import { systemClock, type Clock } from './clock.js';
import {
  createConnectionContext,
  type ConnectionContext,
  type TransportRequest,
  type TransportResponse,
} from './connection.js';
import { ConfigError, FetchError } from './errors.js';
import { parseRetryAfter } from './rate-limiter.js';
import { withRetry, type BackoffDetails } from './retry.js';
import { isValidUrl } from './url.js';

/**
 * Collaborators and hooks for a single fetch. None of these are part of
 * the (immutable) FetchConfig.
 */
export interface FetchOptions {
  /** Caller-owned pooled context. Never closed by the engine. */
  context?: ConnectionContext;
  onSuccess?: SuccessCallback;
  onFailure?: FailureCallback;
  /** Cancels the fetch, including rate-limit and backoff waits. */
  signal?: AbortSignal;
  logger?: Logger;
  validateUrl?: (url: string) => boolean;
  clock?: Clock;
}

/** Status codes a server uses to ask us to slow down. */
const RATE_LIMIT_STATUSES = new Set([429, 503]);

/**
 * Fetch one URL: validate, throttle, GET, classify, and retry transient
 * failures with exponential backoff.
 *
 * Resolves with a `FetchResult` or a classified `FetchError`. The only
 * rejection is a `ConfigError` raised by a collaborator.
 *
 * @example
 * ```typescript
 * const outcome = await fetchPage('https://example.com', resolveFetchConfig());
 * if (outcome.success) {
 *   console.log(outcome.statusCode, outcome.text.length);
 * } else {
 *   console.error(outcome.kind, outcome.message);
 * }
 * ```
 */
export async function fetchPage(
  url: string,
  config: FetchConfig,
  options: FetchOptions = {},
): Promise<FetchOutcome> {
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? defaultLogger;
  const validateUrl = options.validateUrl ?? isValidUrl;
  const startedAt = clock.now();
  let attempts = 0;

  const finish = (error: FetchError): FetchError => {
    error.attempts = Math.max(attempts, 1);
    runCallback(logger, 'onFailure', () =>
      options.onFailure?.({
        url,
        error,
        attempts: error.attempts,
        elapsedMs: clock.now() - startedAt,
      }),
    );
    return error;
  };

  if (!validateUrl(url)) {
    return finish(new FetchError('invalid-url', `Invalid URL format: ${url}`, url));
  }

  // Ad-hoc context for this call only; released on every exit path
  const ownsContext = options.context === undefined;
  const context = options.context ?? createConnectionContext();

  const attempt = async (): Promise<TransportResponse> => {
    attempts++;
    await config.rateLimiter?.wait(options.signal);
    // An attempt may not outlive the retry time budget
    const remaining = config.retry.maxTimeMs - (clock.now() - startedAt);
    const timeoutMs = remaining > 0 ? Math.min(config.timeoutMs, remaining) : config.timeoutMs;
    const response = await context.get(buildRequest(url, config, timeoutMs, options.signal));
    classifyResponse(url, response, config);
    return response;
  };

  const attemptWithRetry = withRetry(attempt, {
    maxAttempts: config.retry.maxAttempts,
    maxTimeMs: config.retry.maxTimeMs,
    baseDelayMs: config.retry.baseDelayMs,
    jitter: config.retry.jitter,
    isRetryable: (error) => error instanceof FetchError && error.retryable,
    retryDelayFor: retryAfterDelay,
    onBackoff: (details) => logBackoff(logger, url, details),
    clock,
    signal: options.signal,
  });

  try {
    const response = await attemptWithRetry();
    const result: FetchResult = {
      success: true,
      url,
      finalUrl: response.url,
      statusCode: response.statusCode,
      content: response.content,
      text: response.text,
      headers: response.headers,
      elapsedMs: clock.now() - startedAt,
      contentType: response.headers.get('content-type') ?? '',
      attempts,
    };
    runCallback(logger, 'onSuccess', () => options.onSuccess?.(result));
    return result;
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const fetchError = toFetchError(error, url, options.signal);
    logger.error(fetchError.message, { kind: fetchError.kind, attempts });
    return finish(fetchError);
  } finally {
    if (ownsContext) {
      await context.close();
    }
  }
}

/**
 * Assemble the transport request for one attempt. The config is only read.
 * An empty header map counts as none. Cookies are left to the transport,
 * which matches them against every redirect hop.
 */
function buildRequest(
  url: string,
  config: FetchConfig,
  timeoutMs: number,
  signal: AbortSignal | undefined,
): TransportRequest {
  const configured = config.headers;
  const headers =
    configured && Object.keys(configured).length > 0 ? configured : DEFAULT_HEADERS;

  return {
    url,
    headers: { ...headers },
    cookies: config.cookies,
    cookieJar: config.cookieJar,
    params: config.params,
    followRedirects: config.followRedirects,
    verifyTls: config.verifyTls,
    proxy: config.proxy,
    timeoutMs,
    signal,
  };
}

/**
 * Throw the FetchError a response maps to, if any.
 */
function classifyResponse(
  url: string,
  response: TransportResponse,
  config: FetchConfig,
): void {
  const { statusCode, headers } = response;

  if (RATE_LIMIT_STATUSES.has(statusCode)) {
    throw new FetchError(
      'rate-limited',
      `Rate limit exceeded: ${statusCode} for ${url}`,
      url,
      statusCode,
      headers,
    );
  }

  if (statusCode >= 400) {
    throw new FetchError(
      'http-status',
      `HTTP error for ${url}: ${statusCode}`,
      url,
      statusCode,
      headers,
    );
  }

  const contentType = headers.get('content-type') ?? '';
  if (config.expectedContentType && !contentType.includes(config.expectedContentType)) {
    throw new FetchError(
      'content-type-mismatch',
      `Expected content type '${config.expectedContentType}' but got '${contentType}'`,
      url,
      statusCode,
      headers,
    );
  }
}

/**
 * Honour Retry-After on rate-limited responses.
 */
function retryAfterDelay(error: unknown): number | undefined {
  if (!(error instanceof FetchError) || error.kind !== 'rate-limited') {
    return undefined;
  }
  const retryAfter = error.headers?.get('retry-after');
  return retryAfter ? parseRetryAfter(retryAfter) : undefined;
}

/**
 * Turn whatever ended the fetch into a FetchError. Aborts by the caller
 * take precedence over the error they caused downstream.
 */
function toFetchError(
  error: unknown,
  url: string,
  signal: AbortSignal | undefined,
): FetchError {
  if (signal?.aborted) {
    const reason: unknown = signal.reason;
    if (isTimeoutReason(reason)) {
      return new FetchError('timeout', `Deadline exceeded for ${url}`, url, undefined, undefined, {
        cause: reason,
      });
    }
    return new FetchError('unexpected', `Fetch aborted: ${url}`, url, undefined, undefined, {
      cause: reason,
    });
  }

  if (error instanceof FetchError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(
    'unexpected',
    `Unexpected error while loading ${url}: ${message}`,
    url,
    undefined,
    undefined,
    { cause: error },
  );
}

/**
 * `AbortSignal.timeout()` aborts with a DOMException named TimeoutError.
 */
function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  );
}

function logBackoff(logger: Logger, url: string, details: BackoffDetails): void {
  const kind = details.error instanceof FetchError ? details.error.kind : 'unknown';
  logger.warn(
    `Backing off ${(details.waitMs / 1000).toFixed(1)} seconds after ${details.attempt} tries for ${url}`,
    { kind },
  );
}

/**
 * Run a user callback without letting it affect the fetch outcome.
 * Sync throws and async rejections are logged and dropped.
 */
function runCallback(
  logger: Logger,
  name: string,
  callback: () => void | Promise<void> | undefined,
): void {
  const report = (error: unknown): void => {
    logger.error(
      `An exception was encountered while running the ${name} callback: ${
        error instanceof Error ? error.message : String(error)
      }`,
    );
  };

  try {
    const returned = callback();
    if (returned instanceof Promise) {
      returned.catch(report);
    }
  } catch (error) {
    report(error);
  }
}

// Re-export types and utilities for external use
export { FetchError, ConfigError, isFetchError } from './errors.js';
export type { FetchErrorKind } from './errors.js';
export { RateLimiter, createRateLimiter, parseRetryAfter } from './rate-limiter.js';
export type { RateLimiterConfig } from './rate-limiter.js';
export { withRetry, backoffDelay } from './retry.js';
export type { RetryPolicy, BackoffDetails } from './retry.js';
export { createConnectionContext, MAX_REDIRECTS, decodeBody } from './connection.js';
export type {
  ConnectionContext,
  ConnectionContextOptions,
  TransportRequest,
  TransportResponse,
} from './connection.js';
export { loadCookieFile, parseCookieFile, matchCookies } from './cookies.js';
export type { Cookie } from './cookies.js';
export { isValidUrl } from './url.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
