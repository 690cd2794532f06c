import type { RateLimiter } from './fetcher/rate-limiter.js';
import type { FetchError } from './fetcher/errors.js';
import type { Cookie } from './fetcher/cookies.js';

/**
 * Backoff settings for transient failures.
 */
export interface RetryConfig {
  /** Total attempts, the first one included. */
  maxAttempts: number;
  /** Ceiling on cumulative time spent across attempts and backoff waits. */
  maxTimeMs: number;
  /** First backoff interval; doubles on every further attempt. */
  baseDelayMs: number;
  /** 'full' picks a random wait in [0, interval]; 'none' waits the whole interval. */
  jitter: 'full' | 'none';
}

/**
 * Per-call fetch configuration. Treated as immutable by the engine.
 */
export interface FetchConfig {
  // Request shaping
  headers?: Readonly<Record<string, string>>;
  params?: Readonly<Record<string, string | number | boolean>>;
  cookies?: Readonly<Record<string, string>>;
  cookieJar?: readonly Cookie[];

  // Transport
  timeoutMs: number;
  followRedirects: boolean;
  verifyTls: boolean;
  proxy?: string;

  // Response gate
  expectedContentType?: string;

  // Throttling and retries
  rateLimiter?: RateLimiter;
  retry: RetryConfig;
}

/**
 * A successfully fetched response.
 */
export interface FetchResult {
  success: true;
  /** URL as requested. */
  url: string;
  /** URL of the last hop after redirects. */
  finalUrl: string;
  statusCode: number;
  content: Uint8Array;
  text: string;
  headers: Headers;
  elapsedMs: number;
  contentType: string;
  attempts: number;
}

/**
 * Either a result or a classified error, discriminated on `success`.
 */
export type FetchOutcome = FetchResult | FetchError;

/**
 * Passed to `onFailure` when a fetch ends in an error.
 */
export interface FailureContext {
  url: string;
  error: FetchError;
  attempts: number;
  elapsedMs: number;
}

export type SuccessCallback = (result: FetchResult) => void | Promise<void>;
export type FailureCallback = (context: FailureContext) => void | Promise<void>;

/**
 * Request headers sent when the config carries none. Some sites sniff
 * these, so the values must stay exactly as they are.
 */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
  'Cache-Control': 'max-age=0',
});

/**
 * Named requests-per-second profiles. Callers choose one explicitly.
 */
export const RATE_LIMIT_PRESETS = Object.freeze({
  standard: 5,
  bulk: 250,
});

export type RateLimitPreset = keyof typeof RATE_LIMIT_PRESETS;

export const DEFAULT_RETRY: Readonly<RetryConfig> = Object.freeze({
  maxAttempts: 3,
  maxTimeMs: 90_000,
  baseDelayMs: 1_000,
  jitter: 'full',
});

/**
 * Default configuration values, merged under user-provided partial config
 * by `resolveFetchConfig`.
 */
export const CONFIG_DEFAULTS: Readonly<Pick<FetchConfig, 'timeoutMs' | 'followRedirects' | 'verifyTls' | 'retry'>> =
  Object.freeze({
    timeoutMs: 30_000,
    followRedirects: true,
    verifyTls: true,
    retry: DEFAULT_RETRY,
  });
