import { readFileSync } from 'node:fs';
import type { ScrapeSessionOptions } from '../sdk/index.js';
import { loadCookieFile } from '../fetcher/cookies.js';
import { RATE_LIMIT_PRESETS, type RateLimitPreset } from '../types.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  input?: string;
  preset: string;
  rps?: string;
  rateLimit?: boolean;
  timeout?: string;
  header?: string[];
  param?: string[];
  cookie?: string[];
  cookieFile?: string;
  expectType?: string;
  proxy?: string;
  insecure?: boolean;
  followRedirects?: boolean;
  maxAttempts?: string;
  maxTime?: string;
  concurrency?: string;
  strict?: boolean;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Parse --header values from "key:value" format into a Record.
 * Splits on the first colon to allow colons in the value.
 *
 * @param headers - Array of "key:value" strings
 * @returns A Record mapping header names to values
 * @throws Error if a header value does not contain a colon
 */
export function parseHeaders(headers: string[]): Record<string, string> {
  return parsePairs(headers, ':', 'header', 'key:value');
}

/**
 * Parse repeated "name=value" options (--param, --cookie) into a Record.
 * Splits on the first equals sign.
 */
export function parseAssignments(values: string[], label: string): Record<string, string> {
  return parsePairs(values, '=', label, 'name=value');
}

function parsePairs(
  values: string[],
  separator: string,
  label: string,
  expected: string,
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const entry of values) {
    const index = entry.indexOf(separator);
    if (index === -1) {
      throw new Error(`Invalid ${label} format: "${entry}". Expected "${expected}" format.`);
    }
    const key = entry.slice(0, index).trim();
    if (!key) {
      throw new Error(`Invalid ${label} format: "${entry}". Name cannot be empty.`);
    }
    result[key] = entry.slice(index + 1).trim();
  }

  return result;
}

/**
 * Parse a numeric option, rejecting anything that is not a finite number.
 */
export function parseNumber(value: string, flag: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new Error(`Invalid value for ${flag}: "${value}". Expected a number.`);
  }
  return parsed;
}

function isPreset(value: string): value is RateLimitPreset {
  return Object.hasOwn(RATE_LIMIT_PRESETS, value);
}

/**
 * Read URLs from a file, one per line. Blank lines and lines starting
 * with '#' are skipped.
 */
export function readUrlFile(filePath: string): string[] {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new Error(
      `Cannot read URL file "${filePath}": ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Collect the URLs to fetch: positional arguments first, then --input.
 */
export function collectUrls(urls: string[], options: CLIOptions): string[] {
  const fromFile = options.input !== undefined ? readUrlFile(options.input) : [];
  return [...urls, ...fromFile];
}

/**
 * Build scrape session options from the parsed CLI options.
 *
 * Only sets properties that were explicitly provided; the SDK's own
 * default merging handles the rest.
 *
 * @param options - The parsed commander options
 * @returns Options for createScrapeSession
 */
export function buildSessionOptions(options: CLIOptions): ScrapeSessionOptions {
  const session: ScrapeSessionOptions = {};

  // Throttling
  if (options.rateLimit !== false) {
    if (options.rps !== undefined) {
      session.requestsPerSecond = parseNumber(options.rps, '--rps');
    } else if (isPreset(options.preset)) {
      session.preset = options.preset;
    } else {
      throw new Error(
        `Invalid preset "${options.preset}". Must be one of: ${Object.keys(RATE_LIMIT_PRESETS).join(', ')}`,
      );
    }
  }

  // Request shaping
  if (options.header !== undefined && options.header.length > 0) {
    session.headers = parseHeaders(options.header);
  }
  if (options.param !== undefined && options.param.length > 0) {
    session.params = parseAssignments(options.param, 'param');
  }
  if (options.cookie !== undefined && options.cookie.length > 0) {
    session.cookies = parseAssignments(options.cookie, 'cookie');
  }
  if (options.cookieFile !== undefined) {
    session.cookieJar = loadCookieFile(options.cookieFile);
  }

  // Transport
  if (options.timeout !== undefined) {
    session.timeoutMs = parseNumber(options.timeout, '--timeout');
  }
  // Commander negated option: --no-follow-redirects sets followRedirects to false
  if (options.followRedirects === false) {
    session.followRedirects = false;
  }
  if (options.insecure) {
    session.verifyTls = false;
  }
  if (options.proxy !== undefined) {
    session.proxy = options.proxy;
  }
  if (options.expectType !== undefined) {
    session.expectedContentType = options.expectType;
  }

  // Retries
  const retry: NonNullable<ScrapeSessionOptions['retry']> = {};
  if (options.maxAttempts !== undefined) {
    retry.maxAttempts = parseNumber(options.maxAttempts, '--max-attempts');
  }
  if (options.maxTime !== undefined) {
    retry.maxTimeMs = parseNumber(options.maxTime, '--max-time');
  }
  if (Object.keys(retry).length > 0) {
    session.retry = retry;
  }

  // Batch
  if (options.concurrency !== undefined) {
    session.concurrency = parseNumber(options.concurrency, '--concurrency');
  }
  session.failurePolicy = options.strict ? 'fail-together' : 'collect';

  return session;
}
