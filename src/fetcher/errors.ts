/**
 * Classification of a failed fetch.
 */
export type FetchErrorKind =
  | 'invalid-url'
  | 'connection-failure'
  | 'timeout'
  | 'too-many-redirects'
  | 'http-status'
  | 'rate-limited'
  | 'content-type-mismatch'
  | 'unexpected';

/** Kinds worth another attempt. */
const RETRYABLE_KINDS: ReadonlySet<FetchErrorKind> = new Set([
  'connection-failure',
  'timeout',
  'http-status',
  'rate-limited',
]);

/**
 * Error returned when a fetch fails. Doubles as the failure variant of
 * `FetchOutcome`, so `success` is always false.
 */
export class FetchError extends Error {
  readonly success = false as const;
  /** Number of attempts made; filled in when the fetch ends. */
  attempts = 0;

  constructor(
    public readonly kind: FetchErrorKind,
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    public readonly headers?: Headers,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Thrown for caller contract violations such as a non-positive rate.
 * Never returned as an outcome.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Narrow an unknown value to a FetchError.
 */
export function isFetchError(value: unknown): value is FetchError {
  return value instanceof FetchError;
}

/**
 * Shape of a Node.js system error (ECONNREFUSED and friends).
 */
export interface SystemError extends Error {
  code: string;
}

export function isSystemError(error: unknown): error is SystemError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
