import { RATE_LIMIT_PRESETS, type RateLimitPreset } from '../types.js';
import { ConfigError } from './errors.js';
import { systemClock, type Clock } from './clock.js';

/**
 * Configuration for the RateLimiter.
 */
export interface RateLimiterConfig {
  /** Maximum number of requests per second. Must be > 0. */
  requestsPerSecond: number;
  /** Time source; defaults to the monotonic system clock. */
  clock?: Clock;
}

/**
 * Single-slot throttle enforcing a minimum interval between requests.
 *
 * Meant to be shared by every fetch in a scrape session. Each caller
 * claims the next free slot (`max(now, last + minInterval)`) before it
 * pauses, and because that read-modify-write runs synchronously on the
 * event loop, concurrent waiters come out spaced by `minInterval`.
 * There is no FIFO fairness beyond that.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private lastRequestAt = Number.NEGATIVE_INFINITY;
  private readonly clock: Clock;

  constructor(config: RateLimiterConfig) {
    const rps = config.requestsPerSecond;
    if (!Number.isFinite(rps) || rps <= 0) {
      throw new ConfigError(
        `requestsPerSecond must be a positive number, got ${String(rps)}`,
      );
    }
    this.minIntervalMs = 1000 / rps;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Suspend until the caller may issue its request.
   *
   * @param signal - Aborts the pause; the reserved slot is not released
   */
  async wait(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const delay = this.reserve();
    if (delay > 0) {
      await this.clock.sleep(delay, signal);
    }
  }

  /**
   * Blocking variant of `wait()`. Stalls the whole thread, so only use it
   * from code that has nothing else to run meanwhile.
   */
  waitSync(): void {
    const delay = this.reserve();
    if (delay > 0) {
      Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, delay);
    }
  }

  /**
   * Timestamp of the most recently granted slot (for testing/inspection).
   */
  getLastRequestAt(): number {
    return this.lastRequestAt;
  }

  /**
   * Claim the next slot and return how long to pause before it starts.
   */
  private reserve(): number {
    const now = this.clock.now();
    const slot = Math.max(now, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;
    return slot - now;
  }
}

/**
 * Build a RateLimiter from a named preset or an explicit rate.
 */
export function createRateLimiter(
  rate: RateLimitPreset | number,
  clock?: Clock,
): RateLimiter {
  const requestsPerSecond =
    typeof rate === 'number' ? rate : RATE_LIMIT_PRESETS[rate];
  return new RateLimiter({ requestsPerSecond, clock });
}

/**
 * Parse a Retry-After header value.
 * Can be either a number of seconds or an HTTP-date string.
 *
 * @param value - The Retry-After header value
 * @param now - Wall-clock reference for HTTP-dates
 * @returns Delay in milliseconds, or undefined if unparseable
 */
export function parseRetryAfter(
  value: string,
  now: number = Date.now(),
): number | undefined {
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }

  const seconds = Number(trimmed);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    // A date in the past means "retry now"
    return Math.max(0, date - now);
  }

  return undefined;
}
