import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  RateLimiter,
  createRateLimiter,
  parseRetryAfter,
  ConfigError,
} from "../fetcher/index.js";
import { sleep, type Clock } from "../fetcher/clock.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Clock backed by the faked Date and setTimeout, so advancing the fake
 * timers moves both `now()` and pending sleeps.
 */
const fakeClock: Clock = {
  now: () => Date.now(),
  sleep,
};

// ---------------------------------------------------------------------------
// 1. parseRetryAfter
// ---------------------------------------------------------------------------
describe("parseRetryAfter", () => {
  it("should parse delta-seconds into milliseconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
    expect(parseRetryAfter("0")).toBe(0);
    expect(parseRetryAfter(" 1.5 ")).toBe(1500);
  });

  it("should parse an HTTP-date relative to now", () => {
    const now = 1_000_000;
    const header = new Date(1_010_000).toUTCString();
    expect(parseRetryAfter(header, now)).toBe(10_000);
  });

  it("should clamp a date in the past to zero", () => {
    const header = new Date(0).toUTCString();
    expect(parseRetryAfter(header, 1_000_000)).toBe(0);
  });

  it("should return undefined for empty, negative or garbage values", () => {
    expect(parseRetryAfter("")).toBeUndefined();
    expect(parseRetryAfter("   ")).toBeUndefined();
    expect(parseRetryAfter("-5")).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// 2. Construction
// ---------------------------------------------------------------------------
describe("RateLimiter construction", () => {
  it("should derive the minimum interval from the rate", () => {
    expect(new RateLimiter({ requestsPerSecond: 5 }).minIntervalMs).toBe(200);
    expect(new RateLimiter({ requestsPerSecond: 0.5 }).minIntervalMs).toBe(2000);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    "should reject requestsPerSecond = %s",
    (rps) => {
      expect(() => new RateLimiter({ requestsPerSecond: rps })).toThrow(ConfigError);
    },
  );

  it("should build limiters from named presets or explicit rates", () => {
    expect(createRateLimiter("standard").minIntervalMs).toBe(200);
    expect(createRateLimiter("bulk").minIntervalMs).toBe(4);
    expect(createRateLimiter(10).minIntervalMs).toBe(100);
  });

  it("should start with no granted slot", () => {
    expect(new RateLimiter({ requestsPerSecond: 1 }).getLastRequestAt()).toBe(
      Number.NEGATIVE_INFINITY,
    );
  });
});

// ---------------------------------------------------------------------------
// 3. wait()
// ---------------------------------------------------------------------------
describe("RateLimiter.wait", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should let the first request through immediately", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    const start = Date.now();

    await limiter.wait();

    expect(Date.now()).toBe(start);
    expect(limiter.getLastRequestAt()).toBe(start);
  });

  it("should space sequential requests by the minimum interval", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    const start = Date.now();
    const grantedAt: number[] = [];

    const run = (async () => {
      for (let i = 0; i < 10; i++) {
        await limiter.wait();
        grantedAt.push(Date.now() - start);
      }
    })();

    await vi.advanceTimersByTimeAsync(2000);
    await run;

    expect(grantedAt).toEqual([0, 200, 400, 600, 800, 1000, 1200, 1400, 1600, 1800]);
  });

  it("should not delay a request that arrives after the interval has passed", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    await limiter.wait();

    await vi.advanceTimersByTimeAsync(500);
    const before = Date.now();
    await limiter.wait();

    expect(Date.now()).toBe(before);
  });

  it("should space concurrent waiters instead of releasing them together", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    const start = Date.now();
    const grantedAt: number[] = [];

    const waiters = [0, 1, 2].map(() =>
      limiter.wait().then(() => {
        grantedAt.push(Date.now() - start);
      }),
    );

    await vi.advanceTimersByTimeAsync(400);
    await Promise.all(waiters);

    expect(grantedAt).toEqual([0, 200, 400]);
    expect(limiter.getLastRequestAt()).toBe(start + 400);
  });

  it("should reject with the abort reason when the signal fires during the pause", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    await limiter.wait();

    const controller = new AbortController();
    const pending = limiter.wait(controller.signal).catch((e: unknown) => e);
    controller.abort(new Error("stop"));

    const error = await pending;
    expect(error).toBeInstanceOf(Error);
    expect(error).toHaveProperty("message", "stop");
  });

  it("should reject immediately when the signal is already aborted", async () => {
    const limiter = new RateLimiter({ requestsPerSecond: 5, clock: fakeClock });
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(limiter.wait(controller.signal)).rejects.toThrow("cancelled");
    expect(limiter.getLastRequestAt()).toBe(Number.NEGATIVE_INFINITY);
  });
});

// ---------------------------------------------------------------------------
// 4. waitSync()
// ---------------------------------------------------------------------------
describe("RateLimiter.waitSync", () => {
  it("should block the thread for the minimum interval between calls", () => {
    const limiter = new RateLimiter({ requestsPerSecond: 50 });
    const start = performance.now();

    for (let i = 0; i < 4; i++) {
      limiter.waitSync();
    }

    // Three 20ms gaps after the first call, with a little timer slack
    expect(performance.now() - start).toBeGreaterThanOrEqual(55);
  });
});
