import { afterEach, describe, expect, it, vi } from "vitest";
import { RateLimitedError, TransientNetworkError } from "./errors.js";
import { TimeoutElapsedError, backoffDelayMs, parseRetryAfter, withBackoff, withTimeout } from "./retry.js";

describe("withBackoff", () => {
  it("retries retryable errors with exponential delays", async () => {
    const delays: number[] = [];
    let calls = 0;
    const result = await withBackoff(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new TransientNetworkError("socket hang up");
        }
        return "done";
      },
      {
        maxAttempts: 3,
        baseBackoffMs: 100,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );
    expect(result).toBe("done");
    expect(delays).toEqual([100, 200]);
  });

  it("surfaces non-retryable errors immediately", async () => {
    let calls = 0;
    await expect(
      withBackoff(
        async () => {
          calls += 1;
          throw new Error("execution reverted");
        },
        { maxAttempts: 3, baseBackoffMs: 1, sleep: async () => undefined },
      ),
    ).rejects.toThrow("execution reverted");
    expect(calls).toBe(1);
  });

  it("gives up after the attempt bound", async () => {
    let calls = 0;
    await expect(
      withBackoff(
        async () => {
          calls += 1;
          throw new RateLimitedError("0x");
        },
        { maxAttempts: 2, baseBackoffMs: 1, sleep: async () => undefined },
      ),
    ).rejects.toBeInstanceOf(RateLimitedError);
    expect(calls).toBe(2);
  });
});

describe("backoffDelayMs", () => {
  it("honours a longer retry-after hint", () => {
    expect(backoffDelayMs(1, 500)).toBe(500);
    expect(backoffDelayMs(3, 500)).toBe(2_000);
    expect(backoffDelayMs(1, 500, new RateLimitedError("goplus", 5_000))).toBe(5_000);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects when the operation outlives the timeout", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 1_000, "simulateBlocks");
    const assertion = expect(pending).rejects.toThrow("simulateBlocks timed out after 1000ms");
    await vi.advanceTimersByTimeAsync(1_000);
    await assertion;
  });

  it("passes through a fast result", async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000)).resolves.toBe(42);
  });

  it("is an Error subclass callers can narrow on", () => {
    expect(new TimeoutElapsedError("x", 1)).toBeInstanceOf(Error);
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds and HTTP dates", () => {
    const now = Date.parse("2026-01-01T00:00:00.000Z");
    expect(parseRetryAfter("3", now)).toBe(3000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:05 GMT", now)).toBe(5000);
    expect(parseRetryAfter(null, now)).toBeNull();
    expect(parseRetryAfter("soon", now)).toBeNull();
  });
});
