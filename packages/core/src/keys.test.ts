import { describe, expect, it } from "vitest";
import { ApiKeyPool } from "./keys.js";

describe("ApiKeyPool", () => {
  it("rotates round-robin", () => {
    const pool = new ApiKeyPool(["key-1", "key-2"], 60);
    expect(pool.acquire(0)).toBe("key-1");
    expect(pool.acquire(0)).toBe("key-2");
    expect(pool.acquire(0)).toBe("key-1");
  });

  it("skips keys in cooldown until it elapses", () => {
    const pool = new ApiKeyPool(["key-1", "key-2"], 60);
    pool.markCooldown("key-1", 0);
    expect(pool.acquire(0)).toBe("key-2");
    expect(pool.acquire(0)).toBe("key-2");
    pool.markCooldown("key-2", 0);
    expect(pool.acquire(30_000)).toBeNull();
    expect(pool.msUntilAvailable(30_000)).toBe(30_000);
    expect(pool.acquire(60_000)).toBe("key-1");
  });

  it("drops blanks and duplicates", () => {
    const pool = new ApiKeyPool(["key-1", "", "key-1", " "], 60);
    expect(pool.size).toBe(1);
  });

  it("returns null for an empty pool", () => {
    const pool = new ApiKeyPool([], 60);
    expect(pool.acquire()).toBeNull();
    expect(pool.msUntilAvailable()).toBe(0);
  });

  it("ignores cooldowns for unknown keys", () => {
    const pool = new ApiKeyPool(["key-1"], 60);
    pool.markCooldown("other", 0);
    expect(pool.acquire(0)).toBe("key-1");
  });
});
