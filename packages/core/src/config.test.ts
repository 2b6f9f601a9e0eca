import { describe, expect, it } from "vitest";
import { maskAddress, parseConfig } from "./config.js";

describe("parseConfig", () => {
  it("applies defaults", () => {
    const config = parseConfig({}, "/srv/tradeguard");
    expect(config.MODE).toBe("paper");
    expect(config.DB_PATH).toBe("/srv/tradeguard/data/tradeguard.db");
    expect(config.BLOCK_BELOW_SCORE).toBe(3);
    expect(config.SAFE_MODE_MIN_SCORE).toBe(7);
    expect(config.EXEC_MAX_ATTEMPTS).toBe(3);
    expect(config.MIRROR_SELL_ENABLED).toBe(true);
    expect(config.MIRROR_BUY_ENABLED).toBe(false);
    expect(config.ZEROX_API_KEYS).toEqual([]);
  });

  it("splits comma separated pools", () => {
    const config = parseConfig({ ZEROX_API_KEYS: " key-a, key-b ,,", MIRROR_TRACKED_WALLETS: "0xabc" }, "/srv");
    expect(config.ZEROX_API_KEYS).toEqual(["key-a", "key-b"]);
    expect(config.MIRROR_TRACKED_WALLETS).toEqual(["0xabc"]);
  });

  it("keeps an in-memory database path", () => {
    expect(parseConfig({ DB_PATH: ":memory:" }, "/srv").DB_PATH).toBe(":memory:");
  });

  it("requires a key directory in live mode", () => {
    expect(() => parseConfig({ MODE: "live" }, "/srv")).toThrow("MODE=live requires KEY_DIR");
    expect(parseConfig({ MODE: "live", KEY_DIR: "keys" }, "/srv").KEY_DIR).toBe("/srv/keys");
  });

  it("rejects unordered score boundaries", () => {
    expect(() => parseConfig({ SCORE_LOW_MIN: "9" }, "/srv")).toThrow(
      "Score boundaries must satisfy SAFE >= LOW >= MEDIUM >= HIGH",
    );
  });

  it("rejects a safe-mode threshold below the block threshold", () => {
    expect(() => parseConfig({ SAFE_MODE_MIN_SCORE: "2" }, "/srv")).toThrow(
      "SAFE_MODE_MIN_SCORE cannot be lower than BLOCK_BELOW_SCORE",
    );
  });

  it("rejects a poll interval under five seconds", () => {
    expect(() => parseConfig({ MIRROR_POLL_SECONDS: "3" }, "/srv")).toThrow();
  });
});

describe("maskAddress", () => {
  it("keeps head and tail", () => {
    expect(maskAddress("0x1234567890abcdef")).toBe("0x1234...cdef");
    expect(maskAddress("short")).toBe("N/A");
    expect(maskAddress(undefined)).toBe("N/A");
  });
});
