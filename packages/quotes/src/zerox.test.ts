import { afterEach, describe, expect, it, vi } from "vitest";
import { ApiKeyPool, InsufficientLiquidityError, NATIVE_ASSET, RateLimitedError } from "@tradeguard/core";
import { AggregatorQuoteProvider } from "./provider.js";
import { ZEROX_NATIVE_TOKEN, ZeroExQuoteProvider } from "./zerox.js";

const token = "0x1111111111111111111111111111111111111111";
const taker = "0x2222222222222222222222222222222222222222";
const spender = "0x0000000000001fF3684f28c67538d4D072C22734";
const settler = "0x3333333333333333333333333333333333333333";
const fixedNow = Date.parse("2026-03-01T12:00:00.000Z");

function quoteBody(allowance: { actual: string; spender: string } | null = null) {
  return {
    liquidityAvailable: true,
    buyAmount: "5000",
    minBuyAmount: "4950",
    sellAmount: "1000000000000000",
    buyToken: token,
    sellToken: ZEROX_NATIVE_TOKEN,
    issues: { allowance, balance: null, simulationIncomplete: false },
    route: { fills: [{ source: "Uniswap_V2", proportionBps: "5000" }, { source: "Uniswap_V2", proportionBps: "5000" }], tokens: [] },
    transaction: { to: settler, data: "0xabcdef", gas: "210000", gasPrice: "1000", value: "1000000000000000" },
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function providerWith(keys: string[]): ZeroExQuoteProvider {
  return new ZeroExQuoteProvider({
    baseUrl: "https://zerox.test",
    keys: new ApiKeyPool(keys, 60),
    quoteTtlSeconds: 20,
    now: () => fixedNow,
    sleep: async () => undefined,
  });
}

function headerOf(init: RequestInit | undefined, name: string): string | null {
  return new Headers(init?.headers).get(name);
}

describe("ZeroExQuoteProvider", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("quotes a native buy through the allowance-holder endpoint", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody()));

    const quote = await providerWith(["key-a"]).getQuote({
      chain: "base",
      sellToken: NATIVE_ASSET,
      buyToken: token,
      amount: 1_000_000_000_000_000n,
      slippageBps: 150,
      taker,
    });

    const [input, init] = fetchSpy.mock.calls[0] ?? [];
    const url = new URL(String(input));
    expect(url.pathname).toBe("/swap/allowance-holder/quote");
    expect(url.searchParams.get("chainId")).toBe("8453");
    expect(url.searchParams.get("sellToken")).toBe(ZEROX_NATIVE_TOKEN);
    expect(url.searchParams.get("slippageBps")).toBe("150");
    expect(headerOf(init, "0x-api-key")).toBe("key-a");
    expect(headerOf(init, "0x-version")).toBe("v2");
    expect(quote).toMatchObject({
      provider: "0x",
      route: ["Uniswap_V2"],
      buyAmount: 5000n,
      minReceived: 4950n,
      allowanceTarget: null,
      payload: { family: "evm", to: settler, data: "0xabcdef", value: 1_000_000_000_000_000n, gas: 210_000n },
      expiresAt: "2026-03-01T12:00:20.000Z",
    });
  });

  it("takes the allowance spender from the issues block when selling a token", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody({ actual: "0", spender })));
    const quote = await providerWith(["key-a"]).getQuote({
      chain: "ethereum",
      sellToken: token,
      buyToken: NATIVE_ASSET,
      amount: 5000n,
      slippageBps: 100,
      taker,
    });
    expect(quote.allowanceTarget).toBe(spender);
  });

  it("falls back to the transaction target when no allowance issue is reported", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody()));
    const quote = await providerWith(["key-a"]).getQuote({
      chain: "ethereum",
      sellToken: token,
      buyToken: NATIVE_ASSET,
      amount: 5000n,
      slippageBps: 100,
      taker,
    });
    expect(quote.allowanceTarget).toBe(settler);
  });

  it("rotates to the next key after a 429", async () => {
    const fetchSpy = vi
      .spyOn(global, "fetch")
      .mockImplementationOnce(async () => new Response("{}", { status: 429, headers: { "retry-after": "30" } }))
      .mockImplementationOnce(async () => json(quoteBody()));

    const quote = await providerWith(["key-a", "key-b"]).getQuote({
      chain: "base",
      sellToken: NATIVE_ASSET,
      buyToken: token,
      amount: 1n,
      slippageBps: 100,
      taker,
    });

    expect(quote.buyAmount).toBe(5000n);
    expect(headerOf(fetchSpy.mock.calls[0]?.[1], "0x-api-key")).toBe("key-a");
    expect(headerOf(fetchSpy.mock.calls[1]?.[1], "0x-api-key")).toBe("key-b");
  });

  it("surfaces RateLimitedError once every key is cooling down", async () => {
    const fetchSpy = vi
      .spyOn(global, "fetch")
      .mockImplementation(async () => new Response("{}", { status: 429, headers: { "retry-after": "30" } }));

    const error = await providerWith(["key-a", "key-b"])
      .getQuote({ chain: "base", sellToken: NATIVE_ASSET, buyToken: token, amount: 1n, slippageBps: 100, taker })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 30_000 });
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("reports missing liquidity without retrying", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockImplementation(async () => json({ liquidityAvailable: false, zid: "z" }));
    await expect(
      providerWith(["key-a"]).getQuote({ chain: "bsc", sellToken: NATIVE_ASSET, buyToken: token, amount: 1n, slippageBps: 100, taker }),
    ).rejects.toBeInstanceOf(InsufficientLiquidityError);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("retries upstream failures", async () => {
    const fetchSpy = vi
      .spyOn(global, "fetch")
      .mockImplementationOnce(async () => new Response("bad gateway", { status: 502 }))
      .mockImplementationOnce(async () => json(quoteBody()));
    const quote = await providerWith(["key-a"]).getQuote({
      chain: "arbitrum",
      sellToken: NATIVE_ASSET,
      buyToken: token,
      amount: 1n,
      slippageBps: 100,
      taker,
    });
    expect(quote.minReceived).toBe(4950n);
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });
});

describe("AggregatorQuoteProvider", () => {
  it("routes by chain family and rejects unconfigured families", async () => {
    const evm = { getQuote: vi.fn(async () => { throw new Error("evm called"); }) };
    const aggregator = new AggregatorQuoteProvider({ evm });
    const request = { chain: "base" as const, sellToken: NATIVE_ASSET, buyToken: token, amount: 1n, slippageBps: 100, taker };

    await expect(aggregator.getQuote(request)).rejects.toThrow("evm called");
    expect(evm.getQuote).toHaveBeenCalledWith(request);
    await expect(aggregator.getQuote({ ...request, chain: "solana" })).rejects.toThrow(
      "No quote provider configured for solana chains",
    );
  });
});
