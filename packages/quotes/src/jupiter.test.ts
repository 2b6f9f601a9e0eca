import { afterEach, describe, expect, it, vi } from "vitest";
import { InsufficientLiquidityError, NATIVE_ASSET, QuoteUnavailableError, RateLimitedError, WSOL_MINT } from "@tradeguard/core";
import { JupiterClient, JupiterQuoteProvider } from "./jupiter.js";

const mint = "7GCihgDB8fe6KNjn2MYtkzZcRjQy3t9GHdC8uHYmW2hr";
const taker = "9xQeWvG816bUx9EPjHmaT23yvVM2ZWbrrpZb9PusVFin";

function quoteBody(outAmount = "2500000") {
  return {
    inputMint: WSOL_MINT,
    outputMint: mint,
    inAmount: "100000000",
    outAmount,
    otherAmountThreshold: "2475000",
    swapMode: "ExactIn",
    slippageBps: 100,
    priceImpactPct: "0.01",
    routePlan: [
      { percent: 60, swapInfo: { ammKey: "a", label: "Raydium", inputMint: WSOL_MINT, outputMint: mint, inAmount: "60000000", outAmount: "1500000" } },
      { percent: 40, swapInfo: { ammKey: "b", label: "Orca", inputMint: WSOL_MINT, outputMint: mint, inAmount: "40000000", outAmount: "1000000" } },
      { percent: 100, swapInfo: { ammKey: "c", label: "Raydium", inputMint: mint, outputMint: mint, inAmount: "1", outAmount: "1" } },
    ],
    contextSlot: 1,
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("JupiterClient", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("requests an ExactIn quote with the given parameters", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody()));
    const client = new JupiterClient("https://quote.test/v6/");

    const quote = await client.getQuote({ inputMint: WSOL_MINT, outputMint: mint, amount: "100000000", slippageBps: 100 });

    expect(quote.outAmount).toBe("2500000");
    const url = new URL(String(fetchSpy.mock.calls[0]?.[0]));
    expect(url.origin + url.pathname).toBe("https://quote.test/v6/quote");
    expect(url.searchParams.get("swapMode")).toBe("ExactIn");
    expect(url.searchParams.get("slippageBps")).toBe("100");
  });

  it("maps a missing route to InsufficientLiquidityError", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () =>
      json({ error: "Could not find any route", errorCode: "COULD_NOT_FIND_ANY_ROUTE" }, 400),
    );
    const client = new JupiterClient("https://quote.test/v6");
    await expect(
      client.getQuote({ inputMint: WSOL_MINT, outputMint: mint, amount: "1", slippageBps: 50 }),
    ).rejects.toBeInstanceOf(InsufficientLiquidityError);
  });

  it("maps 429 to RateLimitedError with the advertised delay", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () => new Response("slow down", { status: 429, headers: { "retry-after": "2" } }));
    const client = new JupiterClient("https://quote.test/v6");
    const error = await client
      .getQuote({ inputMint: WSOL_MINT, outputMint: mint, amount: "1", slippageBps: 50 })
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterMs: 2000 });
  });

  it("retries a failed quote before giving up", async () => {
    const fetchSpy = vi
      .spyOn(global, "fetch")
      .mockImplementationOnce(async () => new Response("upstream", { status: 502 }))
      .mockImplementationOnce(async () => json(quoteBody()));
    const client = new JupiterClient("https://quote.test/v6");

    const quote = await client.getQuoteWithRetries({ inputMint: WSOL_MINT, outputMint: mint, amount: "1", slippageBps: 50 }, 2, 1);

    expect(quote.inAmount).toBe("100000000");
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it("rejects malformed quote bodies", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () => json({ inAmount: 5 }));
    const client = new JupiterClient("https://quote.test/v6");
    await expect(
      client.getQuote({ inputMint: WSOL_MINT, outputMint: mint, amount: "1", slippageBps: 50 }),
    ).rejects.toBeInstanceOf(QuoteUnavailableError);
  });

  it("summarises unique route labels in order", () => {
    const client = new JupiterClient("https://quote.test/v6");
    expect(client.parseRouteSummary(quoteBody())).toEqual(["Raydium", "Orca"]);
  });
});

describe("JupiterQuoteProvider", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds a swap transaction for the taker with the configured priority fee", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockImplementation(async (input) => {
      const url = String(input);
      if (url.includes("/quote")) {
        return json(quoteBody());
      }
      return json({ swapTransaction: "AQID", lastValidBlockHeight: 321 });
    });
    const provider = new JupiterQuoteProvider(new JupiterClient("https://quote.test/v6"), {
      priorityFeeLamports: 5000,
      quoteTtlSeconds: 30,
      now: () => Date.parse("2026-01-01T00:00:00.000Z"),
    });

    const quote = await provider.getQuote({
      chain: "solana",
      sellToken: NATIVE_ASSET,
      buyToken: mint,
      amount: 100_000_000n,
      slippageBps: 100,
      taker,
    });

    const quoteUrl = new URL(String(fetchSpy.mock.calls[0]?.[0]));
    expect(quoteUrl.searchParams.get("inputMint")).toBe(WSOL_MINT);
    const swapInit = fetchSpy.mock.calls[1]?.[1];
    const swapBody: unknown = JSON.parse(String(swapInit?.body));
    expect(swapBody).toMatchObject({
      userPublicKey: taker,
      prioritizationFeeLamports: 5000,
      quoteResponse: { contextSlot: 1 },
    });
    expect(quote).toMatchObject({
      provider: "jupiter",
      sellToken: NATIVE_ASSET,
      buyAmount: 2_500_000n,
      minReceived: 2_475_000n,
      route: ["Raydium", "Orca"],
      allowanceTarget: null,
      payload: { family: "solana", serialized: "AQID", lastValidBlockHeight: 321 },
      expiresAt: "2026-01-01T00:00:30.000Z",
    });
  });

  it("skips the swap build for quote-only requests", async () => {
    const fetchSpy = vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody()));
    const provider = new JupiterQuoteProvider(new JupiterClient("https://quote.test/v6"), {
      priorityFeeLamports: 0,
      quoteTtlSeconds: 30,
    });

    const quote = await provider.getQuote({
      chain: "solana",
      sellToken: mint,
      buyToken: NATIVE_ASSET,
      amount: 10n,
      slippageBps: 100,
      taker,
      quoteOnly: true,
    });

    expect(quote.payload).toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it("treats a zero-output route as no liquidity", async () => {
    vi.spyOn(global, "fetch").mockImplementation(async () => json(quoteBody("0")));
    const provider = new JupiterQuoteProvider(new JupiterClient("https://quote.test/v6"), {
      priorityFeeLamports: 0,
      quoteTtlSeconds: 30,
    });
    await expect(
      provider.getQuote({ chain: "solana", sellToken: NATIVE_ASSET, buyToken: mint, amount: 10n, slippageBps: 100, taker }),
    ).rejects.toBeInstanceOf(InsufficientLiquidityError);
  });
});
