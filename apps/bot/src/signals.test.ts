import { describe, expect, it, vi } from "vitest";
import { CHAINS, Logger, type ChainId, type MarketDataProvider, type TokenIdentity } from "@tradeguard/core";
import { SignalFactory, type ObservedSwap } from "./signals.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function factory(market: MarketDataProvider): SignalFactory {
  return new SignalFactory({
    resolveToken: async (chain: ChainId, address: string): Promise<TokenIdentity> => ({
      chain,
      address,
      decimals: 6,
      symbol: "TEST",
    }),
    market,
    logger: new Logger({ component: "SIGNALS", level: "ERROR", quiet: true }),
    now: () => NOW,
  });
}

const observed: ObservedSwap = {
  id: "sig-1",
  chain: "solana",
  wallet: "Wallet1111111111111111111111111111111111111",
  side: "BUY",
  tokenAddress: "Mint111111111111111111111111111111111111111",
  tokenAmountRaw: 1_500_000n,
  nativeSpentRaw: 2_000_000_000n,
};

describe("SignalFactory", () => {
  it("prices the native spend of a buy", async () => {
    const getPrice = vi.fn(async () => ({ usdPrice: 150, asOf: NOW.toISOString() }));
    const signal = await factory({ getPrice, getLiquidity: async () => 0 }).build(observed);

    expect(signal).toEqual({
      id: "sig-1",
      sourceWallet: observed.wallet,
      side: "BUY",
      token: { chain: "solana", address: observed.tokenAddress, decimals: 6, symbol: "TEST" },
      observedAmountRaw: "1500000",
      observedAmountUsd: 300,
      discoveredAt: "2026-03-01T12:00:00.000Z",
    });
    expect(getPrice).toHaveBeenCalledWith({
      chain: "solana",
      address: CHAINS.solana.wrappedNative,
      decimals: 9,
      symbol: "SOL",
    });
  });

  it("leaves the USD amount empty for sells", async () => {
    const getPrice = vi.fn(async () => ({ usdPrice: 150, asOf: NOW.toISOString() }));
    const signal = await factory({ getPrice, getLiquidity: async () => 0 }).build({
      ...observed,
      side: "SELL",
      nativeSpentRaw: null,
    });

    expect(signal.observedAmountUsd).toBeNull();
    expect(getPrice).not.toHaveBeenCalled();
  });

  it("leaves the USD amount empty when no price is available", async () => {
    const signal = await factory({
      getPrice: async () => {
        throw new Error("price feed down");
      },
      getLiquidity: async () => 0,
    }).build(observed);

    expect(signal.observedAmountUsd).toBeNull();
  });
});
