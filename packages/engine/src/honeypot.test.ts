import { toFunctionSelector } from "viem";
import { describe, expect, it } from "vitest";
import { SimulationUnavailableError } from "@tradeguard/core";
import { HoneypotSimulator, type SimulationPolicy } from "./honeypot.js";
import { AdapterRegistry } from "./registry.js";
import { cleanRun, FakeChainAdapter, TOKEN } from "./test-helpers.js";

const policy: SimulationPolicy = {
  buyAmountNative: 0.05,
  timeoutMs: 8_000,
  maxBuyTaxPct: 10,
  maxSellTaxPct: 15,
  maxTransferTaxPct: 5,
};

function simulatorWith(adapter: FakeChainAdapter): HoneypotSimulator {
  return new HoneypotSimulator({
    adapters: new AdapterRegistry([adapter]),
    policy,
    now: () => new Date("2026-01-01T00:00:00.000Z"),
  });
}

describe("HoneypotSimulator", () => {
  it("reports a clean token with gas estimates and no flags", async () => {
    const adapter = new FakeChainAdapter();
    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(adapter.plans).toEqual([{ token: TOKEN, buyAmountRaw: 50_000_000_000_000_000n, timeoutMs: 8_000 }]);
    expect(result.scenarios.BUY).toEqual({
      scenario: "BUY",
      outcome: { status: "SUCCESS" },
      informational: false,
      gasEstimate: "150000",
    });
    expect(result.scenarios.SELL.outcome).toEqual({ status: "SUCCESS" });
    expect(result.flags).toEqual([]);
    expect(result.createdAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("tags a sell that reverts in the token transfer", async () => {
    const adapter = new FakeChainAdapter();
    adapter.run = {
      ...cleanRun(),
      outcomes: {
        ...cleanRun().outcomes,
        SELL: { status: "reverted", data: null, message: "TransferHelper: TRANSFER_FROM_FAILED" },
      },
    };

    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(result.scenarios.SELL).toEqual({
      scenario: "SELL",
      outcome: { status: "REVERTED", reason: "TRANSFER_FAILED", detail: "TransferHelper: TRANSFER_FROM_FAILED" },
      informational: false,
      gasEstimate: null,
    });
    expect(result.flags).toEqual(["SELL_BLOCKED"]);
  });

  it("marks sell and transfer informational when the buy fails", async () => {
    const adapter = new FakeChainAdapter();
    adapter.run = {
      ...cleanRun(),
      outcomes: {
        BUY: { status: "reverted", data: toFunctionSelector("TradingNotEnabled()"), message: "execution reverted" },
        SELL: { status: "reverted", data: null, message: "execution reverted" },
        TRANSFER: { status: "success", gasUsed: null },
      },
    };

    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(result.scenarios.BUY.outcome).toMatchObject({ status: "REVERTED", reason: "TRADING_DISABLED" });
    expect(result.scenarios.SELL.informational).toBe(true);
    expect(result.scenarios.SELL.outcome).toMatchObject({ reason: "UNRECOGNIZED_REVERT" });
    expect(result.scenarios.TRANSFER.informational).toBe(true);
    expect(result.flags).toEqual(["BUY_BLOCKED", "SELL_BLOCKED"]);
  });

  it("raises limit and tax flags without failing the scenarios", async () => {
    const adapter = new FakeChainAdapter();
    adapter.run = {
      outcomes: {
        ...cleanRun().outcomes,
        TRANSFER: { status: "reverted", data: null, message: "Transfer amount exceeds the maxTxAmount." },
      },
      taxes: { buyPct: 12, sellPct: 20, transferPct: 6 },
      flags: ["FREEZE_AUTHORITY"],
    };

    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(result.scenarios.BUY.outcome.status).toBe("SUCCESS");
    expect(result.flags).toEqual([
      "FREEZE_AUTHORITY",
      "TRANSFER_BLOCKED",
      "MAX_TX_LIMIT",
      "HIGH_BUY_TAX",
      "HIGH_SELL_TAX",
      "TRANSFER_TAX",
    ]);
    expect(result.taxes).toEqual({ buyPct: 12, sellPct: 20, transferPct: 6 });
  });

  it("flags blacklist and pause functions found in bytecode", async () => {
    const adapter = new FakeChainAdapter();
    const selector = toFunctionSelector("addBots(address[])").slice(2);
    adapter.code = `0x608060405263${selector}14`;

    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(result.flags).toEqual(["BLACKLIST_FUNCTION_PRESENT"]);
  });

  it("maps timeouts and marks later scenarios informational", async () => {
    const adapter = new FakeChainAdapter();
    adapter.run = {
      outcomes: { BUY: { status: "timeout" }, SELL: { status: "timeout" }, TRANSFER: { status: "timeout" } },
      taxes: { buyPct: null, sellPct: null, transferPct: null },
      flags: [],
    };

    const result = await simulatorWith(adapter).simulate(TOKEN);

    expect(result.scenarios.BUY).toEqual({ scenario: "BUY", outcome: { status: "TIMEOUT" }, informational: false, gasEstimate: null });
    expect(result.scenarios.SELL.informational).toBe(true);
    expect(result.flags).toEqual([]);
  });

  it("throws SimulationUnavailable when no context can be obtained", async () => {
    const adapter = new FakeChainAdapter();
    adapter.contextError = new Error("method eth_simulateV1 not found");

    await expect(simulatorWith(adapter).simulate(TOKEN)).rejects.toBeInstanceOf(SimulationUnavailableError);
    expect(adapter.plans).toHaveLength(0);
  });

  it("throws SimulationUnavailable for chains without an adapter", async () => {
    const simulator = simulatorWith(new FakeChainAdapter("bsc"));
    await expect(simulator.simulate(TOKEN)).rejects.toMatchObject({ code: "SIMULATION_UNAVAILABLE" });
  });
});
