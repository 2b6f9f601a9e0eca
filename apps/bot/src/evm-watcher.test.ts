import { custom, encodeFunctionData, numberToHex, type Hex } from "viem";
import { describe, expect, it, vi } from "vitest";
import { CHAINS, Logger, type LogEntry } from "@tradeguard/core";
import { decodeRouterSwap, EvmMempoolWatcher, mirroredSwapAbi, type PendingTransaction } from "./evm-watcher.js";
import type { ObservedSwap } from "./signals.js";

const ROUTER = CHAINS.base.router;
const WETH = CHAINS.base.wrappedNative;
const TOKEN = "0xabababababababababababababababababababab";
const WALLET = "0x1111111111111111111111111111111111111111";
const HASH: Hex = `0x${"aa".repeat(32)}`;

function buyInput(): Hex {
  return encodeFunctionData({
    abi: mirroredSwapAbi,
    functionName: "swapExactETHForTokens",
    args: [500n, [WETH, TOKEN], WALLET, 9_999_999_999n],
  });
}

function pending(overrides: Partial<PendingTransaction> = {}): PendingTransaction {
  return { hash: HASH, from: WALLET, to: ROUTER, input: buyInput(), value: 10n ** 17n, ...overrides };
}

describe("decodeRouterSwap", () => {
  it("reads a native-for-token buy", () => {
    expect(decodeRouterSwap("base", pending())).toEqual({
      id: HASH,
      chain: "base",
      wallet: WALLET,
      side: "BUY",
      tokenAddress: TOKEN,
      tokenAmountRaw: 500n,
      nativeSpentRaw: 10n ** 17n,
    });
  });

  it("reads a token-for-native sell", () => {
    const input = encodeFunctionData({
      abi: mirroredSwapAbi,
      functionName: "swapExactTokensForETHSupportingFeeOnTransferTokens",
      args: [7_000n, 1n, [TOKEN, WETH], WALLET, 9_999_999_999n],
    });

    expect(decodeRouterSwap("base", pending({ input, value: 0n }))).toMatchObject({
      side: "SELL",
      tokenAddress: TOKEN,
      tokenAmountRaw: 7_000n,
      nativeSpentRaw: null,
    });
  });

  it("uses the input ceiling for exact-output sells", () => {
    const input = encodeFunctionData({
      abi: mirroredSwapAbi,
      functionName: "swapTokensForExactETH",
      args: [10n ** 16n, 9_000n, [TOKEN, WETH], WALLET, 9_999_999_999n],
    });

    expect(decodeRouterSwap("base", pending({ input, value: 0n }))?.tokenAmountRaw).toBe(9_000n);
  });

  it("ignores calls to other contracts and unknown selectors", () => {
    expect(decodeRouterSwap("base", pending({ to: TOKEN }))).toBeNull();
    expect(decodeRouterSwap("base", pending({ to: null }))).toBeNull();
    expect(decodeRouterSwap("base", pending({ input: "0xdeadbeef" }))).toBeNull();
  });
});

describe("EvmMempoolWatcher", () => {
  function rpcTransaction(from: string): Record<string, unknown> {
    return {
      hash: HASH,
      from,
      to: ROUTER,
      input: buyInput(),
      value: numberToHex(10n ** 17n),
      nonce: "0x1",
      gas: "0x30d40",
      gasPrice: "0x3b9aca00",
      type: "0x0",
      v: "0x1b",
      r: "0x1",
      s: "0x1",
      chainId: numberToHex(CHAINS.base.chainIdNum),
      blockHash: null,
      blockNumber: null,
      transactionIndex: null,
    };
  }

  function watcherFor(from: string, onSwap: (swap: ObservedSwap) => Promise<void>, entries: LogEntry[] = []) {
    return new EvmMempoolWatcher({
      chain: "base",
      transport: custom({
        async request({ method }: { method: string }) {
          if (method === "eth_getTransactionByHash") {
            return rpcTransaction(from);
          }
          throw new Error(`unexpected ${method}`);
        },
      }),
      trackedWallets: () => [WALLET],
      onSwap,
      logger: new Logger({
        component: "MEMPOOL",
        level: "DEBUG",
        quiet: true,
        sink: {
          write: (entry) => {
            entries.push(entry);
          },
        },
      }),
    });
  }

  it("hands swaps from tracked wallets to the callback", async () => {
    const onSwap = vi.fn(async (_swap: ObservedSwap) => undefined);

    await watcherFor(WALLET, onSwap).inspect(HASH);

    expect(onSwap).toHaveBeenCalledTimes(1);
    expect(onSwap.mock.calls[0]?.[0]).toMatchObject({ side: "BUY", tokenAddress: TOKEN, wallet: WALLET });
  });

  it("skips transactions from other senders", async () => {
    const onSwap = vi.fn(async (_swap: ObservedSwap) => undefined);

    await watcherFor("0x2222222222222222222222222222222222222222", onSwap).inspect(HASH);

    expect(onSwap).not.toHaveBeenCalled();
  });

  it("logs a failed submission without throwing", async () => {
    const entries: LogEntry[] = [];
    const failing = async (): Promise<void> => {
      throw new Error("queue closed");
    };
    const watcher = watcherFor(WALLET, failing, entries);

    await watcher.inspect(HASH);

    expect(entries.map((entry) => entry.code)).toEqual(["MIRROR_SUBMIT_FAIL"]);
    expect(entries[0]?.data).toMatchObject({ chain: "base", error: "queue closed" });
  });
});
