import { custom, keccak256, toHex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { describe, expect, it } from "vitest";
import { CHAINS, RateLimitedError, TransientNetworkError, type EvmChainConfig, type UnsignedTransaction } from "@tradeguard/core";
import { EvmChainAdapter, classifyRpcError, toAddress } from "./adapter.js";

const testKey = new Uint8Array(32).fill(7);
const owner = privateKeyToAccount(toHex(testKey)).address;
const pendingHash = `0x${"ab".repeat(32)}`;
const revertedHash = `0x${"cd".repeat(32)}`;

function adapterWith(handler: (method: string, params: unknown) => unknown, chain: EvmChainConfig = CHAINS.base): EvmChainAdapter {
  return new EvmChainAdapter({
    chain,
    priorityFeeFloorGwei: 1.5,
    transport: custom({
      async request({ method, params }: { method: string; params?: unknown }) {
        return handler(method, params);
      },
    }, { retryCount: 0 }),
  });
}

function unsignedFrom(from: string): Extract<UnsignedTransaction, { family: "evm" }> {
  return {
    family: "evm",
    chain: "base",
    from,
    to: "0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24",
    data: "0x",
    value: 1_000n,
    nonce: 4,
    gas: 210_000n,
    fees: { kind: "eip1559", baseFeePerGas: "1000", maxFeePerGas: "1500002000", maxPriorityFeePerGas: "1500000000" },
  };
}

describe("EvmChainAdapter", () => {
  it("returns null for a pending receipt and the status otherwise", async () => {
    const adapter = adapterWith((method, params) => {
      if (method !== "eth_getTransactionReceipt" || !Array.isArray(params)) {
        throw new Error(`unexpected ${method}`);
      }
      return params[0] === pendingHash ? null : { status: "0x0", transactionHash: revertedHash };
    });
    await expect(adapter.getReceipt(pendingHash)).resolves.toBeNull();
    await expect(adapter.getReceipt(revertedHash)).resolves.toBe("reverted");
  });

  it("signs an EIP-1559 transaction and precomputes its hash", async () => {
    const adapter = adapterWith((method) => {
      throw new Error(`no network expected, got ${method}`);
    });
    const signed = await adapter.signTransaction(unsignedFrom(owner), testKey);
    expect(signed.raw.startsWith("0x02")).toBe(true);
    expect(signed.hash).toBe(keccak256(Buffer.from(signed.raw.slice(2), "hex")));
    expect(signed.chain).toBe("base");
  });

  it("refuses a key that does not match the sender", async () => {
    const adapter = adapterWith(() => null);
    await expect(
      adapter.signTransaction(unsignedFrom("0x1111111111111111111111111111111111111111"), testKey),
    ).rejects.toThrow("Key material does not belong to the transaction sender");
  });

  it("signs legacy transactions on chains without a fee market", async () => {
    const adapter = adapterWith(() => null, CHAINS.bsc);
    const unsigned: UnsignedTransaction = { ...unsignedFrom(owner), chain: "bsc", fees: { kind: "legacy", gasPrice: "3000000000" } };
    const signed = await adapter.signTransaction(unsigned, testKey);
    expect(signed.raw.startsWith("0xf8")).toBe(true);
  });

  it("maps a missing simulation context to SimulationUnavailableError", async () => {
    const adapter = adapterWith(() => {
      throw new Error("connection refused");
    });
    await expect(adapter.getSimulationContext()).rejects.toMatchObject({ code: "SIMULATION_UNAVAILABLE" });
  });

  it("treats empty bytecode as no contract", async () => {
    const adapter = adapterWith((method) => (method === "eth_getCode" ? "0x" : null));
    await expect(adapter.getCode("0x3333333333333333333333333333333333333333")).resolves.toBeNull();
  });
});

describe("classifyRpcError", () => {
  it("separates rate limits from transient failures", () => {
    expect(classifyRpcError(new Error("HTTP 429 Too Many Requests"), "base")).toBeInstanceOf(RateLimitedError);
    expect(classifyRpcError(new Error("socket hang up"), "base")).toBeInstanceOf(TransientNetworkError);
    const other = new Error("insufficient funds for gas");
    expect(classifyRpcError(other, "base")).toBe(other);
  });
});

describe("toAddress", () => {
  it("checksums valid addresses and rejects junk", () => {
    expect(toAddress("0x4752ba5dbc23f44d87826276bf6fd6b1c372ad24")).toBe("0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24");
    expect(() => toAddress("not-an-address")).toThrow("Invalid EVM address: not-an-address");
  });
});
