import { toFunctionSelector } from "viem";
import { describe, expect, it } from "vitest";
import { classifyRevert, pushedSelectors, REVERT_SIGNATURES, scanBytecode } from "./signatures.js";

describe("classifyRevert", () => {
  it("keeps a tag the adapter already assigned", () => {
    expect(classifyRevert({ status: "reverted", data: null, message: "Mint is non-transferable", tag: "NON_TRANSFERABLE" })).toEqual({
      tag: "NON_TRANSFERABLE",
      detail: "Mint is non-transferable",
    });
  });

  it("matches revert strings case-insensitively", () => {
    expect(classifyRevert({ status: "reverted", data: null, message: "TransferHelper: TRANSFER_FROM_FAILED" }).tag).toBe(
      "TRANSFER_FAILED",
    );
    expect(classifyRevert({ status: "reverted", data: null, message: "UniswapV2: K" }).tag).toBe("K_INVARIANT");
    expect(classifyRevert({ status: "reverted", data: null, message: "Transfer amount exceeds the maxTxAmount." }).tag).toBe(
      "MAX_TX_EXCEEDED",
    );
    expect(classifyRevert({ status: "reverted", data: null, message: "Trading not open yet" }).tag).toBe("TRADING_DISABLED");
  });

  it("falls back to custom error selectors", () => {
    const data = `${toFunctionSelector("MaxWalletExceeded()")}`;
    expect(classifyRevert({ status: "reverted", data, message: "execution reverted" }).tag).toBe("MAX_WALLET_EXCEEDED");

    const withArgs = `${toFunctionSelector("ERC20InsufficientBalance(address,uint256,uint256)")}${"0".repeat(192)}`;
    expect(classifyRevert({ status: "reverted", data: withArgs, message: "execution reverted" }).tag).toBe("TRANSFER_FAILED");
  });

  it("reports anything else as unrecognized with the original detail", () => {
    expect(classifyRevert({ status: "reverted", data: "0xdeadbeef", message: "execution reverted" })).toEqual({
      tag: "UNRECOGNIZED_REVERT",
      detail: "execution reverted",
    });
  });

  it("covers at least ten distinct honeypot categories", () => {
    expect(new Set(REVERT_SIGNATURES.map((signature) => signature.tag)).size).toBeGreaterThanOrEqual(10);
  });
});

describe("bytecode selector scan", () => {
  it("reads PUSH4 immediates and skips other push data", () => {
    expect([...pushedSelectors("0x6312345678")]).toEqual(["0x12345678"]);
    expect(pushedSelectors("0x61631234").size).toBe(0);
  });

  it("detects blacklist and pause functions in the dispatcher", () => {
    const blacklist = toFunctionSelector("blacklist(address)").slice(2);
    const pause = toFunctionSelector("pause()").slice(2);
    expect(scanBytecode(`0x6080604052${"63"}${blacklist}14${"63"}${pause}14`)).toEqual({ blacklist: true, pause: true });
    expect(scanBytecode("0x6080604052")).toEqual({ blacklist: false, pause: false });
  });
});
