import { describe, expect, it } from "vitest";
import { computeFeeParams, padGas } from "./fees.js";

describe("computeFeeParams", () => {
  it("builds EIP-1559 fields with maxFee = 2 x baseFee + priority", () => {
    expect(
      computeFeeParams({
        supportsEip1559: true,
        baseFeePerGas: 10_000_000_000n,
        gasPrice: 12_000_000_000n,
        priorityFeeFloorGwei: 1.5,
      }),
    ).toEqual({
      kind: "eip1559",
      baseFeePerGas: "10000000000",
      maxPriorityFeePerGas: "1500000000",
      maxFeePerGas: "21500000000",
    });
  });

  it("reads a fractional gwei floor that prints in exponent notation", () => {
    expect(
      computeFeeParams({ supportsEip1559: true, baseFeePerGas: 1_000n, gasPrice: 1n, priorityFeeFloorGwei: 1e-7 }),
    ).toMatchObject({ maxPriorityFeePerGas: "100", maxFeePerGas: "2100" });
  });

  it("falls back to legacy gasPrice on chains without a fee market", () => {
    expect(
      computeFeeParams({ supportsEip1559: false, baseFeePerGas: 0n, gasPrice: 3_000_000_000n, priorityFeeFloorGwei: 1.5 }),
    ).toEqual({ kind: "legacy", gasPrice: "3000000000" });
  });

  it("uses legacy when the block has no base fee", () => {
    expect(
      computeFeeParams({ supportsEip1559: true, baseFeePerGas: null, gasPrice: 5n, priorityFeeFloorGwei: 1 }),
    ).toEqual({ kind: "legacy", gasPrice: "5" });
  });
});

describe("padGas", () => {
  it("adds 20%", () => {
    expect(padGas(100_000n)).toBe(120_000n);
  });
});
