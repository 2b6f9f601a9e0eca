import { parseGwei } from "viem";
import type { GasParams } from "@tradeguard/core";

export interface FeeInputs {
  supportsEip1559: boolean;
  /** Null when the latest block carries no base fee (pre-London or non-1559 chain). */
  baseFeePerGas: bigint | null;
  gasPrice: bigint;
  priorityFeeFloorGwei: number;
}

/**
 * EIP-1559 where the chain has a fee market: priority fee at the floor and
 * maxFee = 2 × baseFee + priority. Otherwise a legacy gasPrice.
 */
export function computeFeeParams(input: FeeInputs): GasParams {
  if (input.supportsEip1559 && input.baseFeePerGas !== null) {
    const priority = parseGwei(input.priorityFeeFloorGwei.toFixed(9));
    return {
      kind: "eip1559",
      baseFeePerGas: input.baseFeePerGas.toString(),
      maxPriorityFeePerGas: priority.toString(),
      maxFeePerGas: (2n * input.baseFeePerGas + priority).toString(),
    };
  }
  return { kind: "legacy", gasPrice: input.gasPrice.toString() };
}

/** 20% headroom over an estimate. */
export function padGas(estimate: bigint): bigint {
  return (estimate * 12n) / 10n;
}
