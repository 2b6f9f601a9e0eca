import { decodeErrorResult, decodeFunctionResult, encodeFunctionData, maxUint256, type Address, type Hex } from "viem";
import { applyBps, shortfallPct, type RawScenarioOutcome, type ScenarioRun } from "@tradeguard/core";
import { routerAbi, tokenAbi } from "./abi.js";

/** Share of the expected buy output that the sell leg sells back. */
export const SELL_SHARE_BPS = 3_000;
/** Share of the expected buy output that the transfer leg sends on. */
export const TRANSFER_SHARE_BPS = 1_000;

export interface ScenarioLayout {
  trader: Address;
  recipient: Address;
  token: Address;
  router: Address;
  wrappedNative: Address;
  buyValue: bigint;
  /** Router quote for the buy; 0 when the quote itself reverted. */
  expectedTokensOut: bigint;
  deadline: bigint;
}

export interface ScenarioCall {
  account: Address;
  to: Address;
  data: Hex;
  value?: bigint;
}

export interface CallResult {
  status: "success" | "failure";
  data: Hex;
  gasUsed: bigint;
  errorMessage: string | null;
}

export const CALL_INDEX = {
  buy: 0,
  traderBalance: 1,
  approve: 2,
  sellQuote: 3,
  sell: 4,
  nativeBack: 5,
  transfer: 6,
  recipientBalance: 7,
} as const;

export function sizeScenarioAmounts(expectedTokensOut: bigint): { sellAmount: bigint; transferAmount: bigint } {
  const sellAmount = applyBps(expectedTokensOut, SELL_SHARE_BPS);
  const transferAmount = applyBps(expectedTokensOut, TRANSFER_SHARE_BPS);
  return {
    sellAmount: sellAmount > 0n ? sellAmount : 1n,
    transferAmount: transferAmount > 0n ? transferAmount : 1n,
  };
}

/** Calls of the single simulated block, in CALL_INDEX order, all from the ephemeral trader. */
export function buildScenarioCalls(layout: ScenarioLayout): ScenarioCall[] {
  const { sellAmount, transferAmount } = sizeScenarioAmounts(layout.expectedTokensOut);
  const buyPath: Address[] = [layout.wrappedNative, layout.token];
  const sellPath: Address[] = [layout.token, layout.wrappedNative];
  const from = layout.trader;

  return [
    {
      account: from,
      to: layout.router,
      value: layout.buyValue,
      data: encodeFunctionData({
        abi: routerAbi,
        functionName: "swapExactETHForTokensSupportingFeeOnTransferTokens",
        args: [0n, buyPath, from, layout.deadline],
      }),
    },
    {
      account: from,
      to: layout.token,
      data: encodeFunctionData({ abi: tokenAbi, functionName: "balanceOf", args: [from] }),
    },
    {
      account: from,
      to: layout.token,
      data: encodeFunctionData({ abi: tokenAbi, functionName: "approve", args: [layout.router, maxUint256] }),
    },
    {
      account: from,
      to: layout.router,
      data: encodeFunctionData({ abi: routerAbi, functionName: "getAmountsOut", args: [sellAmount, sellPath] }),
    },
    {
      account: from,
      to: layout.router,
      data: encodeFunctionData({
        abi: routerAbi,
        functionName: "swapExactTokensForTokensSupportingFeeOnTransferTokens",
        args: [sellAmount, 0n, sellPath, from, layout.deadline],
      }),
    },
    {
      account: from,
      to: layout.wrappedNative,
      data: encodeFunctionData({ abi: tokenAbi, functionName: "balanceOf", args: [from] }),
    },
    {
      account: from,
      to: layout.token,
      data: encodeFunctionData({ abi: tokenAbi, functionName: "transfer", args: [layout.recipient, transferAmount] }),
    },
    {
      account: from,
      to: layout.token,
      data: encodeFunctionData({ abi: tokenAbi, functionName: "balanceOf", args: [layout.recipient] }),
    },
  ];
}

/** Human readable revert reason: Error(string) and Panic(uint256) are decoded, anything else falls back. */
export function describeRevert(data: Hex, fallback: string | null): string {
  if (data === "0x") {
    return fallback ?? "execution reverted";
  }
  try {
    const decoded = decodeErrorResult({ abi: [], data });
    const first = decoded.args?.[0];
    if (decoded.errorName === "Error" && typeof first === "string") {
      return first;
    }
    if (decoded.errorName === "Panic" && typeof first === "bigint") {
      return `Panic(0x${first.toString(16)})`;
    }
    return fallback ?? decoded.errorName;
  } catch {
    return fallback ?? `execution reverted (${data.slice(0, 10)})`;
  }
}

function toOutcome(result: CallResult | undefined): RawScenarioOutcome {
  if (!result) {
    return { status: "reverted", data: null, message: "call result missing" };
  }
  if (result.status === "success") {
    return { status: "success", gasUsed: result.gasUsed };
  }
  return {
    status: "reverted",
    data: result.data === "0x" ? null : result.data,
    message: describeRevert(result.data, result.errorMessage),
  };
}

function readUint(result: CallResult | undefined): bigint | null {
  if (!result || result.status !== "success") {
    return null;
  }
  return decodeFunctionResult({ abi: tokenAbi, functionName: "balanceOf", data: result.data });
}

function readAmountsOutTail(result: CallResult | undefined): bigint | null {
  if (!result || result.status !== "success") {
    return null;
  }
  const amounts = decodeFunctionResult({ abi: routerAbi, functionName: "getAmountsOut", data: result.data });
  return amounts[amounts.length - 1] ?? null;
}

export function interpretScenarioResults(layout: ScenarioLayout, results: readonly CallResult[]): ScenarioRun {
  const at = (index: number): CallResult | undefined => results[index];
  const { transferAmount } = sizeScenarioAmounts(layout.expectedTokensOut);

  const buy = toOutcome(at(CALL_INDEX.buy));
  const approve = at(CALL_INDEX.approve);
  const sell = approve && approve.status === "failure" ? toOutcome(approve) : toOutcome(at(CALL_INDEX.sell));
  const transfer = toOutcome(at(CALL_INDEX.transfer));

  const received = buy.status === "success" ? readUint(at(CALL_INDEX.traderBalance)) : null;
  const expectedBack = sell.status === "success" ? readAmountsOutTail(at(CALL_INDEX.sellQuote)) : null;
  const nativeBack = sell.status === "success" ? readUint(at(CALL_INDEX.nativeBack)) : null;
  const delivered = transfer.status === "success" ? readUint(at(CALL_INDEX.recipientBalance)) : null;

  return {
    outcomes: { BUY: buy, SELL: sell, TRANSFER: transfer },
    taxes: {
      buyPct: received === null ? null : shortfallPct(layout.expectedTokensOut, received),
      sellPct: expectedBack === null || nativeBack === null ? null : shortfallPct(expectedBack, nativeBack),
      transferPct: delivered === null ? null : shortfallPct(transferAmount, delivered),
    },
    flags: [],
  };
}
