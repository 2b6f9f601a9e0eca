import { toFunctionSelector } from "viem";
import type { RawScenarioOutcome, RevertTag } from "@tradeguard/core";

interface RevertSignature {
  tag: RevertTag;
  /** Lower-case substrings matched against the revert message. */
  messages: string[];
  /** Custom errors whose 4-byte selector identifies the tag. */
  errors: string[];
}

/** Ordered: the first matching entry wins. */
export const REVERT_SIGNATURES: readonly RevertSignature[] = [
  {
    tag: "BLACKLISTED",
    messages: ["blacklist", "blocklist", "bot detected", "is a bot", "sniper"],
    errors: ["Blacklisted()", "Blacklisted(address)", "AddressBlacklisted(address)", "BotDetected()"],
  },
  {
    tag: "TRADING_DISABLED",
    messages: ["trading not", "trading is not", "trading disabled", "trading has not", "not open yet", "not launched"],
    errors: ["TradingNotEnabled()", "TradingNotOpen()", "TradingClosed()", "TradingNotStarted()"],
  },
  {
    tag: "MAX_TX_EXCEEDED",
    messages: ["max tx", "maxtx", "max transaction", "exceeds the maxtransactionamount", "transfer amount exceeds the max"],
    errors: ["MaxTxAmountExceeded()", "MaxTransactionExceeded()", "ExceedsMaxTxAmount()"],
  },
  {
    tag: "MAX_WALLET_EXCEEDED",
    messages: ["max wallet", "maxwallet", "max holding", "exceeds the maxwalletsize", "wallet limit"],
    errors: ["MaxWalletExceeded()", "ExceedsMaxWallet()", "MaxWalletAmountExceeded()"],
  },
  {
    tag: "COOLDOWN_ACTIVE",
    messages: ["cooldown", "cool down", "one buy per block", "only one purchase per block"],
    errors: ["CooldownActive()", "TransferDelayEnabled()"],
  },
  {
    tag: "PAUSED",
    messages: ["paused", "pausable"],
    errors: ["EnforcedPause()", "Paused()"],
  },
  {
    tag: "OWNER_ONLY",
    messages: ["caller is not the owner", "only owner", "onlyowner", "not authorized", "unauthorized"],
    errors: ["OwnableUnauthorizedAccount(address)", "Unauthorized()", "NotOwner()"],
  },
  {
    tag: "LIQUIDITY_LOCKED",
    messages: ["liquidity locked", "lp locked", "locked liquidity"],
    errors: ["LiquidityLocked()"],
  },
  {
    tag: "INSUFFICIENT_OUTPUT_AMOUNT",
    messages: ["insufficient_output_amount", "slippagetoleranceexceeded", "too little received", "0x1771"],
    errors: ["InsufficientOutputAmount()", "TooLittleReceived()"],
  },
  {
    tag: "INSUFFICIENT_LIQUIDITY",
    messages: ["insufficient_liquidity", "insufficient liquidity"],
    errors: ["InsufficientLiquidity()"],
  },
  {
    tag: "K_INVARIANT",
    messages: ["uniswapv2: k", "pancake: k", ": k\"", "invariant"],
    errors: ["K()"],
  },
  {
    tag: "ACCOUNT_FROZEN",
    messages: ["account is frozen", "accountfrozen", "program error: 0x11"],
    errors: [],
  },
  {
    tag: "NON_TRANSFERABLE",
    messages: ["non-transferable", "nontransferable"],
    errors: [],
  },
  {
    tag: "NO_ROUTE",
    messages: ["no route", "could_not_find_any_route", "route not found"],
    errors: [],
  },
  {
    tag: "TRANSFER_FAILED",
    messages: [
      "transfer_failed",
      "transfer_from_failed",
      "transfer failed",
      "transferfrom failed",
      "transfer amount exceeds balance",
      "insufficient allowance",
    ],
    errors: [
      "TransferFailed()",
      "TransferFromFailed()",
      "ERC20InsufficientBalance(address,uint256,uint256)",
      "ERC20InsufficientAllowance(address,uint256,uint256)",
    ],
  },
];

const selectorTags = new Map<string, RevertTag>();
for (const signature of REVERT_SIGNATURES) {
  for (const error of signature.errors) {
    const selector = toFunctionSelector(error);
    if (!selectorTags.has(selector)) {
      selectorTags.set(selector, signature.tag);
    }
  }
}

export interface ClassifiedRevert {
  tag: RevertTag;
  detail: string;
}

export function classifyRevert(outcome: Extract<RawScenarioOutcome, { status: "reverted" }>): ClassifiedRevert {
  const detail = outcome.message;
  if (outcome.tag) {
    return { tag: outcome.tag, detail };
  }

  const lower = outcome.message.toLowerCase();
  for (const signature of REVERT_SIGNATURES) {
    if (signature.messages.some((pattern) => lower.includes(pattern))) {
      return { tag: signature.tag, detail };
    }
  }

  if (outcome.data && outcome.data.length >= 10) {
    const tag = selectorTags.get(outcome.data.slice(0, 10).toLowerCase());
    if (tag) {
      return { tag, detail };
    }
  }

  return { tag: "UNRECOGNIZED_REVERT", detail };
}

/** Functions whose presence in bytecode raises a restriction flag. */
export const BLACKLIST_FUNCTIONS = [
  "blacklist(address)",
  "addToBlacklist(address)",
  "setBlacklist(address,bool)",
  "blacklistAddress(address,bool)",
  "addBots(address[])",
  "setBots(address[])",
  "blockBots(address[])",
  "setBot(address,bool)",
  "isBot(address)",
];

export const PAUSE_FUNCTIONS = ["pause()", "unpause()", "setTradingEnabled(bool)", "pauseTrading()", "setPaused(bool)"];

const blacklistSelectors = new Set<string>(BLACKLIST_FUNCTIONS.map((fn) => toFunctionSelector(fn)));
const pauseSelectors = new Set<string>(PAUSE_FUNCTIONS.map((fn) => toFunctionSelector(fn)));

/** 4-byte immediates of every PUSH4 in the bytecode; dispatcher selectors show up here. */
export function pushedSelectors(bytecode: string): Set<string> {
  const hex = bytecode.startsWith("0x") ? bytecode.slice(2) : bytecode;
  const selectors = new Set<string>();
  let index = 0;
  while (index < hex.length) {
    const opcode = Number.parseInt(hex.slice(index, index + 2), 16);
    index += 2;
    if (opcode >= 0x60 && opcode <= 0x7f) {
      const width = (opcode - 0x5f) * 2;
      if (opcode === 0x63 && index + width <= hex.length) {
        selectors.add(`0x${hex.slice(index, index + width).toLowerCase()}`);
      }
      index += width;
    }
  }
  return selectors;
}

export function scanBytecode(bytecode: string): { blacklist: boolean; pause: boolean } {
  const selectors = pushedSelectors(bytecode);
  let blacklist = false;
  let pause = false;
  for (const selector of selectors) {
    blacklist ||= blacklistSelectors.has(selector);
    pause ||= pauseSelectors.has(selector);
  }
  return { blacklist, pause };
}
