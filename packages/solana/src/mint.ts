import { z } from "zod";
import type { RawScenarioOutcome, RestrictionFlag } from "@tradeguard/core";

export const TOKEN_PROGRAM_ID = "TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA";
export const TOKEN_2022_PROGRAM_ID = "TokenzQdBNbLqP5VEhdkAS6EPFLC1PHnBqCXEpPxuEb";

const transferFeeSchema = z.object({
  transferFeeBasisPoints: z.number(),
});

const extensionSchema = z
  .object({
    extension: z.string(),
    state: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

export const mintInfoSchema = z
  .object({
    decimals: z.number(),
    mintAuthority: z.string().nullable().optional(),
    freezeAuthority: z.string().nullable().optional(),
    isInitialized: z.boolean().optional(),
    extensions: z.array(extensionSchema).optional(),
  })
  .passthrough();

export type MintInfo = z.infer<typeof mintInfoSchema>;

export interface MintAuthorityStatus {
  mint: string;
  program: string;
  decimals: number;
  mintAuthority: string | null;
  freezeAuthority: string | null;
  extensions: MintInfo["extensions"];
}

export interface MintInspection {
  transfer: RawScenarioOutcome;
  flags: RestrictionFlag[];
  /** Token-2022 transfer fee as a percentage, 0 when the mint has none. */
  transferFeePct: number;
}

function extensionState(status: MintAuthorityStatus, name: string): Record<string, unknown> | null {
  const found = (status.extensions ?? []).find((entry) => entry.extension === name);
  if (!found) {
    return null;
  }
  return found.state ?? {};
}

/** Highest fee the mint can currently charge, newer and older schedules both considered. */
function transferFeeBps(state: Record<string, unknown>): number {
  let bps = 0;
  for (const key of ["newerTransferFee", "olderTransferFee"]) {
    const parsed = transferFeeSchema.safeParse(state[key]);
    if (parsed.success) {
      bps = Math.max(bps, parsed.data.transferFeeBasisPoints);
    }
  }
  return bps;
}

/**
 * Transfer scenario for a mint, read off its authorities and Token-2022
 * extensions. Solana cannot override balances in simulation, so the mint
 * layout is the evidence.
 */
export function inspectMint(status: MintAuthorityStatus): MintInspection {
  const flags: RestrictionFlag[] = [];
  let transfer: RawScenarioOutcome = { status: "success", gasUsed: null };

  if (status.freezeAuthority) {
    flags.push("FREEZE_AUTHORITY");
  }

  if (extensionState(status, "transferHook")) {
    flags.push("TRANSFER_HOOK");
  }

  const defaultState = extensionState(status, "defaultAccountState");
  if (defaultState && defaultState.accountState === "frozen") {
    transfer = {
      status: "reverted",
      data: null,
      message: "New token accounts start frozen",
      tag: "ACCOUNT_FROZEN",
    };
  }

  const pausable = extensionState(status, "pausableConfig");
  if (pausable && pausable.paused === true) {
    transfer = { status: "reverted", data: null, message: "Mint is paused", tag: "PAUSED" };
  }

  if (extensionState(status, "nonTransferable")) {
    transfer = {
      status: "reverted",
      data: null,
      message: "Mint is non-transferable",
      tag: "NON_TRANSFERABLE",
    };
  }

  const feeState = extensionState(status, "transferFeeConfig");
  const transferFeePct = feeState ? transferFeeBps(feeState) / 100 : 0;

  return { transfer, flags, transferFeePct };
}
