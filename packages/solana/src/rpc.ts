import { Connection, PublicKey, VersionedTransaction, type Commitment } from "@solana/web3.js";
import { z } from "zod";
import type { ReceiptStatus } from "@tradeguard/core";
import { mintInfoSchema, type MintAuthorityStatus } from "./mint.js";

const tokenAccountSchema = z.object({
  tokenAmount: z.object({
    amount: z.string(),
    decimals: z.number(),
  }),
});

export function createRpcConnection(rpcUrl: string, commitment: Commitment = "confirmed"): Connection {
  return new Connection(rpcUrl, { commitment });
}

export function decodeVersionedTransaction(serialized: string): VersionedTransaction {
  return VersionedTransaction.deserialize(Buffer.from(serialized, "base64"));
}

export async function getTokenBalanceRaw(connection: Connection, owner: PublicKey, mint: string): Promise<bigint> {
  const accounts = await connection.getParsedTokenAccountsByOwner(owner, { mint: new PublicKey(mint) }, "confirmed");
  let total = 0n;
  for (const item of accounts.value) {
    const parsed = tokenAccountSchema.safeParse(item.account.data.parsed?.info);
    if (parsed.success) {
      total += BigInt(parsed.data.tokenAmount.amount);
    }
  }
  return total;
}

export async function getMintAuthorityStatus(connection: Connection, mint: string): Promise<MintAuthorityStatus> {
  const account = await connection.getParsedAccountInfo(new PublicKey(mint), "confirmed");
  const value = account.value;
  if (!value || !("parsed" in value.data)) {
    throw new Error(`Mint account not found/parsible: ${mint}`);
  }
  const info = mintInfoSchema.safeParse(value.data.parsed?.info);
  if (!info.success) {
    throw new Error(`Mint account is not a token mint: ${mint}`);
  }

  return {
    mint,
    program: value.owner.toBase58(),
    decimals: info.data.decimals,
    mintAuthority: info.data.mintAuthority ?? null,
    freezeAuthority: info.data.freezeAuthority ?? null,
    extensions: info.data.extensions ?? [],
  };
}

export async function simulateVersionedTransaction(
  connection: Connection,
  transaction: VersionedTransaction,
): Promise<{ ok: boolean; logs: string[]; unitsConsumed: number | null; error?: string }> {
  const result = await connection.simulateTransaction(transaction, {
    replaceRecentBlockhash: true,
    sigVerify: false,
    commitment: "processed",
  });

  const logs = result.value.logs ?? [];
  const unitsConsumed = result.value.unitsConsumed ?? null;
  if (result.value.err) {
    return {
      ok: false,
      logs,
      unitsConsumed,
      error: JSON.stringify(result.value.err),
    };
  }
  return { ok: true, logs, unitsConsumed };
}

/** `null` until the signature reaches confirmed commitment. */
export async function getSignatureOutcome(connection: Connection, signature: string): Promise<ReceiptStatus | null> {
  const statuses = await connection.getSignatureStatuses([signature], { searchTransactionHistory: false });
  const status = statuses.value[0];
  if (!status) {
    return null;
  }
  if (status.err) {
    return "reverted";
  }
  if (status.confirmationStatus === "confirmed" || status.confirmationStatus === "finalized") {
    return "success";
  }
  return null;
}
