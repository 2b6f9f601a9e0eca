import { PublicKey, type Connection, type ParsedTransactionWithMeta, type TokenBalance } from "@solana/web3.js";
import { errorMessage, sleep, WSOL_MINT, type Logger } from "@tradeguard/core";
import { createRpcConnection } from "@tradeguard/solana";
import type { ObservedSwap } from "./signals.js";

export interface WalletBalanceChange {
  signature: string;
  accountKeys: string[];
  preBalances: number[];
  postBalances: number[];
  preTokenBalances: TokenBalance[];
  postTokenBalances: TokenBalance[];
}

export function balanceChangeOf(signature: string, tx: ParsedTransactionWithMeta): WalletBalanceChange | null {
  if (!tx.meta || tx.meta.err) {
    return null;
  }
  return {
    signature,
    accountKeys: tx.transaction.message.accountKeys.map((account) => account.pubkey.toBase58()),
    preBalances: tx.meta.preBalances,
    postBalances: tx.meta.postBalances,
    preTokenBalances: tx.meta.preTokenBalances ?? [],
    postTokenBalances: tx.meta.postTokenBalances ?? [],
  };
}

function tokenTotals(balances: TokenBalance[], wallet: string): Map<string, bigint> {
  const totals = new Map<string, bigint>();
  for (const balance of balances) {
    if (balance.owner !== wallet) {
      continue;
    }
    totals.set(balance.mint, (totals.get(balance.mint) ?? 0n) + BigInt(balance.uiTokenAmount.amount));
  }
  return totals;
}

/**
 * Reads a swap off the wallet's balance changes: the non-SOL mint with the
 * largest movement is the token, its sign is the side. Wrapped SOL counts
 * as native.
 */
export function swapFromBalances(change: WalletBalanceChange, wallet: string): ObservedSwap | null {
  const pre = tokenTotals(change.preTokenBalances, wallet);
  const post = tokenTotals(change.postTokenBalances, wallet);

  let token: string | null = null;
  let delta = 0n;
  for (const mint of new Set([...pre.keys(), ...post.keys()])) {
    if (mint === WSOL_MINT) {
      continue;
    }
    const mintDelta = (post.get(mint) ?? 0n) - (pre.get(mint) ?? 0n);
    const magnitude = mintDelta < 0n ? -mintDelta : mintDelta;
    if (magnitude > (delta < 0n ? -delta : delta)) {
      token = mint;
      delta = mintDelta;
    }
  }
  if (!token || delta === 0n) {
    return null;
  }

  const index = change.accountKeys.indexOf(wallet);
  const lamports = index >= 0 ? BigInt((change.postBalances[index] ?? 0) - (change.preBalances[index] ?? 0)) : 0n;
  const wrapped = (post.get(WSOL_MINT) ?? 0n) - (pre.get(WSOL_MINT) ?? 0n);
  const nativeDelta = lamports + wrapped;

  const base = { id: change.signature, chain: "solana" as const, wallet, tokenAddress: token };
  if (delta > 0n) {
    return { ...base, side: "BUY", tokenAmountRaw: delta, nativeSpentRaw: nativeDelta < 0n ? -nativeDelta : null };
  }
  return { ...base, side: "SELL", tokenAmountRaw: -delta, nativeSpentRaw: null };
}

export interface SolanaWatcherOptions {
  connection: Connection;
  trackedWallets: () => readonly string[];
  onSwap: (swap: ObservedSwap) => Promise<void>;
  logger: Logger;
  pollSeconds: number;
  signaturesPerPoll?: number;
}

/** Polls each tracked wallet's signature history and reports swaps seen since the last poll. */
export class SolanaWalletWatcher {
  private readonly options: SolanaWatcherOptions;
  private readonly lastSignature = new Map<string, string | null>();
  private running = false;
  private loop: Promise<void> | null = null;

  public constructor(options: SolanaWatcherOptions) {
    this.options = options;
  }

  public static fromRpcUrl(rpcUrl: string, options: Omit<SolanaWatcherOptions, "connection">): SolanaWalletWatcher {
    return new SolanaWalletWatcher({ ...options, connection: createRpcConnection(rpcUrl) });
  }

  public start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.options.logger.info("WALLET_WATCH", "SOLANA WALLET WATCHER STARTED", {
      wallets: this.options.trackedWallets().length,
      pollSeconds: this.options.pollSeconds,
    });
    this.loop = this.run();
  }

  public async stop(): Promise<void> {
    this.running = false;
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
  }

  /** One pass over every tracked base58 wallet. The first pass only records where history starts. */
  public async poll(): Promise<void> {
    for (const wallet of this.options.trackedWallets()) {
      if (wallet.startsWith("0x")) {
        continue;
      }
      try {
        await this.pollWallet(wallet);
      } catch (error) {
        this.options.logger.warn("WALLET_POLL_FAIL", "FAILED TO READ WALLET ACTIVITY", {
          wallet,
          error: errorMessage(error),
        });
      }
    }
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.poll();
      const deadline = Date.now() + this.options.pollSeconds * 1000;
      while (this.running && Date.now() < deadline) {
        await sleep(Math.min(500, deadline - Date.now()));
      }
    }
  }

  private async pollWallet(wallet: string): Promise<void> {
    const known = this.lastSignature.has(wallet);
    const until = this.lastSignature.get(wallet) ?? undefined;
    const signatures = await this.options.connection.getSignaturesForAddress(new PublicKey(wallet), {
      limit: this.options.signaturesPerPoll ?? 25,
      ...(until ? { until } : {}),
    });
    const newest = signatures[0];
    if (newest) {
      this.lastSignature.set(wallet, newest.signature);
    } else if (!known) {
      this.lastSignature.set(wallet, null);
    }
    if (!known) {
      return;
    }

    // Newest first from the RPC; replay oldest first.
    for (const entry of [...signatures].reverse()) {
      if (entry.err) {
        continue;
      }
      const tx = await this.options.connection.getParsedTransaction(entry.signature, {
        maxSupportedTransactionVersion: 0,
        commitment: "confirmed",
      });
      const change = tx ? balanceChangeOf(entry.signature, tx) : null;
      const swap = change ? swapFromBalances(change, wallet) : null;
      if (swap) {
        await this.options.onSwap(swap);
      }
    }
  }
}
