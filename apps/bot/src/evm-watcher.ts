import { createPublicClient, decodeFunctionData, http, parseAbi, type Hex, type Transport } from "viem";
import { errorMessage, getEvmChainConfig, type ChainId, type Logger } from "@tradeguard/core";
import type { ObservedSwap } from "./signals.js";

export const mirroredSwapAbi = parseAbi([
  "function swapExactETHForTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable",
  "function swapETHForExactTokens(uint256 amountOut, address[] path, address to, uint256 deadline) payable",
  "function swapExactETHForTokensSupportingFeeOnTransferTokens(uint256 amountOutMin, address[] path, address to, uint256 deadline) payable",
  "function swapExactTokensForETH(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)",
  "function swapTokensForExactETH(uint256 amountOut, uint256 amountInMax, address[] path, address to, uint256 deadline)",
  "function swapExactTokensForETHSupportingFeeOnTransferTokens(uint256 amountIn, uint256 amountOutMin, address[] path, address to, uint256 deadline)",
]);

export interface PendingTransaction {
  hash: string;
  from: string;
  to: string | null;
  input: Hex;
  value: bigint;
}

function decodeSwapCall(input: Hex) {
  try {
    return decodeFunctionData({ abi: mirroredSwapAbi, data: input });
  } catch {
    return null;
  }
}

/** Decodes a V2 router swap between the native asset and one token; other calls yield null. */
export function decodeRouterSwap(chain: ChainId, tx: PendingTransaction): ObservedSwap | null {
  const config = getEvmChainConfig(chain);
  if (!tx.to || tx.to.toLowerCase() !== config.router.toLowerCase()) {
    return null;
  }

  const decoded = decodeSwapCall(tx.input);
  if (!decoded) {
    return null;
  }

  const base = { id: tx.hash, chain, wallet: tx.from.toLowerCase() };
  switch (decoded.functionName) {
    case "swapExactETHForTokens":
    case "swapETHForExactTokens":
    case "swapExactETHForTokensSupportingFeeOnTransferTokens": {
      const [tokenAmount, path] = decoded.args;
      const token = path.at(-1);
      if (!token) {
        return null;
      }
      return { ...base, side: "BUY", tokenAddress: token.toLowerCase(), tokenAmountRaw: tokenAmount, nativeSpentRaw: tx.value };
    }
    case "swapExactTokensForETH":
    case "swapExactTokensForETHSupportingFeeOnTransferTokens": {
      const [amountIn, , path] = decoded.args;
      const token = path[0];
      if (!token) {
        return null;
      }
      return { ...base, side: "SELL", tokenAddress: token.toLowerCase(), tokenAmountRaw: amountIn, nativeSpentRaw: null };
    }
    case "swapTokensForExactETH": {
      const [, amountInMax, path] = decoded.args;
      const token = path[0];
      if (!token) {
        return null;
      }
      return { ...base, side: "SELL", tokenAddress: token.toLowerCase(), tokenAmountRaw: amountInMax, nativeSpentRaw: null };
    }
    default:
      return null;
  }
}

export interface EvmWatcherOptions {
  chain: ChainId;
  transport: Transport;
  /** Current tracked wallets; read on every pending transaction. */
  trackedWallets: () => readonly string[];
  onSwap: (swap: ObservedSwap) => Promise<void>;
  logger: Logger;
  pollingIntervalMs?: number;
}

/** Follows the pending-transaction feed and reports router swaps sent by tracked wallets. */
export class EvmMempoolWatcher {
  private readonly options: EvmWatcherOptions;
  private readonly client;
  private unwatch: (() => void) | null = null;

  public constructor(options: EvmWatcherOptions) {
    this.options = options;
    this.client = createPublicClient({ transport: options.transport });
  }

  public static fromRpcUrl(chain: ChainId, rpcUrl: string, options: Omit<EvmWatcherOptions, "chain" | "transport">): EvmMempoolWatcher {
    return new EvmMempoolWatcher({ ...options, chain, transport: http(rpcUrl, { timeout: 15_000 }) });
  }

  public start(): void {
    if (this.unwatch) {
      return;
    }
    this.options.logger.info("MEMPOOL_WATCH", "PENDING TRANSACTION FEED STARTED", { chain: this.options.chain });
    this.unwatch = this.client.watchPendingTransactions({
      poll: true,
      pollingInterval: this.options.pollingIntervalMs ?? 2_000,
      onTransactions: (hashes) => {
        for (const hash of hashes) {
          void this.inspect(hash);
        }
      },
      onError: (error) => {
        this.options.logger.warn("MEMPOOL_FEED_FAIL", "PENDING TRANSACTION FEED ERROR", {
          chain: this.options.chain,
          error: errorMessage(error),
        });
      },
    });
  }

  public stop(): void {
    this.unwatch?.();
    this.unwatch = null;
  }

  public async inspect(hash: Hex): Promise<void> {
    let swap: ObservedSwap | null;
    try {
      const tx = await this.client.getTransaction({ hash });
      const tracked = this.options.trackedWallets().map((wallet) => wallet.toLowerCase());
      swap = tracked.includes(tx.from.toLowerCase()) ? decodeRouterSwap(this.options.chain, tx) : null;
    } catch (error) {
      this.options.logger.debug("MEMPOOL_TX_SKIP", "PENDING TRANSACTION NOT INSPECTED", {
        chain: this.options.chain,
        hash,
        error: errorMessage(error),
      });
      return;
    }
    if (!swap) {
      return;
    }
    try {
      await this.options.onSwap(swap);
    } catch (error) {
      this.options.logger.warn("MIRROR_SUBMIT_FAIL", "OBSERVED SWAP NOT SUBMITTED", {
        chain: this.options.chain,
        hash,
        error: errorMessage(error),
      });
    }
  }
}
