import { Keypair, PublicKey, type Connection } from "@solana/web3.js";
import bs58 from "bs58";
import {
  InsufficientLiquidityError,
  NATIVE_ASSET,
  RateLimitedError,
  SimulationUnavailableError,
  TimeoutElapsedError,
  TransientNetworkError,
  errorMessage,
  isTransientMessage,
  shortfallPct,
  withTimeout,
  type ChainAdapter,
  type ChainId,
  type FeeEstimate,
  type Logger,
  type Quote,
  type QuoteProvider,
  type RawScenarioOutcome,
  type ReceiptStatus,
  type ScenarioPlan,
  type ScenarioRun,
  type SignedTransaction,
  type SimulationContext,
  type TokenIdentity,
  type UnsignedTransaction,
} from "@tradeguard/core";
import { inspectMint, type MintInspection } from "./mint.js";
import {
  createRpcConnection,
  decodeVersionedTransaction,
  getMintAuthorityStatus,
  getSignatureOutcome,
  getTokenBalanceRaw,
  simulateVersionedTransaction,
} from "./rpc.js";

/** Slippage used for simulated swaps; the simulator measures, it does not trade. */
const SIMULATION_SLIPPAGE_BPS = 500;

export interface SolanaAdapterOptions {
  connection: Connection;
  quotes: QuoteProvider;
  /** Funded, read-only account that swap simulations are built for. */
  simulationPayer: string;
  priorityFeeLamports: number;
  logger?: Logger;
}

export function classifySolanaRpcError(error: unknown): unknown {
  const message = errorMessage(error);
  const lower = message.toLowerCase();
  if (lower.includes("429") || lower.includes("too many requests")) {
    return new RateLimitedError("solana rpc");
  }
  if (isTransientMessage(message)) {
    return new TransientNetworkError(message, { chain: "solana" });
  }
  return error;
}

function revertMessage(error: string | undefined, logs: string[]): string {
  const tail = logs.filter((line) => /error|failed|insufficient/i.test(line)).slice(-3);
  return [error ?? "simulation failed", ...tail].join(" | ");
}

function timedOut(error: unknown): boolean {
  return error instanceof TimeoutElapsedError;
}

export class SolanaChainAdapter implements ChainAdapter {
  public readonly chain: ChainId = "solana";
  private readonly connection: Connection;
  private readonly quotes: QuoteProvider;
  private readonly simulationPayer: string;
  private readonly priorityFeeLamports: number;
  private readonly logger: Logger | undefined;

  public constructor(options: SolanaAdapterOptions) {
    this.connection = options.connection;
    this.quotes = options.quotes;
    this.simulationPayer = options.simulationPayer;
    this.priorityFeeLamports = options.priorityFeeLamports;
    this.logger = options.logger;
  }

  public static fromRpcUrl(rpcUrl: string, options: Omit<SolanaAdapterOptions, "connection">): SolanaChainAdapter {
    return new SolanaChainAdapter({ ...options, connection: createRpcConnection(rpcUrl) });
  }

  public async getSimulationContext(): Promise<SimulationContext> {
    if (!this.simulationPayer) {
      throw new SimulationUnavailableError("No Solana simulation payer configured", { chain: this.chain });
    }
    try {
      const latest = await this.connection.getLatestBlockhash("processed");
      return { chain: this.chain, reference: latest.blockhash };
    } catch (error) {
      throw new SimulationUnavailableError("Solana RPC unavailable", { chain: this.chain, error: errorMessage(error) });
    }
  }

  public async simulateScenarios(plan: ScenarioPlan): Promise<ScenarioRun> {
    const mint = plan.token.address;

    let inspection: MintInspection | null = null;
    let transfer: RawScenarioOutcome;
    try {
      inspection = inspectMint(await withTimeout(getMintAuthorityStatus(this.connection, mint), plan.timeoutMs, "mint inspection"));
      transfer = inspection.transfer;
    } catch (error) {
      if (!timedOut(error)) {
        throw new SimulationUnavailableError("Mint inspection failed", { chain: this.chain, error: errorMessage(error) });
      }
      transfer = { status: "timeout" };
    }

    const buy = await this.simulateBuy(mint, plan);
    const sell = await this.roundTrip(mint, plan, buy.tokensOut);
    const feePct = inspection?.transferFeePct ?? 0;

    this.logger?.debug("SIM_SOLANA", "SIMULATED SOLANA SCENARIOS", {
      mint,
      buy: buy.outcome.status,
      sell: sell.outcome.status,
      transfer: transfer.status,
    });

    return {
      outcomes: { BUY: buy.outcome, SELL: sell.outcome, TRANSFER: transfer },
      taxes: {
        buyPct: buy.outcome.status === "success" ? feePct : null,
        sellPct: sell.lossPct,
        transferPct: inspection ? feePct : null,
      },
      flags: inspection?.flags ?? [],
    };
  }

  private async simulateBuy(
    mint: string,
    plan: ScenarioPlan,
  ): Promise<{ outcome: RawScenarioOutcome; tokensOut: bigint | null }> {
    let quote: Quote;
    try {
      quote = await withTimeout(
        this.quotes.getQuote({
          chain: this.chain,
          sellToken: NATIVE_ASSET,
          buyToken: mint,
          amount: plan.buyAmountRaw,
          slippageBps: SIMULATION_SLIPPAGE_BPS,
          taker: this.simulationPayer,
        }),
        plan.timeoutMs,
        "buy quote",
      );
    } catch (error) {
      if (timedOut(error)) {
        return { outcome: { status: "timeout" }, tokensOut: null };
      }
      if (error instanceof InsufficientLiquidityError) {
        return { outcome: { status: "reverted", data: null, message: error.message, tag: "NO_ROUTE" }, tokensOut: null };
      }
      throw new SimulationUnavailableError("Buy quote failed", { chain: this.chain, error: errorMessage(error) });
    }

    const payload = quote.payload;
    if (!payload || payload.family !== "solana") {
      throw new SimulationUnavailableError("Buy quote carried no transaction", { chain: this.chain });
    }

    try {
      const simulation = await withTimeout(
        simulateVersionedTransaction(this.connection, decodeVersionedTransaction(payload.serialized)),
        plan.timeoutMs,
        "simulateTransaction",
      );
      if (!simulation.ok) {
        return {
          outcome: { status: "reverted", data: null, message: revertMessage(simulation.error, simulation.logs) },
          tokensOut: quote.buyAmount,
        };
      }
      return {
        outcome: {
          status: "success",
          gasUsed: simulation.unitsConsumed === null ? null : BigInt(simulation.unitsConsumed),
        },
        tokensOut: quote.buyAmount,
      };
    } catch (error) {
      if (timedOut(error)) {
        return { outcome: { status: "timeout" }, tokensOut: quote.buyAmount };
      }
      throw new SimulationUnavailableError("simulateTransaction failed", { chain: this.chain, error: errorMessage(error) });
    }
  }

  /** Sell leg: quotes the bought amount back to SOL and measures the round-trip loss. */
  private async roundTrip(
    mint: string,
    plan: ScenarioPlan,
    tokensOut: bigint | null,
  ): Promise<{ outcome: RawScenarioOutcome; lossPct: number | null }> {
    if (tokensOut === null || tokensOut <= 0n) {
      return {
        outcome: { status: "reverted", data: null, message: "No bought amount to sell back", tag: "NO_ROUTE" },
        lossPct: null,
      };
    }
    try {
      const back = await withTimeout(
        this.quotes.getQuote({
          chain: this.chain,
          sellToken: mint,
          buyToken: NATIVE_ASSET,
          amount: tokensOut,
          slippageBps: SIMULATION_SLIPPAGE_BPS,
          taker: this.simulationPayer,
          quoteOnly: true,
        }),
        plan.timeoutMs,
        "sell quote",
      );
      return { outcome: { status: "success", gasUsed: null }, lossPct: shortfallPct(plan.buyAmountRaw, back.buyAmount) };
    } catch (error) {
      if (timedOut(error)) {
        return { outcome: { status: "timeout" }, lossPct: null };
      }
      if (error instanceof InsufficientLiquidityError) {
        return { outcome: { status: "reverted", data: null, message: error.message, tag: "NO_ROUTE" }, lossPct: null };
      }
      throw new SimulationUnavailableError("Sell quote failed", { chain: this.chain, error: errorMessage(error) });
    }
  }

  public async getCode(): Promise<string | null> {
    return null;
  }

  public async getTokenMetadata(address: string): Promise<{ decimals: number; symbol: string | null }> {
    const status = await getMintAuthorityStatus(this.connection, address);
    return { decimals: status.decimals, symbol: null };
  }

  public async getNativeBalance(owner: string): Promise<bigint> {
    return BigInt(await this.connection.getBalance(new PublicKey(owner), "confirmed"));
  }

  public async getTokenBalance(owner: string, token: TokenIdentity): Promise<bigint> {
    return getTokenBalanceRaw(this.connection, new PublicKey(owner), token.address);
  }

  public async getNonce(): Promise<number> {
    return 0;
  }

  public async getFeeEstimate(): Promise<FeeEstimate> {
    return { params: { kind: "solana", priorityFeeLamports: this.priorityFeeLamports } };
  }

  public async buildApproval(): Promise<UnsignedTransaction | null> {
    return null;
  }

  public async buildTransaction(quote: Quote, _fees: FeeEstimate, owner: string): Promise<UnsignedTransaction> {
    const payload = quote.payload;
    if (!payload || payload.family !== "solana") {
      throw new Error(`Quote from ${quote.provider} carries no Solana payload`);
    }
    const feePayer = decodeVersionedTransaction(payload.serialized).message.staticAccountKeys[0];
    if (!feePayer || feePayer.toBase58() !== owner) {
      throw new Error("Swap transaction was built for a different fee payer");
    }
    return {
      family: "solana",
      chain: this.chain,
      payer: owner,
      serialized: payload.serialized,
      lastValidBlockHeight: payload.lastValidBlockHeight,
    };
  }

  public async signTransaction(unsigned: UnsignedTransaction, key: Uint8Array): Promise<SignedTransaction> {
    if (unsigned.family !== "solana") {
      throw new Error("Solana adapter cannot sign a non-Solana transaction");
    }
    const keypair = Keypair.fromSecretKey(key);
    if (keypair.publicKey.toBase58() !== unsigned.payer) {
      throw new Error("Key material does not belong to the transaction sender");
    }
    const transaction = decodeVersionedTransaction(unsigned.serialized);
    transaction.sign([keypair]);
    const signature = transaction.signatures[0];
    if (!signature) {
      throw new Error("Signing produced no signature");
    }
    return {
      chain: this.chain,
      raw: Buffer.from(transaction.serialize()).toString("base64"),
      hash: bs58.encode(signature),
    };
  }

  public async broadcast(signed: SignedTransaction): Promise<string> {
    try {
      return await this.connection.sendRawTransaction(Buffer.from(signed.raw, "base64"), {
        skipPreflight: true,
        maxRetries: 2,
      });
    } catch (error) {
      if (errorMessage(error).toLowerCase().includes("already been processed")) {
        return signed.hash;
      }
      throw classifySolanaRpcError(error);
    }
  }

  public async getReceipt(hash: string): Promise<ReceiptStatus | null> {
    try {
      return await getSignatureOutcome(this.connection, hash);
    } catch (error) {
      throw classifySolanaRpcError(error);
    }
  }
}
