import { randomUUID } from "node:crypto";
import {
  applyBps,
  backoffDelayMs,
  CHAINS,
  EngineError,
  errorMessage,
  ExecutionRevertedError,
  ExecutionTimeoutError,
  InvalidStateError,
  isRetryable,
  Logger,
  NATIVE_ASSET,
  QuoteUnavailableError,
  sleep,
  toErrorInfo,
  uiToAtomic,
  type ChainAdapter,
  type CircuitBreaker,
  type EngineConfig,
  type ExecutionAttempt,
  type ExecutionStatus,
  type FailureKind,
  type KeyVault,
  type MarketDataProvider,
  type Mode,
  type NotificationSink,
  type PersistenceSink,
  type Quote,
  type QuoteProvider,
  type QuoteSnapshot,
  type ReceiptStatus,
  type SignedTransaction,
  type TradeExecution,
  type TradeProposal,
  type UnsignedTransaction,
} from "@tradeguard/core";
import type { AdapterRegistry } from "./registry.js";

export interface ExecutorPolicy {
  mode: Mode;
  maxAttempts: number;
  baseBackoffMs: number;
  maxSlippageBps: number;
  confirmTimeoutSeconds: number;
}

export function executorPolicyFromConfig(config: EngineConfig): ExecutorPolicy {
  return {
    mode: config.MODE,
    maxAttempts: config.EXEC_MAX_ATTEMPTS,
    baseBackoffMs: config.EXEC_BACKOFF_MS,
    maxSlippageBps: config.MAX_SLIPPAGE_BPS,
    confirmTimeoutSeconds: config.CONFIRM_TIMEOUT_SECONDS,
  };
}

export interface TradeExecutorOptions {
  adapters: AdapterRegistry;
  quotes: QuoteProvider;
  market: MarketDataProvider;
  vault: KeyVault;
  breaker: CircuitBreaker;
  policy: ExecutorPolicy;
  persistence?: PersistenceSink;
  notifier?: NotificationSink;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

class ExecutionAbortedError extends Error {
  public constructor() {
    super("Execution aborted before broadcast");
    this.name = "ExecutionAbortedError";
  }
}

export function failureKindOf(error: unknown): FailureKind {
  if (!(error instanceof EngineError)) {
    return "error";
  }
  switch (error.code) {
    case "INSUFFICIENT_LIQUIDITY":
      return "insufficient_liquidity";
    case "QUOTE_UNAVAILABLE":
      return "quote_unavailable";
    case "RATE_LIMITED":
      return "rate_limited";
    case "EXECUTION_REVERTED":
      return "reverted";
    case "EXECUTION_TIMEOUT":
      return "timeout";
    default:
      return "error";
  }
}

function snapshot(quote: Quote): QuoteSnapshot {
  return {
    provider: quote.provider,
    route: [...quote.route],
    sellAmount: quote.sellAmount.toString(),
    buyAmount: quote.buyAmount.toString(),
    minReceived: quote.minReceived.toString(),
    expiresAt: quote.expiresAt,
  };
}

interface RunState {
  controller: AbortController;
  broadcastStarted: boolean;
}

/**
 * Drives one confirmed proposal through quote, approval, build, sign,
 * broadcast and confirmation. Each attempt takes a fresh quote, so a quote
 * backs at most one broadcast.
 */
export class TradeExecutor {
  private readonly options: TradeExecutorOptions;
  private readonly policy: ExecutorPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly executions = new Map<string, TradeExecution>();
  private readonly byProposal = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<TradeExecution>>();
  private readonly runs = new Map<string, RunState>();

  public constructor(options: TradeExecutorOptions) {
    this.options = options;
    this.policy = options.policy;
    this.logger = options.logger ?? new Logger({ component: "executor", level: "INFO", quiet: true });
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  public get paper(): boolean {
    return this.policy.mode === "paper";
  }

  /**
   * Starts (or joins) the execution of a confirmed proposal. The execution
   * record is registered before this returns, so `getByProposal` sees it.
   */
  public execute(proposal: TradeProposal): Promise<TradeExecution> {
    const running = this.inFlight.get(proposal.id);
    if (running) {
      return running;
    }
    const finishedId = this.byProposal.get(proposal.id);
    const finished = finishedId ? this.executions.get(finishedId) : undefined;
    if (finished) {
      return Promise.resolve(finished);
    }
    if (proposal.status !== "CONFIRMED") {
      return Promise.reject(
        new InvalidStateError(`Proposal ${proposal.id} is ${proposal.status}, not CONFIRMED`, {
          id: proposal.id,
          status: proposal.status,
        }),
      );
    }

    const execution: TradeExecution = {
      id: randomUUID(),
      proposalId: proposal.id,
      chain: proposal.chain,
      side: proposal.side,
      token: proposal.token,
      paper: this.paper,
      attempts: [],
      status: "PENDING",
      failure: null,
      createdAt: this.now().toISOString(),
      finishedAt: null,
    };
    this.executions.set(execution.id, execution);
    this.byProposal.set(proposal.id, execution.id);

    const state: RunState = { controller: new AbortController(), broadcastStarted: false };
    this.runs.set(proposal.id, state);
    const done = this.run(proposal, execution, state).finally(() => {
      this.inFlight.delete(proposal.id);
      this.runs.delete(proposal.id);
    });
    this.inFlight.set(proposal.id, done);
    return done;
  }

  /** Aborts a running execution; false once anything has been broadcast. */
  public abort(proposalId: string): boolean {
    const state = this.runs.get(proposalId);
    if (!state || state.broadcastStarted) {
      return false;
    }
    state.controller.abort();
    return true;
  }

  public get(executionId: string): TradeExecution | null {
    return this.executions.get(executionId) ?? null;
  }

  public getByProposal(proposalId: string): TradeExecution | null {
    const id = this.byProposal.get(proposalId);
    return id ? (this.executions.get(id) ?? null) : null;
  }

  public isRunning(proposalId: string): boolean {
    return this.inFlight.has(proposalId);
  }

  public async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  private async run(proposal: TradeProposal, execution: TradeExecution, state: RunState): Promise<TradeExecution> {
    this.options.persistence?.appendExecution(execution);

    if (this.options.breaker.isOpen(this.now().getTime())) {
      return this.finish(execution, "FAILED", {
        kind: "circuit_open",
        message: "Circuit breaker is open after consecutive failures",
      });
    }

    let adapter: ChainAdapter;
    try {
      adapter = this.options.adapters.get(proposal.chain);
    } catch (error) {
      return this.finish(execution, "FAILED", { kind: "error", message: errorMessage(error) });
    }

    let slippageBps = proposal.slippageBps;
    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      const record: ExecutionAttempt = {
        attempt,
        states: [],
        quote: null,
        gas: null,
        slippageBps,
        txHash: null,
        receiptStatus: null,
        error: null,
        startedAt: this.now().toISOString(),
        endedAt: null,
      };
      execution.attempts.push(record);

      try {
        await this.attemptOnce(proposal, adapter, record, state);
        record.endedAt = this.now().toISOString();
        return this.finish(execution, "SUCCESS", null);
      } catch (error) {
        record.endedAt = this.now().toISOString();
        record.error = toErrorInfo(error);
        if (error instanceof ExecutionAbortedError) {
          return this.finish(execution, "ABORTED", null);
        }

        const reverted = error instanceof ExecutionRevertedError;
        const retry = attempt < this.policy.maxAttempts && (reverted || isRetryable(error));
        if (!retry) {
          return this.finish(execution, "FAILED", { kind: failureKindOf(error), message: errorMessage(error) });
        }

        if (reverted) {
          slippageBps = Math.min(this.policy.maxSlippageBps, Math.ceil(slippageBps * 1.5));
        }
        const delayMs = backoffDelayMs(attempt, this.policy.baseBackoffMs, error);
        this.logger.warn("EXEC_RETRY", "EXECUTION ATTEMPT FAILED, RETRYING", {
          executionId: execution.id,
          attempt,
          maxAttempts: this.policy.maxAttempts,
          delayMs,
          slippageBps,
          error: record.error,
        });
        this.options.persistence?.appendExecution(execution);
        await this.sleep(delayMs);
      }
    }

    // Unreachable with maxAttempts >= 1; the loop returns on its last attempt.
    return this.finish(execution, "FAILED", { kind: "error", message: "No execution attempts were made" });
  }

  private async attemptOnce(
    proposal: TradeProposal,
    adapter: ChainAdapter,
    record: ExecutionAttempt,
    state: RunState,
  ): Promise<void> {
    const signal = state.controller.signal;
    this.throwIfAborted(signal, state);

    record.states.push("QUOTING");
    const amount = await this.tradeAmount(proposal, adapter);
    let quote = await this.fetchQuote(proposal, amount, record.slippageBps);
    record.quote = snapshot(quote);

    if (this.paper) {
      record.states.push("BUILDING");
      record.gas = (await adapter.getFeeEstimate()).params;
      return;
    }

    if (proposal.side === "SELL" && quote.allowanceTarget) {
      const fees = await adapter.getFeeEstimate();
      const approval = await adapter.buildApproval(
        proposal.token,
        proposal.owner,
        quote.allowanceTarget,
        quote.sellAmount,
        fees,
      );
      if (approval) {
        record.states.push("APPROVING");
        const signedApproval = await this.sign(proposal, adapter, approval);
        this.throwIfAborted(signal, state);
        state.broadcastStarted = true;
        const approvalHash = await this.sendSigned(adapter, signedApproval, quote);
        if ((await this.waitForReceipt(adapter, approvalHash, proposal)) === "reverted") {
          throw new ExecutionRevertedError(approvalHash);
        }
      }
    }

    record.states.push("BUILDING");
    if (this.isExpired(quote)) {
      quote = await this.fetchQuote(proposal, amount, record.slippageBps);
      record.quote = snapshot(quote);
    }
    const fees = await adapter.getFeeEstimate();
    record.gas = fees.params;
    const unsigned = await adapter.buildTransaction(quote, fees, proposal.owner);

    record.states.push("SIGNING");
    const signed = await this.sign(proposal, adapter, unsigned);
    this.throwIfAborted(signal, state);
    if (this.isExpired(quote)) {
      throw new QuoteUnavailableError("Quote expired before broadcast", { expiresAt: quote.expiresAt });
    }

    record.states.push("BROADCASTING");
    state.broadcastStarted = true;
    record.txHash = signed.hash;
    const hash = await this.sendSigned(adapter, signed, quote);
    record.txHash = hash;

    record.states.push("CONFIRMING");
    const status = await this.waitForReceipt(adapter, hash, proposal);
    record.receiptStatus = status;
    if (status === "reverted") {
      throw new ExecutionRevertedError(hash);
    }
  }

  /**
   * Broadcasts one signed transaction. A send that may have reached the node is
   * retried with the same bytes; once the node has seen it, its own hash is
   * returned for the receipt wait.
   */
  private async sendSigned(adapter: ChainAdapter, signed: SignedTransaction, quote: Quote): Promise<string> {
    let uncertain = false;
    for (let send = 1; ; send += 1) {
      try {
        return await adapter.broadcast(signed);
      } catch (error) {
        if (uncertain && isNonceConsumed(error)) {
          this.logger.info("BROADCAST_SEEN", "EARLIER SEND ALREADY USED THE NONCE", { hash: signed.hash });
          return signed.hash;
        }
        if (!isUncertainSend(error)) {
          if (uncertain) {
            return signed.hash;
          }
          throw error;
        }
        uncertain = true;
        if (send >= this.policy.maxAttempts || this.isExpired(quote)) {
          this.logger.warn("BROADCAST_UNCERTAIN", "SEND OUTCOME UNKNOWN, WAITING FOR RECEIPT", {
            hash: signed.hash,
            sends: send,
            error: errorMessage(error),
          });
          return signed.hash;
        }
        const delayMs = backoffDelayMs(send, this.policy.baseBackoffMs, error);
        this.logger.warn("BROADCAST_RESEND", "SEND OUTCOME UNKNOWN, RESENDING SAME TRANSACTION", {
          hash: signed.hash,
          send,
          delayMs,
          error: errorMessage(error),
        });
        await this.sleep(delayMs);
      }
    }
  }

  private throwIfAborted(signal: AbortSignal, state: RunState): void {
    if (signal.aborted && !state.broadcastStarted) {
      throw new ExecutionAbortedError();
    }
  }

  private isExpired(quote: Quote): boolean {
    return Date.parse(quote.expiresAt) <= this.now().getTime();
  }

  /** BUY spends native worth `amount` USD; SELL spends `amount` percent of the token balance. */
  private async tradeAmount(proposal: TradeProposal, adapter: ChainAdapter): Promise<bigint> {
    const chain = CHAINS[proposal.chain];
    if (proposal.side === "BUY") {
      const price = await this.options.market.getPrice({
        chain: proposal.chain,
        address: chain.wrappedNative,
        decimals: chain.nativeDecimals,
        symbol: chain.nativeSymbol,
      });
      if (!(price.usdPrice > 0)) {
        throw new QuoteUnavailableError(`No USD price for ${chain.nativeSymbol}`, { chain: proposal.chain });
      }
      const amount = uiToAtomic(proposal.amount / price.usdPrice, chain.nativeDecimals);
      if (amount <= 0n) {
        throw new EngineError("INVALID_REQUEST", "Buy amount rounds to zero", { amountUsd: proposal.amount });
      }
      return amount;
    }

    const balance = await adapter.getTokenBalance(proposal.owner, proposal.token);
    const amount = applyBps(balance, proposal.amount * 100);
    if (amount <= 0n) {
      throw new InvalidStateError("No token balance to sell", {
        owner: proposal.owner,
        token: proposal.token.address,
        balance: balance.toString(),
      });
    }
    return amount;
  }

  private fetchQuote(proposal: TradeProposal, amount: bigint, slippageBps: number): Promise<Quote> {
    const buying = proposal.side === "BUY";
    return this.options.quotes.getQuote({
      chain: proposal.chain,
      sellToken: buying ? NATIVE_ASSET : proposal.token.address,
      buyToken: buying ? proposal.token.address : NATIVE_ASSET,
      amount,
      slippageBps,
      taker: proposal.owner,
    });
  }

  private sign(
    proposal: TradeProposal,
    adapter: ChainAdapter,
    unsigned: UnsignedTransaction,
  ): Promise<SignedTransaction> {
    return this.options.vault.withKey(proposal.chain, proposal.owner, (key) => adapter.signTransaction(unsigned, key));
  }

  private async waitForReceipt(adapter: ChainAdapter, hash: string, proposal: TradeProposal): Promise<ReceiptStatus> {
    const timeoutMs = this.policy.confirmTimeoutSeconds * 1000;
    const pollMs = CHAINS[proposal.chain].confirmationPollMs;
    const deadline = this.now().getTime() + timeoutMs;

    for (;;) {
      try {
        const status = await adapter.getReceipt(hash);
        if (status) {
          return status;
        }
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }
        this.logger.debug("RECEIPT_POLL_FAIL", "RECEIPT POLL FAILED", { hash, error: errorMessage(error) });
      }
      if (this.now().getTime() + pollMs > deadline) {
        throw new ExecutionTimeoutError(hash, timeoutMs);
      }
      await this.sleep(pollMs);
    }
  }

  private finish(
    execution: TradeExecution,
    status: Exclude<ExecutionStatus, "PENDING">,
    failure: TradeExecution["failure"],
  ): TradeExecution {
    execution.status = status;
    execution.failure = failure;
    execution.finishedAt = this.now().toISOString();

    if (status === "SUCCESS") {
      this.options.breaker.recordSuccess();
    } else if (status === "FAILED" && failure?.kind !== "circuit_open") {
      this.options.breaker.recordFailure(this.now().getTime());
    }

    this.options.persistence?.appendExecution(execution);
    const last = execution.attempts[execution.attempts.length - 1];
    const fields = {
      executionId: execution.id,
      proposalId: execution.proposalId,
      chain: execution.chain,
      side: execution.side,
      token: execution.token.address,
      status,
      paper: execution.paper,
      attempts: execution.attempts.length,
      txHash: last?.txHash ?? null,
      failure: failure?.kind ?? null,
    };
    if (status === "SUCCESS") {
      this.logger.ok("EXEC_SUCCESS", execution.paper ? "PAPER EXECUTION COMPLETE" : "EXECUTION CONFIRMED", fields);
    } else {
      this.logger.warn("EXEC_END", `EXECUTION ${status}`, { ...fields, message: failure?.message ?? null });
    }
    this.options.notifier?.notify({
      kind: "execution_outcome",
      severity: status === "SUCCESS" ? "info" : status === "ABORTED" ? "warning" : "critical",
      title: `${execution.side} ${execution.token.symbol ?? execution.token.address} ${status}${execution.paper ? " (paper)" : ""}`,
      fields: { ...fields, message: failure?.message ?? null },
      ts: execution.finishedAt,
    });
    return execution;
  }
}

function isNonceConsumed(error: unknown): boolean {
  const message = errorMessage(error).toLowerCase();
  return message.includes("nonce too low") || message.includes("replacement transaction underpriced");
}

/** Retryable send failures where the node may still have accepted the transaction. */
function isUncertainSend(error: unknown): boolean {
  if (isNonceConsumed(error)) {
    return false;
  }
  if (error instanceof EngineError && (error.code === "RATE_LIMITED" || error.code === "QUOTE_UNAVAILABLE")) {
    return false;
  }
  return isRetryable(error);
}
