import { randomUUID } from "node:crypto";
import {
  chainFamily,
  errorMessage,
  KeyedMutex,
  Logger,
  PolicyBlockedError,
  Semaphore,
  sleep,
  withBackoff,
  type BoundedChannel,
  type EngineConfig,
  type MirrorDecisionRecord,
  type MirrorSignal,
  type NotificationSink,
  type PersistenceSink,
  type RiskAssessment,
  type TokenIdentity,
  type TradeExecution,
  type TradeProposal,
  type TradeRequest,
} from "@tradeguard/core";
import type { SessionGate } from "./gate.js";

export interface MirrorPolicy {
  sellEnabled: boolean;
  buyEnabled: boolean;
  trackedWallets: string[];
  blacklistWallets: string[];
  blacklistTokens: string[];
  /** Share of the observed USD amount copied on BUY, 0..100. */
  copyPct: number;
  maxPositionUsd: number;
  defaultBuyUsd: number;
  /** Share of our holdings sold on a mirrored SELL, 0..100. */
  sellPct: number;
  safeMode: boolean;
  slippageBps: number;
  ownerEvm: string;
  ownerSolana: string;
}

export function mirrorPolicyFromConfig(config: EngineConfig): MirrorPolicy {
  return {
    sellEnabled: config.MIRROR_SELL_ENABLED,
    buyEnabled: config.MIRROR_BUY_ENABLED,
    trackedWallets: [...config.MIRROR_TRACKED_WALLETS],
    blacklistWallets: [...config.MIRROR_BLACKLIST_WALLETS],
    blacklistTokens: [...config.MIRROR_BLACKLIST_TOKENS],
    copyPct: config.MIRROR_COPY_PCT,
    maxPositionUsd: config.MIRROR_MAX_POSITION_USD,
    defaultBuyUsd: config.MIRROR_DEFAULT_BUY_USD,
    sellPct: config.MIRROR_SELL_PCT,
    safeMode: config.SAFE_MODE,
    slippageBps: config.DEFAULT_SLIPPAGE_BPS,
    ownerEvm: config.MIRROR_OWNER_EVM,
    ownerSolana: config.MIRROR_OWNER_SOLANA,
  };
}

/** EVM addresses compare case-insensitively; base58 addresses are case-sensitive. */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  return trimmed.startsWith("0x") ? trimmed.toLowerCase() : trimmed;
}

function includesAddress(list: readonly string[], address: string): boolean {
  const needle = normalizeAddress(address);
  return list.some((entry) => normalizeAddress(entry) === needle);
}

export function mirrorBuyNotional(signal: MirrorSignal, policy: MirrorPolicy): number {
  if (signal.observedAmountUsd === null || !(signal.observedAmountUsd > 0)) {
    return policy.defaultBuyUsd;
  }
  return Math.min((signal.observedAmountUsd * policy.copyPct) / 100, policy.maxPositionUsd);
}

export interface MirrorProcessorOptions {
  assess: (token: TokenIdentity) => Promise<RiskAssessment>;
  gate: SessionGate;
  execute: (proposal: TradeProposal) => Promise<TradeExecution>;
  persistence?: PersistenceSink;
  notifier?: NotificationSink;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  /** Assessment tries for a mirrored SELL before it goes ahead at unknown risk. */
  assessAttempts?: number;
  assessBackoffMs?: number;
  /** Signals being decided at once across all wallets; queued and executing signals do not count. */
  maxConcurrent?: number;
  /** Signals buffered behind busy wallets before the run loop stops receiving. */
  maxQueued?: number;
  /** Remembered signal ids for duplicate detection. */
  seenCapacity?: number;
}

interface MirrorDecision {
  proposal: TradeProposal | null;
  execute: boolean;
}

/**
 * Turns observed wallet activity into gated proposals. Signals from one
 * source wallet are decided and executed in arrival order; different wallets
 * run concurrently.
 */
export class MirrorProcessor {
  private readonly options: MirrorProcessorOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly decisionLocks = new KeyedMutex();
  private readonly executionLocks = new KeyedMutex();
  private readonly seen = new Set<string>();
  private readonly seenCapacity: number;
  private readonly slots: Semaphore;
  private readonly maxQueued: number;
  private readonly decisions = new Set<Promise<void>>();
  private readonly executions = new Set<Promise<void>>();

  public constructor(options: MirrorProcessorOptions) {
    this.options = options;
    this.logger = options.logger ?? new Logger({ component: "mirror", level: "INFO", quiet: true });
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
    this.seenCapacity = options.seenCapacity ?? 10_000;
    this.slots = new Semaphore(options.maxConcurrent ?? 16);
    this.maxQueued = options.maxQueued ?? 256;
  }

  /** Decides one signal and, when it is auto-confirmed, waits for its execution. */
  public async process(signal: MirrorSignal, policy: MirrorPolicy): Promise<TradeProposal | null> {
    const decision = await this.decide(signal, policy);
    if (decision.proposal && decision.execute) {
      await this.executeProposal(decision.proposal);
    }
    return decision.proposal;
  }

  private async decide(signal: MirrorSignal, policy: MirrorPolicy): Promise<MirrorDecision> {
    const skip: MirrorDecision = { proposal: null, execute: false };
    const dropReason = this.dropReason(signal, policy);
    if (dropReason) {
      this.record(signal, "dropped", dropReason, null);
      return skip;
    }
    this.remember(signal.id);

    const owner = chainFamily(signal.token.chain) === "evm" ? policy.ownerEvm : policy.ownerSolana;
    if (!owner) {
      this.record(signal, "failed", `no mirror owner wallet for ${signal.token.chain}`, null);
      return skip;
    }

    let assessment: RiskAssessment;
    try {
      assessment = await this.assess(signal);
    } catch (error) {
      this.record(signal, "failed", errorMessage(error), null);
      return skip;
    }

    const request: TradeRequest = {
      requester: `mirror:${signal.sourceWallet}`,
      owner,
      chain: signal.token.chain,
      side: signal.side,
      token: signal.token,
      amount: signal.side === "BUY" ? mirrorBuyNotional(signal, policy) : policy.sellPct,
      slippageBps: policy.slippageBps,
      safeMode: policy.safeMode,
      origin: "mirror",
    };

    let proposal: TradeProposal;
    try {
      proposal = this.options.gate.propose(request, assessment);
    } catch (error) {
      this.record(signal, error instanceof PolicyBlockedError ? "blocked" : "failed", errorMessage(error), null);
      return skip;
    }

    const autoConfirm = signal.side === "SELL" ? policy.sellEnabled : policy.buyEnabled;
    if (!autoConfirm) {
      this.record(signal, "proposed", "manual confirmation required", proposal.id);
      this.options.notifier?.notify({
        kind: "mirror_signal",
        severity: "info",
        title: `Mirror ${signal.side} of ${signal.token.symbol ?? signal.token.address} awaits confirmation`,
        fields: {
          proposalId: proposal.id,
          sourceWallet: signal.sourceWallet,
          chain: signal.token.chain,
          token: signal.token.address,
          side: signal.side,
          amount: request.amount,
          score: assessment.score,
          level: assessment.level,
          expiresAt: proposal.expiresAt,
        },
        ts: this.now().toISOString(),
      });
      return { proposal, execute: false };
    }

    try {
      this.options.gate.confirm(proposal.id);
    } catch (error) {
      this.record(signal, error instanceof PolicyBlockedError ? "blocked" : "failed", errorMessage(error), proposal.id);
      return { proposal, execute: false };
    }
    this.record(signal, "auto_confirmed", null, proposal.id);
    return { proposal, execute: true };
  }

  /**
   * Buys need a score. A SELL that still cannot be assessed after retries goes
   * ahead at unknown risk; safe mode refuses it at confirmation.
   */
  private async assess(signal: MirrorSignal): Promise<RiskAssessment> {
    if (signal.side === "BUY") {
      return this.options.assess(signal.token);
    }
    try {
      return await withBackoff(() => this.options.assess(signal.token), {
        maxAttempts: this.options.assessAttempts ?? 3,
        baseBackoffMs: this.options.assessBackoffMs ?? 500,
        shouldRetry: () => true,
        sleep: this.sleep,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          this.logger.warn("MIRROR_ASSESS_RETRY", "SELL ASSESSMENT FAILED, RETRYING", {
            signalId: signal.id,
            attempt,
            maxAttempts,
            delayMs,
            error: errorMessage(error),
          });
        },
      });
    } catch (error) {
      this.logger.warn("MIRROR_RISK_UNKNOWN", "SELL PROPOSED WITHOUT A RISK ASSESSMENT", {
        signalId: signal.id,
        token: signal.token.address,
        error: errorMessage(error),
      });
      return unknownRisk(signal.token, error, this.now().toISOString());
    }
  }

  private async executeProposal(proposal: TradeProposal): Promise<void> {
    try {
      await this.options.execute(proposal);
    } catch (error) {
      this.logger.error("MIRROR_EXEC_FAIL", "MIRRORED EXECUTION FAILED TO START", {
        proposalId: proposal.id,
        error: errorMessage(error),
      });
    }
  }

  /**
   * Consumes the channel until it is closed and drained. Each wallet's signals
   * are decided one at a time, and at most `maxConcurrent` decisions run across
   * wallets. Executions follow in the same per-wallet order without holding up
   * the next decision. Once `maxQueued` signals wait on busy wallets the loop
   * stops receiving and producers wait on the full channel.
   */
  public async run(channel: BoundedChannel<MirrorSignal>, policy: () => MirrorPolicy): Promise<void> {
    for await (const signal of channel) {
      while (this.decisions.size >= this.maxQueued) {
        await Promise.race(this.decisions);
      }
      const wallet = normalizeAddress(signal.sourceWallet);
      const decision: Promise<void> = this.decisionLocks
        .runExclusive(wallet, () => this.slots.run(() => this.decide(signal, policy())))
        .then(
          ({ proposal, execute }) => {
            if (proposal && execute) {
              this.track(this.executionLocks.runExclusive(wallet, () => this.executeProposal(proposal)));
            }
          },
          (error: unknown) => {
            this.logger.error("MIRROR_SIGNAL_FAIL", "MIRROR SIGNAL PROCESSING FAILED", {
              signalId: signal.id,
              error: errorMessage(error),
            });
          },
        )
        .finally(() => {
          this.decisions.delete(decision);
        });
      this.decisions.add(decision);
    }
    await Promise.allSettled([...this.decisions]);
    await Promise.allSettled([...this.executions]);
  }

  private track(execution: Promise<void>): void {
    const tracked: Promise<void> = execution.finally(() => {
      this.executions.delete(tracked);
    });
    this.executions.add(tracked);
  }

  private dropReason(signal: MirrorSignal, policy: MirrorPolicy): string | null {
    if (this.seen.has(signal.id)) {
      return "duplicate";
    }
    if (!includesAddress(policy.trackedWallets, signal.sourceWallet)) {
      return "untracked_wallet";
    }
    if (includesAddress(policy.blacklistWallets, signal.sourceWallet)) {
      return "blacklisted_wallet";
    }
    if (includesAddress(policy.blacklistTokens, signal.token.address)) {
      return "blacklisted_token";
    }
    return null;
  }

  private remember(id: string): void {
    this.seen.add(id);
    if (this.seen.size > this.seenCapacity) {
      const oldest = this.seen.values().next();
      if (!oldest.done) {
        this.seen.delete(oldest.value);
      }
    }
  }

  private record(
    signal: MirrorSignal,
    action: MirrorDecisionRecord["action"],
    reason: string | null,
    proposalId: string | null,
  ): void {
    const record: MirrorDecisionRecord = { signal, action, reason, proposalId, decidedAt: this.now().toISOString() };
    this.options.persistence?.appendMirrorDecision(record);
    this.logger.info("MIRROR_DECISION", `MIRROR SIGNAL ${action.toUpperCase()}`, {
      signalId: signal.id,
      sourceWallet: signal.sourceWallet,
      side: signal.side,
      token: signal.token.address,
      reason,
      proposalId,
    });
  }
}

function unknownRisk(token: TokenIdentity, error: unknown, at: string): RiskAssessment {
  return {
    id: randomUUID(),
    token,
    score: 0,
    level: "CRITICAL",
    factors: [{ source: "simulation", weight: 10, description: `Risk unknown: ${errorMessage(error)}` }],
    lockedPriceUsd: 0,
    priceCapturedAt: at,
    simulationId: "",
    assessedAt: at,
  };
}
