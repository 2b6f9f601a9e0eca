import { randomUUID } from "node:crypto";
import {
  InvalidStateError,
  Logger,
  NotFoundError,
  PolicyBlockedError,
  type EngineConfig,
  type NotificationSink,
  type PersistenceSink,
  type RiskAssessment,
  type Scenario,
  type TradeProposal,
  type TradeRequest,
} from "@tradeguard/core";

export interface GatePolicy {
  blockBelowScore: number;
  safeModeMinScore: number;
  proposalTtlSeconds: number;
}

export function gatePolicyFromConfig(config: EngineConfig): GatePolicy {
  return {
    blockBelowScore: config.BLOCK_BELOW_SCORE,
    safeModeMinScore: config.SAFE_MODE_MIN_SCORE,
    proposalTtlSeconds: config.PROPOSAL_TTL_SECONDS,
  };
}

export interface TimerApi {
  setTimeout(callback: () => void, ms: number): ReturnType<typeof setTimeout>;
  clearTimeout(handle: ReturnType<typeof setTimeout>): void;
}

const systemTimers: TimerApi = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

export interface SessionGateOptions {
  policy: GatePolicy;
  persistence?: PersistenceSink;
  notifier?: NotificationSink;
  logger?: Logger;
  now?: () => Date;
  timers?: TimerApi;
}

export const POLICY_BLOCKED_REASON = "POLICY_BLOCKED";
export const EXPIRED_REASON = "EXPIRED";

function revertedScenarios(assessment: RiskAssessment): Scenario[] {
  const scenarios: Scenario[] = [];
  for (const factor of assessment.factors) {
    const match = /^(Buy|Sell|Transfer) simulation reverted/.exec(factor.description);
    if (match?.[1]) {
      scenarios.push(match[1] === "Buy" ? "BUY" : match[1] === "Sell" ? "SELL" : "TRANSFER");
    }
  }
  return scenarios;
}

/**
 * Owns proposals until they are confirmed. Every transition is a synchronous
 * check-and-set on the proposal's status, so confirmation and expiry cannot
 * both win.
 */
export class SessionGate {
  private readonly policy: GatePolicy;
  private readonly persistence: PersistenceSink | undefined;
  private readonly notifier: NotificationSink | undefined;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly timers: TimerApi;
  private readonly proposals = new Map<string, TradeProposal>();
  private readonly expiryTimers = new Map<string, ReturnType<typeof setTimeout>>();

  public constructor(options: SessionGateOptions) {
    this.policy = options.policy;
    this.persistence = options.persistence;
    this.notifier = options.notifier;
    this.logger = options.logger ?? new Logger({ component: "gate", level: "INFO", quiet: true });
    this.now = options.now ?? (() => new Date());
    this.timers = options.timers ?? systemTimers;
  }

  public propose(request: TradeRequest, assessment: RiskAssessment): TradeProposal {
    if (request.side === "BUY" && assessment.score < this.policy.blockBelowScore) {
      const error = new PolicyBlockedError(
        `Buy blocked: score ${assessment.score} is below ${this.policy.blockBelowScore}`,
        {
          score: assessment.score,
          threshold: this.policy.blockBelowScore,
          rule: "block_threshold",
          factors: assessment.factors,
          revertedScenarios: revertedScenarios(assessment),
        },
      );
      this.reportBlocked(request, assessment, error);
      throw error;
    }

    const createdAt = this.now();
    const proposal: TradeProposal = {
      ...request,
      id: randomUUID(),
      assessment,
      status: "PROPOSED",
      cancelReason: null,
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + this.policy.proposalTtlSeconds * 1000).toISOString(),
      resolvedAt: null,
    };
    this.proposals.set(proposal.id, proposal);
    this.persistence?.appendProposal({ ...proposal });
    this.expiryTimers.set(
      proposal.id,
      this.timers.setTimeout(() => this.expire(proposal.id), this.policy.proposalTtlSeconds * 1000),
    );

    this.logger.info("PROPOSAL_CREATED", "TRADE PROPOSED", {
      proposalId: proposal.id,
      side: proposal.side,
      chain: proposal.chain,
      token: proposal.token.address,
      score: assessment.score,
      origin: proposal.origin,
    });
    return proposal;
  }

  public confirm(id: string): TradeProposal {
    const proposal = this.require(id);
    if (proposal.status !== "PROPOSED") {
      throw new InvalidStateError(`Proposal ${id} is ${proposal.status}`, { id, status: proposal.status });
    }
    if (this.now().getTime() >= Date.parse(proposal.expiresAt)) {
      this.expire(id);
      throw new InvalidStateError(`Proposal ${id} is EXPIRED`, { id, status: "EXPIRED" });
    }

    if (proposal.safeMode && proposal.assessment.score < this.policy.safeModeMinScore) {
      this.resolve(proposal, "CANCELLED", POLICY_BLOCKED_REASON);
      const error = new PolicyBlockedError(
        `Safe mode requires score ${this.policy.safeModeMinScore}, got ${proposal.assessment.score}`,
        {
          score: proposal.assessment.score,
          threshold: this.policy.safeModeMinScore,
          rule: "safe_mode_threshold",
          factors: proposal.assessment.factors,
          revertedScenarios: revertedScenarios(proposal.assessment),
        },
      );
      this.reportBlocked(proposal, proposal.assessment, error);
      throw error;
    }

    this.resolve(proposal, "CONFIRMED", null);
    this.logger.ok("PROPOSAL_CONFIRMED", "TRADE CONFIRMED", { proposalId: id });
    return proposal;
  }

  public cancel(id: string, reason = "CANCELLED_BY_USER"): TradeProposal {
    const proposal = this.require(id);
    if (proposal.status !== "PROPOSED") {
      throw new InvalidStateError(`Only PROPOSED proposals can be cancelled; ${id} is ${proposal.status}`, {
        id,
        status: proposal.status,
      });
    }
    this.resolve(proposal, "CANCELLED", reason);
    this.logger.info("PROPOSAL_CANCELLED", "TRADE CANCELLED", { proposalId: id, reason });
    return proposal;
  }

  public get(id: string): TradeProposal | null {
    return this.proposals.get(id) ?? null;
  }

  public listPending(): TradeProposal[] {
    return [...this.proposals.values()].filter((proposal) => proposal.status === "PROPOSED");
  }

  /** Stops expiry timers; pending proposals stay PROPOSED. */
  public dispose(): void {
    for (const handle of this.expiryTimers.values()) {
      this.timers.clearTimeout(handle);
    }
    this.expiryTimers.clear();
  }

  private expire(id: string): void {
    const proposal = this.proposals.get(id);
    if (!proposal || proposal.status !== "PROPOSED") {
      return;
    }
    this.resolve(proposal, "EXPIRED", EXPIRED_REASON);
    this.logger.info("PROPOSAL_EXPIRED", "TRADE PROPOSAL EXPIRED", { proposalId: id });
  }

  private resolve(proposal: TradeProposal, status: "CONFIRMED" | "EXPIRED" | "CANCELLED", reason: string | null): void {
    proposal.status = status;
    proposal.cancelReason = reason;
    proposal.resolvedAt = this.now().toISOString();
    const handle = this.expiryTimers.get(proposal.id);
    if (handle !== undefined) {
      this.timers.clearTimeout(handle);
      this.expiryTimers.delete(proposal.id);
    }
    this.persistence?.appendProposal({ ...proposal });
  }

  private require(id: string): TradeProposal {
    const proposal = this.proposals.get(id);
    if (!proposal) {
      throw new NotFoundError("Proposal", id);
    }
    return proposal;
  }

  private reportBlocked(request: TradeRequest, assessment: RiskAssessment, error: PolicyBlockedError): void {
    this.logger.warn("POLICY_BLOCKED", "TRADE BLOCKED BY POLICY", {
      side: request.side,
      chain: request.chain,
      token: request.token.address,
      ...error.details,
    });
    this.notifier?.notify({
      kind: "policy_blocked",
      severity: "warning",
      title: `${request.side} ${request.token.symbol ?? request.token.address} blocked`,
      fields: {
        chain: request.chain,
        token: request.token.address,
        side: request.side,
        score: assessment.score,
        reason: error.message,
        origin: request.origin,
      },
      ts: this.now().toISOString(),
    });
  }
}
