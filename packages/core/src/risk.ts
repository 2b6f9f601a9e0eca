import { randomUUID } from "node:crypto";
import type {
  EngineConfig,
  LiquiditySnapshot,
  RestrictionFlag,
  RiskAssessment,
  RiskFactor,
  RiskLevel,
  Scenario,
  ScenarioReport,
  SecurityScan,
  SimulationResult,
} from "./types.js";

export interface LevelBoundaries {
  safe: number;
  low: number;
  medium: number;
  high: number;
}

export interface RiskPolicy {
  boundaries: LevelBoundaries;
  ownershipConcentrationMax: number;
  liquidityFloorUsd: number;
  trustScoreMin: number;
}

export const DEFAULT_RISK_POLICY: RiskPolicy = {
  boundaries: { safe: 8, low: 6, medium: 4, high: 2 },
  ownershipConcentrationMax: 0.5,
  liquidityFloorUsd: 10_000,
  trustScoreMin: 50,
};

export function riskPolicyFromConfig(config: EngineConfig): RiskPolicy {
  return {
    boundaries: {
      safe: config.SCORE_SAFE_MIN,
      low: config.SCORE_LOW_MIN,
      medium: config.SCORE_MEDIUM_MIN,
      high: config.SCORE_HIGH_MIN,
    },
    ownershipConcentrationMax: config.OWNERSHIP_CONCENTRATION_MAX,
    liquidityFloorUsd: config.LIQUIDITY_FLOOR_USD,
    trustScoreMin: config.TRUST_SCORE_MIN,
  };
}

const MAX_SCORE = 10;

const flagPenalties: Partial<Record<RestrictionFlag, { weight: number; description: string }>> = {
  HIGH_BUY_TAX: { weight: 2, description: "Buy tax above cap" },
  HIGH_SELL_TAX: { weight: 2, description: "Sell round-trip loss above cap" },
  TRANSFER_TAX: { weight: 1, description: "Transfer tax above cap" },
  MAX_TX_LIMIT: { weight: 1, description: "Max transaction limit enforced" },
  MAX_WALLET_LIMIT: { weight: 0.5, description: "Max wallet limit enforced" },
  TRADING_COOLDOWN: { weight: 0.5, description: "Trading cooldown enforced" },
  BLACKLIST_FUNCTION_PRESENT: { weight: 1.5, description: "Contract exposes blacklist functions" },
  PAUSE_FUNCTION_PRESENT: { weight: 1, description: "Contract can pause transfers" },
  FREEZE_AUTHORITY: { weight: 2, description: "Mint freeze authority is set" },
  TRANSFER_HOOK: { weight: 1, description: "Token runs a transfer hook program" },
};

const scenarioLabel: Record<Scenario, string> = {
  BUY: "Buy",
  SELL: "Sell",
  TRANSFER: "Transfer",
};

export function levelForScore(score: number, boundaries: LevelBoundaries = DEFAULT_RISK_POLICY.boundaries): RiskLevel {
  if (score >= boundaries.safe) {
    return "SAFE";
  }
  if (score >= boundaries.low) {
    return "LOW";
  }
  if (score >= boundaries.medium) {
    return "MEDIUM";
  }
  if (score >= boundaries.high) {
    return "HIGH";
  }
  return "CRITICAL";
}

export function clampScore(value: number): number {
  const clamped = Math.max(0, Math.min(MAX_SCORE, value));
  return Math.round(clamped * 100) / 100;
}

function describeOutcome(report: ScenarioReport): string {
  const label = scenarioLabel[report.scenario];
  if (report.outcome.status === "REVERTED") {
    return `${label} simulation reverted (${report.outcome.reason})`;
  }
  if (report.outcome.status === "TIMEOUT") {
    return `${label} simulation timed out`;
  }
  return `${label} simulation succeeded`;
}

export class RiskScorer {
  private readonly policy: RiskPolicy;
  private readonly now: () => Date;

  public constructor(policy: RiskPolicy = DEFAULT_RISK_POLICY, now: () => Date = () => new Date()) {
    this.policy = policy;
    this.now = now;
  }

  public score(simulation: SimulationResult, scan: SecurityScan | null, liquidity: LiquiditySnapshot): RiskAssessment {
    const { score, factors } = this.evaluate(simulation, scan, liquidity);
    return {
      id: randomUUID(),
      token: simulation.token,
      score,
      level: levelForScore(score, this.policy.boundaries),
      factors,
      lockedPriceUsd: liquidity.usdPrice,
      priceCapturedAt: liquidity.priceAsOf,
      simulationId: simulation.id,
      assessedAt: this.now().toISOString(),
    };
  }

  /** Pure part of scoring: identical inputs always produce identical score and factors. */
  public evaluate(
    simulation: SimulationResult,
    scan: SecurityScan | null,
    liquidity: LiquiditySnapshot,
  ): { score: number; factors: RiskFactor[] } {
    const sell = simulation.scenarios.SELL;
    if (sell.outcome.status === "REVERTED") {
      const description = sell.informational
        ? `${describeOutcome(sell)}; buy also failed so sellability is unverified`
        : describeOutcome(sell);
      return {
        score: 0,
        factors: [{ source: "simulation", weight: MAX_SCORE, description }],
      };
    }

    const factors: RiskFactor[] = [];
    const buy = simulation.scenarios.BUY;
    const transfer = simulation.scenarios.TRANSFER;

    if (buy.outcome.status === "REVERTED") {
      factors.push({ source: "simulation", weight: 6, description: describeOutcome(buy) });
    }
    if (transfer.outcome.status === "REVERTED" && !transfer.informational) {
      factors.push({ source: "simulation", weight: 3, description: describeOutcome(transfer) });
    }
    for (const report of [buy, sell, transfer]) {
      if (report.outcome.status === "TIMEOUT" && !report.informational) {
        factors.push({ source: "simulation", weight: 1, description: describeOutcome(report) });
      }
    }

    for (const flag of simulation.flags) {
      const penalty = flagPenalties[flag];
      if (penalty) {
        factors.push({ source: "simulation", weight: penalty.weight, description: penalty.description });
      }
    }

    if (!scan) {
      factors.push({ source: "security_scan", weight: 2, description: "Security scan unavailable" });
    } else {
      if (scan.ownershipConcentration > this.policy.ownershipConcentrationMax) {
        factors.push({
          source: "security_scan",
          weight: 2,
          description: `Top holders own ${(scan.ownershipConcentration * 100).toFixed(1)}% of supply`,
        });
      }
      if (scan.isProxy) {
        factors.push({ source: "security_scan", weight: 1.5, description: "Proxy / upgradeable contract" });
      }
      if (scan.flaggedFunctions.length > 0) {
        factors.push({
          source: "security_scan",
          weight: 1.5,
          description: `Suspicious functions: ${scan.flaggedFunctions.join(", ")}`,
        });
      }
      if (scan.trustScore < this.policy.trustScoreMin) {
        factors.push({
          source: "security_scan",
          weight: 1.5,
          description: `External trust score ${scan.trustScore} below ${this.policy.trustScoreMin}`,
        });
      }
    }

    if (liquidity.usdLiquidity < this.policy.liquidityFloorUsd) {
      factors.push({
        source: "liquidity",
        weight: 2,
        description: `Liquidity $${Math.round(liquidity.usdLiquidity)} below floor $${this.policy.liquidityFloorUsd}`,
      });
    }

    const penalty = factors.reduce((sum, factor) => sum + factor.weight, 0);
    const ordered = factors
      .map((factor, index) => ({ factor, index }))
      .sort((a, b) => b.factor.weight - a.factor.weight || a.index - b.index)
      .map((item) => item.factor);

    return { score: clampScore(MAX_SCORE - penalty), factors: ordered };
  }
}

export class CircuitBreaker {
  private readonly threshold: number;
  private readonly cooldownMinutes: number;
  private consecutiveFailures = 0;
  private openedAt: number | null = null;

  public constructor(threshold: number, cooldownMinutes: number) {
    this.threshold = threshold;
    this.cooldownMinutes = cooldownMinutes;
  }

  public recordFailure(now = Date.now()): void {
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.threshold && this.openedAt === null) {
      this.openedAt = now;
    }
  }

  public recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.openedAt = null;
  }

  public isOpen(now = Date.now()): boolean {
    if (this.openedAt === null) {
      return false;
    }
    const cooldownMs = this.cooldownMinutes * 60_000;
    if (now - this.openedAt >= cooldownMs) {
      this.openedAt = null;
      this.consecutiveFailures = 0;
      return false;
    }
    return true;
  }

  public state(now = Date.now()): { isOpen: boolean; consecutiveFailures: number; reopenAt?: string } {
    const open = this.isOpen(now);
    if (!open || this.openedAt === null) {
      return { isOpen: false, consecutiveFailures: this.consecutiveFailures };
    }
    return {
      isOpen: true,
      consecutiveFailures: this.consecutiveFailures,
      reopenAt: new Date(this.openedAt + this.cooldownMinutes * 60_000).toISOString(),
    };
  }
}
