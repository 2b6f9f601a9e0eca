import { describe, expect, it } from "vitest";
import { CircuitBreaker, DEFAULT_RISK_POLICY, RiskScorer, levelForScore, riskPolicyFromConfig } from "./risk.js";
import { parseConfig } from "./config.js";
import type {
  LiquiditySnapshot,
  RestrictionFlag,
  RiskLevel,
  ScenarioOutcome,
  SecurityScan,
  SimulationResult,
} from "./types.js";

const token = { chain: "base", address: "0x00000000000000000000000000000000000000aa", decimals: 18, symbol: "TEST" } as const;

function simulation(input: {
  buy?: ScenarioOutcome;
  sell?: ScenarioOutcome;
  transfer?: ScenarioOutcome;
  flags?: RestrictionFlag[];
}): SimulationResult {
  const buy = input.buy ?? { status: "SUCCESS" };
  const buyFailed = buy.status !== "SUCCESS";
  return {
    id: "sim-1",
    token,
    scenarios: {
      BUY: { scenario: "BUY", outcome: buy, informational: false, gasEstimate: "120000" },
      SELL: { scenario: "SELL", outcome: input.sell ?? { status: "SUCCESS" }, informational: buyFailed, gasEstimate: null },
      TRANSFER: {
        scenario: "TRANSFER",
        outcome: input.transfer ?? { status: "SUCCESS" },
        informational: buyFailed,
        gasEstimate: null,
      },
    },
    flags: input.flags ?? [],
    taxes: { buyPct: 0, sellPct: 0, transferPct: 0 },
    createdAt: "2026-01-01T00:00:00.000Z",
  };
}

const cleanScan: SecurityScan = { ownershipConcentration: 0.1, isProxy: false, flaggedFunctions: [], trustScore: 90 };
const deepLiquidity: LiquiditySnapshot = { usdLiquidity: 250_000, usdPrice: 0.042, priceAsOf: "2026-01-01T00:00:05.000Z" };

describe("RiskScorer", () => {
  const scorer = new RiskScorer(DEFAULT_RISK_POLICY, () => new Date("2026-01-01T00:00:10.000Z"));

  it("scores a clean token as SAFE with no factors", () => {
    const assessment = scorer.score(simulation({}), cleanScan, deepLiquidity);
    expect(assessment.score).toBe(10);
    expect(assessment.level).toBe("SAFE");
    expect(assessment.factors).toEqual([]);
  });

  it("locks the price from the liquidity snapshot", () => {
    const assessment = scorer.score(simulation({}), cleanScan, deepLiquidity);
    expect(assessment.lockedPriceUsd).toBe(0.042);
    expect(assessment.priceCapturedAt).toBe("2026-01-01T00:00:05.000Z");
    expect(assessment.assessedAt).toBe("2026-01-01T00:00:10.000Z");
    expect(assessment.simulationId).toBe("sim-1");
  });

  it("pins a reverted sell to 0 / CRITICAL whatever else is true", () => {
    const assessment = scorer.score(
      simulation({ sell: { status: "REVERTED", reason: "TRANSFER_FAILED", detail: "TransferHelper: TRANSFER_FROM_FAILED" } }),
      cleanScan,
      deepLiquidity,
    );
    expect(assessment.score).toBe(0);
    expect(assessment.level).toBe("CRITICAL");
    expect(assessment.factors).toEqual([
      { source: "simulation", weight: 10, description: "Sell simulation reverted (TRANSFER_FAILED)" },
    ]);
  });

  it("still pins to 0 when the sell revert is informational", () => {
    const result = scorer.evaluate(
      simulation({
        buy: { status: "REVERTED", reason: "TRADING_DISABLED", detail: "Trading not open" },
        sell: { status: "REVERTED", reason: "TRANSFER_FAILED", detail: "" },
      }),
      cleanScan,
      deepLiquidity,
    );
    expect(result.score).toBe(0);
    expect(result.factors[0]?.description).toBe(
      "Sell simulation reverted (TRANSFER_FAILED); buy also failed so sellability is unverified",
    );
  });

  it("penalises a missing scan and thin liquidity", () => {
    const result = scorer.evaluate(simulation({}), null, { ...deepLiquidity, usdLiquidity: 2_500 });
    expect(result.score).toBe(6);
    expect(result.factors.map((factor) => factor.source)).toEqual(["security_scan", "liquidity"]);
    expect(result.factors[1]?.description).toBe("Liquidity $2500 below floor $10000");
  });

  it("orders factors by weight", () => {
    const result = scorer.evaluate(
      simulation({ flags: ["MAX_WALLET_LIMIT", "HIGH_SELL_TAX"] }),
      { ...cleanScan, isProxy: true },
      deepLiquidity,
    );
    expect(result.factors.map((factor) => factor.weight)).toEqual([2, 1.5, 0.5]);
    expect(result.score).toBe(6);
  });

  it("penalises a blocked buy without short-circuiting", () => {
    const result = scorer.evaluate(
      simulation({ buy: { status: "REVERTED", reason: "MAX_TX_EXCEEDED", detail: "" }, flags: ["BUY_BLOCKED", "MAX_TX_LIMIT"] }),
      cleanScan,
      deepLiquidity,
    );
    expect(result.score).toBe(3);
    expect(result.factors[0]).toEqual({
      source: "simulation",
      weight: 6,
      description: "Buy simulation reverted (MAX_TX_EXCEEDED)",
    });
  });

  it("ignores informational timeouts but counts real ones", () => {
    const result = scorer.evaluate(simulation({ transfer: { status: "TIMEOUT" } }), cleanScan, deepLiquidity);
    expect(result.score).toBe(9);
    expect(result.factors).toEqual([{ source: "simulation", weight: 1, description: "Transfer simulation timed out" }]);
  });

  it("clamps at zero", () => {
    const result = scorer.evaluate(
      simulation({
        buy: { status: "REVERTED", reason: "BLACKLISTED", detail: "" },
        flags: ["FREEZE_AUTHORITY", "BLACKLIST_FUNCTION_PRESENT"],
      }),
      { ownershipConcentration: 0.9, isProxy: true, flaggedFunctions: ["mint"], trustScore: 10 },
      { ...deepLiquidity, usdLiquidity: 0 },
    );
    expect(result.score).toBe(0);
  });

  it("is deterministic for identical inputs", () => {
    const input = simulation({ flags: ["TRANSFER_TAX"] });
    expect(scorer.evaluate(input, cleanScan, deepLiquidity)).toEqual(scorer.evaluate(input, cleanScan, deepLiquidity));
  });
});

describe("levelForScore", () => {
  it("maps the default boundaries", () => {
    expect(levelForScore(10)).toBe("SAFE");
    expect(levelForScore(8)).toBe("SAFE");
    expect(levelForScore(7.99)).toBe("LOW");
    expect(levelForScore(6)).toBe("LOW");
    expect(levelForScore(4)).toBe("MEDIUM");
    expect(levelForScore(2)).toBe("HIGH");
    expect(levelForScore(1.99)).toBe("CRITICAL");
    expect(levelForScore(0)).toBe("CRITICAL");
  });

  it("never improves the level as the score drops", () => {
    const rank: Record<RiskLevel, number> = { SAFE: 0, LOW: 1, MEDIUM: 2, HIGH: 3, CRITICAL: 4 };
    let previous = rank[levelForScore(10)];
    for (let score = 10; score >= 0; score -= 0.25) {
      const current = rank[levelForScore(score)];
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
  });

  it("honours configured boundaries", () => {
    const policy = riskPolicyFromConfig(parseConfig({ SCORE_SAFE_MIN: "9", SCORE_LOW_MIN: "7" }, "/tmp/tradeguard"));
    expect(levelForScore(8.5, policy.boundaries)).toBe("LOW");
    expect(levelForScore(6.5, policy.boundaries)).toBe("MEDIUM");
  });
});

describe("CircuitBreaker", () => {
  it("opens after N consecutive failures and closes after the cooldown", () => {
    const breaker = new CircuitBreaker(2, 1);
    breaker.recordFailure(0);
    expect(breaker.isOpen(0)).toBe(false);
    breaker.recordFailure(1_000);
    expect(breaker.isOpen(1_000)).toBe(true);
    expect(breaker.state(1_000).reopenAt).toBe(new Date(61_000).toISOString());
    expect(breaker.isOpen(60_999)).toBe(true);
    expect(breaker.isOpen(61_000)).toBe(false);
  });

  it("resets on success", () => {
    const breaker = new CircuitBreaker(2, 1);
    breaker.recordFailure(0);
    breaker.recordSuccess();
    breaker.recordFailure(10);
    expect(breaker.isOpen(10)).toBe(false);
  });
});
