import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { MirrorDecisionRecord, RiskAssessment, TokenIdentity, TradeExecution, TradeProposal } from "@tradeguard/core";
import { Store } from "./db.js";

const token: TokenIdentity = {
  chain: "base",
  address: "0x1111111111111111111111111111111111111111",
  decimals: 18,
  symbol: "TEST",
};

function assessment(id: string, score: number, assessedAt: string): RiskAssessment {
  return {
    id,
    token,
    score,
    level: score >= 8 ? "SAFE" : "MEDIUM",
    factors: [],
    lockedPriceUsd: 0.5,
    priceCapturedAt: assessedAt,
    simulationId: `sim-${id}`,
    assessedAt,
  };
}

describe("Store", () => {
  let store: Store;

  beforeEach(() => {
    store = new Store(":memory:");
    store.initialize();
  });

  afterEach(() => {
    store.close();
  });

  it("keeps every assessment and lists the newest first", () => {
    store.appendAssessment(assessment("a1", 9, "2026-01-01T00:00:00.000Z"));
    store.appendAssessment(assessment("a2", 5.5, "2026-01-01T00:05:00.000Z"));

    const rows = store.listAssessments("base", token.address);

    expect(rows.map((row) => [row.id, row.score, row.level])).toEqual([
      ["a2", 5.5, "MEDIUM"],
      ["a1", 9, "SAFE"],
    ]);
    expect(rows[0]?.payload.lockedPriceUsd).toBe(0.5);
  });

  it("appends proposal transitions instead of updating in place", () => {
    const proposal: TradeProposal = {
      id: "p1",
      requester: "ops",
      owner: "0x2222222222222222222222222222222222222222",
      chain: "base",
      side: "BUY",
      token,
      amount: 50,
      slippageBps: 100,
      safeMode: false,
      origin: "manual",
      assessment: assessment("a1", 9, "2026-01-01T00:00:00.000Z"),
      status: "PROPOSED",
      cancelReason: null,
      createdAt: "2026-01-01T00:00:01.000Z",
      expiresAt: "2026-01-01T00:05:01.000Z",
      resolvedAt: null,
    };
    store.appendProposal(proposal);
    store.appendProposal({ ...proposal, status: "CONFIRMED", resolvedAt: "2026-01-01T00:00:09.000Z" });

    expect(store.getProposalStatusHistory("p1")).toEqual(["PROPOSED", "CONFIRMED"]);
  });

  it("records execution snapshots in order", () => {
    const execution: TradeExecution = {
      id: "e1",
      proposalId: "p1",
      chain: "base",
      side: "BUY",
      token,
      paper: true,
      attempts: [],
      status: "PENDING",
      failure: null,
      createdAt: "2026-01-01T00:00:10.000Z",
      finishedAt: null,
    };
    store.appendExecution(execution);
    store.appendExecution({ ...execution, status: "SUCCESS", finishedAt: "2026-01-01T00:00:12.000Z" });

    const history = store.getExecutionHistory("e1");
    expect(history.map((row) => row.status)).toEqual(["PENDING", "SUCCESS"]);
    expect(history[1]?.ts).toBe("2026-01-01T00:00:12.000Z");
    expect(history[1]?.payload.paper).toBe(true);
  });

  it("stores mirror decisions with their reason", () => {
    const record: MirrorDecisionRecord = {
      signal: {
        id: "0xsig",
        sourceWallet: "0x3333333333333333333333333333333333333333",
        side: "SELL",
        token,
        observedAmountRaw: "1000",
        observedAmountUsd: null,
        discoveredAt: "2026-01-01T00:00:00.000Z",
      },
      action: "dropped",
      reason: "duplicate",
      proposalId: null,
      decidedAt: "2026-01-01T00:00:01.000Z",
    };
    store.appendMirrorDecision(record);

    expect(store.listMirrorDecisions()).toEqual([
      {
        id: 1,
        ts: "2026-01-01T00:00:01.000Z",
        signalId: "0xsig",
        sourceWallet: "0x3333333333333333333333333333333333333333",
        action: "dropped",
        reason: "duplicate",
        proposalId: null,
      },
    ]);
  });

  it("acts as a log sink and pages logs by id", () => {
    store.write({ ts: "2026-01-01T00:00:00.000Z", level: "INFO", component: "engine", code: "BOOT", message: "ENGINE STARTED" });
    store.write({
      ts: "2026-01-01T00:00:01.000Z",
      level: "WARN",
      component: "executor",
      code: "RETRY",
      message: "RETRYING BROADCAST",
      data: { attempt: 2, amount: 10n },
    });

    expect(store.getRecentLogs(1).map((log) => log.code)).toEqual(["RETRY"]);
    const after = store.getLogsAfter(1);
    expect(after).toHaveLength(1);
    expect(after[0]?.data).toEqual({ attempt: 2, amount: "10" });
  });

  it("upserts runtime state", () => {
    store.setRuntimeState("mirror_policy", { sellEnabled: true });
    store.setRuntimeState("mirror_policy", { sellEnabled: false });
    expect(store.getRuntimeState("mirror_policy")?.value).toEqual({ sellEnabled: false });
    expect(store.getRuntimeState("missing")).toBeNull();
  });
});
