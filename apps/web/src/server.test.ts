import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Logger } from "@tradeguard/core";
import { AdapterRegistry, TradeEngine } from "@tradeguard/engine";
import {
  cleanRun,
  FakeChainAdapter,
  FakeMarket,
  FakeQuoteProvider,
  FakeScanner,
  FakeVault,
  OWNER,
  testConfig,
  TOKEN,
} from "@tradeguard/engine/testing";
import { Store } from "@tradeguard/store";
import { createWebApp, httpStatusFor } from "./server.js";

interface ApiResponse {
  status: number;
  body: Record<string, unknown>;
}

describe("web API", () => {
  let store: Store;
  let engine: TradeEngine;
  let adapter: FakeChainAdapter;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new Store(":memory:");
    store.initialize();
    adapter = new FakeChainAdapter();
    const logger = new Logger({ component: "WEB", level: "ERROR", quiet: true });
    engine = new TradeEngine({
      config: testConfig(),
      adapters: new AdapterRegistry([adapter]),
      quotes: new FakeQuoteProvider(),
      market: new FakeMarket(),
      security: new FakeScanner(),
      vault: new FakeVault(),
      persistence: store,
      logger,
      sleep: async () => undefined,
    });
    const app = createWebApp({ engine, store, logger });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") {
      throw new Error("server has no port");
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await engine.stop();
    store.close();
  });

  async function call(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: { "Content-Type": "application/json" },
      ...(body === undefined ? {} : { body: JSON.stringify(body) }),
    });
    const parsed: unknown = await response.json();
    if (typeof parsed !== "object" || parsed === null) {
      throw new Error(`non-object response from ${path}`);
    }
    return { status: response.status, body: { ...parsed } };
  }

  const proposalBody = { owner: OWNER, chain: "base", token: TOKEN.address, side: "BUY", amount: 25 };

  it("answers ping", async () => {
    const { status, body } = await call("GET", "/api/ping");
    expect(status).toBe(200);
    expect(body.ok).toBe(true);
  });

  it("analyzes a token and lists the stored assessment", async () => {
    const analyzed = await call("POST", "/api/analyze", { chain: "base", token: TOKEN.address });
    expect(analyzed.status).toBe(200);
    expect(analyzed.body.assessment).toMatchObject({ score: 10, level: "SAFE" });

    const listed = await call("GET", `/api/assessments/base/${TOKEN.address.toUpperCase().replace("0X", "0x")}`);
    expect(listed.body.assessments).toHaveLength(1);
  });

  it("rejects malformed requests with the error envelope", async () => {
    const { status, body } = await call("POST", "/api/proposals", { ...proposalBody, chain: "polygon" });

    expect(status).toBe(400);
    expect(body).toMatchObject({ ok: false, error: { code: "INVALID_REQUEST" } });
  });

  it("proposes, confirms and reports a paper execution", async () => {
    const created = await call("POST", "/api/proposals", proposalBody);
    expect(created.status).toBe(201);
    expect(created.body.proposal).toMatchObject({ status: "PROPOSED", requester: "web", amount: 25 });
    const pending = await call("GET", "/api/proposals");
    expect(pending.body.proposals).toHaveLength(1);

    const proposalId = engine.listPendingProposals()[0]?.id ?? "";
    const confirmed = await call("POST", `/api/proposals/${proposalId}/confirm`, { wait: true });
    expect(confirmed.status).toBe(200);
    expect(confirmed.body.execution).toMatchObject({ status: "SUCCESS", paper: true });

    const execution = await call("GET", `/api/executions/${proposalId}`);
    expect(execution.body.history).toEqual(["PENDING", "SUCCESS"]);
    const proposal = await call("GET", `/api/proposals/${proposalId}`);
    expect(proposal.body.statusHistory).toEqual(["PROPOSED", "CONFIRMED"]);
  });

  it("maps engine errors onto status codes", async () => {
    const created = await engine.proposeTrade({
      requester: "operator",
      owner: OWNER,
      chain: "base",
      tokenAddress: TOKEN.address,
      side: "SELL",
      amount: 50,
    });

    expect((await call("POST", `/api/proposals/${created.id}/cancel`)).status).toBe(200);
    const again = await call("POST", `/api/proposals/${created.id}/cancel`);
    expect(again.status).toBe(409);
    expect(again.body).toMatchObject({ ok: false, error: { code: "INVALID_STATE" } });

    const missing = await call("GET", "/api/proposals/missing");
    expect(missing.status).toBe(404);
    expect(missing.body).toMatchObject({ error: { code: "NOT_FOUND", message: "Proposal missing not found" } });
  });

  it("returns the blocking factors for a buy below the threshold", async () => {
    adapter.run = {
      ...cleanRun(),
      outcomes: { ...cleanRun().outcomes, SELL: { status: "reverted", data: null, message: "TRANSFER_FAILED" } },
    };

    const { status, body } = await call("POST", "/api/proposals", proposalBody);

    expect(status).toBe(422);
    expect(body).toMatchObject({
      ok: false,
      error: { code: "POLICY_BLOCKED", details: { score: 0, threshold: 3, rule: "block_threshold" } },
    });
  });

  it("updates the mirror policy and refuses unknown fields", async () => {
    const updated = await call("PUT", "/api/mirror/policy", { buyEnabled: true, copyPct: 25 });
    expect(updated.body.policy).toMatchObject({ buyEnabled: true, copyPct: 25, sellEnabled: true });
    expect(engine.getMirrorPolicy().copyPct).toBe(25);

    const rejected = await call("PUT", "/api/mirror/policy", { autoBuyEverything: true });
    expect(rejected.status).toBe(400);
  });

  it("answers unknown routes with 404", async () => {
    const { status, body } = await call("GET", "/api/nope");
    expect(status).toBe(404);
    expect(body).toMatchObject({ ok: false, error: { code: "NOT_FOUND" } });
  });
});

describe("httpStatusFor", () => {
  it("treats unknown errors as server failures", () => {
    expect(httpStatusFor(new Error("boom"))).toBe(500);
  });
});
