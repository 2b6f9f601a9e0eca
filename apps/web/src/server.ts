import type { Server } from "node:http";
import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z, ZodError } from "zod";
import {
  bigintReplacer,
  CHAIN_IDS,
  EngineError,
  errorMessage,
  isChainId,
  type ChainId,
  type EngineErrorCode,
  type Logger,
} from "@tradeguard/core";
import type { TradeEngine } from "@tradeguard/engine";
import type { Store } from "@tradeguard/store";

export interface WebAppDeps {
  engine: TradeEngine;
  store: Store;
  logger: Logger;
  /** Interval of the server-sent event stream. */
  eventIntervalMs?: number;
}

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  INVALID_STATE: 409,
  POLICY_BLOCKED: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  RATE_LIMITED: 429,
  SIMULATION_UNAVAILABLE: 503,
  QUOTE_UNAVAILABLE: 503,
  TRANSIENT_NETWORK: 503,
  EXECUTION_REVERTED: 502,
  EXECUTION_TIMEOUT: 504,
};

export function httpStatusFor(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof EngineError) {
    return STATUS_BY_CODE[error.code];
  }
  return 500;
}

export function errorBody(error: unknown): { ok: false; error: { code: string; message: string; details: Record<string, unknown> } } {
  if (error instanceof ZodError) {
    return {
      ok: false,
      error: {
        code: "INVALID_REQUEST",
        message: error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
        details: { issues: error.issues },
      },
    };
  }
  if (error instanceof EngineError) {
    return { ok: false, error: { code: error.code, message: error.message, details: error.details } };
  }
  return { ok: false, error: { code: "INTERNAL", message: errorMessage(error), details: {} } };
}

const chainSchema = z.string().refine(isChainId, { message: `chain must be one of ${CHAIN_IDS.join(", ")}` });
const sideSchema = z.enum(["BUY", "SELL"]);

const analyzeSchema = z.object({
  chain: chainSchema,
  token: z.string().min(1),
});

const proposeSchema = z.object({
  requester: z.string().min(1).default("web"),
  owner: z.string().min(1),
  chain: chainSchema,
  token: z.string().min(1),
  side: sideSchema,
  amount: z.number().positive(),
  slippageBps: z.number().int().positive().optional(),
  safeMode: z.boolean().optional(),
});

const confirmSchema = z.object({ wait: z.boolean().default(false) });

const walletList = z.array(z.string().min(1));
const mirrorPolicyPatchSchema = z
  .object({
    sellEnabled: z.boolean(),
    buyEnabled: z.boolean(),
    trackedWallets: walletList,
    blacklistWallets: walletList,
    blacklistTokens: walletList,
    copyPct: z.number().gt(0).max(100),
    maxPositionUsd: z.number().positive(),
    defaultBuyUsd: z.number().positive(),
    sellPct: z.number().gt(0).max(100),
    safeMode: z.boolean(),
    slippageBps: z.number().int().positive(),
    ownerEvm: z.string(),
    ownerSolana: z.string(),
  })
  .partial()
  .strict();

const signalSchema = z.object({
  id: z.string().min(1),
  chain: chainSchema,
  wallet: z.string().min(1),
  token: z.string().min(1),
  side: sideSchema,
  amountRaw: z.string().regex(/^\d+$/).default("0"),
  amountUsd: z.number().nonnegative().nullable().default(null),
});

function asChainId(value: string): ChainId {
  if (!isChainId(value)) {
    throw new EngineError("INVALID_REQUEST", `Unknown chain ${value}`);
  }
  return value;
}

function clampLimit(raw: unknown, fallback: number, min: number, max: number): number {
  const parsed = Number(raw ?? fallback);
  return Number.isFinite(parsed) ? Math.max(min, Math.min(max, Math.floor(parsed))) : fallback;
}

function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

/** HTTP API over one engine instance and its store. */
export function createWebApp(deps: WebAppDeps): express.Express {
  const { engine, store, logger } = deps;
  const app = express();
  app.set("json replacer", bigintReplacer);
  app.use(express.json());

  app.get("/api/ping", (_req, res) => {
    res.json({ ok: true, ts: new Date().toISOString() });
  });

  app.get("/api/status", (_req, res) => {
    const mirror = engine.getMirrorPolicy();
    res.json({
      ok: true,
      mode: engine.mode,
      circuit: engine.circuitState(),
      pendingProposals: engine.listPendingProposals().length,
      mirror: {
        sellEnabled: mirror.sellEnabled,
        buyEnabled: mirror.buyEnabled,
        safeMode: mirror.safeMode,
        trackedWallets: mirror.trackedWallets.length,
      },
      system: store.getRuntimeState("system_status")?.value ?? {},
      updatedTs: new Date().toISOString(),
    });
  });

  app.post(
    "/api/analyze",
    route(async (req, res) => {
      const body = analyzeSchema.parse(req.body);
      const assessment = await engine.analyze(asChainId(body.chain), body.token);
      res.json({ ok: true, assessment });
    }),
  );

  app.get(
    "/api/assessments/:chain/:token",
    route((req, res) => {
      const chain = asChainId(String(req.params.chain));
      const token = chain === "solana" ? String(req.params.token) : String(req.params.token).toLowerCase();
      res.json({ ok: true, assessments: store.listAssessments(chain, token, clampLimit(req.query.limit, 20, 1, 200)) });
    }),
  );

  app.post(
    "/api/proposals",
    route(async (req, res) => {
      const body = proposeSchema.parse(req.body);
      const proposal = await engine.proposeTrade({
        requester: body.requester,
        owner: body.owner,
        chain: asChainId(body.chain),
        tokenAddress: body.token,
        side: body.side,
        amount: body.amount,
        ...(body.slippageBps !== undefined ? { slippageBps: body.slippageBps } : {}),
        ...(body.safeMode !== undefined ? { safeMode: body.safeMode } : {}),
      });
      logger.info("WEB_PROPOSE", "PROPOSAL CREATED VIA API", { proposalId: proposal.id, side: proposal.side });
      res.status(201).json({ ok: true, proposal });
    }),
  );

  app.get("/api/proposals", (_req, res) => {
    res.json({ ok: true, proposals: engine.listPendingProposals() });
  });

  app.get(
    "/api/proposals/:id",
    route((req, res) => {
      const id = String(req.params.id);
      const proposal = engine.getProposal(id);
      res.json({ ok: true, proposal, statusHistory: store.getProposalStatusHistory(id) });
    }),
  );

  app.post(
    "/api/proposals/:id/confirm",
    route(async (req, res) => {
      const { wait } = confirmSchema.parse(req.body ?? {});
      const result = await engine.confirm(String(req.params.id), { wait });
      res.json({ ok: true, ...result });
    }),
  );

  app.post(
    "/api/proposals/:id/cancel",
    route((req, res) => {
      const proposal = engine.cancel(String(req.params.id));
      res.json({ ok: true, proposal });
    }),
  );

  app.get(
    "/api/executions/:id",
    route((req, res) => {
      const execution = engine.getExecution(String(req.params.id));
      res.json({ ok: true, execution, history: store.getExecutionHistory(execution.id).map((row) => row.status) });
    }),
  );

  app.get("/api/mirror/policy", (_req, res) => {
    res.json({ ok: true, policy: engine.getMirrorPolicy() });
  });

  app.put(
    "/api/mirror/policy",
    route((req, res) => {
      const patch = mirrorPolicyPatchSchema.parse(req.body);
      const policy = engine.updateMirrorPolicy(patch);
      logger.warn("WEB_MIRROR_POLICY", "MIRROR POLICY CHANGED VIA API", { fields: Object.keys(patch) });
      res.json({ ok: true, policy });
    }),
  );

  app.post(
    "/api/mirror/signals",
    route(async (req, res) => {
      const body = signalSchema.parse(req.body);
      const token = await engine.assessor.resolveToken(asChainId(body.chain), body.token);
      await engine.submitSignal({
        id: body.id,
        sourceWallet: body.wallet,
        side: body.side,
        token,
        observedAmountRaw: body.amountRaw,
        observedAmountUsd: body.amountUsd,
        discoveredAt: new Date().toISOString(),
      });
      res.status(202).json({ ok: true, accepted: body.id });
    }),
  );

  app.get("/api/mirror/decisions", (req, res) => {
    res.json({ ok: true, decisions: store.listMirrorDecisions(clampLimit(req.query.limit, 100, 1, 500)) });
  });

  app.get("/api/logs", (req, res) => {
    res.json({ ok: true, logs: store.getRecentLogs(clampLimit(req.query.limit, 250, 10, 1000)) });
  });

  app.get("/events/logs", (req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    let lastId = Number(req.query.lastId ?? 0);
    if (!Number.isFinite(lastId)) {
      lastId = 0;
    }
    let lastStatusPayload = "";

    const push = (): void => {
      for (const log of store.getLogsAfter(lastId, 200)) {
        lastId = log.id;
        res.write(`event: log\n`);
        res.write(`data: ${JSON.stringify(log)}\n\n`);
      }
      const serialized = JSON.stringify({
        circuit: engine.circuitState(),
        pendingProposals: engine.listPendingProposals().length,
        system: store.getRuntimeState("system_status")?.value ?? {},
      });
      if (serialized !== lastStatusPayload) {
        lastStatusPayload = serialized;
        res.write(`event: status\n`);
        res.write(`data: ${serialized}\n\n`);
      }
    };

    push();
    const timer = setInterval(push, deps.eventIntervalMs ?? 2_000);
    req.on("close", () => {
      clearInterval(timer);
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: { code: "NOT_FOUND", message: "Route not found", details: {} } });
  });

  // express recognises error handlers by their four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(error);
    if (status >= 500) {
      logger.error("WEB_REQUEST_FAIL", "API REQUEST FAILED", { path: req.path, error: errorMessage(error) });
    }
    res.status(status).json(errorBody(error));
  });

  return app;
}

export function startWebServer(deps: WebAppDeps, port: number): Promise<Server> {
  const app = createWebApp(deps);
  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      deps.logger.ok("WEB_BOOT", "WEB API ONLINE", { url: `http://localhost:${port}`, mode: deps.engine.mode });
      resolve(server);
    });
  });
}
