import type { RiskFactor, Scenario } from "./types.js";

export type EngineErrorCode =
  | "SIMULATION_UNAVAILABLE"
  | "QUOTE_UNAVAILABLE"
  | "INSUFFICIENT_LIQUIDITY"
  | "RATE_LIMITED"
  | "TRANSIENT_NETWORK"
  | "EXECUTION_REVERTED"
  | "EXECUTION_TIMEOUT"
  | "POLICY_BLOCKED"
  | "NOT_FOUND"
  | "INVALID_STATE"
  | "INVALID_REQUEST";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly details: Record<string, unknown>;

  public constructor(code: EngineErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** The infrastructure could not run a simulation. Unknown risk, never "safe". */
export class SimulationUnavailableError extends EngineError {
  public constructor(message: string, details: Record<string, unknown> = {}) {
    super("SIMULATION_UNAVAILABLE", message, details);
  }
}

export class QuoteUnavailableError extends EngineError {
  public constructor(message: string, details: Record<string, unknown> = {}) {
    super("QUOTE_UNAVAILABLE", message, details);
  }
}

export class InsufficientLiquidityError extends EngineError {
  public constructor(message: string, details: Record<string, unknown> = {}) {
    super("INSUFFICIENT_LIQUIDITY", message, details);
  }
}

export class RateLimitedError extends EngineError {
  public readonly retryAfterMs: number | null;

  public constructor(service: string, retryAfterMs: number | null = null) {
    super("RATE_LIMITED", `${service} rate limited`, { service, retryAfterMs });
    this.retryAfterMs = retryAfterMs;
  }
}

export class TransientNetworkError extends EngineError {
  public constructor(message: string, details: Record<string, unknown> = {}) {
    super("TRANSIENT_NETWORK", message, details);
  }
}

export class ExecutionRevertedError extends EngineError {
  public constructor(txHash: string) {
    super("EXECUTION_REVERTED", `Transaction ${txHash} reverted on-chain`, { txHash });
  }
}

/** Not confirmed within the bounded wait. Funds may or may not have moved. */
export class ExecutionTimeoutError extends EngineError {
  public constructor(txHash: string, waitedMs: number) {
    super("EXECUTION_TIMEOUT", `Transaction ${txHash} not confirmed after ${waitedMs}ms`, { txHash, waitedMs });
  }
}

export class PolicyBlockedError extends EngineError {
  public readonly factors: readonly RiskFactor[];

  public constructor(
    message: string,
    input: {
      score: number;
      threshold: number;
      rule: "block_threshold" | "safe_mode_threshold" | "circuit_breaker";
      factors: readonly RiskFactor[];
      revertedScenarios?: Scenario[];
    },
  ) {
    super("POLICY_BLOCKED", message, {
      score: input.score,
      threshold: input.threshold,
      rule: input.rule,
      factors: input.factors,
      revertedScenarios: input.revertedScenarios ?? [],
    });
    this.factors = input.factors;
  }
}

export class NotFoundError extends EngineError {
  public constructor(what: string, id: string) {
    super("NOT_FOUND", `${what} ${id} not found`, { id });
  }
}

export class InvalidStateError extends EngineError {
  public constructor(message: string, details: Record<string, unknown> = {}) {
    super("INVALID_STATE", message, details);
  }
}

const transientPatterns = [
  "blockhash",
  "429",
  "rate limit",
  "timeout",
  "timed out",
  "econnreset",
  "econnrefused",
  "etimedout",
  "socket hang up",
  "fetch failed",
  "too many requests",
  "nonce too low",
  "replacement transaction underpriced",
];

export function isTransientMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return transientPatterns.some((pattern) => lower.includes(pattern));
}

/** Infrastructure failures that are worth a local retry with backoff. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof EngineError) {
    return error.code === "RATE_LIMITED" || error.code === "TRANSIENT_NETWORK" || error.code === "QUOTE_UNAVAILABLE";
  }
  return error instanceof Error && isTransientMessage(error.message);
}

export function toErrorInfo(error: unknown): { code: string; message: string } {
  if (error instanceof EngineError) {
    return { code: error.code, message: error.message };
  }
  return { code: "ERROR", message: error instanceof Error ? error.message : String(error) };
}
