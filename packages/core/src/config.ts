import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import type { EngineConfig } from "./types.js";

const workspaceBaseDir = process.env.APP_ROOT ?? process.env.INIT_CWD ?? process.cwd();
const envCandidates = [
  path.resolve(workspaceBaseDir, ".env"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

const num = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      const parsed = Number(value);
      return Number.isFinite(parsed) ? parsed : Number.NaN;
    });

const intNum = (defaultValue: number) =>
  num(defaultValue).refine((value) => Number.isInteger(value), {
    message: "Expected integer",
  });

const bool = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      if (value === undefined || value.trim() === "") {
        return defaultValue;
      }
      return value.trim().toLowerCase() === "true";
    });

const list = () =>
  z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

const envSchema = z.object({
  MODE: z.enum(["paper", "live"]).default("paper"),
  LOG_LEVEL: z.enum(["DEBUG", "INFO", "OK", "WARN", "ERROR"]).default("INFO"),
  DB_PATH: z.string().default("./data/tradeguard.db"),
  WEB_PORT: intNum(8787).refine((v) => v > 0, "WEB_PORT must be > 0"),
  RPC_URL_ETHEREUM: z.string().default(""),
  RPC_URL_BSC: z.string().default(""),
  RPC_URL_BASE: z.string().default(""),
  RPC_URL_ARBITRUM: z.string().default(""),
  RPC_URL_SOLANA: z.string().default(""),
  SOLANA_SIMULATION_PAYER: z.string().default(""),
  KEY_DIR: z.string().optional(),
  JUPITER_BASE_URL: z.string().default("https://lite-api.jup.ag/swap/v1"),
  ZEROX_BASE_URL: z.string().default("https://api.0x.org"),
  ZEROX_API_KEYS: list(),
  GOPLUS_BASE_URL: z.string().default("https://api.gopluslabs.io/api/v1"),
  GOPLUS_API_KEYS: list(),
  GECKO_TERMINAL_BASE_URL: z.string().default("https://api.geckoterminal.com/api/v2"),
  DISCORD_WEBHOOK_URL: z.string().default(""),
  API_KEY_COOLDOWN_SECONDS: intNum(60).refine((v) => v > 0, "API_KEY_COOLDOWN_SECONDS must be > 0"),
  SCORE_SAFE_MIN: num(8).refine((v) => v >= 0 && v <= 10, "SCORE_SAFE_MIN must be 0..10"),
  SCORE_LOW_MIN: num(6).refine((v) => v >= 0 && v <= 10, "SCORE_LOW_MIN must be 0..10"),
  SCORE_MEDIUM_MIN: num(4).refine((v) => v >= 0 && v <= 10, "SCORE_MEDIUM_MIN must be 0..10"),
  SCORE_HIGH_MIN: num(2).refine((v) => v >= 0 && v <= 10, "SCORE_HIGH_MIN must be 0..10"),
  BLOCK_BELOW_SCORE: num(3).refine((v) => v >= 0 && v <= 10, "BLOCK_BELOW_SCORE must be 0..10"),
  SAFE_MODE_MIN_SCORE: num(7).refine((v) => v >= 0 && v <= 10, "SAFE_MODE_MIN_SCORE must be 0..10"),
  OWNERSHIP_CONCENTRATION_MAX: num(0.5).refine((v) => v > 0 && v <= 1, "OWNERSHIP_CONCENTRATION_MAX must be > 0 and <= 1"),
  LIQUIDITY_FLOOR_USD: num(10_000).refine((v) => v >= 0, "LIQUIDITY_FLOOR_USD must be >= 0"),
  TRUST_SCORE_MIN: num(50).refine((v) => v >= 0 && v <= 100, "TRUST_SCORE_MIN must be 0..100"),
  MAX_BUY_TAX_PCT: num(10).refine((v) => v >= 0, "MAX_BUY_TAX_PCT must be >= 0"),
  MAX_SELL_TAX_PCT: num(15).refine((v) => v >= 0, "MAX_SELL_TAX_PCT must be >= 0"),
  MAX_TRANSFER_TAX_PCT: num(5).refine((v) => v >= 0, "MAX_TRANSFER_TAX_PCT must be >= 0"),
  SIM_BUY_AMOUNT_NATIVE: num(0.05).refine((v) => v > 0, "SIM_BUY_AMOUNT_NATIVE must be > 0"),
  SIM_TIMEOUT_MS: intNum(8_000).refine((v) => v > 0, "SIM_TIMEOUT_MS must be > 0"),
  ASSESSMENT_TTL_SECONDS: intNum(120).refine((v) => v >= 0, "ASSESSMENT_TTL_SECONDS must be >= 0"),
  DEFAULT_SLIPPAGE_BPS: intNum(100).refine((v) => v > 0, "DEFAULT_SLIPPAGE_BPS must be > 0"),
  MAX_SLIPPAGE_BPS: intNum(1_000).refine((v) => v > 0, "MAX_SLIPPAGE_BPS must be > 0"),
  EXEC_MAX_ATTEMPTS: intNum(3).refine((v) => v > 0, "EXEC_MAX_ATTEMPTS must be > 0"),
  EXEC_BACKOFF_MS: intNum(500).refine((v) => v >= 0, "EXEC_BACKOFF_MS must be >= 0"),
  QUOTE_TTL_SECONDS: intNum(30).refine((v) => v > 0, "QUOTE_TTL_SECONDS must be > 0"),
  CONFIRM_TIMEOUT_SECONDS: intNum(90).refine((v) => v > 0, "CONFIRM_TIMEOUT_SECONDS must be > 0"),
  PRIORITY_FEE_FLOOR_GWEI: num(1.5).refine((v) => v >= 0, "PRIORITY_FEE_FLOOR_GWEI must be >= 0"),
  PRIORITY_FEE_LAMPORTS: intNum(10_000).refine((v) => v >= 0, "PRIORITY_FEE_LAMPORTS must be >= 0"),
  FAILURE_CIRCUIT_BREAKER_N: intNum(3).refine((v) => v > 0, "FAILURE_CIRCUIT_BREAKER_N must be > 0"),
  CIRCUIT_BREAKER_COOLDOWN_MINUTES: intNum(30).refine(
    (v) => v > 0,
    "CIRCUIT_BREAKER_COOLDOWN_MINUTES must be > 0",
  ),
  PROPOSAL_TTL_SECONDS: intNum(120).refine((v) => v > 0, "PROPOSAL_TTL_SECONDS must be > 0"),
  SAFE_MODE: bool(false),
  MIRROR_SELL_ENABLED: bool(true),
  MIRROR_BUY_ENABLED: bool(false),
  MIRROR_TRACKED_WALLETS: list(),
  MIRROR_BLACKLIST_WALLETS: list(),
  MIRROR_BLACKLIST_TOKENS: list(),
  MIRROR_COPY_PCT: num(100).refine((v) => v > 0 && v <= 100, "MIRROR_COPY_PCT must be > 0 and <= 100"),
  MIRROR_MAX_POSITION_USD: num(1_000).refine((v) => v > 0, "MIRROR_MAX_POSITION_USD must be > 0"),
  MIRROR_DEFAULT_BUY_USD: num(50).refine((v) => v > 0, "MIRROR_DEFAULT_BUY_USD must be > 0"),
  MIRROR_SELL_PCT: num(100).refine((v) => v > 0 && v <= 100, "MIRROR_SELL_PCT must be > 0 and <= 100"),
  MIRROR_CHANNEL_CAPACITY: intNum(256).refine((v) => v > 0, "MIRROR_CHANNEL_CAPACITY must be > 0"),
  MIRROR_OWNER_EVM: z.string().default(""),
  MIRROR_OWNER_SOLANA: z.string().default(""),
  MIRROR_POLL_SECONDS: intNum(15).refine((v) => v >= 5, "MIRROR_POLL_SECONDS must be >= 5"),
});

let cachedConfig: EngineConfig | null = null;

export function parseConfig(env: Record<string, string | undefined>, baseDir = workspaceBaseDir): EngineConfig {
  const parsed = envSchema.parse(env);
  if (
    !(parsed.SCORE_SAFE_MIN >= parsed.SCORE_LOW_MIN
      && parsed.SCORE_LOW_MIN >= parsed.SCORE_MEDIUM_MIN
      && parsed.SCORE_MEDIUM_MIN >= parsed.SCORE_HIGH_MIN)
  ) {
    throw new Error("Score boundaries must satisfy SAFE >= LOW >= MEDIUM >= HIGH");
  }
  if (parsed.SAFE_MODE_MIN_SCORE < parsed.BLOCK_BELOW_SCORE) {
    throw new Error("SAFE_MODE_MIN_SCORE cannot be lower than BLOCK_BELOW_SCORE");
  }
  if (parsed.DEFAULT_SLIPPAGE_BPS > parsed.MAX_SLIPPAGE_BPS) {
    throw new Error("DEFAULT_SLIPPAGE_BPS cannot be greater than MAX_SLIPPAGE_BPS");
  }
  if (parsed.MODE === "live" && !parsed.KEY_DIR) {
    throw new Error("MODE=live requires KEY_DIR");
  }

  return {
    ...parsed,
    DB_PATH: parsed.DB_PATH === ":memory:" ? parsed.DB_PATH : path.resolve(baseDir, parsed.DB_PATH),
    KEY_DIR: parsed.KEY_DIR ? path.resolve(baseDir, parsed.KEY_DIR) : undefined,
  };
}

export function loadConfig(): EngineConfig {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

export function maskAddress(address: string | undefined): string {
  if (!address || address.length < 10) {
    return "N/A";
  }
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
