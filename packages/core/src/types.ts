export type Mode = "paper" | "live";

export type LogLevel = "DEBUG" | "INFO" | "OK" | "WARN" | "ERROR";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  component: string;
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

export type ChainId = "ethereum" | "bsc" | "base" | "arbitrum" | "solana";

export type ChainFamily = "evm" | "solana";

export interface TokenIdentity {
  readonly chain: ChainId;
  readonly address: string;
  readonly decimals: number;
  readonly symbol: string | null;
}

export type Scenario = "BUY" | "SELL" | "TRANSFER";

export type RevertTag =
  | "TRANSFER_FAILED"
  | "BLACKLISTED"
  | "TRADING_DISABLED"
  | "MAX_TX_EXCEEDED"
  | "MAX_WALLET_EXCEEDED"
  | "COOLDOWN_ACTIVE"
  | "INSUFFICIENT_OUTPUT_AMOUNT"
  | "LIQUIDITY_LOCKED"
  | "INSUFFICIENT_LIQUIDITY"
  | "K_INVARIANT"
  | "PAUSED"
  | "OWNER_ONLY"
  | "ACCOUNT_FROZEN"
  | "NON_TRANSFERABLE"
  | "NO_ROUTE"
  | "UNRECOGNIZED_REVERT";

export type ScenarioOutcome =
  | { status: "SUCCESS" }
  | { status: "REVERTED"; reason: RevertTag; detail: string }
  | { status: "TIMEOUT" };

export interface ScenarioReport {
  scenario: Scenario;
  outcome: ScenarioOutcome;
  /** Set when BUY failed in the same pass, so this outcome proves nothing on its own. */
  informational: boolean;
  gasEstimate: string | null;
}

export type RestrictionFlag =
  | "BUY_BLOCKED"
  | "SELL_BLOCKED"
  | "TRANSFER_BLOCKED"
  | "HIGH_BUY_TAX"
  | "HIGH_SELL_TAX"
  | "TRANSFER_TAX"
  | "MAX_TX_LIMIT"
  | "MAX_WALLET_LIMIT"
  | "TRADING_COOLDOWN"
  | "BLACKLIST_FUNCTION_PRESENT"
  | "PAUSE_FUNCTION_PRESENT"
  | "FREEZE_AUTHORITY"
  | "TRANSFER_HOOK";

export interface MeasuredTaxes {
  buyPct: number | null;
  sellPct: number | null;
  transferPct: number | null;
}

export interface SimulationResult {
  readonly id: string;
  readonly token: TokenIdentity;
  readonly scenarios: Readonly<Record<Scenario, ScenarioReport>>;
  readonly flags: readonly RestrictionFlag[];
  readonly taxes: Readonly<MeasuredTaxes>;
  readonly createdAt: string;
}

export type RiskLevel = "SAFE" | "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

export type FactorSource = "simulation" | "security_scan" | "liquidity";

export interface RiskFactor {
  source: FactorSource;
  weight: number;
  description: string;
}

export interface SecurityScan {
  /** Share of supply held by the top holders, 0..1. */
  ownershipConcentration: number;
  isProxy: boolean;
  flaggedFunctions: string[];
  /** 0..100, higher is more trusted. */
  trustScore: number;
}

export interface LiquiditySnapshot {
  usdLiquidity: number;
  usdPrice: number;
  priceAsOf: string;
}

export interface RiskAssessment {
  readonly id: string;
  readonly token: TokenIdentity;
  readonly score: number;
  readonly level: RiskLevel;
  readonly factors: readonly RiskFactor[];
  readonly lockedPriceUsd: number;
  readonly priceCapturedAt: string;
  readonly simulationId: string;
  readonly assessedAt: string;
}

export type TradeSide = "BUY" | "SELL";

export type ProposalStatus = "PROPOSED" | "CONFIRMED" | "EXPIRED" | "CANCELLED";

export type ProposalOrigin = "manual" | "mirror";

export interface TradeRequest {
  requester: string;
  /** Wallet that signs the trade. */
  owner: string;
  chain: ChainId;
  side: TradeSide;
  token: TokenIdentity;
  /** USD notional for BUY, percentage of holdings (0..100] for SELL. */
  amount: number;
  slippageBps: number;
  safeMode: boolean;
  origin: ProposalOrigin;
}

export interface TradeProposal extends TradeRequest {
  readonly id: string;
  readonly assessment: RiskAssessment;
  status: ProposalStatus;
  cancelReason: string | null;
  readonly createdAt: string;
  readonly expiresAt: string;
  resolvedAt: string | null;
}

export type ExecutionState = "QUOTING" | "APPROVING" | "BUILDING" | "SIGNING" | "BROADCASTING" | "CONFIRMING";

export type ExecutionStatus = "PENDING" | "SUCCESS" | "FAILED" | "ABORTED";

export type FailureKind =
  | "insufficient_liquidity"
  | "quote_unavailable"
  | "rate_limited"
  | "reverted"
  | "timeout"
  | "circuit_open"
  | "error";

export interface QuoteSnapshot {
  provider: string;
  route: string[];
  sellAmount: string;
  buyAmount: string;
  minReceived: string;
  expiresAt: string;
}

export type GasParams =
  | { kind: "eip1559"; baseFeePerGas: string; maxFeePerGas: string; maxPriorityFeePerGas: string }
  | { kind: "legacy"; gasPrice: string }
  | { kind: "solana"; priorityFeeLamports: number };

export type ReceiptStatus = "success" | "reverted";

export interface ExecutionAttempt {
  attempt: number;
  states: ExecutionState[];
  quote: QuoteSnapshot | null;
  gas: GasParams | null;
  slippageBps: number;
  txHash: string | null;
  receiptStatus: ReceiptStatus | null;
  error: { code: string; message: string } | null;
  startedAt: string;
  endedAt: string | null;
}

export interface TradeExecution {
  readonly id: string;
  readonly proposalId: string;
  readonly chain: ChainId;
  readonly side: TradeSide;
  readonly token: TokenIdentity;
  readonly paper: boolean;
  readonly attempts: ExecutionAttempt[];
  status: ExecutionStatus;
  failure: { kind: FailureKind; message: string } | null;
  readonly createdAt: string;
  finishedAt: string | null;
}

export interface MirrorSignal {
  /** Source transaction hash or signature. */
  id: string;
  sourceWallet: string;
  side: TradeSide;
  token: TokenIdentity;
  observedAmountRaw: string;
  observedAmountUsd: number | null;
  discoveredAt: string;
}

export type AlertKind = "risk_assessment" | "execution_outcome" | "mirror_signal" | "policy_blocked";

export type AlertSeverity = "info" | "warning" | "critical";

export interface Alert {
  kind: AlertKind;
  severity: AlertSeverity;
  title: string;
  fields: Record<string, string | number | boolean | null>;
  ts: string;
}

export interface EngineConfig {
  MODE: Mode;
  LOG_LEVEL: LogLevel;
  DB_PATH: string;
  WEB_PORT: number;
  RPC_URL_ETHEREUM: string;
  RPC_URL_BSC: string;
  RPC_URL_BASE: string;
  RPC_URL_ARBITRUM: string;
  RPC_URL_SOLANA: string;
  SOLANA_SIMULATION_PAYER: string;
  KEY_DIR: string | undefined;
  JUPITER_BASE_URL: string;
  ZEROX_BASE_URL: string;
  ZEROX_API_KEYS: string[];
  GOPLUS_BASE_URL: string;
  GOPLUS_API_KEYS: string[];
  GECKO_TERMINAL_BASE_URL: string;
  DISCORD_WEBHOOK_URL: string;
  API_KEY_COOLDOWN_SECONDS: number;
  SCORE_SAFE_MIN: number;
  SCORE_LOW_MIN: number;
  SCORE_MEDIUM_MIN: number;
  SCORE_HIGH_MIN: number;
  BLOCK_BELOW_SCORE: number;
  SAFE_MODE_MIN_SCORE: number;
  OWNERSHIP_CONCENTRATION_MAX: number;
  LIQUIDITY_FLOOR_USD: number;
  TRUST_SCORE_MIN: number;
  MAX_BUY_TAX_PCT: number;
  MAX_SELL_TAX_PCT: number;
  MAX_TRANSFER_TAX_PCT: number;
  SIM_BUY_AMOUNT_NATIVE: number;
  SIM_TIMEOUT_MS: number;
  ASSESSMENT_TTL_SECONDS: number;
  DEFAULT_SLIPPAGE_BPS: number;
  MAX_SLIPPAGE_BPS: number;
  EXEC_MAX_ATTEMPTS: number;
  EXEC_BACKOFF_MS: number;
  QUOTE_TTL_SECONDS: number;
  CONFIRM_TIMEOUT_SECONDS: number;
  PRIORITY_FEE_FLOOR_GWEI: number;
  PRIORITY_FEE_LAMPORTS: number;
  FAILURE_CIRCUIT_BREAKER_N: number;
  CIRCUIT_BREAKER_COOLDOWN_MINUTES: number;
  PROPOSAL_TTL_SECONDS: number;
  SAFE_MODE: boolean;
  MIRROR_SELL_ENABLED: boolean;
  MIRROR_BUY_ENABLED: boolean;
  MIRROR_TRACKED_WALLETS: string[];
  MIRROR_BLACKLIST_WALLETS: string[];
  MIRROR_BLACKLIST_TOKENS: string[];
  MIRROR_COPY_PCT: number;
  MIRROR_MAX_POSITION_USD: number;
  MIRROR_DEFAULT_BUY_USD: number;
  MIRROR_SELL_PCT: number;
  MIRROR_CHANNEL_CAPACITY: number;
  MIRROR_OWNER_EVM: string;
  MIRROR_OWNER_SOLANA: string;
  MIRROR_POLL_SECONDS: number;
}
