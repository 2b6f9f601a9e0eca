import type {
  Alert,
  ChainId,
  GasParams,
  MeasuredTaxes,
  MirrorSignal,
  ReceiptStatus,
  RestrictionFlag,
  RevertTag,
  RiskAssessment,
  Scenario,
  SecurityScan,
  SimulationResult,
  TokenIdentity,
  TradeExecution,
  TradeProposal,
} from "./types.js";

// ---- chain adapter ----

export interface SimulationContext {
  chain: ChainId;
  /** Latest block number (EVM) or slot-bound blockhash (Solana). */
  reference: string;
}

export interface ScenarioPlan {
  token: TokenIdentity;
  /** Native amount spent by the simulated buy, in base units. */
  buyAmountRaw: bigint;
  timeoutMs: number;
}

export type RawScenarioOutcome =
  | { status: "success"; gasUsed: bigint | null }
  | {
      status: "reverted";
      /** Hex revert payload when the chain exposes one. */
      data: string | null;
      message: string;
      /** Set when the adapter already knows the category. */
      tag?: RevertTag;
    }
  | { status: "timeout" };

export interface ScenarioRun {
  outcomes: Record<Scenario, RawScenarioOutcome>;
  taxes: MeasuredTaxes;
  /** Structural flags the adapter observed directly (mint authorities, extensions). */
  flags: RestrictionFlag[];
}

export interface FeeEstimate {
  params: GasParams;
}

export type UnsignedTransaction =
  | {
      family: "evm";
      chain: ChainId;
      from: string;
      to: string;
      data: string;
      value: bigint;
      nonce: number;
      gas: bigint | null;
      fees: GasParams;
    }
  | {
      family: "solana";
      chain: ChainId;
      payer: string;
      /** Base64 serialized versioned transaction. */
      serialized: string;
      lastValidBlockHeight: number | null;
    };

export interface SignedTransaction {
  chain: ChainId;
  /** Hex (EVM) or base64 (Solana) wire bytes. */
  raw: string;
  /** Tx hash or first signature, known before broadcast. */
  hash: string;
}

export interface ChainAdapter {
  readonly chain: ChainId;
  getSimulationContext(): Promise<SimulationContext>;
  simulateScenarios(plan: ScenarioPlan): Promise<ScenarioRun>;
  getCode(address: string): Promise<string | null>;
  getTokenMetadata(address: string): Promise<{ decimals: number; symbol: string | null }>;
  getNativeBalance(owner: string): Promise<bigint>;
  getTokenBalance(owner: string, token: TokenIdentity): Promise<bigint>;
  getNonce(owner: string): Promise<number>;
  getFeeEstimate(): Promise<FeeEstimate>;
  buildApproval(
    token: TokenIdentity,
    owner: string,
    spender: string,
    amount: bigint,
    fees: FeeEstimate,
  ): Promise<UnsignedTransaction | null>;
  buildTransaction(quote: Quote, fees: FeeEstimate, owner: string): Promise<UnsignedTransaction>;
  signTransaction(unsigned: UnsignedTransaction, key: Uint8Array): Promise<SignedTransaction>;
  broadcast(signed: SignedTransaction): Promise<string>;
  getReceipt(hash: string): Promise<ReceiptStatus | null>;
}

// ---- quotes ----

export interface QuoteRequest {
  chain: ChainId;
  /** Token address, or NATIVE_ASSET for the chain's native coin. */
  sellToken: string;
  buyToken: string;
  /** Base units of sellToken. */
  amount: bigint;
  slippageBps: number;
  /** Address that will sign and pay; swap payloads are built for it. */
  taker: string;
  /** Price-only quote without a swap payload. */
  quoteOnly?: boolean;
}

export type QuotePayload =
  | { family: "evm"; to: string; data: string; value: bigint; gas: bigint | null }
  | { family: "solana"; serialized: string; lastValidBlockHeight: number | null };

export interface Quote {
  provider: string;
  chain: ChainId;
  sellToken: string;
  buyToken: string;
  route: string[];
  sellAmount: bigint;
  buyAmount: bigint;
  minReceived: bigint;
  payload: QuotePayload | null;
  /** Spender that needs an allowance on sellToken (EVM), else null. */
  allowanceTarget: string | null;
  expiresAt: string;
}

export interface QuoteProvider {
  /** Throws QuoteUnavailableError (retryable) or InsufficientLiquidityError (no route). */
  getQuote(request: QuoteRequest): Promise<Quote>;
}

// ---- market / security ----

export interface PriceSnapshot {
  usdPrice: number;
  asOf: string;
}

export interface MarketDataProvider {
  getPrice(token: TokenIdentity): Promise<PriceSnapshot>;
  getLiquidity(token: TokenIdentity): Promise<number>;
}

export interface SecurityScanProvider {
  scan(token: TokenIdentity): Promise<SecurityScan>;
}

// ---- sinks ----

export interface NotificationSink {
  notify(alert: Alert): void;
}

export interface MirrorDecisionRecord {
  signal: MirrorSignal;
  action: "dropped" | "proposed" | "auto_confirmed" | "blocked" | "failed";
  reason: string | null;
  proposalId: string | null;
  decidedAt: string;
}

export interface PersistenceSink {
  appendSimulation(result: SimulationResult): void;
  appendAssessment(assessment: RiskAssessment): void;
  appendProposal(proposal: TradeProposal): void;
  appendExecution(execution: TradeExecution): void;
  appendMirrorDecision(record: MirrorDecisionRecord): void;
}

// ---- keys ----

export interface KeyVault {
  /** Key bytes are only valid inside `use`; they are wiped once it settles. */
  withKey<T>(chain: ChainId, owner: string, use: (key: Uint8Array) => Promise<T>): Promise<T>;
}
