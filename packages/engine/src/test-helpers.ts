import {
  parseConfig,
  type Alert,
  type ChainAdapter,
  type ChainId,
  type EngineConfig,
  type FeeEstimate,
  type KeyVault,
  type MarketDataProvider,
  type MirrorDecisionRecord,
  type PersistenceSink,
  type PriceSnapshot,
  type Quote,
  type QuoteProvider,
  type QuoteRequest,
  type ReceiptStatus,
  type RiskAssessment,
  type ScenarioPlan,
  type ScenarioRun,
  type SecurityScan,
  type SecurityScanProvider,
  type SignedTransaction,
  type SimulationContext,
  type SimulationResult,
  type TokenIdentity,
  type TradeExecution,
  type TradeProposal,
  type UnsignedTransaction,
} from "@tradeguard/core";

export const TOKEN: TokenIdentity = {
  chain: "base",
  address: "0x1111111111111111111111111111111111111111",
  decimals: 18,
  symbol: "TEST",
};

export const OWNER = "0x2222222222222222222222222222222222222222";

export function testConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return { ...parseConfig({ DB_PATH: ":memory:" }), ...overrides };
}

export function cleanRun(): ScenarioRun {
  return {
    outcomes: {
      BUY: { status: "success", gasUsed: 150_000n },
      SELL: { status: "success", gasUsed: 120_000n },
      TRANSFER: { status: "success", gasUsed: 50_000n },
    },
    taxes: { buyPct: 0, sellPct: 1, transferPct: 0 },
    flags: [],
  };
}

export const cleanScan: SecurityScan = {
  ownershipConcentration: 0.1,
  isProxy: false,
  flaggedFunctions: [],
  trustScore: 90,
};

/** Chain adapter whose answers are set field by field. */
export class FakeChainAdapter implements ChainAdapter {
  public readonly chain: ChainId;
  public run: ScenarioRun = cleanRun();
  public code: string | null = null;
  public contextError: Error | null = null;
  public tokenBalance = 1_000n * 10n ** 18n;
  /** Consumed front to back; the last entry repeats. */
  public receipts: Array<ReceiptStatus | null> = ["success"];
  /** Thrown by successive broadcasts before they start succeeding. */
  /** Thrown before the node sees the transaction; null lets that send through. */
  public broadcastErrors: Array<Error | null> = [];
  /** Thrown after the transaction is recorded, like a timeout on an accepted send. */
  public lostBroadcastReplies: Error[] = [];
  public approval: UnsignedTransaction | null = null;
  public readonly plans: ScenarioPlan[] = [];
  public readonly broadcasts: SignedTransaction[] = [];
  public readonly built: UnsignedTransaction[] = [];
  public readonly keysSeen: Uint8Array[] = [];
  public receiptPolls = 0;
  private signatures = 0;

  public constructor(chain: ChainId = "base") {
    this.chain = chain;
  }

  public async getSimulationContext(): Promise<SimulationContext> {
    if (this.contextError) {
      throw this.contextError;
    }
    return { chain: this.chain, reference: "100" };
  }

  public async simulateScenarios(plan: ScenarioPlan): Promise<ScenarioRun> {
    this.plans.push(plan);
    return this.run;
  }

  public async getCode(): Promise<string | null> {
    return this.code;
  }

  public async getTokenMetadata(): Promise<{ decimals: number; symbol: string | null }> {
    return { decimals: 18, symbol: "TEST" };
  }

  public async getNativeBalance(): Promise<bigint> {
    return 10n ** 18n;
  }

  public async getTokenBalance(): Promise<bigint> {
    return this.tokenBalance;
  }

  public async getNonce(): Promise<number> {
    return 0;
  }

  public async getFeeEstimate(): Promise<FeeEstimate> {
    return { params: { kind: "legacy", gasPrice: "1000000000" } };
  }

  public async buildApproval(): Promise<UnsignedTransaction | null> {
    return this.approval;
  }

  public async buildTransaction(quote: Quote, fees: FeeEstimate, owner: string): Promise<UnsignedTransaction> {
    const unsigned: UnsignedTransaction = {
      family: "evm",
      chain: this.chain,
      from: owner,
      to: "0x3333333333333333333333333333333333333333",
      data: "0x",
      value: quote.sellToken === "native" ? quote.sellAmount : 0n,
      nonce: 0,
      gas: null,
      fees: fees.params,
    };
    this.built.push(unsigned);
    return unsigned;
  }

  public async signTransaction(_unsigned: UnsignedTransaction, key: Uint8Array): Promise<SignedTransaction> {
    this.keysSeen.push(key);
    this.signatures += 1;
    return { chain: this.chain, raw: "0xsigned", hash: `0xhash${this.signatures}` };
  }

  public async broadcast(signed: SignedTransaction): Promise<string> {
    const error = this.broadcastErrors.shift();
    if (error) {
      throw error;
    }
    this.broadcasts.push(signed);
    const lost = this.lostBroadcastReplies.shift();
    if (lost) {
      throw lost;
    }
    return signed.hash;
  }

  public async getReceipt(): Promise<ReceiptStatus | null> {
    this.receiptPolls += 1;
    if (this.receipts.length > 1) {
      return this.receipts.shift() ?? null;
    }
    return this.receipts[0] ?? null;
  }
}

export class FakeQuoteProvider implements QuoteProvider {
  public readonly requests: QuoteRequest[] = [];
  public errors: Error[] = [];
  public allowanceTarget: string | null = null;
  public ttlMs = 30_000;
  private readonly now: () => Date;

  public constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  public async getQuote(request: QuoteRequest): Promise<Quote> {
    this.requests.push(request);
    const error = this.errors.shift();
    if (error) {
      throw error;
    }
    const buyAmount = request.amount * 2n;
    return {
      provider: "fakeswap",
      chain: request.chain,
      sellToken: request.sellToken,
      buyToken: request.buyToken,
      route: ["FakeSwap"],
      sellAmount: request.amount,
      buyAmount,
      minReceived: buyAmount - (buyAmount * BigInt(request.slippageBps)) / 10_000n,
      payload: null,
      allowanceTarget: this.allowanceTarget,
      expiresAt: new Date(this.now().getTime() + this.ttlMs).toISOString(),
    };
  }
}

export class FakeMarket implements MarketDataProvider {
  public usdPrice = 2_000;
  public usdLiquidity = 250_000;
  public error: Error | null = null;

  public async getPrice(): Promise<PriceSnapshot> {
    if (this.error) {
      throw this.error;
    }
    return { usdPrice: this.usdPrice, asOf: "2026-01-01T00:00:00.000Z" };
  }

  public async getLiquidity(): Promise<number> {
    if (this.error) {
      throw this.error;
    }
    return this.usdLiquidity;
  }
}

export class FakeScanner implements SecurityScanProvider {
  public result: SecurityScan = cleanScan;
  public error: Error | null = null;
  public calls = 0;

  public async scan(): Promise<SecurityScan> {
    this.calls += 1;
    if (this.error) {
      throw this.error;
    }
    return this.result;
  }
}

/** Hands out a fresh key per call and zeroes it afterwards. */
export class FakeVault implements KeyVault {
  public active = 0;
  public released = 0;

  public async withKey<T>(_chain: ChainId, _owner: string, use: (key: Uint8Array) => Promise<T>): Promise<T> {
    const key = new Uint8Array(32).fill(7);
    this.active += 1;
    try {
      return await use(key);
    } finally {
      key.fill(0);
      this.active -= 1;
      this.released += 1;
    }
  }
}

export class RecordingSink implements PersistenceSink {
  public readonly simulations: SimulationResult[] = [];
  public readonly assessments: RiskAssessment[] = [];
  public readonly proposals: TradeProposal[] = [];
  public readonly executions: TradeExecution[] = [];
  public readonly decisions: MirrorDecisionRecord[] = [];

  public appendSimulation(result: SimulationResult): void {
    this.simulations.push(result);
  }

  public appendAssessment(assessment: RiskAssessment): void {
    this.assessments.push(assessment);
  }

  public appendProposal(proposal: TradeProposal): void {
    this.proposals.push(proposal);
  }

  public appendExecution(execution: TradeExecution): void {
    this.executions.push(structuredClone(execution));
  }

  public appendMirrorDecision(record: MirrorDecisionRecord): void {
    this.decisions.push(record);
  }
}

export class RecordingNotifier {
  public readonly alerts: Alert[] = [];

  public notify(alert: Alert): void {
    this.alerts.push(alert);
  }
}

export function assessmentWith(score: number, overrides: Partial<RiskAssessment> = {}): RiskAssessment {
  return {
    id: `assessment-${score}`,
    token: TOKEN,
    score,
    level: score >= 8 ? "SAFE" : score >= 6 ? "LOW" : score >= 4 ? "MEDIUM" : score >= 2 ? "HIGH" : "CRITICAL",
    factors: [],
    lockedPriceUsd: 0.25,
    priceCapturedAt: "2026-01-01T00:00:00.000Z",
    simulationId: "simulation-1",
    assessedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}
