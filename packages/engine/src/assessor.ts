import {
  CHAINS,
  errorMessage,
  KeyedMutex,
  Logger,
  tokenKey,
  type ChainId,
  type LiquiditySnapshot,
  type MarketDataProvider,
  type NotificationSink,
  type PersistenceSink,
  type RiskAssessment,
  type RiskScorer,
  type SecurityScan,
  type SecurityScanProvider,
  type TokenIdentity,
} from "@tradeguard/core";
import type { HoneypotSimulator } from "./honeypot.js";
import type { AdapterRegistry } from "./registry.js";

export interface RiskAssessorOptions {
  adapters: AdapterRegistry;
  simulator: HoneypotSimulator;
  scorer: RiskScorer;
  market: MarketDataProvider;
  security: SecurityScanProvider;
  ttlSeconds: number;
  persistence?: PersistenceSink;
  notifier?: NotificationSink;
  logger?: Logger;
  now?: () => Date;
}

interface CachedAssessment {
  assessment: RiskAssessment;
  expiresAt: number;
}

function severityFor(assessment: RiskAssessment): "info" | "warning" | "critical" {
  if (assessment.level === "CRITICAL" || assessment.level === "HIGH") {
    return "critical";
  }
  return assessment.level === "MEDIUM" ? "warning" : "info";
}

export class RiskAssessor {
  private readonly options: RiskAssessorOptions;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly writers = new KeyedMutex();
  private readonly identities = new Map<string, TokenIdentity>();
  private readonly latest = new Map<string, CachedAssessment>();

  public constructor(options: RiskAssessorOptions) {
    this.options = options;
    this.logger = options.logger ?? new Logger({ component: "assessor", level: "INFO", quiet: true });
    this.now = options.now ?? (() => new Date());
  }

  /** Decimals and symbol from chain state; resolved once per token. */
  public async resolveToken(chain: ChainId, address: string): Promise<TokenIdentity> {
    const key = tokenKey(chain, address);
    const known = this.identities.get(key);
    if (known) {
      return known;
    }
    const metadata = await this.options.adapters.get(chain).getTokenMetadata(address);
    const identity: TokenIdentity = Object.freeze({
      chain,
      address,
      decimals: metadata.decimals,
      symbol: metadata.symbol,
    });
    this.identities.set(key, identity);
    return identity;
  }

  /** Fresh simulation and score. Concurrent calls for one token run one after another. */
  public assess(token: TokenIdentity): Promise<RiskAssessment> {
    return this.writers.runExclusive(tokenKey(token.chain, token.address), () => this.runAssessment(token));
  }

  /** Cached assessment while inside its TTL; never waits on a running assessment. */
  public cached(token: TokenIdentity): RiskAssessment | null {
    const entry = this.latest.get(tokenKey(token.chain, token.address));
    if (!entry || entry.expiresAt <= this.now().getTime()) {
      return null;
    }
    return entry.assessment;
  }

  public async getOrAssess(token: TokenIdentity): Promise<RiskAssessment> {
    return this.cached(token) ?? this.assess(token);
  }

  private async runAssessment(token: TokenIdentity): Promise<RiskAssessment> {
    const simulation = await this.options.simulator.simulate(token);
    const [scan, liquidity] = await Promise.all([this.fetchScan(token), this.fetchLiquidity(token)]);

    const assessment = this.options.scorer.score(simulation, scan, liquidity);
    this.options.persistence?.appendSimulation(simulation);
    this.options.persistence?.appendAssessment(assessment);
    this.latest.set(tokenKey(token.chain, token.address), {
      assessment,
      expiresAt: this.now().getTime() + this.options.ttlSeconds * 1000,
    });

    this.logger.info("RISK_ASSESSED", "TOKEN RISK ASSESSED", {
      chain: token.chain,
      token: token.address,
      score: assessment.score,
      level: assessment.level,
    });
    this.options.notifier?.notify({
      kind: "risk_assessment",
      severity: severityFor(assessment),
      title: `${token.symbol ?? token.address} scored ${assessment.score.toFixed(1)} (${assessment.level})`,
      fields: {
        chain: token.chain,
        token: token.address,
        score: assessment.score,
        level: assessment.level,
        topFactor: assessment.factors[0]?.description ?? null,
        lockedPriceUsd: assessment.lockedPriceUsd,
      },
      ts: assessment.assessedAt,
    });
    return assessment;
  }

  private async fetchScan(token: TokenIdentity): Promise<SecurityScan | null> {
    try {
      return await this.options.security.scan(token);
    } catch (error) {
      this.logger.warn("SECURITY_SCAN_FAIL", "SECURITY SCAN UNAVAILABLE", {
        chain: token.chain,
        token: token.address,
        error: errorMessage(error),
      });
      return null;
    }
  }

  /** Zero liquidity and price when market data is down; the liquidity floor then applies. */
  private async fetchLiquidity(token: TokenIdentity): Promise<LiquiditySnapshot> {
    try {
      const [price, usdLiquidity] = await Promise.all([
        this.options.market.getPrice(token),
        this.options.market.getLiquidity(token),
      ]);
      return { usdLiquidity, usdPrice: price.usdPrice, priceAsOf: price.asOf };
    } catch (error) {
      this.logger.warn("MARKET_DATA_FAIL", "MARKET DATA UNAVAILABLE", {
        chain: token.chain,
        token: token.address,
        network: CHAINS[token.chain].geckoNetwork,
        error: errorMessage(error),
      });
      return { usdLiquidity: 0, usdPrice: 0, priceAsOf: this.now().toISOString() };
    }
  }
}
