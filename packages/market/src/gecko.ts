import { z } from "zod";
import {
  NotFoundError,
  QuoteUnavailableError,
  RateLimitedError,
  TransientNetworkError,
  errorMessage,
  parseRetryAfter,
  getChainConfig,
  tokenKey,
  type Logger,
  type MarketDataProvider,
  type PriceSnapshot,
  type TokenIdentity,
} from "@tradeguard/core";

const numericString = z
  .union([z.string(), z.number()])
  .nullable()
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const tokenResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    attributes: z
      .object({
        address: z.string(),
        symbol: z.string().nullable().optional(),
        decimals: z.number().nullable().optional(),
        price_usd: numericString,
        total_reserve_in_usd: numericString,
      })
      .passthrough(),
  }),
});

export interface TokenMarketSnapshot {
  usdPrice: number;
  usdLiquidity: number;
  asOf: string;
}

export interface GeckoTerminalOptions {
  baseUrl: string;
  /** Price and liquidity for the same token are served from one request within this window. */
  cacheMs?: number;
  logger?: Logger;
  now?: () => number;
}

interface CacheEntry {
  fetchedAt: number;
  snapshot: Promise<TokenMarketSnapshot>;
}

export class GeckoTerminalClient implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly options: GeckoTerminalOptions;
  private readonly cache = new Map<string, CacheEntry>();

  public constructor(options: GeckoTerminalOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.options = options;
  }

  public async getPrice(token: TokenIdentity): Promise<PriceSnapshot> {
    const snapshot = await this.getSnapshot(token);
    return { usdPrice: snapshot.usdPrice, asOf: snapshot.asOf };
  }

  public async getLiquidity(token: TokenIdentity): Promise<number> {
    const snapshot = await this.getSnapshot(token);
    return snapshot.usdLiquidity;
  }

  public getSnapshot(token: TokenIdentity): Promise<TokenMarketSnapshot> {
    const key = tokenKey(token.chain, token.address);
    const now = this.now();
    const cached = this.cache.get(key);
    if (cached && now - cached.fetchedAt < (this.options.cacheMs ?? 5_000)) {
      return cached.snapshot;
    }

    const snapshot = this.fetchSnapshot(token);
    this.cache.set(key, { fetchedAt: now, snapshot });
    snapshot.catch(() => {
      if (this.cache.get(key)?.snapshot === snapshot) {
        this.cache.delete(key);
      }
    });
    return snapshot;
  }

  private async fetchSnapshot(token: TokenIdentity): Promise<TokenMarketSnapshot> {
    const network = getChainConfig(token.chain).geckoNetwork;
    const url = `${this.baseUrl}/networks/${network}/tokens/${token.address}`;

    let response: Response;
    try {
      response = await fetch(url, { headers: { Accept: "application/json" } });
    } catch (error) {
      throw new TransientNetworkError(`GeckoTerminal request failed: ${errorMessage(error)}`);
    }

    if (response.status === 429) {
      throw new RateLimitedError("geckoterminal", parseRetryAfter(response.headers.get("retry-after")));
    }
    if (response.status === 404) {
      throw new NotFoundError("Market data for token", `${token.chain}:${token.address}`);
    }
    if (!response.ok) {
      const body = await response.text();
      throw new QuoteUnavailableError(`GeckoTerminal token lookup failed (${response.status})`, {
        body: body.slice(0, 300),
      });
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new QuoteUnavailableError("GeckoTerminal token response malformed", {
        issues: parsed.error.issues.length,
      });
    }

    const attributes = parsed.data.data.attributes;
    const snapshot: TokenMarketSnapshot = {
      usdPrice: attributes.price_usd ?? 0,
      usdLiquidity: attributes.total_reserve_in_usd ?? 0,
      asOf: new Date(this.now()).toISOString(),
    };
    this.options.logger?.debug("MARKET_SNAPSHOT", "FETCHED TOKEN MARKET DATA", {
      chain: token.chain,
      token: token.address,
      usdPrice: snapshot.usdPrice,
      usdLiquidity: snapshot.usdLiquidity,
    });
    return snapshot;
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }
}
