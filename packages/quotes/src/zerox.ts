import { z } from "zod";
import {
  type ApiKeyPool,
  InsufficientLiquidityError,
  NATIVE_ASSET,
  QuoteUnavailableError,
  RateLimitedError,
  TransientNetworkError,
  errorMessage,
  parseRetryAfter,
  getEvmChainConfig,
  withBackoff,
  type Logger,
  type Quote,
  type QuoteProvider,
  type QuoteRequest,
} from "@tradeguard/core";

/** 0x's placeholder address for the native coin. */
export const ZEROX_NATIVE_TOKEN = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

const noLiquiditySchema = z.object({ liquidityAvailable: z.literal(false) });

const quoteSchema = z.object({
  liquidityAvailable: z.literal(true),
  buyAmount: z.string(),
  minBuyAmount: z.string(),
  sellAmount: z.string(),
  issues: z
    .object({
      allowance: z.object({ actual: z.string(), spender: z.string() }).nullable().optional(),
    })
    .passthrough()
    .optional(),
  route: z
    .object({
      fills: z.array(z.object({ source: z.string() }).passthrough()),
    })
    .passthrough()
    .optional(),
  transaction: z.object({
    to: z.string(),
    data: z.string(),
    value: z.string(),
    gas: z.string().nullable().optional(),
  }),
});

const responseSchema = z.union([noLiquiditySchema, quoteSchema]);

export type ZeroExQuoteResponse = z.infer<typeof quoteSchema>;

export interface ZeroExQuoteProviderOptions {
  baseUrl: string;
  keys: ApiKeyPool;
  quoteTtlSeconds: number;
  /** Cooldown applied to a key when 0x omits Retry-After. */
  defaultCooldownMs?: number;
  maxAttempts?: number;
  baseBackoffMs?: number;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function toZeroExToken(token: string): string {
  return token === NATIVE_ASSET ? ZEROX_NATIVE_TOKEN : token;
}

/** EVM quotes from the 0x Swap API (allowance-holder flow), rotating API keys on 429. */
export class ZeroExQuoteProvider implements QuoteProvider {
  private readonly baseUrl: string;
  private readonly options: ZeroExQuoteProviderOptions;

  public constructor(options: ZeroExQuoteProviderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.options = options;
  }

  public async getQuote(request: QuoteRequest): Promise<Quote> {
    const chain = getEvmChainConfig(request.chain);
    const response = await withBackoff(() => this.fetchQuote(request, chain.chainIdNum), {
      maxAttempts: this.options.maxAttempts ?? 3,
      baseBackoffMs: this.options.baseBackoffMs ?? 300,
      shouldRetry: (error) => error instanceof TransientNetworkError || error instanceof QuoteUnavailableError,
      ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
      onRetry: ({ attempt, error }) => {
        this.options.logger?.warn("QUOTE_RETRY", "0X QUOTE ATTEMPT FAILED", {
          chain: request.chain,
          attempt,
          error: errorMessage(error),
        });
      },
    });

    const sellingNative = request.sellToken === NATIVE_ASSET;
    const allowanceTarget = sellingNative
      ? null
      : (response.issues?.allowance?.spender ?? response.transaction.to);
    const sources = response.route?.fills.map((fill) => fill.source) ?? [];

    return {
      provider: "0x",
      chain: request.chain,
      sellToken: request.sellToken,
      buyToken: request.buyToken,
      route: [...new Set(sources)],
      sellAmount: BigInt(response.sellAmount),
      buyAmount: BigInt(response.buyAmount),
      minReceived: BigInt(response.minBuyAmount),
      payload: request.quoteOnly
        ? null
        : {
            family: "evm",
            to: response.transaction.to,
            data: response.transaction.data,
            value: BigInt(response.transaction.value),
            gas: response.transaction.gas ? BigInt(response.transaction.gas) : null,
          },
      allowanceTarget,
      expiresAt: new Date(this.now() + this.options.quoteTtlSeconds * 1000).toISOString(),
    };
  }

  /** One quote attempt; a 429 parks the key and moves straight on to the next one. */
  private async fetchQuote(request: QuoteRequest, chainId: number): Promise<ZeroExQuoteResponse> {
    const pool = this.options.keys;
    let lastRetryAfterMs: number | null = null;

    for (let tried = 0; tried < Math.max(1, pool.size); tried += 1) {
      const key = pool.acquire(this.now());
      if (key === null) {
        break;
      }
      const response = await this.send(this.quoteUrl(request, chainId), key);
      if (response.status === 429) {
        lastRetryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
        pool.markCooldown(key, this.now(), lastRetryAfterMs ?? this.options.defaultCooldownMs);
        this.options.logger?.warn("API_KEY_COOLDOWN", "0X KEY RATE LIMITED", {
          keyIndexTried: tried,
          retryAfterMs: lastRetryAfterMs,
        });
        continue;
      }
      return this.parseResponse(response, request);
    }

    const waitMs = pool.size === 0 ? null : pool.msUntilAvailable(this.now());
    throw new RateLimitedError("0x", waitMs ?? lastRetryAfterMs);
  }

  private quoteUrl(request: QuoteRequest, chainId: number): URL {
    const url = new URL(`${this.baseUrl}/swap/allowance-holder/quote`);
    url.searchParams.set("chainId", String(chainId));
    url.searchParams.set("sellToken", toZeroExToken(request.sellToken));
    url.searchParams.set("buyToken", toZeroExToken(request.buyToken));
    url.searchParams.set("sellAmount", request.amount.toString());
    url.searchParams.set("taker", request.taker);
    url.searchParams.set("slippageBps", String(request.slippageBps));
    return url;
  }

  private async send(url: URL, key: string): Promise<Response> {
    try {
      return await fetch(url, {
        headers: {
          Accept: "application/json",
          "0x-api-key": key,
          "0x-version": "v2",
        },
      });
    } catch (error) {
      throw new TransientNetworkError(`0x request failed: ${errorMessage(error)}`);
    }
  }

  private async parseResponse(response: Response, request: QuoteRequest): Promise<ZeroExQuoteResponse> {
    if (!response.ok) {
      const body = await response.text();
      throw new QuoteUnavailableError(`0x quote failed (${response.status})`, { body: body.slice(0, 300) });
    }
    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new QuoteUnavailableError("0x quote response malformed", { issues: parsed.error.issues.length });
    }
    if (parsed.data.liquidityAvailable === false) {
      throw new InsufficientLiquidityError(`0x has no liquidity for ${request.sellToken} -> ${request.buyToken}`, {
        chain: request.chain,
      });
    }
    return parsed.data;
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }
}
