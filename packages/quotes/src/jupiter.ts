import { z } from "zod";
import {
  InsufficientLiquidityError,
  NATIVE_ASSET,
  QuoteUnavailableError,
  RateLimitedError,
  TransientNetworkError,
  WSOL_MINT,
  errorMessage,
  parseRetryAfter,
  withBackoff,
  type Logger,
  type Quote,
  type QuoteProvider,
  type QuoteRequest,
} from "@tradeguard/core";

export interface JupiterQuoteRequest {
  inputMint: string;
  outputMint: string;
  amount: string;
  slippageBps: number;
}

const quoteResponseSchema = z
  .object({
    inputMint: z.string(),
    outputMint: z.string(),
    inAmount: z.string(),
    outAmount: z.string(),
    otherAmountThreshold: z.string(),
    swapMode: z.string(),
    slippageBps: z.number(),
    priceImpactPct: z.string(),
    routePlan: z.array(
      z
        .object({
          percent: z.number(),
          swapInfo: z
            .object({
              ammKey: z.string(),
              label: z.string().optional(),
              inputMint: z.string(),
              outputMint: z.string(),
              inAmount: z.string(),
              outAmount: z.string(),
            })
            .passthrough(),
        })
        .passthrough(),
    ),
  })
  .passthrough();

export type JupiterQuoteResponse = z.infer<typeof quoteResponseSchema>;

const swapResponseSchema = z.object({
  swapTransaction: z.string(),
  lastValidBlockHeight: z.number(),
  prioritizationFeeLamports: z.number().optional(),
  computeUnitLimit: z.number().optional(),
});

export type JupiterSwapResponse = z.infer<typeof swapResponseSchema>;

export interface JupiterSwapRequest {
  userPublicKey: string;
  quoteResponse: JupiterQuoteResponse;
  priorityFeeLamports: number;
}

const noRoutePattern = /no.?route|could_not_find_any_route|route not found|token_not_tradable/i;

export class JupiterClient {
  private readonly baseUrl: string;
  private readonly logger: Logger | undefined;

  public constructor(baseUrl: string, logger?: Logger) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.logger = logger;
  }

  public async getQuote(request: JupiterQuoteRequest): Promise<JupiterQuoteResponse> {
    const url = new URL(`${this.baseUrl}/quote`);
    url.searchParams.set("inputMint", request.inputMint);
    url.searchParams.set("outputMint", request.outputMint);
    url.searchParams.set("amount", request.amount);
    url.searchParams.set("slippageBps", String(request.slippageBps));
    url.searchParams.set("swapMode", "ExactIn");

    const response = await this.send(url, { headers: { Accept: "application/json" } });
    if (!response.ok) {
      const body = await response.text();
      if (response.status === 429) {
        throw new RateLimitedError("jupiter", parseRetryAfter(response.headers.get("retry-after")));
      }
      if (noRoutePattern.test(body)) {
        throw new InsufficientLiquidityError(`Jupiter found no route ${request.inputMint} -> ${request.outputMint}`, {
          status: response.status,
        });
      }
      throw new QuoteUnavailableError(`Jupiter quote failed (${response.status})`, { body: body.slice(0, 300) });
    }
    const parsed = quoteResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new QuoteUnavailableError("Jupiter quote response malformed", { issues: parsed.error.issues.length });
    }
    return parsed.data;
  }

  public async getQuoteWithRetries(
    request: JupiterQuoteRequest,
    maxAttempts = 3,
    baseBackoffMs = 300,
  ): Promise<JupiterQuoteResponse> {
    return withBackoff(() => this.getQuote(request), {
      maxAttempts,
      baseBackoffMs,
      shouldRetry: (error) => error instanceof QuoteUnavailableError || error instanceof TransientNetworkError,
      onRetry: ({ attempt, error }) => {
        this.logger?.warn("QUOTE_RETRY", "QUOTE ATTEMPT FAILED", {
          attempt,
          maxAttempts,
          error: errorMessage(error),
        });
      },
    });
  }

  public async getSwapTransaction(request: JupiterSwapRequest): Promise<JupiterSwapResponse> {
    const body: Record<string, unknown> = {
      userPublicKey: request.userPublicKey,
      quoteResponse: request.quoteResponse,
      wrapAndUnwrapSol: true,
      dynamicComputeUnitLimit: true,
    };
    if (request.priorityFeeLamports > 0) {
      body.prioritizationFeeLamports = request.priorityFeeLamports;
    }

    const response = await this.send(`${this.baseUrl}/swap`, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!response.ok) {
      const responseBody = await response.text();
      if (response.status === 429) {
        throw new RateLimitedError("jupiter", parseRetryAfter(response.headers.get("retry-after")));
      }
      throw new QuoteUnavailableError(`Jupiter swap build failed (${response.status})`, {
        body: responseBody.slice(0, 300),
      });
    }

    const parsed = swapResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new QuoteUnavailableError("Jupiter swap response malformed", { issues: parsed.error.issues.length });
    }
    return parsed.data;
  }

  public parseRouteSummary(quote: JupiterQuoteResponse): string[] {
    const labels = quote.routePlan.map((part) => part.swapInfo.label ?? "").filter(Boolean);
    const unique: string[] = [];
    for (const label of labels) {
      if (!unique.includes(label)) {
        unique.push(label);
      }
    }
    return unique;
  }

  private async send(url: URL | string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(url, init);
    } catch (error) {
      throw new TransientNetworkError(`Jupiter request failed: ${errorMessage(error)}`);
    }
  }
}

function toMint(token: string): string {
  return token === NATIVE_ASSET ? WSOL_MINT : token;
}

export interface JupiterQuoteProviderOptions {
  priorityFeeLamports: number;
  quoteTtlSeconds: number;
  now?: () => number;
}

/** Solana side of the quote port: quote plus a swap transaction built for the taker. */
export class JupiterQuoteProvider implements QuoteProvider {
  private readonly client: JupiterClient;
  private readonly options: JupiterQuoteProviderOptions;

  public constructor(client: JupiterClient, options: JupiterQuoteProviderOptions) {
    this.client = client;
    this.options = options;
  }

  public async getQuote(request: QuoteRequest): Promise<Quote> {
    if (request.chain !== "solana") {
      throw new QuoteUnavailableError(`Jupiter does not quote ${request.chain}`);
    }
    const quote = await this.client.getQuoteWithRetries({
      inputMint: toMint(request.sellToken),
      outputMint: toMint(request.buyToken),
      amount: request.amount.toString(),
      slippageBps: request.slippageBps,
    });
    if (BigInt(quote.outAmount) === 0n) {
      throw new InsufficientLiquidityError("Jupiter route returns nothing", { outputMint: quote.outputMint });
    }

    const now = this.options.now?.() ?? Date.now();
    let payload: Quote["payload"] = null;
    if (!request.quoteOnly) {
      const swap = await this.client.getSwapTransaction({
        userPublicKey: request.taker,
        quoteResponse: quote,
        priorityFeeLamports: this.options.priorityFeeLamports,
      });
      payload = {
        family: "solana",
        serialized: swap.swapTransaction,
        lastValidBlockHeight: swap.lastValidBlockHeight,
      };
    }

    return {
      provider: "jupiter",
      chain: "solana",
      sellToken: request.sellToken,
      buyToken: request.buyToken,
      route: this.client.parseRouteSummary(quote),
      sellAmount: BigInt(quote.inAmount),
      buyAmount: BigInt(quote.outAmount),
      minReceived: BigInt(quote.otherAmountThreshold),
      payload,
      allowanceTarget: null,
      expiresAt: new Date(now + this.options.quoteTtlSeconds * 1000).toISOString(),
    };
  }
}
