import { chainFamily, type ChainFamily, type Quote, type QuoteProvider, type QuoteRequest } from "@tradeguard/core";

/** Routes each request to the provider registered for the chain's family. */
export class AggregatorQuoteProvider implements QuoteProvider {
  private readonly providers: Partial<Record<ChainFamily, QuoteProvider>>;

  public constructor(providers: Partial<Record<ChainFamily, QuoteProvider>>) {
    this.providers = providers;
  }

  public async getQuote(request: QuoteRequest): Promise<Quote> {
    const family = chainFamily(request.chain);
    const provider = this.providers[family];
    if (!provider) {
      throw new Error(`No quote provider configured for ${family} chains`);
    }
    return provider.getQuote(request);
  }
}
