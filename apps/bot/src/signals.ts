import {
  atomicToUi,
  CHAINS,
  errorMessage,
  type ChainId,
  type Logger,
  type MarketDataProvider,
  type MirrorSignal,
  type TokenIdentity,
  type TradeSide,
} from "@tradeguard/core";

/** A swap by a watched wallet, as decoded from chain data. */
export interface ObservedSwap {
  id: string;
  chain: ChainId;
  wallet: string;
  side: TradeSide;
  tokenAddress: string;
  tokenAmountRaw: bigint;
  /** Native asset spent on a buy, when the transaction shows it. */
  nativeSpentRaw: bigint | null;
}

export interface SignalFactoryOptions {
  resolveToken: (chain: ChainId, address: string) => Promise<TokenIdentity>;
  market: MarketDataProvider;
  logger: Logger;
  now?: () => Date;
}

export class SignalFactory {
  private readonly options: SignalFactoryOptions;
  private readonly now: () => Date;

  public constructor(options: SignalFactoryOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  public async build(observed: ObservedSwap): Promise<MirrorSignal> {
    const token = await this.options.resolveToken(observed.chain, observed.tokenAddress);
    return {
      id: observed.id,
      sourceWallet: observed.wallet,
      side: observed.side,
      token,
      observedAmountRaw: observed.tokenAmountRaw.toString(),
      observedAmountUsd: await this.observedUsd(observed),
      discoveredAt: this.now().toISOString(),
    };
  }

  private async observedUsd(observed: ObservedSwap): Promise<number | null> {
    if (observed.nativeSpentRaw === null || observed.nativeSpentRaw <= 0n) {
      return null;
    }
    const chain = CHAINS[observed.chain];
    try {
      const price = await this.options.market.getPrice({
        chain: observed.chain,
        address: chain.wrappedNative,
        decimals: chain.nativeDecimals,
        symbol: chain.nativeSymbol,
      });
      return price.usdPrice > 0 ? atomicToUi(observed.nativeSpentRaw, chain.nativeDecimals) * price.usdPrice : null;
    } catch (error) {
      this.options.logger.warn("SIGNAL_PRICE_FAIL", "NATIVE PRICE UNAVAILABLE FOR SIGNAL", {
        chain: observed.chain,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
