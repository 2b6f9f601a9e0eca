import type { ChainFamily, ChainId, EngineConfig } from "./types.js";

interface ChainBase {
  id: ChainId;
  name: string;
  nativeSymbol: string;
  nativeDecimals: number;
  /** Wrapped native token address / mint, the counter-asset of every swap. */
  wrappedNative: string;
  confirmationPollMs: number;
  geckoNetwork: string;
  goplusChainId: string;
}

export interface EvmChainConfig extends ChainBase {
  family: "evm";
  chainIdNum: number;
  router: string;
  factory: string;
  supportsEip1559: boolean;
}

export interface SolanaChainConfig extends ChainBase {
  family: "solana";
}

export type ChainConfig = EvmChainConfig | SolanaChainConfig;

export const WSOL_MINT = "So11111111111111111111111111111111111111112";

/** Stand-in token address for the chain's native asset in quote requests. */
export const NATIVE_ASSET = "native";

export const CHAINS = {
  ethereum: {
    id: "ethereum",
    family: "evm",
    name: "Ethereum",
    nativeSymbol: "ETH",
    nativeDecimals: 18,
    chainIdNum: 1,
    wrappedNative: "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2",
    router: "0x7a250d5630B4cF539739dF2C5dAcb4c659F2488D",
    factory: "0x5C69bEe701ef814a2B6a3EDD4B1652CB9cc5aA6f",
    supportsEip1559: true,
    confirmationPollMs: 4_000,
    geckoNetwork: "eth",
    goplusChainId: "1",
  },
  bsc: {
    id: "bsc",
    family: "evm",
    name: "BNB Smart Chain",
    nativeSymbol: "BNB",
    nativeDecimals: 18,
    chainIdNum: 56,
    wrappedNative: "0xbb4CdB9CBd36B01bD1cBaEBF2De08d9173bc095c",
    router: "0x10ED43C718714eb63d5aA57B78B54704E256024E",
    factory: "0xcA143Ce32Fe78f1f7019d7d551a6402fC5350c73",
    supportsEip1559: false,
    confirmationPollMs: 3_000,
    geckoNetwork: "bsc",
    goplusChainId: "56",
  },
  base: {
    id: "base",
    family: "evm",
    name: "Base",
    nativeSymbol: "ETH",
    nativeDecimals: 18,
    chainIdNum: 8453,
    wrappedNative: "0x4200000000000000000000000000000000000006",
    router: "0x4752ba5DBc23f44D87826276BF6Fd6b1C372aD24",
    factory: "0x8909Dc15e40173Ff4699343b6eB8132c65e18eC6",
    supportsEip1559: true,
    confirmationPollMs: 2_000,
    geckoNetwork: "base",
    goplusChainId: "8453",
  },
  arbitrum: {
    id: "arbitrum",
    family: "evm",
    name: "Arbitrum One",
    nativeSymbol: "ETH",
    nativeDecimals: 18,
    chainIdNum: 42161,
    wrappedNative: "0x82aF49447D8a07e3bd95BD0d56f35241523fBab1",
    router: "0x1b02dA8Cb0d097eB8D57A175b88c7D8b47997506",
    factory: "0xc35DADB65012eC5796536bD9864eD8773aBc74C4",
    supportsEip1559: true,
    confirmationPollMs: 1_000,
    geckoNetwork: "arbitrum",
    goplusChainId: "42161",
  },
  solana: {
    id: "solana",
    family: "solana",
    name: "Solana",
    nativeSymbol: "SOL",
    nativeDecimals: 9,
    wrappedNative: WSOL_MINT,
    confirmationPollMs: 1_500,
    geckoNetwork: "solana",
    goplusChainId: "solana",
  },
} as const satisfies Record<ChainId, ChainConfig>;

export const CHAIN_IDS = Object.keys(CHAINS).filter(isChainId);

export function isChainId(value: string): value is ChainId {
  return value === "ethereum" || value === "bsc" || value === "base" || value === "arbitrum" || value === "solana";
}

export function getChainConfig(chain: ChainId): ChainConfig {
  return CHAINS[chain];
}

export function getEvmChainConfig(chain: ChainId): EvmChainConfig {
  const config = getChainConfig(chain);
  if (config.family !== "evm") {
    throw new Error(`${chain} is not an EVM chain`);
  }
  return config;
}

export function chainFamily(chain: ChainId): ChainFamily {
  return CHAINS[chain].family;
}

export function rpcUrlFor(config: EngineConfig, chain: ChainId): string {
  switch (chain) {
    case "ethereum":
      return config.RPC_URL_ETHEREUM;
    case "bsc":
      return config.RPC_URL_BSC;
    case "base":
      return config.RPC_URL_BASE;
    case "arbitrum":
      return config.RPC_URL_ARBITRUM;
    case "solana":
      return config.RPC_URL_SOLANA;
  }
}

/** Canonical cache / lock key; EVM addresses are case-insensitive, Solana mints are not. */
export function tokenKey(chain: ChainId, address: string): string {
  return `${chain}:${chainFamily(chain) === "evm" ? address.toLowerCase() : address}`;
}
