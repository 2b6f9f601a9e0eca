import {
  BaseError,
  ContractFunctionRevertedError,
  TransactionReceiptNotFoundError,
  createPublicClient,
  encodeFunctionData,
  getAddress,
  http,
  isAddress,
  isHex,
  keccak256,
  toHex,
  type Address,
  type Hex,
  type Transport,
} from "viem";
import { generatePrivateKey, privateKeyToAccount } from "viem/accounts";
import {
  RateLimitedError,
  SimulationUnavailableError,
  TimeoutElapsedError,
  TransientNetworkError,
  errorMessage,
  isTransientMessage,
  withTimeout,
  type ChainAdapter,
  type ChainId,
  type EvmChainConfig,
  type FeeEstimate,
  type Logger,
  type Quote,
  type ReceiptStatus,
  type ScenarioPlan,
  type ScenarioRun,
  type SignedTransaction,
  type SimulationContext,
  type TokenIdentity,
  type UnsignedTransaction,
} from "@tradeguard/core";
import { routerAbi, tokenAbi } from "./abi.js";
import { computeFeeParams, padGas } from "./fees.js";
import { buildScenarioCalls, interpretScenarioResults, type CallResult, type ScenarioLayout } from "./scenarios.js";

export interface EvmAdapterOptions {
  chain: EvmChainConfig;
  transport: Transport;
  priorityFeeFloorGwei: number;
  logger?: Logger;
  now?: () => number;
}

export function toAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new Error(`Invalid EVM address: ${value}`);
  }
  return getAddress(value);
}

function toHexData(value: string): Hex {
  if (!isHex(value)) {
    throw new Error(`Expected hex data, got ${value.slice(0, 12)}`);
  }
  return value;
}

function isRevert(error: unknown): boolean {
  return error instanceof BaseError && error.walk((cause) => cause instanceof ContractFunctionRevertedError) !== null;
}

/** Maps RPC failures onto the retryable error types; anything else passes through. */
export function classifyRpcError(error: unknown, chain: string): unknown {
  const message = errorMessage(error);
  const lower = message.toLowerCase();
  if (lower.includes("429") || lower.includes("too many requests") || lower.includes("rate limit")) {
    return new RateLimitedError(`${chain} rpc`);
  }
  if (!isRevert(error) && isTransientMessage(message)) {
    return new TransientNetworkError(message, { chain });
  }
  return error;
}

function allTimedOut(): ScenarioRun {
  return {
    outcomes: { BUY: { status: "timeout" }, SELL: { status: "timeout" }, TRANSFER: { status: "timeout" } },
    taxes: { buyPct: null, sellPct: null, transferPct: null },
    flags: [],
  };
}

export class EvmChainAdapter implements ChainAdapter {
  public readonly chain: ChainId;
  private readonly config: EvmChainConfig;
  private readonly client;
  private readonly priorityFeeFloorGwei: number;
  private readonly logger: Logger | undefined;
  private readonly now: () => number;

  public constructor(options: EvmAdapterOptions) {
    this.chain = options.chain.id;
    this.config = options.chain;
    this.client = createPublicClient({ transport: options.transport });
    this.priorityFeeFloorGwei = options.priorityFeeFloorGwei;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
  }

  public static fromRpcUrl(chain: EvmChainConfig, rpcUrl: string, options: Omit<EvmAdapterOptions, "chain" | "transport">): EvmChainAdapter {
    return new EvmChainAdapter({ ...options, chain, transport: http(rpcUrl, { timeout: 15_000 }) });
  }

  public async getSimulationContext(): Promise<SimulationContext> {
    try {
      const blockNumber = await this.client.getBlockNumber();
      return { chain: this.chain, reference: blockNumber.toString() };
    } catch (error) {
      throw new SimulationUnavailableError(`${this.config.name} RPC unavailable`, { chain: this.chain, error: errorMessage(error) });
    }
  }

  public async simulateScenarios(plan: ScenarioPlan): Promise<ScenarioRun> {
    const token = toAddress(plan.token.address);
    const router = toAddress(this.config.router);
    const wrappedNative = toAddress(this.config.wrappedNative);
    const trader = privateKeyToAccount(generatePrivateKey()).address;
    const recipient = privateKeyToAccount(generatePrivateKey()).address;

    let expectedTokensOut = 0n;
    let quoteRevert: string | null = null;
    try {
      const amounts = await withTimeout(
        this.client.readContract({
          address: router,
          abi: routerAbi,
          functionName: "getAmountsOut",
          args: [plan.buyAmountRaw, [wrappedNative, token]],
        }),
        plan.timeoutMs,
        "getAmountsOut",
      );
      expectedTokensOut = amounts[amounts.length - 1] ?? 0n;
    } catch (error) {
      if (error instanceof TimeoutElapsedError) {
        return allTimedOut();
      }
      if (!isRevert(error)) {
        throw new SimulationUnavailableError("Router quote failed", { chain: this.chain, error: errorMessage(error) });
      }
      quoteRevert = errorMessage(error);
    }

    const layout: ScenarioLayout = {
      trader,
      recipient,
      token,
      router,
      wrappedNative,
      buyValue: plan.buyAmountRaw,
      expectedTokensOut,
      deadline: BigInt(Math.floor(this.now() / 1000) + 1_200),
    };

    let results: CallResult[];
    try {
      const blocks = await withTimeout(
        this.client.simulateBlocks({
          blocks: [
            {
              calls: buildScenarioCalls(layout),
              stateOverrides: [{ address: trader, balance: plan.buyAmountRaw * 2n }],
            },
          ],
        }),
        plan.timeoutMs,
        "eth_simulateV1",
      );
      const calls = blocks[0]?.calls ?? [];
      results = calls.map((call) => {
        const failure = "error" in call ? call.error : undefined;
        return {
          status: call.status,
          data: call.data,
          gasUsed: call.gasUsed,
          errorMessage: failure instanceof Error ? failure.message : null,
        };
      });
    } catch (error) {
      if (error instanceof TimeoutElapsedError) {
        return allTimedOut();
      }
      throw new SimulationUnavailableError("eth_simulateV1 failed", { chain: this.chain, error: errorMessage(error) });
    }

    const run = interpretScenarioResults(layout, results);
    if (quoteRevert !== null && run.outcomes.BUY.status === "reverted") {
      run.outcomes.BUY = { ...run.outcomes.BUY, message: `${run.outcomes.BUY.message}; quote: ${quoteRevert}` };
    }
    this.logger?.debug("SIM_BLOCK", "SIMULATED SCENARIO BLOCK", {
      chain: this.chain,
      token,
      calls: results.length,
      expectedTokensOut,
    });
    return run;
  }

  public async getCode(address: string): Promise<string | null> {
    const code = await this.client.getCode({ address: toAddress(address) });
    return code && code !== "0x" ? code : null;
  }

  public async getTokenMetadata(address: string): Promise<{ decimals: number; symbol: string | null }> {
    const token = toAddress(address);
    const decimals = await this.client.readContract({ address: token, abi: tokenAbi, functionName: "decimals" });
    let symbol: string | null = null;
    try {
      symbol = await this.client.readContract({ address: token, abi: tokenAbi, functionName: "symbol" });
    } catch (error) {
      this.logger?.debug("SYMBOL_MISSING", "TOKEN SYMBOL NOT READABLE", { token, error: errorMessage(error) });
    }
    return { decimals, symbol };
  }

  public async getNativeBalance(owner: string): Promise<bigint> {
    return this.client.getBalance({ address: toAddress(owner) });
  }

  public async getTokenBalance(owner: string, token: TokenIdentity): Promise<bigint> {
    return this.client.readContract({
      address: toAddress(token.address),
      abi: tokenAbi,
      functionName: "balanceOf",
      args: [toAddress(owner)],
    });
  }

  public async getNonce(owner: string): Promise<number> {
    return this.client.getTransactionCount({ address: toAddress(owner), blockTag: "pending" });
  }

  public async getFeeEstimate(): Promise<FeeEstimate> {
    const [block, gasPrice] = await Promise.all([this.client.getBlock({ blockTag: "latest" }), this.client.getGasPrice()]);
    return {
      params: computeFeeParams({
        supportsEip1559: this.config.supportsEip1559,
        baseFeePerGas: block.baseFeePerGas,
        gasPrice,
        priorityFeeFloorGwei: this.priorityFeeFloorGwei,
      }),
    };
  }

  public async buildApproval(
    token: TokenIdentity,
    owner: string,
    spender: string,
    amount: bigint,
    fees: FeeEstimate,
  ): Promise<UnsignedTransaction | null> {
    const tokenAddress = toAddress(token.address);
    const ownerAddress = toAddress(owner);
    const spenderAddress = toAddress(spender);
    const allowance = await this.client.readContract({
      address: tokenAddress,
      abi: tokenAbi,
      functionName: "allowance",
      args: [ownerAddress, spenderAddress],
    });
    if (allowance >= amount) {
      return null;
    }

    const data = encodeApprove(spenderAddress, amount);
    const [nonce, gas] = await Promise.all([
      this.getNonce(owner),
      this.client.estimateGas({ account: ownerAddress, to: tokenAddress, data }),
    ]);
    return {
      family: "evm",
      chain: this.chain,
      from: ownerAddress,
      to: tokenAddress,
      data,
      value: 0n,
      nonce,
      gas: padGas(gas),
      fees: fees.params,
    };
  }

  public async buildTransaction(quote: Quote, fees: FeeEstimate, owner: string): Promise<UnsignedTransaction> {
    const payload = quote.payload;
    if (!payload || payload.family !== "evm") {
      throw new Error(`Quote from ${quote.provider} carries no EVM payload`);
    }
    const from = toAddress(owner);
    const to = toAddress(payload.to);
    const data = toHexData(payload.data);
    const value = payload.value;
    const nonce = await this.getNonce(owner);
    const gas = payload.gas ?? (await this.client.estimateGas({ account: from, to, data, value }));
    return {
      family: "evm",
      chain: this.chain,
      from,
      to,
      data,
      value,
      nonce,
      gas: padGas(gas),
      fees: fees.params,
    };
  }

  public async signTransaction(unsigned: UnsignedTransaction, key: Uint8Array): Promise<SignedTransaction> {
    if (unsigned.family !== "evm") {
      throw new Error("EVM adapter cannot sign a non-EVM transaction");
    }
    if (unsigned.gas === null) {
      throw new Error("Gas limit missing");
    }
    const account = privateKeyToAccount(toHex(key));
    if (account.address.toLowerCase() !== unsigned.from.toLowerCase()) {
      throw new Error("Key material does not belong to the transaction sender");
    }

    const base = {
      chainId: this.config.chainIdNum,
      to: toAddress(unsigned.to),
      data: toHexData(unsigned.data),
      value: unsigned.value,
      nonce: unsigned.nonce,
      gas: unsigned.gas,
    };
    const fees = unsigned.fees;
    let raw: Hex;
    if (fees.kind === "eip1559") {
      raw = await account.signTransaction({
        ...base,
        type: "eip1559",
        maxFeePerGas: BigInt(fees.maxFeePerGas),
        maxPriorityFeePerGas: BigInt(fees.maxPriorityFeePerGas),
      });
    } else if (fees.kind === "legacy") {
      raw = await account.signTransaction({ ...base, type: "legacy", gasPrice: BigInt(fees.gasPrice) });
    } else {
      throw new Error("Solana fee parameters on an EVM transaction");
    }
    return { chain: this.chain, raw, hash: keccak256(raw) };
  }

  public async broadcast(signed: SignedTransaction): Promise<string> {
    try {
      return await this.client.sendRawTransaction({ serializedTransaction: toHexData(signed.raw) });
    } catch (error) {
      const message = errorMessage(error);
      // "already known": a previous send of these exact bytes reached the mempool
      if (message.toLowerCase().includes("already known")) {
        return signed.hash;
      }
      throw classifyRpcError(error, this.chain);
    }
  }

  public async getReceipt(hash: string): Promise<ReceiptStatus | null> {
    try {
      const receipt = await this.client.getTransactionReceipt({ hash: toHexData(hash) });
      return receipt.status;
    } catch (error) {
      if (error instanceof TransactionReceiptNotFoundError) {
        return null;
      }
      throw error;
    }
  }
}

function encodeApprove(spender: Address, amount: bigint): Hex {
  return encodeFunctionData({ abi: tokenAbi, functionName: "approve", args: [spender, amount] });
}
