import type { Server } from "node:http";
import { z } from "zod";
import {
  ApiKeyPool,
  CHAIN_IDS,
  chainFamily,
  errorMessage,
  getEvmChainConfig,
  loadConfig,
  Logger,
  maskAddress,
  rpcUrlFor,
  sleep,
  type ChainAdapter,
  type ChainId,
  type EngineConfig,
  type NotificationSink,
} from "@tradeguard/core";
import { AdapterRegistry, TradeEngine, type MirrorPolicy } from "@tradeguard/engine";
import { EvmChainAdapter } from "@tradeguard/evm";
import { GeckoTerminalClient, GoPlusSecurityScanner } from "@tradeguard/market";
import { AggregatorQuoteProvider, JupiterClient, JupiterQuoteProvider, ZeroExQuoteProvider } from "@tradeguard/quotes";
import { SolanaChainAdapter } from "@tradeguard/solana";
import { Store } from "@tradeguard/store";
import { startWebServer } from "@tradeguard/web";
import { EvmMempoolWatcher } from "./evm-watcher.js";
import { DiscordWebhookNotifier, FanoutNotifier, LogNotifier } from "./notifiers.js";
import { SignalFactory, type ObservedSwap } from "./signals.js";
import { SolanaWalletWatcher } from "./solana-watcher.js";
import { FileKeyVault } from "./vault.js";

const MIRROR_POLICY_KEY = "mirror_policy";

const savedMirrorPolicySchema = z
  .object({
    sellEnabled: z.boolean(),
    buyEnabled: z.boolean(),
    trackedWallets: z.array(z.string()),
    blacklistWallets: z.array(z.string()),
    blacklistTokens: z.array(z.string()),
    copyPct: z.number(),
    maxPositionUsd: z.number(),
    defaultBuyUsd: z.number(),
    sellPct: z.number(),
    safeMode: z.boolean(),
    slippageBps: z.number().int(),
    ownerEvm: z.string(),
    ownerSolana: z.string(),
  })
  .partial();

/** Mirror policy saved by an earlier run; unreadable state is ignored. */
export function parseSavedMirrorPolicy(value: unknown): Partial<MirrorPolicy> {
  const parsed = savedMirrorPolicySchema.safeParse(value);
  return parsed.success ? parsed.data : {};
}

export interface Watcher {
  start(): void;
  stop(): void | Promise<void>;
}

export class TradeGuardBot {
  private readonly config: EngineConfig;
  private readonly store: Store;
  private readonly logger: Logger;
  private readonly engine: TradeEngine;
  private readonly watchers: Watcher[] = [];
  private readonly chains: ChainId[];
  private server: Server | null = null;
  private running = false;
  private loop: Promise<void> | null = null;

  public constructor(config: EngineConfig = loadConfig()) {
    this.config = config;
    this.store = new Store(config.DB_PATH);
    this.store.initialize();

    this.logger = new Logger({ component: "BOT", level: config.LOG_LEVEL, sink: this.store });

    const jupiter = new JupiterQuoteProvider(new JupiterClient(config.JUPITER_BASE_URL, this.logger.child("JUPITER")), {
      priorityFeeLamports: config.PRIORITY_FEE_LAMPORTS,
      quoteTtlSeconds: config.QUOTE_TTL_SECONDS,
    });
    const quotes = new AggregatorQuoteProvider({
      solana: jupiter,
      evm: new ZeroExQuoteProvider({
        baseUrl: config.ZEROX_BASE_URL,
        keys: new ApiKeyPool(config.ZEROX_API_KEYS, config.API_KEY_COOLDOWN_SECONDS),
        quoteTtlSeconds: config.QUOTE_TTL_SECONDS,
        logger: this.logger.child("ZEROX"),
      }),
    });
    const market = new GeckoTerminalClient({ baseUrl: config.GECKO_TERMINAL_BASE_URL, logger: this.logger.child("GECKO") });
    const security = new GoPlusSecurityScanner({
      baseUrl: config.GOPLUS_BASE_URL,
      keys: new ApiKeyPool(config.GOPLUS_API_KEYS, config.API_KEY_COOLDOWN_SECONDS),
      logger: this.logger.child("GOPLUS"),
    });

    this.chains = CHAIN_IDS.filter((chain) => rpcUrlFor(config, chain) !== "");
    const adapters = new AdapterRegistry(this.chains.map((chain) => this.createAdapter(chain, jupiter)));

    this.engine = new TradeEngine({
      config,
      adapters,
      quotes,
      market,
      security,
      vault: new FileKeyVault(config.KEY_DIR),
      persistence: this.store,
      notifier: this.createNotifier(),
      logger: this.logger.child("ENGINE"),
      mirrorPolicy: parseSavedMirrorPolicy(this.store.getRuntimeState(MIRROR_POLICY_KEY)?.value),
      onMirrorPolicyChange: (policy) => {
        this.store.setRuntimeState(MIRROR_POLICY_KEY, { ...policy });
      },
    });

    const signals = new SignalFactory({
      resolveToken: (chain, address) => this.engine.assessor.resolveToken(chain, address),
      market,
      logger: this.logger.child("SIGNALS"),
    });
    const onSwap = async (swap: ObservedSwap): Promise<void> => {
      await this.engine.submitSignal(await signals.build(swap));
    };
    const trackedWallets = (): readonly string[] => this.engine.getMirrorPolicy().trackedWallets;
    for (const chain of this.chains) {
      const rpcUrl = rpcUrlFor(config, chain);
      if (chainFamily(chain) === "evm") {
        this.watchers.push(
          EvmMempoolWatcher.fromRpcUrl(chain, rpcUrl, { trackedWallets, onSwap, logger: this.logger.child("MEMPOOL") }),
        );
      } else {
        this.watchers.push(
          SolanaWalletWatcher.fromRpcUrl(rpcUrl, {
            trackedWallets,
            onSwap,
            logger: this.logger.child("WALLETS"),
            pollSeconds: config.MIRROR_POLL_SECONDS,
          }),
        );
      }
    }
  }

  public async start(): Promise<void> {
    this.running = true;
    const policy = this.engine.getMirrorPolicy();
    this.logger.ok("BOOT", "===== TRADEGUARD START =====", {
      mode: this.config.MODE,
      chains: this.chains,
      dbPath: this.store.getDbPath(),
      trackedWallets: policy.trackedWallets.length,
      ownerEvm: maskAddress(policy.ownerEvm),
      ownerSolana: maskAddress(policy.ownerSolana),
    });
    if (this.chains.length === 0) {
      this.logger.warn("NO_CHAINS", "WARNING NO RPC URL CONFIGURED; ANALYSIS AND TRADING ARE UNAVAILABLE");
    }

    this.engine.startMirror();
    for (const watcher of this.watchers) {
      watcher.start();
    }
    this.server = await startWebServer(
      { engine: this.engine, store: this.store, logger: this.logger.child("WEB") },
      this.config.WEB_PORT,
    );
    this.loop = this.heartbeat();
  }

  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.logger.warn("STOP", "STOP SIGNAL RECEIVED", {});
    await Promise.all(this.watchers.map((watcher) => watcher.stop()));
    await new Promise<void>((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close(() => resolve());
    });
    await this.engine.stop();
    if (this.loop) {
      await this.loop;
    }
    this.store.close();
  }

  private createAdapter(chain: ChainId, jupiter: JupiterQuoteProvider): ChainAdapter {
    const rpcUrl = rpcUrlFor(this.config, chain);
    if (chainFamily(chain) === "evm") {
      return EvmChainAdapter.fromRpcUrl(getEvmChainConfig(chain), rpcUrl, {
        priorityFeeFloorGwei: this.config.PRIORITY_FEE_FLOOR_GWEI,
        logger: this.logger.child(chain.toUpperCase()),
      });
    }
    return SolanaChainAdapter.fromRpcUrl(rpcUrl, {
      quotes: jupiter,
      simulationPayer: this.config.SOLANA_SIMULATION_PAYER,
      priorityFeeLamports: this.config.PRIORITY_FEE_LAMPORTS,
      logger: this.logger.child("SOLANA"),
    });
  }

  private createNotifier(): NotificationSink {
    const sinks: NotificationSink[] = [new LogNotifier(this.logger.child("ALERT"))];
    if (this.config.DISCORD_WEBHOOK_URL) {
      sinks.push(new DiscordWebhookNotifier({ webhookUrl: this.config.DISCORD_WEBHOOK_URL, logger: this.logger.child("DISCORD") }));
    }
    return new FanoutNotifier(sinks);
  }

  private async heartbeat(): Promise<void> {
    while (this.running) {
      try {
        this.store.setRuntimeState("system_status", {
          mode: this.config.MODE,
          chains: this.chains,
          circuit: this.engine.circuitState(),
          pendingProposals: this.engine.listPendingProposals().length,
          heartbeatTs: new Date().toISOString(),
        });
      } catch (error) {
        this.logger.error("HEARTBEAT_FAIL", "ERROR WRITING SYSTEM STATUS", { error: errorMessage(error) });
      }

      const deadline = Date.now() + this.config.MIRROR_POLL_SECONDS * 1000;
      while (this.running && Date.now() < deadline) {
        await sleep(Math.min(500, deadline - Date.now()));
      }
    }
  }
}
