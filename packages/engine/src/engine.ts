import {
  BoundedChannel,
  ChannelClosedError,
  CircuitBreaker,
  EngineError,
  errorMessage,
  InvalidStateError,
  Logger,
  NotFoundError,
  RiskScorer,
  riskPolicyFromConfig,
  type ChainId,
  type EngineConfig,
  type KeyVault,
  type MarketDataProvider,
  type MirrorSignal,
  type NotificationSink,
  type PersistenceSink,
  type QuoteProvider,
  type RiskAssessment,
  type SecurityScanProvider,
  type TradeExecution,
  type TradeProposal,
  type TradeSide,
} from "@tradeguard/core";
import { RiskAssessor } from "./assessor.js";
import { TradeExecutor, executorPolicyFromConfig } from "./executor.js";
import { SessionGate, gatePolicyFromConfig, type TimerApi } from "./gate.js";
import { HoneypotSimulator, simulationPolicyFromConfig } from "./honeypot.js";
import { MirrorProcessor, mirrorPolicyFromConfig, type MirrorPolicy } from "./mirror.js";
import type { AdapterRegistry } from "./registry.js";

export interface TradeEngineDeps {
  config: EngineConfig;
  adapters: AdapterRegistry;
  quotes: QuoteProvider;
  market: MarketDataProvider;
  security: SecurityScanProvider;
  vault: KeyVault;
  persistence?: PersistenceSink;
  notifier?: NotificationSink;
  logger?: Logger;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  timers?: TimerApi;
  /** Saved mirror policy overrides, applied over the configured defaults. */
  mirrorPolicy?: Partial<MirrorPolicy>;
  onMirrorPolicyChange?: (policy: MirrorPolicy) => void;
}

export interface ProposeTradeInput {
  requester: string;
  owner: string;
  chain: ChainId;
  tokenAddress: string;
  side: TradeSide;
  amount: number;
  slippageBps?: number;
  safeMode?: boolean;
}

export interface ConfirmResult {
  proposal: TradeProposal;
  execution: TradeExecution;
}

export class TradeEngine {
  public readonly assessor: RiskAssessor;
  public readonly gate: SessionGate;
  public readonly executor: TradeExecutor;
  public readonly mirror: MirrorProcessor;
  public readonly breaker: CircuitBreaker;

  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly channel: BoundedChannel<MirrorSignal>;
  private readonly onMirrorPolicyChange: ((policy: MirrorPolicy) => void) | undefined;
  private mirrorPolicy: MirrorPolicy;
  private mirrorLoop: Promise<void> | null = null;

  public constructor(deps: TradeEngineDeps) {
    const { config } = deps;
    this.config = config;
    this.logger = deps.logger ?? new Logger({ component: "engine", level: config.LOG_LEVEL });
    this.mirrorPolicy = { ...mirrorPolicyFromConfig(config), ...deps.mirrorPolicy };
    this.onMirrorPolicyChange = deps.onMirrorPolicyChange;
    this.channel = new BoundedChannel<MirrorSignal>(config.MIRROR_CHANNEL_CAPACITY);
    this.breaker = new CircuitBreaker(config.FAILURE_CIRCUIT_BREAKER_N, config.CIRCUIT_BREAKER_COOLDOWN_MINUTES);

    const simulator = new HoneypotSimulator({
      adapters: deps.adapters,
      policy: simulationPolicyFromConfig(config),
      logger: this.logger.child("simulator"),
      ...(deps.now ? { now: deps.now } : {}),
    });
    this.assessor = new RiskAssessor({
      adapters: deps.adapters,
      simulator,
      scorer: new RiskScorer(riskPolicyFromConfig(config), deps.now),
      market: deps.market,
      security: deps.security,
      ttlSeconds: config.ASSESSMENT_TTL_SECONDS,
      logger: this.logger.child("assessor"),
      ...(deps.persistence ? { persistence: deps.persistence } : {}),
      ...(deps.notifier ? { notifier: deps.notifier } : {}),
      ...(deps.now ? { now: deps.now } : {}),
    });
    this.gate = new SessionGate({
      policy: gatePolicyFromConfig(config),
      logger: this.logger.child("gate"),
      ...(deps.persistence ? { persistence: deps.persistence } : {}),
      ...(deps.notifier ? { notifier: deps.notifier } : {}),
      ...(deps.now ? { now: deps.now } : {}),
      ...(deps.timers ? { timers: deps.timers } : {}),
    });
    this.executor = new TradeExecutor({
      adapters: deps.adapters,
      quotes: deps.quotes,
      market: deps.market,
      vault: deps.vault,
      breaker: this.breaker,
      policy: executorPolicyFromConfig(config),
      logger: this.logger.child("executor"),
      ...(deps.persistence ? { persistence: deps.persistence } : {}),
      ...(deps.notifier ? { notifier: deps.notifier } : {}),
      ...(deps.now ? { now: deps.now } : {}),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    });
    this.mirror = new MirrorProcessor({
      assess: (token) => this.assessor.getOrAssess(token),
      gate: this.gate,
      execute: (proposal) => this.executor.execute(proposal),
      logger: this.logger.child("mirror"),
      assessAttempts: config.EXEC_MAX_ATTEMPTS,
      assessBackoffMs: config.EXEC_BACKOFF_MS,
      ...(deps.persistence ? { persistence: deps.persistence } : {}),
      ...(deps.notifier ? { notifier: deps.notifier } : {}),
      ...(deps.now ? { now: deps.now } : {}),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    });
  }

  public get mode(): EngineConfig["MODE"] {
    return this.config.MODE;
  }

  public async analyze(chain: ChainId, address: string): Promise<RiskAssessment> {
    const token = await this.assessor.resolveToken(chain, address);
    return this.assessor.assess(token);
  }

  public async proposeTrade(input: ProposeTradeInput): Promise<TradeProposal> {
    const slippageBps = input.slippageBps ?? this.config.DEFAULT_SLIPPAGE_BPS;
    if (!(input.amount > 0) || (input.side === "SELL" && input.amount > 100)) {
      throw new EngineError(
        "INVALID_REQUEST",
        input.side === "BUY" ? "Buy amount must be a positive USD value" : "Sell amount must be a percentage in (0, 100]",
        { amount: input.amount },
      );
    }
    if (!Number.isInteger(slippageBps) || slippageBps <= 0 || slippageBps > this.config.MAX_SLIPPAGE_BPS) {
      throw new EngineError("INVALID_REQUEST", `Slippage must be 1..${this.config.MAX_SLIPPAGE_BPS} bps`, {
        slippageBps,
      });
    }

    const token = await this.assessor.resolveToken(input.chain, input.tokenAddress);
    const assessment = await this.assessor.getOrAssess(token);
    return this.gate.propose(
      {
        requester: input.requester,
        owner: input.owner,
        chain: input.chain,
        side: input.side,
        token,
        amount: input.amount,
        slippageBps,
        safeMode: input.safeMode ?? this.config.SAFE_MODE,
        origin: "manual",
      },
      assessment,
    );
  }

  /** Confirms and starts execution; `wait` resolves once the execution is final. */
  public async confirm(id: string, options: { wait?: boolean } = {}): Promise<ConfirmResult> {
    const proposal = this.gate.confirm(id);
    const done = this.executor.execute(proposal);
    const execution = this.executor.getByProposal(id);
    if (!execution) {
      throw new InvalidStateError(`Execution for proposal ${id} was not started`, { id });
    }
    if (options.wait) {
      return { proposal, execution: await done };
    }
    void done.catch((error: unknown) => {
      this.logger.error("EXEC_CRASH", "EXECUTION ENDED WITH AN UNEXPECTED ERROR", {
        proposalId: id,
        error: errorMessage(error),
      });
    });
    return { proposal, execution };
  }

  /** Cancels a pending proposal, or aborts its execution if nothing was broadcast yet. */
  public cancel(id: string): TradeProposal {
    const proposal = this.gate.get(id);
    if (!proposal) {
      throw new NotFoundError("Proposal", id);
    }
    if (proposal.status === "PROPOSED") {
      return this.gate.cancel(id);
    }
    if (proposal.status === "CONFIRMED" && this.executor.abort(id)) {
      this.logger.warn("EXEC_ABORT", "EXECUTION ABORT REQUESTED", { proposalId: id });
      return proposal;
    }
    throw new InvalidStateError(`Proposal ${id} can no longer be cancelled`, { id, status: proposal.status });
  }

  public getProposal(id: string): TradeProposal {
    const proposal = this.gate.get(id);
    if (!proposal) {
      throw new NotFoundError("Proposal", id);
    }
    return proposal;
  }

  public listPendingProposals(): TradeProposal[] {
    return this.gate.listPending();
  }

  public getExecution(id: string): TradeExecution {
    const execution = this.executor.get(id) ?? this.executor.getByProposal(id);
    if (!execution) {
      throw new NotFoundError("Execution", id);
    }
    return execution;
  }

  /** Waits while the mirror channel is full. */
  public async submitSignal(signal: MirrorSignal): Promise<void> {
    try {
      await this.channel.send(signal);
    } catch (error) {
      if (error instanceof ChannelClosedError) {
        throw new InvalidStateError("Engine is stopped; mirror signals are no longer accepted");
      }
      throw error;
    }
  }

  public startMirror(): void {
    if (this.mirrorLoop) {
      return;
    }
    this.logger.info("MIRROR_START", "MIRROR CONSUMER STARTED", {
      trackedWallets: this.mirrorPolicy.trackedWallets.length,
      sellEnabled: this.mirrorPolicy.sellEnabled,
      buyEnabled: this.mirrorPolicy.buyEnabled,
    });
    this.mirrorLoop = this.mirror.run(this.channel, () => this.mirrorPolicy).catch((error: unknown) => {
      this.logger.error("MIRROR_LOOP_FAIL", "MIRROR CONSUMER STOPPED", { error: errorMessage(error) });
    });
  }

  public getMirrorPolicy(): MirrorPolicy {
    return { ...this.mirrorPolicy };
  }

  public updateMirrorPolicy(patch: Partial<MirrorPolicy>): MirrorPolicy {
    this.mirrorPolicy = { ...this.mirrorPolicy, ...patch };
    this.logger.info("MIRROR_POLICY", "MIRROR POLICY UPDATED", { fields: Object.keys(patch) });
    this.onMirrorPolicyChange?.(this.getMirrorPolicy());
    return this.getMirrorPolicy();
  }

  public circuitState(): ReturnType<CircuitBreaker["state"]> {
    return this.breaker.state();
  }

  /** Stops accepting signals, drains the mirror queue and waits for running executions. */
  public async stop(): Promise<void> {
    this.channel.close();
    if (this.mirrorLoop) {
      await this.mirrorLoop;
    }
    await this.executor.drain();
    this.gate.dispose();
    this.logger.info("ENGINE_STOP", "ENGINE STOPPED");
  }
}
