import { randomUUID } from "node:crypto";
import {
  CHAINS,
  errorMessage,
  Logger,
  SimulationUnavailableError,
  uiToAtomic,
  type ChainAdapter,
  type EngineConfig,
  type MeasuredTaxes,
  type RawScenarioOutcome,
  type RestrictionFlag,
  type RevertTag,
  type Scenario,
  type ScenarioOutcome,
  type ScenarioPlan,
  type ScenarioRun,
  type SimulationContext,
  type ScenarioReport,
  type SimulationResult,
  type TokenIdentity,
} from "@tradeguard/core";
import type { AdapterRegistry } from "./registry.js";
import { classifyRevert, scanBytecode } from "./signatures.js";

export interface SimulationPolicy {
  /** Native amount spent by the simulated buy, in whole units. */
  buyAmountNative: number;
  timeoutMs: number;
  maxBuyTaxPct: number;
  maxSellTaxPct: number;
  maxTransferTaxPct: number;
}

export function simulationPolicyFromConfig(config: EngineConfig): SimulationPolicy {
  return {
    buyAmountNative: config.SIM_BUY_AMOUNT_NATIVE,
    timeoutMs: config.SIM_TIMEOUT_MS,
    maxBuyTaxPct: config.MAX_BUY_TAX_PCT,
    maxSellTaxPct: config.MAX_SELL_TAX_PCT,
    maxTransferTaxPct: config.MAX_TRANSFER_TAX_PCT,
  };
}

export interface HoneypotSimulatorOptions {
  adapters: AdapterRegistry;
  policy: SimulationPolicy;
  logger?: Logger;
  now?: () => Date;
}

const SCENARIOS: readonly Scenario[] = ["BUY", "SELL", "TRANSFER"];

const blockedFlag: Record<Scenario, RestrictionFlag> = {
  BUY: "BUY_BLOCKED",
  SELL: "SELL_BLOCKED",
  TRANSFER: "TRANSFER_BLOCKED",
};

const limitFlags: Partial<Record<RevertTag, RestrictionFlag>> = {
  MAX_TX_EXCEEDED: "MAX_TX_LIMIT",
  MAX_WALLET_EXCEEDED: "MAX_WALLET_LIMIT",
  COOLDOWN_ACTIVE: "TRADING_COOLDOWN",
};

function toOutcome(raw: RawScenarioOutcome): ScenarioOutcome {
  switch (raw.status) {
    case "success":
      return { status: "SUCCESS" };
    case "timeout":
      return { status: "TIMEOUT" };
    case "reverted": {
      const { tag, detail } = classifyRevert(raw);
      return { status: "REVERTED", reason: tag, detail };
    }
  }
}

function exceeds(measured: number | null, cap: number): boolean {
  return measured !== null && measured > cap;
}

/**
 * Runs the buy / sell / transfer scenario plan through the chain adapter and
 * turns raw outcomes into tagged reports and restriction flags. Nothing is
 * broadcast: every scenario is a simulation against current chain state.
 */
export class HoneypotSimulator {
  private readonly adapters: AdapterRegistry;
  private readonly policy: SimulationPolicy;
  private readonly logger: Logger;
  private readonly now: () => Date;

  public constructor(options: HoneypotSimulatorOptions) {
    this.adapters = options.adapters;
    this.policy = options.policy;
    this.logger = options.logger ?? new Logger({ component: "simulator", level: "INFO", quiet: true });
    this.now = options.now ?? (() => new Date());
  }

  public async simulate(token: TokenIdentity): Promise<SimulationResult> {
    const adapter = this.adapters.find(token.chain);
    if (!adapter) {
      throw new SimulationUnavailableError(`No chain adapter for ${token.chain}`, { chain: token.chain });
    }

    const context = await this.probe(adapter);
    const buyAmountRaw = uiToAtomic(this.policy.buyAmountNative, CHAINS[token.chain].nativeDecimals);

    const run = await this.runScenarios(adapter, { token, buyAmountRaw, timeoutMs: this.policy.timeoutMs });

    const buyFailed = run.outcomes.BUY.status !== "success";
    const scenarios: Record<Scenario, ScenarioReport> = {
      BUY: this.report("BUY", run.outcomes.BUY, false),
      SELL: this.report("SELL", run.outcomes.SELL, buyFailed),
      TRANSFER: this.report("TRANSFER", run.outcomes.TRANSFER, buyFailed),
    };

    const flags = new Set<RestrictionFlag>(run.flags);
    for (const scenario of SCENARIOS) {
      const outcome = scenarios[scenario].outcome;
      if (outcome.status !== "REVERTED") {
        continue;
      }
      flags.add(blockedFlag[scenario]);
      const limit = limitFlags[outcome.reason];
      if (limit) {
        flags.add(limit);
      }
    }
    for (const flag of this.taxFlags(run.taxes)) {
      flags.add(flag);
    }
    for (const flag of await this.bytecodeFlags(adapter, token)) {
      flags.add(flag);
    }

    const result: SimulationResult = {
      id: randomUUID(),
      token,
      scenarios,
      flags: [...flags],
      taxes: { ...run.taxes },
      createdAt: this.now().toISOString(),
    };

    this.logger.info("SIMULATION_DONE", "HONEYPOT SIMULATION COMPLETE", {
      chain: token.chain,
      token: token.address,
      reference: context.reference,
      buy: scenarios.BUY.outcome.status,
      sell: scenarios.SELL.outcome.status,
      transfer: scenarios.TRANSFER.outcome.status,
      flags: result.flags,
    });
    return result;
  }

  private async runScenarios(adapter: ChainAdapter, plan: ScenarioPlan): Promise<ScenarioRun> {
    try {
      return await adapter.simulateScenarios(plan);
    } catch (error) {
      if (error instanceof SimulationUnavailableError) {
        throw error;
      }
      throw new SimulationUnavailableError(`Scenario simulation failed: ${errorMessage(error)}`, {
        chain: plan.token.chain,
        token: plan.token.address,
      });
    }
  }

  private async probe(adapter: ChainAdapter): Promise<SimulationContext> {
    try {
      return await adapter.getSimulationContext();
    } catch (error) {
      if (error instanceof SimulationUnavailableError) {
        throw error;
      }
      throw new SimulationUnavailableError(`Simulation context unavailable: ${errorMessage(error)}`, {
        chain: adapter.chain,
      });
    }
  }

  private report(scenario: Scenario, raw: RawScenarioOutcome, informational: boolean): ScenarioReport {
    return {
      scenario,
      outcome: toOutcome(raw),
      informational,
      gasEstimate: raw.status === "success" && raw.gasUsed !== null ? raw.gasUsed.toString() : null,
    };
  }

  private taxFlags(taxes: MeasuredTaxes): RestrictionFlag[] {
    const flags: RestrictionFlag[] = [];
    if (exceeds(taxes.buyPct, this.policy.maxBuyTaxPct)) {
      flags.push("HIGH_BUY_TAX");
    }
    if (exceeds(taxes.sellPct, this.policy.maxSellTaxPct)) {
      flags.push("HIGH_SELL_TAX");
    }
    if (exceeds(taxes.transferPct, this.policy.maxTransferTaxPct)) {
      flags.push("TRANSFER_TAX");
    }
    return flags;
  }

  /** Selector scan of the deployed code; no flags when the code cannot be read. */
  private async bytecodeFlags(adapter: ChainAdapter, token: TokenIdentity): Promise<RestrictionFlag[]> {
    let code: string | null;
    try {
      code = await adapter.getCode(token.address);
    } catch (error) {
      this.logger.warn("BYTECODE_FETCH_FAIL", "COULD NOT READ TOKEN BYTECODE", {
        chain: token.chain,
        token: token.address,
        error: errorMessage(error),
      });
      return [];
    }
    if (!code || code === "0x") {
      return [];
    }
    const found = scanBytecode(code);
    const flags: RestrictionFlag[] = [];
    if (found.blacklist) {
      flags.push("BLACKLIST_FUNCTION_PRESENT");
    }
    if (found.pause) {
      flags.push("PAUSE_FUNCTION_PRESENT");
    }
    return flags;
  }
}
