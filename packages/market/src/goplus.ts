import { z } from "zod";
import {
  NotFoundError,
  QuoteUnavailableError,
  RateLimitedError,
  TransientNetworkError,
  chainFamily,
  errorMessage,
  getChainConfig,
  parseRetryAfter,
  type ApiKeyPool,
  type Logger,
  type SecurityScan,
  type SecurityScanProvider,
  type TokenIdentity,
} from "@tradeguard/core";

// GoPlus answers 200 with this code when the caller is over quota.
const GOPLUS_RATE_LIMIT_CODE = 4029;

const flagValue = z.union([z.string(), z.number()]).nullable().optional();
const statusObject = z.object({ status: flagValue }).passthrough().nullable().optional();

const holderSchema = z
  .object({
    address: z.string().optional(),
    percent: z.union([z.string(), z.number()]).optional(),
    is_locked: flagValue,
  })
  .passthrough();

const evmEntrySchema = z
  .object({
    is_proxy: flagValue,
    is_open_source: flagValue,
    is_honeypot: flagValue,
    cannot_sell_all: flagValue,
    trust_list: flagValue,
    holders: z.array(holderSchema).optional(),
  })
  .catchall(z.unknown());

const solanaEntrySchema = z
  .object({
    mintable: statusObject,
    freezable: statusObject,
    closable: statusObject,
    balance_mutable_authority: statusObject,
    non_transferable: flagValue,
    transfer_hook: z.array(z.unknown()).optional(),
    trusted_token: flagValue,
    holders: z.array(holderSchema).optional(),
  })
  .catchall(z.unknown());

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  result: z.record(z.string(), z.unknown()).nullable().optional(),
});

type EvmEntry = z.infer<typeof evmEntrySchema>;
type SolanaEntry = z.infer<typeof solanaEntrySchema>;

/** GoPlus boolean-ish field name → function label reported in the scan. */
const EVM_FUNCTION_FLAGS: ReadonlyArray<[string, string]> = [
  ["is_mintable", "mint"],
  ["owner_change_balance", "ownerChangeBalance"],
  ["hidden_owner", "hiddenOwner"],
  ["can_take_back_ownership", "takeBackOwnership"],
  ["selfdestruct", "selfdestruct"],
  ["transfer_pausable", "pause"],
  ["is_blacklisted", "blacklist"],
  ["slippage_modifiable", "setTax"],
  ["personal_slippage_modifiable", "setPersonalTax"],
  ["trading_cooldown", "tradingCooldown"],
  ["external_call", "externalCall"],
];

const SOLANA_FUNCTION_FLAGS: ReadonlyArray<[keyof SolanaEntry, string]> = [
  ["mintable", "mint"],
  ["freezable", "freeze"],
  ["closable", "close"],
  ["balance_mutable_authority", "balanceMutable"],
];

function isSet(value: unknown): boolean {
  if (value === "1" || value === 1) {
    return true;
  }
  if (typeof value === "object" && value !== null && "status" in value) {
    return isSet(value.status);
  }
  return false;
}

function topHolderShare(holders: z.infer<typeof holderSchema>[] | undefined): number {
  let share = 0;
  for (const holder of (holders ?? []).slice(0, 10)) {
    if (isSet(holder.is_locked)) {
      continue;
    }
    const percent = Number(holder.percent ?? 0);
    if (Number.isFinite(percent)) {
      share += percent;
    }
  }
  return Math.min(1, Math.max(0, share));
}

function trustFrom(base: { trusted: boolean; honeypot: boolean; closedSource: boolean; sellCapped: boolean }, flagged: number): number {
  if (base.trusted) {
    return 100;
  }
  let trust = 100 - flagged * 10;
  if (base.honeypot) {
    trust -= 60;
  }
  if (base.sellCapped) {
    trust -= 30;
  }
  if (base.closedSource) {
    trust -= 20;
  }
  return Math.min(100, Math.max(0, trust));
}

export function mapEvmEntry(entry: EvmEntry): SecurityScan {
  const flaggedFunctions = EVM_FUNCTION_FLAGS.filter(([field]) => isSet(entry[field])).map(([, label]) => label);
  return {
    ownershipConcentration: topHolderShare(entry.holders),
    isProxy: isSet(entry.is_proxy),
    flaggedFunctions,
    trustScore: trustFrom(
      {
        trusted: isSet(entry.trust_list),
        honeypot: isSet(entry.is_honeypot),
        closedSource: entry.is_open_source === "0" || entry.is_open_source === 0,
        sellCapped: isSet(entry.cannot_sell_all),
      },
      flaggedFunctions.length,
    ),
  };
}

export function mapSolanaEntry(entry: SolanaEntry): SecurityScan {
  const flaggedFunctions = SOLANA_FUNCTION_FLAGS.filter(([field]) => isSet(entry[field])).map(([, label]) => label);
  if (isSet(entry.non_transferable)) {
    flaggedFunctions.push("nonTransferable");
  }
  if ((entry.transfer_hook ?? []).length > 0) {
    flaggedFunctions.push("transferHook");
  }
  return {
    ownershipConcentration: topHolderShare(entry.holders),
    isProxy: false,
    flaggedFunctions,
    trustScore: trustFrom(
      { trusted: isSet(entry.trusted_token), honeypot: false, closedSource: false, sellCapped: false },
      flaggedFunctions.length,
    ),
  };
}

export interface GoPlusOptions {
  baseUrl: string;
  /** Access tokens; the public tier is used when the pool is empty. */
  keys: ApiKeyPool;
  defaultCooldownMs?: number;
  logger?: Logger;
  now?: () => number;
}

export class GoPlusSecurityScanner implements SecurityScanProvider {
  private readonly baseUrl: string;
  private readonly options: GoPlusOptions;

  public constructor(options: GoPlusOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.options = options;
  }

  public async scan(token: TokenIdentity): Promise<SecurityScan> {
    const solana = chainFamily(token.chain) === "solana";
    const url = new URL(
      solana
        ? `${this.baseUrl}/api/v1/solana/token_security`
        : `${this.baseUrl}/api/v1/token_security/${getChainConfig(token.chain).goplusChainId}`,
    );
    url.searchParams.set("contract_addresses", token.address);

    const key = this.options.keys.size > 0 ? this.options.keys.acquire(this.now()) : null;
    if (this.options.keys.size > 0 && key === null) {
      throw new RateLimitedError("goplus", this.options.keys.msUntilAvailable(this.now()));
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    if (key) {
      headers.Authorization = key;
    }

    let response: Response;
    try {
      response = await fetch(url, { headers });
    } catch (error) {
      throw new TransientNetworkError(`GoPlus request failed: ${errorMessage(error)}`);
    }

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      this.cool(key, retryAfterMs);
      throw new RateLimitedError("goplus", retryAfterMs);
    }
    if (!response.ok) {
      throw new QuoteUnavailableError(`GoPlus scan failed (${response.status})`);
    }

    const envelope = envelopeSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new QuoteUnavailableError("GoPlus response malformed");
    }
    if (envelope.data.code === GOPLUS_RATE_LIMIT_CODE) {
      this.cool(key, null);
      throw new RateLimitedError("goplus");
    }

    const result = envelope.data.result ?? {};
    const raw = solana ? result[token.address] : result[token.address.toLowerCase()];
    if (envelope.data.code !== 1 || raw === undefined) {
      throw new NotFoundError("Security scan for token", `${token.chain}:${token.address}`);
    }

    const scan = solana ? this.parseSolana(raw) : this.parseEvm(raw);
    this.options.logger?.debug("SECURITY_SCAN", "SECURITY SCAN COMPLETE", {
      chain: token.chain,
      token: token.address,
      trustScore: scan.trustScore,
      flagged: scan.flaggedFunctions.length,
    });
    return scan;
  }

  private parseEvm(raw: unknown): SecurityScan {
    const entry = evmEntrySchema.safeParse(raw);
    if (!entry.success) {
      throw new QuoteUnavailableError("GoPlus token entry malformed", { issues: entry.error.issues.length });
    }
    return mapEvmEntry(entry.data);
  }

  private parseSolana(raw: unknown): SecurityScan {
    const entry = solanaEntrySchema.safeParse(raw);
    if (!entry.success) {
      throw new QuoteUnavailableError("GoPlus token entry malformed", { issues: entry.error.issues.length });
    }
    return mapSolanaEntry(entry.data);
  }

  private cool(key: string | null, retryAfterMs: number | null): void {
    if (key) {
      this.options.keys.markCooldown(key, this.now(), retryAfterMs ?? this.options.defaultCooldownMs);
    }
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }
}
