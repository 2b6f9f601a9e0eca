import { EngineError, type ChainAdapter, type ChainId } from "@tradeguard/core";

/** Adapters by chain; chains without an RPC URL are simply absent. */
export class AdapterRegistry {
  private readonly adapters = new Map<ChainId, ChainAdapter>();

  public constructor(adapters: Iterable<ChainAdapter> = []) {
    for (const adapter of adapters) {
      this.register(adapter);
    }
  }

  public register(adapter: ChainAdapter): void {
    this.adapters.set(adapter.chain, adapter);
  }

  public has(chain: ChainId): boolean {
    return this.adapters.has(chain);
  }

  public find(chain: ChainId): ChainAdapter | null {
    return this.adapters.get(chain) ?? null;
  }

  public get(chain: ChainId): ChainAdapter {
    const adapter = this.adapters.get(chain);
    if (!adapter) {
      throw new EngineError("INVALID_REQUEST", `Chain ${chain} is not configured`, { chain });
    }
    return adapter;
  }

  public chains(): ChainId[] {
    return [...this.adapters.keys()];
  }
}
