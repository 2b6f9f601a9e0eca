/**
 * Round-robin pool of third-party API keys. A key that hit a rate limit is
 * parked until its cooldown elapses; state only changes through `acquire`
 * and `markCooldown`.
 */
export class ApiKeyPool {
  private readonly keys: readonly string[];
  private readonly cooldownMs: number;
  private readonly cooldownUntil = new Map<string, number>();
  private cursor = 0;

  public constructor(keys: readonly string[], cooldownSeconds: number) {
    this.keys = [...new Set(keys.filter((key) => key.trim().length > 0))];
    this.cooldownMs = cooldownSeconds * 1000;
  }

  public get size(): number {
    return this.keys.length;
  }

  /** Next usable key, or null when every key is cooling down (or the pool is empty). */
  public acquire(now = Date.now()): string | null {
    for (let offset = 0; offset < this.keys.length; offset += 1) {
      const index = (this.cursor + offset) % this.keys.length;
      const key = this.keys[index];
      if (key === undefined) {
        continue;
      }
      const until = this.cooldownUntil.get(key);
      if (until !== undefined && until > now) {
        continue;
      }
      this.cooldownUntil.delete(key);
      this.cursor = (index + 1) % this.keys.length;
      return key;
    }
    return null;
  }

  public markCooldown(key: string, now = Date.now(), cooldownMs = this.cooldownMs): void {
    if (!this.keys.includes(key)) {
      return;
    }
    this.cooldownUntil.set(key, now + cooldownMs);
  }

  /** Milliseconds until some key is usable again; 0 when one is available now. */
  public msUntilAvailable(now = Date.now()): number {
    if (this.keys.length === 0) {
      return 0;
    }
    let soonest = Number.POSITIVE_INFINITY;
    for (const key of this.keys) {
      const until = this.cooldownUntil.get(key) ?? 0;
      soonest = Math.min(soonest, Math.max(0, until - now));
    }
    return soonest;
  }
}
