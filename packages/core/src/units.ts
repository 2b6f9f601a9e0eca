export function uiToAtomic(amountUi: number, decimals: number): bigint {
  if (!Number.isFinite(amountUi) || amountUi <= 0) {
    return 0n;
  }
  // Shortest round-trip form keeps 0.05 as "0.05"; exponent forms fall back to fixed notation.
  const text = String(amountUi);
  const plain = text.includes("e") ? amountUi.toFixed(Math.min(decimals, 20)) : text;
  const [whole = "0", fraction = ""] = plain.split(".");
  const padded = fraction.padEnd(decimals, "0").slice(0, decimals);
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(padded === "" ? "0" : padded);
}

export function atomicToUi(amountRaw: bigint, decimals: number): number {
  const base = 10n ** BigInt(decimals);
  const whole = amountRaw / base;
  const fraction = amountRaw % base;
  return Number(whole) + Number(fraction) / Number(base);
}

/** Portion of `amount` in basis points, rounded down. */
export function applyBps(amount: bigint, bps: number): bigint {
  return (amount * BigInt(Math.round(bps))) / 10_000n;
}

/** Loss between expected and actual as a percentage, null when nothing was expected. */
export function shortfallPct(expected: bigint, actual: bigint): number | null {
  if (expected <= 0n) {
    return null;
  }
  if (actual >= expected) {
    return 0;
  }
  const lossBps = ((expected - actual) * 1_000_000n) / expected;
  return Number(lossBps) / 10_000;
}
