import { isRetryable, RateLimitedError } from "./errors.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TimeoutElapsedError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutElapsedError";
    this.timeoutMs = timeoutMs;
  }
}

export function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label = "operation"): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutElapsedError(label, timeoutMs)), timeoutMs);
    operation.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

/** Delay before retry number `attempt` (1-based): base, 2×base, 4×base, ... */
export function backoffDelayMs(attempt: number, baseMs: number, error?: unknown): number {
  const exponential = baseMs * 2 ** Math.max(0, attempt - 1);
  if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
    return Math.max(exponential, error.retryAfterMs);
  }
  return exponential;
}

export interface BackoffOptions {
  maxAttempts: number;
  baseBackoffMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export async function withBackoff<T>(operation: (attempt: number) => Promise<T>, options: BackoffOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const wait = options.sleep ?? sleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        break;
      }
      const delayMs = backoffDelayMs(attempt, options.baseBackoffMs, error);
      options.onRetry?.({ attempt, maxAttempts: options.maxAttempts, delayMs, error });
      await wait(delayMs);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}

/** Retry-After header in milliseconds; accepts delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now = Date.now()): number | null {
  if (!header) {
    return null;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}
