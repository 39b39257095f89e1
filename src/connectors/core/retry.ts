import type { SleepFn } from "./types.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Retries after the first attempt; total attempts are `maxRetries + 1`. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Errors for which another attempt is made; anything else is thrown. */
  retryOn: (err: unknown) => boolean;
  /** Overrides exponential backoff, e.g. with a server-dictated wait. */
  delayFor?: (err: unknown, attempt: number) => number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: SleepFn;
  random?: () => number;
}

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random,
): number {
  const delay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return delay + delay * 0.1 * random();
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const maxRetries = opts.maxRetries ?? 3;
  const baseDelay = opts.baseDelayMs ?? 1000;
  const maxDelay = opts.maxDelayMs ?? 30_000;
  const wait = opts.sleep ?? sleep;

  let lastError: unknown;
  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === maxRetries || !opts.retryOn(err)) {
        throw err;
      }
      const delay = opts.delayFor
        ? opts.delayFor(err, attempt)
        : backoffDelay(attempt, baseDelay, maxDelay, opts.random);
      opts.onRetry?.(err, attempt + 1, delay);
      await wait(delay);
    }
  }
  throw lastError;
}
