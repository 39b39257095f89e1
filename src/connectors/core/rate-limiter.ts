import { sleep as defaultSleep } from "./retry.js";
import type { RateLimiter, SleepFn } from "./types.js";

/** Remaining-call count below which calls wait for the quota reset. */
const LOW_REMAINING_THRESHOLD = 5;

/**
 * Milliseconds until the quota resets, from an `X-Rate-Limit-Reset` value:
 * epoch milliseconds, epoch seconds, or (below 1e9) seconds to wait.
 */
export function resetWaitMs(
  raw: string | undefined | null,
  nowMs: number,
): number | null {
  if (raw === undefined || raw === null || raw.trim() === "") return null;
  const value = Number.parseFloat(raw);
  if (Number.isNaN(value)) return null;
  const whole = Math.floor(value);
  if (whole >= 1e12) return Math.max(0, whole - nowMs);
  if (whole >= 1e9) return Math.max(0, whole * 1000 - nowMs);
  return Math.max(0, whole * 1000);
}

/**
 * Header-driven limiter shared by every caller of one client: waits out a
 * 429 backoff, and waits for the quota reset once few calls remain.
 */
export class HeaderRateLimiter implements RateLimiter {
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  private backoffUntil = 0;

  // Updated from response headers
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(deps: { sleep?: SleepFn; now?: () => number } = {}) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async acquire(): Promise<void> {
    // Wait for backoff (429 response)
    if (this.backoffUntil > this.now()) {
      await this.sleep(this.backoffUntil - this.now());
    }

    if (
      this.remainingRequests !== null &&
      this.remainingRequests < LOW_REMAINING_THRESHOLD &&
      this.resetAt !== null &&
      this.resetAt > this.now()
    ) {
      await this.sleep(this.resetAt - this.now() + 100);
      this.remainingRequests = null;
    }
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, this.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining = headers["x-rate-limit-remaining"];
    if (remaining !== undefined) {
      const parsed = Number.parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    const reset = headers["x-rate-limit-reset"];
    if (reset !== undefined) {
      const waitMs = resetWaitMs(reset, this.now());
      this.resetAt = waitMs === null ? null : this.now() + waitMs;
    }
  }
}

export function createRateLimiter(
  deps: { sleep?: SleepFn; now?: () => number } = {},
): RateLimiter {
  return new HeaderRateLimiter(deps);
}
