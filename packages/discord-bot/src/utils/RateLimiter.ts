/**
 * @parley-module: RateLimiter
 * @parley-risk: moderate
 * @parley-scope: core
 *
 * @description
 * Sliding-window request limiter keyed by (botId, userId). A denied check is
 * not recorded, so retrying while limited never extends the wait.
 *
 * @impact
 * Risk: A wrong window lets users flood the LLM backend or locks them out for too long.
 */

export interface RateLimiterOptions {
  limit: number; // Max requests per window
  windowMs: number;
  /** Injectable clock; defaults to Date.now. */
  now?: () => number;
}

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterMs: number };

/**
 * Handles per-identity rate limiting for bot interactions.
 * Each bot instance gets its own windows, so two bots sharing a process never
 * spend each other's quota.
 * @class RateLimiter
 */
export class RateLimiter {
  private readonly windows: Map<string, number[]> = new Map();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new Error(`Rate limit must be a positive integer, received ${options.limit}`);
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new Error(`Rate window must be positive, received ${options.windowMs}`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  private getKey(botId: string, userId: string): string {
    return `${botId}:${userId}`;
  }

  /**
   * Prunes, evaluates and records in one synchronous step, so concurrent
   * tasks for the same identity cannot both take the last slot.
   */
  public check(botId: string, userId: string): RateLimitDecision {
    const now = this.now();
    const key = this.getKey(botId, userId);
    const timestamps = (this.windows.get(key) ?? []).filter((time) => time > now - this.windowMs);

    if (timestamps.length >= this.limit) {
      this.windows.set(key, timestamps);
      const oldest = timestamps[0];
      return { allowed: false, retryAfterMs: Math.max(1, this.windowMs - (now - oldest)) };
    }

    timestamps.push(now);
    this.windows.set(key, timestamps);
    return { allowed: true };
  }

  /**
   * Drops identities whose windows have fully expired.
   * Called periodically by the bot bootstrap.
   */
  public cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, timestamps] of this.windows.entries()) {
      const remaining = timestamps.filter((time) => time > now - this.windowMs);
      if (remaining.length === 0) {
        this.windows.delete(key);
        removed++;
      } else {
        this.windows.set(key, remaining);
      }
    }
    return removed;
  }

  public get trackedIdentities(): number {
    return this.windows.size;
  }
}
