/**
 * Fixed-window request limiter keyed by client address.
 */

export interface RateLimitOptions {
  /** Requests allowed per client and window; 0 disables limiting. */
  maxRequests: number;
  windowMs: number;
}

export interface RateLimitVerdict {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms when the client's window resets. */
  resetAt: number;
  retryAfterSeconds: number;
}

interface Window {
  count: number;
  resetAt: number;
}

export class RateLimiter {
  private readonly windows = new Map<string, Window>();
  private readonly options: RateLimitOptions;
  private readonly now: () => number;
  private nextPruneAt: number;

  constructor(options: RateLimitOptions, now: () => number = Date.now) {
    this.options = options;
    this.now = now;
    this.nextPruneAt = now() + options.windowMs;
  }

  get enabled(): boolean {
    return this.options.maxRequests > 0;
  }

  /** Number of clients with an open window. */
  get size(): number {
    return this.windows.size;
  }

  /** Count one request for `key` and report whether it may proceed. */
  consume(key: string): RateLimitVerdict {
    const now = this.now();
    const { maxRequests, windowMs } = this.options;
    if (now >= this.nextPruneAt) this.prune(now);

    let window = this.windows.get(key);
    if (!window || window.resetAt <= now) {
      window = { count: 0, resetAt: now + windowMs };
      this.windows.set(key, window);
    }
    const allowed = !this.enabled || window.count < maxRequests;
    if (allowed) window.count++;
    return {
      allowed,
      limit: maxRequests,
      remaining: Math.max(0, maxRequests - window.count),
      resetAt: window.resetAt,
      retryAfterSeconds: allowed ? 0 : Math.max(1, Math.ceil((window.resetAt - now) / 1000)),
    };
  }

  private prune(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) this.windows.delete(key);
    }
    this.nextPruneAt = now + this.options.windowMs;
  }
}
