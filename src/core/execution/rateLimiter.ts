import { delay, type Sleep } from "./workerPool.js";

export interface RateLimit {
  requestsPerMinute: number;
  /** Calls allowed back to back before spacing kicks in. */
  burst: number;
}

export const DEFAULT_RATE_LIMIT: RateLimit = { requestsPerMinute: 6, burst: 1 };

/**
 * Spaces calls to one provider at `60s / requestsPerMinute`, letting up to
 * `burst` through without waiting. Slots are reserved synchronously, so
 * concurrent callers queue in call order.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly burst: number;
  /** When the bucket would next be empty if nobody waited. */
  private earliestFree = 0;

  constructor(
    limit: RateLimit,
    private readonly sleep: Sleep = delay,
    private readonly now: () => number = Date.now,
  ) {
    this.intervalMs = 60_000 / limit.requestsPerMinute;
    this.burst = Math.max(1, limit.burst);
  }

  /** Wait for a slot. Rejects with AbortedError when `signal` aborts first. */
  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.now();
    const slot = this.earliestFree - (this.burst - 1) * this.intervalMs;
    const wait = Math.max(0, slot - now);
    this.earliestFree = Math.max(this.earliestFree, now) + this.intervalMs;
    if (wait > 0) {
      await this.sleep(wait, signal);
    }
  }
}

/** One limiter per provider name, created on first use. */
export class ProviderRateLimits {
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(
    private readonly limit: RateLimit,
    private readonly sleep: Sleep = delay,
    private readonly now: () => number = Date.now,
  ) {}

  for(provider: string): RateLimiter {
    let limiter = this.limiters.get(provider);
    if (!limiter) {
      limiter = new RateLimiter(this.limit, this.sleep, this.now);
      this.limiters.set(provider, limiter);
    }
    return limiter;
  }
}
