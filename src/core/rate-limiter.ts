import { z } from 'zod';

export const RateLimiterConfigSchema = z.object({
  maxConcurrent: z.number().min(1).default(20),
  minTime: z.number().min(0).default(0),
  reservoir: z.number().min(1).default(120),
  reservoirRefreshAmount: z.number().min(1).default(20),
  reservoirRefreshInterval: z.number().min(1000).default(10000),
});

export type RateLimiterConfig = z.infer<typeof RateLimiterConfigSchema>;

export type AcquireResult = { ok: true } | { ok: false; reason: 'concurrency' | 'spacing' | 'reservoir'; retryAfterMs: number };

/**
 * Token bucket guarding the HTTP surface. Concurrency is released by the
 * caller once the response finishes.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private concurrentRequests = 0;
  private lastRequestTime = 0;

  constructor(
    private readonly config: RateLimiterConfig,
    private readonly now: () => number = Date.now,
  ) {
    this.tokens = config.reservoir;
    this.lastRefill = now();
  }

  acquire(): AcquireResult {
    if (this.concurrentRequests >= this.config.maxConcurrent) {
      return { ok: false, reason: 'concurrency', retryAfterMs: 1000 };
    }

    const now = this.now();
    const sinceLast = now - this.lastRequestTime;
    if (this.config.minTime > 0 && sinceLast < this.config.minTime) {
      return { ok: false, reason: 'spacing', retryAfterMs: this.config.minTime - sinceLast };
    }

    this.refillTokens(now);
    if (this.tokens < 1) {
      const untilRefill = this.config.reservoirRefreshInterval - (now - this.lastRefill);
      return { ok: false, reason: 'reservoir', retryAfterMs: Math.max(0, untilRefill) };
    }

    this.tokens--;
    this.concurrentRequests++;
    this.lastRequestTime = now;
    return { ok: true };
  }

  release(): void {
    this.concurrentRequests = Math.max(0, this.concurrentRequests - 1);
  }

  private refillTokens(now: number): void {
    const intervals = Math.floor((now - this.lastRefill) / this.config.reservoirRefreshInterval);
    if (intervals > 0) {
      this.tokens = Math.min(this.config.reservoir, this.tokens + intervals * this.config.reservoirRefreshAmount);
      this.lastRefill += intervals * this.config.reservoirRefreshInterval;
    }
  }

  getMetrics() {
    return {
      tokens: this.tokens,
      concurrentRequests: this.concurrentRequests,
      lastRefill: this.lastRefill,
      lastRequestTime: this.lastRequestTime,
    };
  }
}
