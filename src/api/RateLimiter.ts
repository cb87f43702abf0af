import { sleep as defaultSleep, type SleepFn } from '../utils/sleep';

export interface RateLimiterOptions {
  maxTokens: number;
  refillIntervalMs: number;
  tokensPerRefill: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Token bucket with lazy refill: tokens are topped up when the bucket is
 * consulted, never by a background timer. The bucket starts full.
 *
 * Waiters are not served in arrival order. When several callers sleep on an
 * empty bucket, whichever wakes first after a refill takes the token, so a
 * newly arrived caller can win over one that has been waiting longer. That is
 * acceptable for a single-user client; anything sharing one limiter across
 * many consumers would need a FIFO queue of waiters instead.
 */
export class RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillIntervalMs: number;
  private readonly tokensPerRefill: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  constructor(options: RateLimiterOptions) {
    if (options.maxTokens < 1 || options.refillIntervalMs <= 0 || options.tokensPerRefill < 1) {
      throw new RangeError('Rate limiter needs at least one token, a positive interval and a positive refill size');
    }
    this.maxTokens = options.maxTokens;
    this.refillIntervalMs = options.refillIntervalMs;
    this.tokensPerRefill = options.tokensPerRefill;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = options.maxTokens;
    this.lastRefill = this.now();
  }

  /** 100 requests per minute, the bucket refilled in one step. */
  static forJiraCloud(): RateLimiter {
    return new RateLimiter({ maxTokens: 100, refillIntervalMs: 60_000, tokensPerRefill: 100 });
  }

  async acquire(): Promise<void> {
    for (;;) {
      const elapsed = this.refill();
      if (this.tokens > 0) {
        this.tokens--;
        return;
      }
      await this.sleep(this.refillIntervalMs - elapsed);
    }
  }

  tryAcquire(): boolean {
    this.refill();
    if (this.tokens > 0) {
      this.tokens--;
      return true;
    }
    return false;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  /** Returns the time elapsed since the (possibly advanced) last refill. */
  private refill(): number {
    const now = this.now();
    const elapsed = now - this.lastRefill;
    if (elapsed < this.refillIntervalMs) {
      return elapsed;
    }

    const refills = Math.floor(elapsed / this.refillIntervalMs);
    this.tokens = Math.min(this.maxTokens, this.tokens + refills * this.tokensPerRefill);
    this.lastRefill += refills * this.refillIntervalMs;
    return now - this.lastRefill;
  }
}
