/**
 * Token bucket rate limiter.
 *
 * One instance is shared by every regional worker of a service. Callers are
 * served in arrival order: each acquire is chained behind the previous one,
 * so two workers can never spend the same tokens.
 */

import { sleep as defaultSleep, type Sleep } from '@shared/utils/sleep';

export interface RateLimiterOptions {
  /**
   * Tokens added per second.
   */
  rate: number;

  /**
   * Bucket capacity. Defaults to `ceil(rate)`.
   */
  burst?: number;

  /**
   * Monotonic clock in milliseconds.
   */
  now?: () => number;

  sleep?: Sleep;
}

export class RateLimiter {
  readonly rate: number;
  readonly burst: number;

  private available: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.rate) || options.rate <= 0) {
      throw new RangeError(`Rate must be a positive number, got ${options.rate}`);
    }

    const burst = options.burst ?? Math.ceil(options.rate);
    if (!Number.isFinite(burst) || burst <= 0) {
      throw new RangeError(`Burst must be a positive number, got ${burst}`);
    }

    this.rate = options.rate;
    this.burst = burst;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
    this.available = burst;
    this.lastRefill = this.now();
  }

  /**
   * Tokens currently in the bucket, as of the last acquire.
   */
  get tokens(): number {
    return this.available;
  }

  /**
   * Wait until `tokens` are available and debit them.
   *
   * @param tokens - Number of tokens to take
   * @param signal - Aborts the wait
   * @returns Milliseconds spent waiting
   */
  acquire(tokens: number = 1, signal?: AbortSignal): Promise<number> {
    if (!Number.isSafeInteger(tokens) || tokens < 0) {
      return Promise.reject(
        new RangeError(`Token count must be a non-negative integer, got ${tokens}`)
      );
    }

    const result = this.queue.then(() => this.take(tokens, signal));
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private refill(): void {
    const current = this.now();
    const elapsedSeconds = Math.max(0, current - this.lastRefill) / 1000;
    this.available = Math.min(this.burst, this.available + elapsedSeconds * this.rate);
    this.lastRefill = current;
  }

  private async take(tokens: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    this.refill();

    if (this.available >= tokens) {
      this.available -= tokens;
      return 0;
    }

    const waitMs = ((tokens - this.available) / this.rate) * 1000;
    await this.sleep(waitMs, signal);

    // The waited interval produced exactly the missing tokens.
    this.available = 0;
    this.lastRefill = this.now();
    return waitMs;
  }
}
