/**
 * Token Bucket
 *
 * ALGORITHM:
 * - Bucket holds tokens (up to capacity)
 * - Tokens refill continuously at a constant rate
 * - Each request consumes N tokens
 * - Burst = bucket capacity
 */

import type { TokenBucketConfig } from './types.js';

export class TokenBucket {
  protected tokens: number;
  protected lastRefill: number;
  protected readonly maxTokens: number;
  protected readonly refillRate: number; // Tokens per second
  private readonly now: () => number;

  constructor(config: TokenBucketConfig) {
    if (config.maxTokens < 1) {
      throw new RangeError(`Token bucket capacity must be >= 1, got ${config.maxTokens}`);
    }
    if (!(config.refillRate > 0)) {
      throw new RangeError(`Token bucket refill rate must be > 0, got ${config.refillRate}`);
    }

    this.maxTokens = config.maxTokens;
    this.tokens = config.maxTokens; // Start with full bucket
    this.refillRate = config.refillRate;
    this.now = config.now ?? Date.now;
    this.lastRefill = this.now();
  }

  /**
   * Refill tokens based on elapsed time
   */
  refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefill;

    const tokensToAdd = (elapsed / 1000) * this.refillRate;

    this.tokens = Math.min(this.maxTokens, this.tokens + tokensToAdd);
    this.lastRefill = now;
  }

  /**
   * Consume tokens if available
   *
   * @returns true if tokens consumed, false if insufficient
   */
  consume(cost = 1): boolean {
    this.refill();

    if (this.tokens >= cost) {
      this.tokens -= cost;
      return true;
    }

    return false;
  }

  /**
   * Get remaining whole tokens
   */
  getRemaining(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  /**
   * Milliseconds until the bucket holds `targetTokens`
   */
  msUntilRefill(targetTokens = 1): number {
    this.refill();

    const tokensNeeded = Math.max(0, targetTokens - this.tokens);
    if (tokensNeeded === 0) return 0;

    return Math.ceil((tokensNeeded / this.refillRate) * 1000);
  }
}
