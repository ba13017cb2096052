/**
 * Request Rate Limiter (Token Bucket Algorithm)
 *
 * One instance is shared by every postal-code fetcher in a run, so the
 * aggregate request rate stays bounded no matter how many fetchers hold
 * permits. Waiters are served strictly in arrival order.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({ requestsPerSecond: 6, burst: 6 });
 *
 * await limiter.acquire();
 * await transport.get(url, { timeoutMs: 20_000 });
 * ```
 */

import type { RateLimiterConfig, RateLimiterStats } from './types.js';
import { TokenBucket } from './token-bucket.js';
import { sleep } from '../core/http-transport.js';

export class RequestRateLimiter {
  private readonly bucket: TokenBucket;
  private tail: Promise<void> = Promise.resolve();
  private granted = 0;
  private waiting = 0;
  private totalWaitMs = 0;

  constructor(config: RateLimiterConfig, now?: () => number) {
    this.bucket = new TokenBucket({
      maxTokens: config.burst,
      refillRate: config.requestsPerSecond,
      now,
    });
  }

  /**
   * Resolve once a token has been taken for the caller
   */
  acquire(): Promise<void> {
    this.waiting++;
    const turn = this.tail.then(() => this.takeToken());
    this.tail = turn;
    return turn;
  }

  private async takeToken(): Promise<void> {
    const startedAt = Date.now();

    while (!this.bucket.consume(1)) {
      await sleep(Math.max(1, this.bucket.msUntilRefill(1)));
    }

    this.waiting--;
    this.granted++;
    this.totalWaitMs += Date.now() - startedAt;
  }

  getStats(): RateLimiterStats {
    return {
      granted: this.granted,
      waiting: this.waiting,
      totalWaitMs: this.totalWaitMs,
      currentTokens: this.bucket.getRemaining(),
    };
  }
}

/**
 * Create rate limiter with geo-harvest defaults
 */
export function createRateLimiter(
  overrides?: Partial<RateLimiterConfig>
): RequestRateLimiter {
  const config: RateLimiterConfig = {
    requestsPerSecond: 6,
    burst: 6,
    ...overrides,
  };

  return new RequestRateLimiter(config);
}
