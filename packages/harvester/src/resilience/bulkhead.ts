/**
 * Bulkhead Isolation Pattern (permit pool)
 *
 * Limits concurrent executions and queues every overflow caller in FIFO order.
 * A finishing execution hands its permit directly to the oldest waiter, so the
 * active count can never exceed `maxConcurrent` even for an instant.
 *
 * BASED ON:
 * - Michael Nygard's "Release It!" bulkhead pattern
 * - Netflix Hystrix semaphore isolation
 */

import type { BulkheadConfig, BulkheadStats } from './types.js';

/**
 * @example
 * ```typescript
 * const bulkhead = createBulkhead('postal-fetch', { maxConcurrent: 10 });
 *
 * const outcome = await bulkhead.execute(() => fetcher.fetch('018956'));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private peakActiveCount = 0;
  private readonly queue: Array<() => void> = [];
  private completedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: BulkheadConfig) {
    if (!Number.isInteger(config.maxConcurrent) || config.maxConcurrent < 1) {
      throw new RangeError(
        `Bulkhead '${config.name}' needs maxConcurrent >= 1, got ${config.maxConcurrent}`
      );
    }
    this.config = config;
  }

  /**
   * Execute function while holding a permit
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      this.activeCount++;
    } else {
      // Unbounded wait queue; resolved by release() with the permit already transferred
      await new Promise<void>((resolve) => {
        this.queue.push(resolve);
      });
    }

    this.peakActiveCount = Math.max(this.peakActiveCount, this.activeCount);
    const startTime = Date.now();

    try {
      return await fn();
    } finally {
      this.completedCount++;
      this.totalExecutionMs += Date.now() - startTime;
      this.release();
    }
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
      return;
    }
    this.activeCount--;
  }

  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      peakActiveCount: this.peakActiveCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
      avgExecutionMs:
        this.completedCount > 0 ? this.totalExecutionMs / this.completedCount : 0,
    };
  }
}

/**
 * Create bulkhead with geo-harvest defaults
 */
export function createBulkhead(
  name: string,
  overrides?: Partial<Omit<BulkheadConfig, 'name'>>
): Bulkhead {
  const config: BulkheadConfig = {
    name,
    maxConcurrent: 10,
    ...overrides,
  };

  return new Bulkhead(config);
}
