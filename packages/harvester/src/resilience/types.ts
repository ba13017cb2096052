/**
 * Resilience Pattern Types
 *
 * Admission control (bulkhead) and request pacing (token bucket) used by the
 * harvest pipeline. The two are independent knobs: the bulkhead caps how many
 * fetchers run at once, the rate limiter caps how many requests leave per second.
 */

/**
 * Token bucket configuration
 */
export interface TokenBucketConfig {
  readonly maxTokens: number; // Bucket capacity (burst)
  readonly refillRate: number; // Tokens per second
  readonly now?: () => number; // Clock, defaults to Date.now
}

/**
 * Shared request rate limiter configuration
 */
export interface RateLimiterConfig {
  readonly requestsPerSecond: number;
  readonly burst: number;
}

/**
 * Rate limiter statistics
 */
export interface RateLimiterStats {
  readonly granted: number;
  readonly waiting: number;
  readonly totalWaitMs: number;
  readonly currentTokens: number;
}

/**
 * Bulkhead configuration (permit pool)
 */
export interface BulkheadConfig {
  readonly name: string;
  readonly maxConcurrent: number; // Permits
}

/**
 * Bulkhead statistics
 */
export interface BulkheadStats {
  readonly name: string;
  readonly activeCount: number;
  readonly peakActiveCount: number;
  readonly queuedCount: number;
  readonly completedCount: number;
  readonly avgExecutionMs: number;
}
