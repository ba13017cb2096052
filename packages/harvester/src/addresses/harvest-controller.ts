/**
 * Harvest Controller
 *
 * Fans out one fetcher per postal code through a permit pool and drains the
 * outcomes in completion order. A single consumer owns the progress counter,
 * so no two completions can race on it.
 *
 * FLOW:
 * 1. Every key is submitted to the bulkhead up front (FIFO admission)
 * 2. Each finished fetcher pushes its outcome onto the completion queue
 * 3. The consumer appends the outcome, bumps the counter, reports progress
 */

import type { HarvestProgress, KeyFetchOutcome, PostalKey } from '../core/types.js';
import { HarvestConfigError, toError } from '../core/errors.js';
import { createBulkhead } from '../resilience/bulkhead.js';
import { CompletionQueue } from '../resilience/completion-queue.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import type { KeyFetcher } from './postal-code-fetcher.js';

export interface HarvestControllerConfig {
  /** Maximum fetchers running at once */
  readonly concurrency: number;

  /** Log a progress line every N completions (and always on the last one) */
  readonly progressInterval: number;

  /** Prefix for progress log lines, e.g. "000001-000999" */
  readonly label?: string;
}

export interface HarvestRunResult {
  /** One outcome per key, in completion order */
  readonly outcomes: readonly KeyFetchOutcome[];
  readonly completed: number;
  readonly total: number;
  /** Highest number of fetchers that held a permit simultaneously */
  readonly peakConcurrency: number;
  readonly durationMs: number;
}

export type ProgressListener = (progress: HarvestProgress) => void;

export class HarvestController {
  private readonly config: HarvestControllerConfig;
  private readonly fetcher: KeyFetcher;
  private readonly log: LogSink;
  private readonly listeners: ProgressListener[] = [];
  private completed = 0;
  private total = 0;
  private running = false;

  constructor(
    config: HarvestControllerConfig,
    fetcher: KeyFetcher,
    log: LogSink = createLogger({ module: 'harvest-controller' })
  ) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new HarvestConfigError(`concurrency must be a positive integer, got ${config.concurrency}`);
    }
    if (!Number.isInteger(config.progressInterval) || config.progressInterval < 1) {
      throw new HarvestConfigError(
        `progressInterval must be a positive integer, got ${config.progressInterval}`
      );
    }
    this.config = config;
    this.fetcher = fetcher;
    this.log = log;
  }

  /**
   * Subscribe to progress updates
   *
   * @returns unsubscribe function
   */
  onProgress(listener: ProgressListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getProgress(): { readonly completed: number; readonly total: number } {
    return { completed: this.completed, total: this.total };
  }

  async run(keys: readonly PostalKey[]): Promise<HarvestRunResult> {
    if (this.running) {
      throw new HarvestConfigError('HarvestController is already running');
    }
    if (new Set(keys).size !== keys.length) {
      throw new HarvestConfigError('Duplicate postal codes in key set');
    }

    this.running = true;
    this.completed = 0;
    this.total = keys.length;
    const startTime = Date.now();

    try {
      const bulkhead = createBulkhead('postal-fetch', {
        maxConcurrent: this.config.concurrency,
      });
      const completions = new CompletionQueue<KeyFetchOutcome>();

      const drained = this.drain(completions);
      const dispatches = keys.map((key) =>
        bulkhead
          .execute(() => this.fetchKey(key))
          .then((outcome) => completions.push(outcome))
      );

      await Promise.all(dispatches);
      completions.close();
      const outcomes = await drained;

      return {
        outcomes,
        completed: this.completed,
        total: this.total,
        peakConcurrency: bulkhead.getStats().peakActiveCount,
        durationMs: Date.now() - startTime,
      };
    } finally {
      this.running = false;
    }
  }

  /**
   * Run the fetcher, converting a contract violation (rejection) into a partial outcome
   */
  private async fetchKey(key: PostalKey): Promise<KeyFetchOutcome> {
    try {
      return await this.fetcher.fetch(key);
    } catch (error) {
      const detail = toError(error).message;
      this.log.error('Fetcher rejected unexpectedly', { key, error: detail });
      return {
        status: 'partial',
        key,
        records: [],
        pagesFetched: 0,
        requests: 0,
        reason: 'unexpected_error',
        page: 1,
        detail,
      };
    }
  }

  private async drain(completions: CompletionQueue<KeyFetchOutcome>): Promise<KeyFetchOutcome[]> {
    const outcomes: KeyFetchOutcome[] = [];

    for await (const outcome of completions) {
      outcomes.push(outcome);
      this.completed++;

      const progress: HarvestProgress = {
        completed: this.completed,
        total: this.total,
        last: outcome,
      };
      // Snapshot: a listener may unsubscribe while being notified
      for (const listener of [...this.listeners]) {
        try {
          listener(progress);
        } catch (error) {
          this.log.error('Progress listener error', { error: toError(error).message });
        }
      }

      if (this.completed % this.config.progressInterval === 0 || this.completed === this.total) {
        this.log.info(formatProgressLine(progress, this.config.label));
      }
    }

    return outcomes;
  }
}

/**
 * "[000001-000999] Progress: 50/999 (5.0%)"
 */
export function formatProgressLine(
  progress: Pick<HarvestProgress, 'completed' | 'total'>,
  label?: string
): string {
  const percent = progress.total > 0 ? (progress.completed / progress.total) * 100 : 100;
  const prefix = label ? `[${label}] ` : '';
  return `${prefix}Progress: ${progress.completed.toLocaleString('en-US')}/${progress.total.toLocaleString('en-US')} (${percent.toFixed(1)}%)`;
}
