/**
 * Per-key postal-code fetcher
 *
 * Drives the paginated retrieval of one postal code. Never rejects: every
 * failure degrades to a `partial` outcome carrying whatever was collected.
 *
 * STATUS HANDLING (per page):
 * - 200 with a valid body: accept, advance while page < totalNumPages
 * - 429, 5xx, transport failure, malformed body: transient, back off and retry
 *   the same page until the attempt budget runs out
 * - anything else: permanent, stop immediately
 *
 * Every attempt first takes a token from the shared rate limiter.
 */

import type { KeyFetchOutcome, PartialReason, PostalKey, RawAddressRecord } from '../core/types.js';
import type { HttpTransport } from '../core/http-transport.js';
import { sleep } from '../core/http-transport.js';
import type { RequestRateLimiter } from '../resilience/rate-limiter.js';
import { createLogger, type LogSink } from '../core/utils/logger.js';
import { buildSearchUrl, parseSearchPage, type SearchPage } from './search-response.js';

export interface PostalFetcherConfig {
  /** Search endpoint, query parameters are appended per page */
  readonly searchUrl: string;

  /** Per-attempt timeout in milliseconds */
  readonly timeoutMs: number;

  /** Attempts per page before giving up on the key */
  readonly maxAttempts: number;

  /** Backoff before retry n (zero-based): backoffBaseMs * 2^n + backoffConstantMs */
  readonly backoffBaseMs: number;
  readonly backoffConstantMs: number;

  /** Sent as the Authorization header when present */
  readonly authToken?: string;
}

export interface KeyFetcher {
  fetch(key: PostalKey): Promise<KeyFetchOutcome>;
}

type AttemptResult =
  | { readonly kind: 'ok'; readonly page: SearchPage }
  | { readonly kind: 'permanent'; readonly detail: string }
  | { readonly kind: 'transient'; readonly detail: string };

type PageResult =
  | { readonly kind: 'ok'; readonly page: SearchPage }
  | { readonly kind: 'stopped'; readonly reason: PartialReason; readonly detail: string };

/**
 * Mutable per-key state, discarded when the key terminates
 */
interface PageCursor {
  page: number;
  pagesFetched: number;
  requests: number;
  readonly records: RawAddressRecord[];
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function backoffDelayMs(
  attempt: number,
  config: Pick<PostalFetcherConfig, 'backoffBaseMs' | 'backoffConstantMs'>
): number {
  return config.backoffBaseMs * Math.pow(2, attempt) + config.backoffConstantMs;
}

export class PostalCodeFetcher implements KeyFetcher {
  private readonly config: PostalFetcherConfig;
  private readonly transport: HttpTransport;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly log: LogSink;

  constructor(
    config: PostalFetcherConfig,
    transport: HttpTransport,
    rateLimiter: RequestRateLimiter,
    log: LogSink = createLogger({ module: 'postal-fetcher' })
  ) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
    }
    this.config = config;
    this.transport = transport;
    this.rateLimiter = rateLimiter;
    this.log = log;
  }

  async fetch(key: PostalKey): Promise<KeyFetchOutcome> {
    const cursor: PageCursor = { page: 1, pagesFetched: 0, requests: 0, records: [] };

    for (;;) {
      const result = await this.fetchPage(key, cursor);

      if (result.kind === 'stopped') {
        this.log.warn('Postal code stopped early', {
          key,
          page: cursor.page,
          reason: result.reason,
          detail: result.detail,
          collected: cursor.records.length,
        });
        return {
          status: 'partial',
          key,
          records: cursor.records,
          pagesFetched: cursor.pagesFetched,
          requests: cursor.requests,
          reason: result.reason,
          page: cursor.page,
          detail: result.detail,
        };
      }

      cursor.pagesFetched++;
      if (result.page.skipped > 0) {
        this.log.warn('Dropped non-object search hits', {
          key,
          page: cursor.page,
          skipped: result.page.skipped,
        });
      }
      for (const record of result.page.results) {
        cursor.records.push(Object.freeze({ ...record }));
      }

      if (cursor.page < result.page.totalNumPages) {
        cursor.page++;
        continue;
      }

      const base = {
        key,
        records: cursor.records,
        pagesFetched: cursor.pagesFetched,
        requests: cursor.requests,
      };
      return cursor.records.length > 0
        ? { status: 'complete', ...base }
        : { status: 'empty', ...base };
    }
  }

  /**
   * Fetch the cursor's current page, retrying transient failures
   */
  private async fetchPage(key: PostalKey, cursor: PageCursor): Promise<PageResult> {
    const url = buildSearchUrl(this.config.searchUrl, { key, page: cursor.page });
    let lastDetail = 'no attempt made';

    for (let attempt = 0; attempt < this.config.maxAttempts; attempt++) {
      await this.rateLimiter.acquire();
      cursor.requests++;

      const result = await this.attempt(url);
      if (result.kind === 'ok') {
        return result;
      }
      if (result.kind === 'permanent') {
        return { kind: 'stopped', reason: 'permanent_status', detail: result.detail };
      }

      lastDetail = result.detail;
      if (attempt < this.config.maxAttempts - 1) {
        const waitMs = backoffDelayMs(attempt, this.config);
        this.log.warn('Transient failure, backing off', {
          key,
          page: cursor.page,
          attempt: attempt + 1,
          maxAttempts: this.config.maxAttempts,
          detail: result.detail,
          waitMs,
        });
        await sleep(waitMs);
      }
    }

    return { kind: 'stopped', reason: 'retries_exhausted', detail: lastDetail };
  }

  private async attempt(url: string): Promise<AttemptResult> {
    try {
      const response = await this.transport.get(url, {
        timeoutMs: this.config.timeoutMs,
        headers: this.config.authToken ? { Authorization: this.config.authToken } : undefined,
      });

      if (response.status === 200) {
        const parsed = parseSearchPage(await response.text());
        return parsed.success
          ? { kind: 'ok', page: parsed.page }
          : { kind: 'transient', detail: parsed.error };
      }

      const detail = `HTTP ${response.status}`;
      return isTransientStatus(response.status)
        ? { kind: 'transient', detail }
        : { kind: 'permanent', detail };
    } catch (error) {
      return {
        kind: 'transient',
        detail: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
