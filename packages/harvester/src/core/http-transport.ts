/**
 * HTTP Transport for geo-harvest
 *
 * Single timed GET over a dedicated undici connection pool. Retry policy is
 * NOT applied here: the postal-code fetcher owns its per-page retry budget,
 * and the bus-stop feed is a one-shot download.
 *
 * The pool's connection count is fixed at construction so that fetchers
 * queued behind the permit pool can never trigger unbounded connection setup.
 *
 * USAGE:
 * ```typescript
 * const transport = new UndiciTransport({ connections: 10, userAgent: 'geo-harvest/0.1' });
 * const response = await transport.get(url, { timeoutMs: 20_000 });
 * if (response.status === 200) {
 *   const body = await response.text();
 * }
 * await transport.close();
 * ```
 */

import { Agent, fetch, type Dispatcher } from 'undici';

// ============================================================================
// Transport Contract
// ============================================================================

export interface TransportRequestOptions {
  /** Abort the attempt after this many milliseconds */
  readonly timeoutMs: number;

  /** Additional HTTP headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Minimal response surface the pipeline relies on
 */
export interface TransportResponse {
  readonly status: number;
  text(): Promise<string>;
}

export interface HttpTransport {
  get(url: string, options: TransportRequestOptions): Promise<TransportResponse>;
  close(): Promise<void>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-success HTTP status
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection failed, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;
  readonly cause: Error;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
    this.url = url;
    this.cause = cause;
  }
}

// ============================================================================
// undici Implementation
// ============================================================================

export interface UndiciTransportConfig {
  /** Maximum parallel connections per origin */
  readonly connections: number;

  /** User-Agent header sent with every request */
  readonly userAgent: string;

  /** Use this dispatcher instead of a new pool; `connections` is then ignored */
  readonly dispatcher?: Dispatcher;
}

export class UndiciTransport implements HttpTransport {
  private readonly agent: Dispatcher;
  private readonly userAgent: string;

  constructor(config: UndiciTransportConfig) {
    this.agent = config.dispatcher ?? new Agent({ connections: config.connections });
    this.userAgent = config.userAgent;
  }

  async get(url: string, options: TransportRequestOptions): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json, application/xml;q=0.9, */*;q=0.8',
          ...options.headers,
        },
        dispatcher: this.agent,
        signal: controller.signal,
      });

      // Read the body inside the timeout window so a stalled body also aborts
      const body = await response.text();
      return {
        status: response.status,
        text: async () => body,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, options.timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
