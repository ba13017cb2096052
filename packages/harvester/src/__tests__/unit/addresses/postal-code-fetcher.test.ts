/**
 * Per-key fetcher tests
 *
 * Pagination, retry classification and the never-reject contract, driven by
 * a scripted in-process transport.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  PostalCodeFetcher,
  backoffDelayMs,
  isTransientStatus,
  type PostalFetcherConfig,
} from '../../../addresses/postal-code-fetcher.js';
import { HTTPNetworkError } from '../../../core/http-transport.js';
import {
  FakeTransport,
  RecordingLog,
  ok,
  searchBody,
  searchParams,
  unlimitedRateLimiter,
  type ReplyHandler,
} from '../../utils/fakes.js';

const CONFIG: PostalFetcherConfig = {
  searchUrl: 'https://search.test/api/search',
  timeoutMs: 1000,
  maxAttempts: 4,
  backoffBaseMs: 1,
  backoffConstantMs: 1,
};

function createFetcher(handler: ReplyHandler, config: Partial<PostalFetcherConfig> = {}) {
  const transport = new FakeTransport(handler);
  const log = new RecordingLog();
  const limiter = unlimitedRateLimiter();
  const fetcher = new PostalCodeFetcher({ ...CONFIG, ...config }, transport, limiter, log);
  return { fetcher, transport, log, limiter };
}

describe('PostalCodeFetcher', () => {
  describe('pagination', () => {
    it('requests every page exactly once and concatenates in page order', async () => {
      const { fetcher, transport } = createFetcher((url) => {
        const { page } = searchParams(url);
        return ok(searchBody([{ ID: `p${page}` }], 3, page));
      });

      const outcome = await fetcher.fetch('018956');

      expect(outcome.status).toBe('complete');
      expect(outcome.records).toEqual([{ ID: 'p1' }, { ID: 'p2' }, { ID: 'p3' }]);
      expect(outcome.pagesFetched).toBe(3);
      expect(outcome.requests).toBe(3);
      expect(transport.requests.map((request) => searchParams(request.url).page)).toEqual([1, 2, 3]);
      expect(transport.requests.every((request) => searchParams(request.url).key === '018956')).toBe(
        true
      );
    });

    it('returns empty when the only page has no results', async () => {
      const { fetcher, transport } = createFetcher(() => ok(searchBody([], 0)));

      const outcome = await fetcher.fetch('000001');

      expect(outcome).toEqual({
        status: 'empty',
        key: '000001',
        records: [],
        pagesFetched: 1,
        requests: 1,
      });
      expect(transport.requests).toHaveLength(1);
    });

    it('stops after one page when totalNumPages is 1', async () => {
      const { fetcher } = createFetcher(() => ok(searchBody([{ ID: 'a' }, { ID: 'b' }], 1)));

      const outcome = await fetcher.fetch('000002');

      expect(outcome.status).toBe('complete');
      expect(outcome.records).toHaveLength(2);
      expect(outcome.requests).toBe(1);
    });

    it('keeps object hits from a page that also carries null entries', async () => {
      const { fetcher, transport, log } = createFetcher(() =>
        ok(JSON.stringify({ totalNumPages: 1, results: [null, { ID: 'a' }] }))
      );

      const outcome = await fetcher.fetch('000003');

      expect(outcome.status).toBe('complete');
      expect(outcome.records).toEqual([{ ID: 'a' }]);
      expect(transport.requests).toHaveLength(1);
      expect(log.messages('warn')).toEqual(['Dropped non-object search hits']);
    });
  });

  describe('permanent failures', () => {
    it('stops on 404 for page 1 with no further requests', async () => {
      const { fetcher, transport } = createFetcher(() => ({ status: 404 }));

      const outcome = await fetcher.fetch('000404');

      expect(outcome).toEqual({
        status: 'partial',
        key: '000404',
        records: [],
        pagesFetched: 0,
        requests: 1,
        reason: 'permanent_status',
        page: 1,
        detail: 'HTTP 404',
      });
      expect(transport.requests).toHaveLength(1);
    });

    it('keeps earlier pages when a later page is forbidden', async () => {
      const { fetcher } = createFetcher((url) =>
        searchParams(url).page === 1 ? ok(searchBody([{ ID: 'first' }], 2)) : { status: 403 }
      );

      const outcome = await fetcher.fetch('000403');

      expect(outcome.status).toBe('partial');
      expect(outcome.records).toEqual([{ ID: 'first' }]);
      expect(outcome.requests).toBe(2);
    });

    it('treats a non-200 success status as permanent', async () => {
      const { fetcher } = createFetcher(() => ({ status: 204 }));

      const outcome = await fetcher.fetch('000204');

      expect(outcome.status).toBe('partial');
      if (outcome.status === 'partial') {
        expect(outcome.reason).toBe('permanent_status');
        expect(outcome.detail).toBe('HTTP 204');
      }
    });
  });

  describe('transient failures', () => {
    it('returns partial data after repeated 429s on a later page', async () => {
      const { fetcher, transport } = createFetcher((url) =>
        searchParams(url).page === 1
          ? ok(searchBody([{ ID: 'a' }, { ID: 'b' }], 3))
          : { status: 429 }
      );

      const outcome = await fetcher.fetch('000429');

      expect(outcome).toEqual({
        status: 'partial',
        key: '000429',
        records: [{ ID: 'a' }, { ID: 'b' }],
        pagesFetched: 1,
        requests: 5,
        reason: 'retries_exhausted',
        page: 2,
        detail: 'HTTP 429',
      });
      expect(transport.requests.filter((request) => searchParams(request.url).page === 2)).toHaveLength(4);
      expect(transport.requests.some((request) => searchParams(request.url).page === 3)).toBe(false);
    });

    it('retries a malformed body and then succeeds', async () => {
      const { fetcher } = createFetcher((_url, call) =>
        call === 1 ? ok('not json') : ok(searchBody([{ ID: 'ok' }], 1))
      );

      const outcome = await fetcher.fetch('000500');

      expect(outcome.status).toBe('complete');
      expect(outcome.records).toEqual([{ ID: 'ok' }]);
      expect(outcome.requests).toBe(2);
    });

    it('retries transport errors and 5xx responses', async () => {
      const replies: ReplyHandler = (url, call) => {
        if (call === 1) return new HTTPNetworkError(url, new Error('socket hang up'));
        if (call === 2) return { status: 503 };
        return ok(searchBody([{ ID: 'late' }], 1));
      };
      const { fetcher } = createFetcher(replies);

      const outcome = await fetcher.fetch('000503');

      expect(outcome.status).toBe('complete');
      expect(outcome.requests).toBe(3);
    });

    it('backs off between attempts but not after the last one', async () => {
      const { fetcher, log } = createFetcher(() => ({ status: 500 }));

      await fetcher.fetch('000777');

      const waits = log.entries
        .filter((entry) => entry.message === 'Transient failure, backing off')
        .map((entry) => entry.metadata?.waitMs);
      expect(waits).toEqual([2, 3, 5]);
      expect(log.messages('warn')).toContain('Postal code stopped early');
    });

    it('reports the last transport error message as detail', async () => {
      const { fetcher } = createFetcher(() => new Error('connect ECONNREFUSED'), { maxAttempts: 2 });

      const outcome = await fetcher.fetch('000111');

      expect(outcome.status).toBe('partial');
      if (outcome.status === 'partial') {
        expect(outcome.reason).toBe('retries_exhausted');
        expect(outcome.detail).toBe('connect ECONNREFUSED');
        expect(outcome.requests).toBe(2);
      }
    });
  });

  describe('requests', () => {
    it('takes a rate-limiter token before every attempt', async () => {
      const { fetcher, limiter } = createFetcher((_url, call) =>
        call < 3 ? { status: 502 } : ok(searchBody([], 1))
      );
      const acquire = vi.spyOn(limiter, 'acquire');

      const outcome = await fetcher.fetch('000123');

      expect(outcome.requests).toBe(3);
      expect(acquire).toHaveBeenCalledTimes(3);
    });

    it('sends the configured timeout and no auth header by default', async () => {
      const { fetcher, transport } = createFetcher(() => ok(searchBody([], 1)));

      await fetcher.fetch('000001');

      expect(transport.requests[0]?.options).toEqual({ timeoutMs: 1000, headers: undefined });
    });

    it('sends the auth token when configured', async () => {
      const { fetcher, transport } = createFetcher(() => ok(searchBody([], 1)), {
        authToken: 'test-token',
      });

      await fetcher.fetch('000001');

      expect(transport.requests[0]?.options.headers).toEqual({ Authorization: 'test-token' });
    });
  });

  it('rejects a zero attempt budget', () => {
    expect(() => createFetcher(() => ok(searchBody([], 1)), { maxAttempts: 0 })).toThrow(RangeError);
  });
});

describe('backoffDelayMs', () => {
  it('grows as base * 2^attempt plus the constant', () => {
    const config = { backoffBaseMs: 1000, backoffConstantMs: 2000 };
    expect([0, 1, 2, 3].map((attempt) => backoffDelayMs(attempt, config))).toEqual([
      3000, 4000, 6000, 10000,
    ]);
  });
});

describe('isTransientStatus', () => {
  it('classifies 429 and 5xx as transient', () => {
    expect([429, 500, 502, 503, 504].every(isTransientStatus)).toBe(true);
  });

  it('classifies other statuses as permanent', () => {
    expect([301, 400, 401, 403, 404, 410].some(isTransientStatus)).toBe(false);
  });
});
