/**
 * Address search API response schema
 *
 * A page body carries the hits for one page and the total page count for the
 * query. Anything that does not match is treated as a malformed (transient)
 * response by the fetcher. Individual hits that are not objects are dropped
 * and counted; the rest of the page is kept.
 */

import { z } from 'zod';
import type { RawAddressRecord } from '../core/types.js';

export const SearchPageSchema = z.object({
  found: z.number().nullish(),
  totalNumPages: z.number().nullish(),
  pageNum: z.number().nullish(),
  results: z.array(z.unknown()).nullish(),
});

export interface SearchPage {
  readonly totalNumPages: number;
  readonly results: readonly RawAddressRecord[];
  /** Hits dropped because they were not objects */
  readonly skipped: number;
}

function isAddressRecord(value: unknown): value is RawAddressRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type SearchPageParseResult =
  | { readonly success: true; readonly page: SearchPage }
  | { readonly success: false; readonly error: string };

/**
 * Parse a raw response body into a search page
 */
export function parseSearchPage(body: string): SearchPageParseResult {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return {
      success: false,
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const parsed = SearchPageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    return {
      success: false,
      error: `Unexpected response shape: ${issue ? `${issue.path.join('.') || '(root)'} ${issue.message}` : 'unknown'}`,
    };
  }

  const hits = parsed.data.results ?? [];
  const results = hits.filter(isAddressRecord);

  return {
    success: true,
    page: {
      totalNumPages: parsed.data.totalNumPages ?? 0,
      results,
      skipped: hits.length - results.length,
    },
  };
}

export interface SearchQuery {
  readonly key: string;
  readonly page: number;
}

/**
 * Build the request URL for one page of a postal-code search
 */
export function buildSearchUrl(baseUrl: string, query: SearchQuery): string {
  const url = new URL(baseUrl);
  url.searchParams.set('searchVal', query.key);
  url.searchParams.set('returnGeom', 'Y');
  url.searchParams.set('getAddrDetails', 'Y');
  url.searchParams.set('pageNum', String(query.page));
  return url.toString();
}
