/**
 * Search API response parsing tests
 */

import { describe, it, expect } from 'vitest';
import { buildSearchUrl, parseSearchPage } from '../../../addresses/search-response.js';

describe('parseSearchPage', () => {
  it('extracts results and the page count', () => {
    const result = parseSearchPage(
      JSON.stringify({
        found: 2,
        totalNumPages: 3,
        pageNum: 1,
        results: [{ POSTAL: '018956' }, { POSTAL: '018956', BLK_NO: '10' }],
      })
    );

    expect(result).toEqual({
      success: true,
      page: {
        totalNumPages: 3,
        results: [{ POSTAL: '018956' }, { POSTAL: '018956', BLK_NO: '10' }],
        skipped: 0,
      },
    });
  });

  it('treats missing fields as an empty single page', () => {
    expect(parseSearchPage('{}')).toEqual({
      success: true,
      page: { totalNumPages: 0, results: [], skipped: 0 },
    });
  });

  it('reports invalid JSON', () => {
    const result = parseSearchPage('<html>busy</html>');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.startsWith('Invalid JSON: ')).toBe(true);
    }
  });

  it('reports a results field that is not a list', () => {
    const result = parseSearchPage(JSON.stringify({ totalNumPages: 1, results: 'none' }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.startsWith('Unexpected response shape: results ')).toBe(true);
    }
  });

  it('drops hits that are not objects and keeps the rest of the page', () => {
    const result = parseSearchPage(
      JSON.stringify({ totalNumPages: 1, results: [null, { POSTAL: '000001' }, 'x', [1]] })
    );

    expect(result).toEqual({
      success: true,
      page: { totalNumPages: 1, results: [{ POSTAL: '000001' }], skipped: 3 },
    });
  });

  it('reports a non-numeric page count', () => {
    const result = parseSearchPage(JSON.stringify({ totalNumPages: 'two', results: [] }));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.startsWith('Unexpected response shape: totalNumPages ')).toBe(true);
    }
  });
});

describe('buildSearchUrl', () => {
  it('sets the query parameters for one page', () => {
    const url = new URL(buildSearchUrl('https://search.test/api/search', { key: '000123', page: 2 }));

    expect(url.origin + url.pathname).toBe('https://search.test/api/search');
    expect(url.searchParams.get('searchVal')).toBe('000123');
    expect(url.searchParams.get('returnGeom')).toBe('Y');
    expect(url.searchParams.get('getAddrDetails')).toBe('Y');
    expect(url.searchParams.get('pageNum')).toBe('2');
  });
});
