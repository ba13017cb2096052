/**
 * Undici transport tests against undici's in-process MockAgent
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import {
  HTTPNetworkError,
  HTTPTimeoutError,
  UndiciTransport,
} from '../../../core/http-transport.js';

const ORIGIN = 'https://search.test';

describe('UndiciTransport', () => {
  let mockAgent: MockAgent;
  let transport: UndiciTransport;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    transport = new UndiciTransport({ connections: 2, userAgent: 'geo-harvest-test', dispatcher: mockAgent });
  });

  afterEach(async () => {
    await transport.close();
  });

  it('returns status and body of a response', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/api?searchVal=000001', method: 'GET' }).reply(200, '{"found":0}');

    const response = await transport.get(`${ORIGIN}/api?searchVal=000001`, { timeoutMs: 1000 });

    expect(response.status).toBe(200);
    expect(await response.text()).toBe('{"found":0}');
  });

  it('passes error statuses through without throwing', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/api', method: 'GET' }).reply(429, 'slow down');

    const response = await transport.get(`${ORIGIN}/api`, { timeoutMs: 1000 });

    expect(response.status).toBe(429);
  });

  it('throws HTTPTimeoutError when the response is slower than the timeout', async () => {
    mockAgent.get(ORIGIN).intercept({ path: '/slow', method: 'GET' }).reply(200, 'late').delay(200);

    await expect(transport.get(`${ORIGIN}/slow`, { timeoutMs: 20 })).rejects.toThrow(HTTPTimeoutError);
  });

  it('wraps connection failures in HTTPNetworkError', async () => {
    mockAgent
      .get(ORIGIN)
      .intercept({ path: '/down', method: 'GET' })
      .replyWithError(new Error('connection reset'));

    await expect(transport.get(`${ORIGIN}/down`, { timeoutMs: 1000 })).rejects.toThrow(HTTPNetworkError);
  });
});
