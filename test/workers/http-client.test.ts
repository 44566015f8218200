import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { MockAgent } from 'undici';
import { fetchHttp } from '../../src/workers/http-client.js';
import { Fetcher } from '../../src/workers/fetch-worker.js';
import type { FetchPolicy } from '../../src/types/fetch.js';

const BASE = 'https://www.vlr.gg';

describe('fetchHttp', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('should return status and body', async () => {
    agent.get(BASE).intercept({ path: '/matches', method: 'GET' }).reply(200, '<html>listing</html>');

    const result = await fetchHttp(`${BASE}/matches`, { timeoutMs: 1000, dispatcher: agent });

    expect(result).toEqual({ status: 200, body: '<html>listing</html>' });
    agent.assertNoPendingInterceptors();
  });

  it('should hand error statuses back instead of throwing', async () => {
    agent.get(BASE).intercept({ path: '/404', method: 'GET' }).reply(404, 'Page not found');

    const result = await fetchHttp(`${BASE}/404`, { timeoutMs: 1000, dispatcher: agent });

    expect(result).toEqual({ status: 404, body: 'Page not found' });
  });

  it('should reject on connection errors', async () => {
    agent.get(BASE).intercept({ path: '/matches', method: 'GET' }).replyWithError(new Error('socket hang up'));

    await expect(fetchHttp(`${BASE}/matches`, { timeoutMs: 1000, dispatcher: agent })).rejects.toThrow(
      'socket hang up',
    );
  });

  it('should surface connection errors as network FetchErrors through the fetcher', async () => {
    agent.get(BASE).intercept({ path: '/matches', method: 'GET' }).replyWithError(new Error('socket hang up'));
    const policy: FetchPolicy = {
      retryLimit: 1,
      minRequestIntervalMs: 0,
      timeoutMs: 1000,
      backoff: { type: 'fixed', delay: 0 },
      maxBackoffMs: 0,
      readiness: () => ({}),
      respectRobotsTxt: false,
    };
    const fetcher = new Fetcher({
      baseUrl: BASE,
      http: (url, options) => fetchHttp(url, { ...options, dispatcher: agent }),
    });

    await expect(
      fetcher.fetch({ seq: 0, url: `${BASE}/matches`, pageType: 'listing', renderMode: 'http' }, policy),
    ).rejects.toMatchObject({ name: 'FetchError', kind: 'network', attempts: 1 });
  });
});
