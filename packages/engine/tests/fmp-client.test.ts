import { describe, it, expect, vi, afterEach } from 'vitest';
import { createFmpClient } from '../bridge/fmp-client.js';

const PROFILE = [{ symbol: 'ACME', companyName: 'Acme Corp', exchangeShortName: 'NYSE' }];

function stubFetch(status = 200, body: unknown = PROFILE) {
  const fetchMock = vi.fn().mockImplementation(async () =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createFmpClient', () => {
  it('builds the request URL with the key first', async () => {
    const fetchMock = stubFetch();
    const fmp = createFmpClient({ apiKey: 'test-secret', baseUrl: 'https://example.test/stable' });

    const data = await fmp('profile', { symbol: 'ACME', limit: undefined });

    expect(data).toEqual(PROFILE);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('https://example.test/stable/profile?apikey=test-secret&symbol=ACME');
  });

  it('serves repeated requests from the cache until they expire', async () => {
    const fetchMock = stubFetch();
    let clock = 1_000_000;
    const fmp = createFmpClient({
      apiKey: 'test-secret',
      baseUrl: 'https://example.test/stable',
      cacheTtl: 60,
      now: () => clock,
    });

    await fmp('profile', { symbol: 'ACME' });
    await fmp('profile', { symbol: 'ACME' });
    expect(fetchMock).toHaveBeenCalledTimes(1);

    clock += 61_000;
    await fmp('profile', { symbol: 'ACME' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('does not cache when the ttl is 0', async () => {
    const fetchMock = stubFetch();
    const fmp = createFmpClient({ apiKey: 'test-secret', baseUrl: 'https://example.test/stable/', cacheTtl: 0 });

    await fmp('profile', { symbol: 'ACME' });
    await fmp('profile', { symbol: 'ACME' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][0]).toBe('https://example.test/stable/profile?apikey=test-secret&symbol=ACME');
  });

  it('enforces the per-minute rate limit', async () => {
    stubFetch();
    let clock = 0;
    const fmp = createFmpClient({
      apiKey: 'test-secret',
      baseUrl: 'https://example.test/stable',
      rateLimit: 1,
      cacheTtl: 0,
      now: () => clock,
    });

    await fmp('profile', { symbol: 'ACME' });
    await expect(fmp('profile', { symbol: 'BETA' }))
      .rejects.toThrow('FMP rate limit exceeded (1 req/min). Try again shortly.');

    clock += 60_000;
    await expect(fmp('profile', { symbol: 'BETA' })).resolves.toEqual(PROFILE);
  });

  it('maps HTTP errors to readable messages', async () => {
    stubFetch(401, 'unauthorized');
    const fmp = createFmpClient({ apiKey: 'test-secret', baseUrl: 'https://example.test/stable' });
    await expect(fmp('profile', { symbol: 'ACME' })).rejects.toThrow('FMP: Invalid API key');

    stubFetch(500, 'boom');
    await expect(fmp('quote', { symbol: 'ACME' })).rejects.toThrow('FMP: HTTP 500: boom');
  });

  it('refuses to call without an API key', async () => {
    const fetchMock = stubFetch();
    const fmp = createFmpClient({ apiKey: '' });
    await expect(fmp('profile', { symbol: 'ACME' })).rejects.toThrow('FMP_API_KEY environment variable is not set');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
