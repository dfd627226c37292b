// FMP market-data client used for ticker validation.
// One shared TTL cache and a sliding one-minute request budget per client.

export interface FmpClientConfig {
  apiKey: string;
  baseUrl?: string;
  /** Requests per minute */
  rateLimit?: number;
  /** Seconds; 0 disables caching */
  cacheTtl?: number;
  requestTimeoutMs?: number;
  now?: () => number;
}

export type FmpFetch = (
  endpoint: string,
  params?: Record<string, string | number | undefined>,
) => Promise<unknown>;

const RATE_WINDOW_MS = 60_000;
const MAX_CACHE_ENTRIES = 1000;

const STATUS_MESSAGES: Record<number, string> = {
  401: 'FMP: Invalid API key',
  403: 'FMP: Endpoint not available on your plan',
  429: 'FMP: Rate limited by server',
};

export function createFmpClient(config: FmpClientConfig): FmpFetch {
  const base = (config.baseUrl || 'https://financialmodelingprep.com/stable').replace(/\/?$/, '/');
  const rateLimit = config.rateLimit ?? 300;
  const ttlMs = (config.cacheTtl ?? 86_400) * 1000;
  const timeoutMs = config.requestTimeoutMs ?? 10_000;
  const now = config.now ?? Date.now;

  const cache = new Map<string, { data: unknown; expiresAt: number }>();
  const sent: number[] = [];

  const fromCache = (key: string): unknown => {
    const hit = cache.get(key);
    if (hit && hit.expiresAt >= now()) return hit.data;
    cache.delete(key);
    return undefined;
  };

  const remember = (key: string, data: unknown): void => {
    if (ttlMs <= 0) return;
    if (cache.size >= MAX_CACHE_ENTRIES) {
      // Oldest insertion goes first
      const oldest = cache.keys().next();
      if (!oldest.done) cache.delete(oldest.value);
    }
    cache.set(key, { data, expiresAt: now() + ttlMs });
  };

  const takeBudget = (): void => {
    const t = now();
    while (sent.length > 0 && t - sent[0] >= RATE_WINDOW_MS) sent.shift();
    if (sent.length >= rateLimit) {
      throw new Error(`FMP rate limit exceeded (${rateLimit} req/min). Try again shortly.`);
    }
    sent.push(t);
  };

  return async (endpoint, params = {}) => {
    if (!config.apiKey) {
      throw new Error('FMP_API_KEY environment variable is not set');
    }

    const url = new URL(endpoint, base);
    url.searchParams.set('apikey', config.apiKey);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
    const key = url.toString();

    const cached = fromCache(key);
    if (cached !== undefined) return cached;

    takeBudget();
    const res = await fetch(key, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      throw new Error(STATUS_MESSAGES[res.status] ?? `FMP: HTTP ${res.status}: ${body.slice(0, 200)}`);
    }

    const data: unknown = await res.json();
    remember(key, data);
    return data;
  };
}
