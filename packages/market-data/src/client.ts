// Shared JSON fetch with an in-process TTL cache
// Every provider client goes through here; retries and client-side throttling are left to callers

const DEFAULT_CACHE_TTL = Number(process.env.MARKET_DATA_CACHE_TTL ?? 300); // seconds
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_CACHE_ENTRIES = 1000;

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

const cache = new Map<string, CacheEntry>();

export class DataSourceError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DataSourceError';
  }
}

function getCached(key: string): unknown | undefined {
  const entry = cache.get(key);
  if (!entry) return undefined;
  if (Date.now() > entry.expiresAt) {
    cache.delete(key);
    return undefined;
  }
  return entry.data;
}

function setCache(key: string, data: unknown, ttlSeconds: number): void {
  cache.set(key, { data, expiresAt: Date.now() + ttlSeconds * 1000 });
  if (cache.size > MAX_CACHE_ENTRIES) {
    const now = Date.now();
    for (const [k, v] of cache) {
      if (now > v.expiresAt) cache.delete(k);
    }
  }
}

/** Drop every cached response (used between test cases and by long-running callers) */
export function clearCache(): void {
  cache.clear();
}

export interface FetchJsonOptions {
  provider: string;
  cacheTtl?: number; // seconds, 0 to skip cache
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export async function cachedFetchJson(
  url: string | URL,
  options: FetchJsonOptions,
): Promise<unknown> {
  const cacheKey = url.toString();
  const ttl = options.cacheTtl ?? DEFAULT_CACHE_TTL;
  if (ttl > 0) {
    const cached = getCached(cacheKey);
    if (cached !== undefined) return cached;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  const provider = options.provider;

  try {
    const res = await fetch(cacheKey, {
      headers: { 'Accept': 'application/json', ...options.headers },
      signal: controller.signal,
    });

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      if (res.status === 401) throw new DataSourceError(`${provider}: Invalid API key`, provider, 401);
      if (res.status === 403) throw new DataSourceError(`${provider}: Endpoint not available`, provider, 403);
      if (res.status === 429) throw new DataSourceError(`${provider}: Rate limited by server`, provider, 429);
      throw new DataSourceError(`${provider}: HTTP ${res.status} — ${body.slice(0, 200)}`, provider, res.status);
    }

    const data: unknown = await res.json();

    if (ttl > 0) setCache(cacheKey, data, ttl);

    return data;
  } catch (err) {
    if (err instanceof DataSourceError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new DataSourceError(`${provider}: ${message}`, provider, undefined, { cause: err });
  } finally {
    clearTimeout(timeout);
  }
}

/** Cache TTL presets by data type */
export const CacheTTL = {
  REALTIME: 30,       // quotes
  SHORT: 300,         // 5 min — news, filings
  MEDIUM: 3600,       // 1 hour — fundamentals, macro series
  LONG: 86400,        // 24 hours — ticker → CIK map
} as const;
