import type { MarketBundle, MarketDataProvider } from './types.ts';
import { silentLogger, type ProviderLogger } from './logger.ts';

interface CacheEntry {
  bundle: Promise<MarketBundle>;
  timestamp: number;
}

export interface CacheOptions {
  /** Entry lifetime in ms (default 1 hour) */
  ttlMs?: number;
  now?: () => number;
  logger?: ProviderLogger;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  ttlMs: number;
}

export const DEFAULT_CACHE_TTL_MS = 3600_000;

/**
 * In-process TTL cache in front of a MarketDataProvider.
 *
 * At most one upstream fetch per ticker per TTL window: concurrent callers
 * share the in-flight promise, and failed fetches are evicted so the next
 * call retries.
 */
export class CachedMarketDataProvider implements MarketDataProvider {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: ProviderLogger;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly upstream: MarketDataProvider,
    options: CacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  getBundle(ticker: string): Promise<MarketBundle> {
    const key = ticker.toUpperCase();
    const entry = this.cache.get(key);

    if (entry && this.now() - entry.timestamp < this.ttlMs) {
      this.hits++;
      this.logger.debug(`[Cache] hit ${key}`);
      return entry.bundle;
    }

    this.misses++;
    const bundle = this.upstream.getBundle(ticker);
    const fresh: CacheEntry = { bundle, timestamp: this.now() };
    this.cache.set(key, fresh);

    void bundle.catch(() => {
      // Only evict our own entry; a later refresh may have replaced it
      if (this.cache.get(key) === fresh) {
        this.cache.delete(key);
      }
    });

    return bundle;
  }

  clear(): void {
    this.cache.clear();
  }

  getStats(): CacheStats {
    return {
      entries: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      ttlMs: this.ttlMs,
    };
  }
}
