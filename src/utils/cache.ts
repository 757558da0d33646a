import { log } from "./logger.js";

const logger = log.child("cache");

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
  hits: number;
};

export type CacheOptions = {
  /** Default: 5 minutes. */
  ttlMs?: number;
  /** Default: 100. */
  maxEntries?: number;
  /** Reset TTL on hit (default: false). */
  slidingExpiration?: boolean;
  /** Name used in log lines. */
  name?: string;
};

export type CacheStats = {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
};

/**
 * In-memory LRU cache with TTL. Holds fetched runtime configs.
 */
export class Cache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private loading = new Map<string, Promise<T>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly slidingExpiration: boolean;
  private readonly name: string;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(opts: CacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 5 * 60 * 1000;
    this.maxEntries = Math.max(1, opts.maxEntries ?? 100);
    this.slidingExpiration = opts.slidingExpiration ?? false;
    this.name = opts.name ?? "cache";
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      this.stats.misses++;
      logger.debug("Entry expired", { cache: this.name, key });
      return undefined;
    }

    this.stats.hits++;
    entry.hits++;
    if (this.slidingExpiration) {
      entry.expiresAt = Date.now() + this.ttlMs;
    }

    // Most recently used goes last
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.stats.evictions++;
      logger.debug("Eviction (LRU)", { cache: this.name, key: oldest.value });
    }

    this.entries.set(key, {
      value,
      expiresAt: Date.now() + this.ttlMs,
      hits: 0,
    });
  }

  /**
   * Return the cached value, or run `load` and cache its result. Concurrent
   * callers for the same key share one load. A failed load caches nothing.
   */
  async getOrLoad(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.loading.get(key);
    if (pending) return pending;

    const promise = load()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.loading.delete(key);
      });
    this.loading.set(key, promise);
    return promise;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  prune(): number {
    const now = Date.now();
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (now > entry.expiresAt) {
        this.entries.delete(key);
        pruned++;
      }
    }
    if (pruned > 0) {
      logger.debug("Pruned", { cache: this.name, count: pruned });
    }
    return pruned;
  }

  getStats(): CacheStats {
    const total = this.stats.hits + this.stats.misses;
    return {
      size: this.entries.size,
      hits: this.stats.hits,
      misses: this.stats.misses,
      evictions: this.stats.evictions,
      hitRate: total > 0 ? this.stats.hits / total : 0,
    };
  }

  get size(): number {
    return this.entries.size;
  }
}
