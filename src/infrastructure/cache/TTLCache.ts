/**
 * @squadline/runtime - TTL Cache
 *
 * Expiring key-value store used to memoize tenant data between store reads.
 * Every operation goes through one lock per cache instance, so concurrent
 * callers always observe some serial ordering of their operations.
 */

import { AsyncLock } from '../concurrency';

/**
 * Cache entry with value and expiry
 */
export class CacheEntry<V> {
  constructor(
    readonly value: V,
    readonly createdAt: number,
    readonly expiresAt: number,
  ) {}

  isExpired(now: number): boolean {
    return now >= this.expiresAt;
  }
}

/**
 * Cache statistics
 */
export interface CacheStats {
  /** Entries currently stored, expired or not */
  total: number;
  /** Entries still live */
  active: number;
  /** Entries past their expiry that have not been purged yet */
  expired: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 when nothing was read */
  hitRate: number;
}

export interface TTLCacheOptions {
  /** TTL used when `set` is called without one (ms, default 5 minutes) */
  defaultTtlMs?: number;

  /** Clock, for tests */
  now?: () => number;
}

/**
 * TTLCache - expiring cache with lazy eviction
 *
 * @template V - Value type
 *
 * @remarks
 * Expired entries are only removed when they are read or when
 * `cleanupExpired()` sweeps them; `set` never evicts anything but the key it
 * writes. A miss is `undefined`, and callers re-fetch from the store.
 *
 * @example
 * ```typescript
 * const cache = new TTLCache<TenantConfig>({ defaultTtlMs: 600_000 });
 *
 * await cache.set('tenant_config:TEAMA', config);
 *
 * const config = await cache.getOrSet(
 *   'tenant_config:TEAMA',
 *   () => store.getDocument('teams', 'TEAMA'),
 * );
 * ```
 */
export class TTLCache<V> {
  private entries: Map<string, CacheEntry<V>> = new Map();
  private readonly lock = new AsyncLock();
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: TTLCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? 5 * 60 * 1000;
    this.now = options.now ?? Date.now;

    if (!(this.defaultTtlMs > 0)) {
      throw new RangeError(`defaultTtlMs must be positive, got ${this.defaultTtlMs}`);
    }
  }

  /**
   * Get a live value, purging it if it has expired
   */
  async get(key: string): Promise<V | undefined> {
    return this.lock.runExclusive(() => {
      const entry = this.entries.get(key);

      if (!entry) {
        this.misses++;
        return undefined;
      }

      if (entry.isExpired(this.now())) {
        this.entries.delete(key);
        this.misses++;
        return undefined;
      }

      this.hits++;
      return entry.value;
    });
  }

  /**
   * Store a value, replacing whatever was under `key`
   *
   * @param ttlMs - Time to live in milliseconds (defaults to the cache's)
   */
  async set(key: string, value: V, ttlMs: number = this.defaultTtlMs): Promise<void> {
    if (!(ttlMs > 0)) {
      throw new RangeError(`ttlMs must be positive, got ${ttlMs}`);
    }

    await this.lock.runExclusive(() => {
      const createdAt = this.now();
      this.entries.set(key, new CacheEntry(value, createdAt, createdAt + ttlMs));
    });
  }

  /**
   * Check if a live entry exists (purges it if expired)
   */
  async has(key: string): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const entry = this.entries.get(key);
      if (!entry) return false;

      if (entry.isExpired(this.now())) {
        this.entries.delete(key);
        return false;
      }
      return true;
    });
  }

  /**
   * @returns whether an entry was removed
   */
  async delete(key: string): Promise<boolean> {
    return this.lock.runExclusive(() => this.entries.delete(key));
  }

  /**
   * Remove every entry and reset hit counters
   */
  async clear(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.entries.clear();
      this.hits = 0;
      this.misses = 0;
    });
  }

  /**
   * Keys of live entries
   */
  async keys(): Promise<string[]> {
    return this.lock.runExclusive(() => {
      const now = this.now();
      return Array.from(this.entries.entries())
        .filter(([, entry]) => !entry.isExpired(now))
        .map(([key]) => key);
    });
  }

  /**
   * Read-through helper: return the cached value or compute, store and
   * return it. The factory runs outside the lock so slow loaders do not
   * block other keys.
   */
  async getOrSet(key: string, factory: () => V | Promise<V>, ttlMs?: number): Promise<V> {
    const cached = await this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await factory();
    await this.set(key, value, ttlMs);
    return value;
  }

  /**
   * Remove every expired entry
   *
   * @returns number of entries removed
   */
  async cleanupExpired(): Promise<number> {
    return this.lock.runExclusive(() => {
      const now = this.now();
      let removed = 0;

      for (const [key, entry] of this.entries) {
        if (entry.isExpired(now)) {
          this.entries.delete(key);
          removed++;
        }
      }

      return removed;
    });
  }

  async getStats(): Promise<CacheStats> {
    return this.lock.runExclusive(() => {
      const now = this.now();
      let expired = 0;
      for (const entry of this.entries.values()) {
        if (entry.isExpired(now)) expired++;
      }

      const reads = this.hits + this.misses;
      return {
        total: this.entries.size,
        active: this.entries.size - expired,
        expired,
        hits: this.hits,
        misses: this.misses,
        hitRate: reads > 0 ? this.hits / reads : 0,
      };
    });
  }

  /**
   * Stored entry count, expired entries included
   */
  get size(): number {
    return this.entries.size;
  }
}
