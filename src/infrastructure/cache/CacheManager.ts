/**
 * @wirebound/core - Cache Manager
 *
 * LRU cache with TTL and single-flight loading. Backs the identity cache.
 */

/**
 * Cache entry with value and metadata
 */
interface CacheEntry<V> {
  value: V;
  expiresAt?: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
  inFlight: number;
}

/**
 * TTL for a freshly loaded value, or a function computing it from the value.
 */
export type CacheTtl<V> = number | ((value: V) => number | undefined);

/**
 * CacheManager - LRU cache with TTL
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new CacheManager<string, Token>(100);
 *
 * // Concurrent callers share one load
 * const [a, b] = await Promise.all([
 *   cache.getOrSet('token', fetchToken, 60000),
 *   cache.getOrSet('token', fetchToken, 60000),
 * ]);
 * ```
 */
export class CacheManager<K, V> {
  private cache: Map<K, CacheEntry<V>> = new Map();
  private pending: Map<K, Promise<V>> = new Map();
  private hits = 0;
  private misses = 0;

  /**
   * @param capacity - Maximum number of entries
   * @param now - Clock in epoch milliseconds
   */
  constructor(
    private readonly capacity: number = 1000,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Get a value from the cache
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * Set a value in the cache
   *
   * @param ttl - Time to live in milliseconds; a value ≤ 0 is stored already expired
   */
  set(key: K, value: V, ttl?: number): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    // Evict least recently used
    if (this.cache.size >= this.capacity) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, {
      value,
      expiresAt: ttl !== undefined ? this.now() + ttl : undefined,
    });
  }

  /**
   * Check if key exists in cache (and is not expired)
   */
  has(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all entries. Loads already in flight still complete.
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
      inFlight: this.pending.size,
    };
  }

  /**
   * Get from cache, or load and cache.
   *
   * @remarks
   * At most one load per key is in flight; concurrent callers receive the
   * same promise. A failed load is not cached.
   */
  getOrSet(key: K, factory: () => V | Promise<V>, ttl?: CacheTtl<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return Promise.resolve(cached);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const load = Promise.resolve()
      .then(factory)
      .then((value) => {
        this.set(key, value, typeof ttl === 'function' ? ttl(value) : ttl);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, load);
    return load;
  }

  keys(): K[] {
    return Array.from(this.cache.keys());
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    let pruned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return entry.expiresAt !== undefined && this.now() >= entry.expiresAt;
  }
}
