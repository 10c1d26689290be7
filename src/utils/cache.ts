/**
 * Generic LRU + TTL Cache
 *
 * - LRU eviction when capacity is reached
 * - TTL expiration, checked on access
 * - take(): read-and-remove in one synchronous step, so a value is handed out once
 * - touch(): read and restart the entry's TTL (sliding expiry)
 *
 * ```typescript
 * const cache = new LruTtlCache<string, BufferedResponse>(1000, 60000);
 * cache.set("sid:/pages/home", response);
 * cache.take("sid:/pages/home"); // response
 * cache.take("sid:/pages/home"); // undefined
 * ```
 */

export type EvictionReason = "lru" | "ttl";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export class LruTtlCache<K, V> {
  private readonly capacity: number;
  private readonly ttlMs: number;
  private readonly cache: Map<K, CacheEntry<V>>;
  private readonly evictionCallback?: (key: K, value: V, reason: EvictionReason) => void;

  /**
   * @param capacity - Maximum number of entries (LRU eviction when full)
   * @param ttlMs - Entries expire this long after being set
   * @param evictionCallback - Called for LRU and TTL evictions, not for take/delete
   */
  constructor(
    capacity: number,
    ttlMs: number,
    evictionCallback?: (key: K, value: V, reason: EvictionReason) => void
  ) {
    if (capacity <= 0) {
      throw new Error("Cache capacity must be > 0");
    }
    if (ttlMs <= 0) {
      throw new Error("Cache TTL must be > 0");
    }

    this.capacity = capacity;
    this.ttlMs = ttlMs;
    this.cache = new Map();
    this.evictionCallback = evictionCallback;
  }

  /**
   * Get value (undefined if missing or expired). Marks the entry most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) {
      return undefined;
    }

    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  /**
   * Get value and restart its TTL. Marks the entry most recently used.
   */
  touch(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) {
      return undefined;
    }

    this.cache.delete(key);
    this.cache.set(key, { value: entry.value, expiresAt: Date.now() + this.ttlMs });
    return entry.value;
  }

  /**
   * Get and remove in one step
   */
  take(key: K): V | undefined {
    const entry = this.live(key);
    if (!entry) {
      return undefined;
    }

    this.cache.delete(key);
    return entry.value;
  }

  /**
   * Set value (replaces an existing entry, evicts LRU entry if at capacity)
   */
  set(key: K, value: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    if (this.cache.size >= this.capacity) {
      const lruKeyIter = this.cache.keys().next();
      if (!lruKeyIter.done) {
        const lruKey = lruKeyIter.value;
        const lruEntry = this.cache.get(lruKey);
        this.cache.delete(lruKey);

        if (lruEntry) {
          this.evictionCallback?.(lruKey, lruEntry.value, "lru");
        }
      }
    }

    this.cache.set(key, {
      value,
      expiresAt: Date.now() + this.ttlMs,
    });
  }

  has(key: K): boolean {
    return this.live(key) !== undefined;
  }

  delete(key: K): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /**
   * Current size (includes expired entries until accessed or cleaned up)
   */
  get size(): number {
    return this.cache.size;
  }

  stats(): { size: number; capacity: number; ttlMs: number } {
    return {
      size: this.cache.size,
      capacity: this.capacity,
      ttlMs: this.ttlMs,
    };
  }

  /**
   * Remove all expired entries. Returns the number removed.
   */
  cleanup(): number {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now > entry.expiresAt) {
        this.cache.delete(key);
        this.evictionCallback?.(key, entry.value, "ttl");
        cleaned++;
      }
    }

    return cleaned;
  }

  private live(key: K): CacheEntry<V> | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      this.evictionCallback?.(key, entry.value, "ttl");
      return undefined;
    }

    return entry;
  }
}
