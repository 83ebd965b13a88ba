/**
 * Bounded LRU Cache
 *
 * Entry-count bounded cache with least-recently-used eviction and hit/miss
 * statistics. Backs the compiled-pattern cache used by `$regex`.
 *
 * Recency is tracked through the insertion order of the underlying Map: a hit
 * re-inserts the entry at the end, so the first key is always the least
 * recently used one.
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<string, RegExp>({ maxEntries: 256 })
 * cache.set('^admin', /^admin/)
 * cache.get('^admin')
 * ```
 */

/**
 * Configuration options for the LRU cache
 */
export interface LRUCacheOptions<K = string, V = unknown> {
  /** Maximum number of entries (0 or undefined = unlimited) */
  maxEntries?: number | undefined
  /** Callback when an entry is evicted due to capacity limits */
  onEvict?: ((key: K, value: V) => void) | undefined
}

/**
 * Cache statistics
 */
export interface LRUCacheStats {
  hits: number
  misses: number
  /** Entries evicted due to capacity limits */
  evictions: number
  size: number
  /** Maximum entries allowed (0 = unlimited) */
  maxEntries: number
  /** hits / (hits + misses), 0 before the first access */
  hitRate: number
}

export class LRUCache<K, V> {
  private readonly entries = new Map<K, { value: V }>()
  private readonly _maxEntries: number
  private readonly _onEvict?: ((key: K, value: V) => void) | undefined

  private _hits = 0
  private _misses = 0
  private _evictions = 0

  constructor(options: LRUCacheOptions<K, V> = {}) {
    this._maxEntries = options.maxEntries ?? 0
    this._onEvict = options.onEvict
  }

  /**
   * Get a value, marking it as recently used.
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this._misses++
      return undefined
    }

    this.entries.delete(key)
    this.entries.set(key, entry)
    this._hits++
    return entry.value
  }

  /**
   * Check if key exists (does not affect LRU order or statistics)
   */
  has(key: K): boolean {
    return this.entries.has(key)
  }

  /**
   * Set a value, evicting the least recently used entries past capacity.
   */
  set(key: K, value: V): this {
    if (this.entries.has(key)) {
      this.entries.delete(key)
    }
    this.entries.set(key, { value })
    this.evictIfNeeded()
    return this
  }

  delete(key: K): boolean {
    return this.entries.delete(key)
  }

  /**
   * Clear all entries and reset stats
   */
  clear(): void {
    this.entries.clear()
    this._hits = 0
    this._misses = 0
    this._evictions = 0
  }

  get size(): number {
    return this.entries.size
  }

  get maxEntries(): number {
    return this._maxEntries
  }

  /**
   * Keys from least to most recently used
   */
  keys(): IterableIterator<K> {
    return this.entries.keys()
  }

  getStats(): LRUCacheStats {
    const totalAccesses = this._hits + this._misses
    return {
      hits: this._hits,
      misses: this._misses,
      evictions: this._evictions,
      size: this.entries.size,
      maxEntries: this._maxEntries,
      hitRate: totalAccesses > 0 ? this._hits / totalAccesses : 0,
    }
  }

  private evictIfNeeded(): void {
    if (this._maxEntries <= 0) return

    while (this.entries.size > this._maxEntries) {
      const oldest = this.entries.entries().next()
      if (oldest.done) return

      const [key, entry] = oldest.value
      this.entries.delete(key)
      this._evictions++
      this._onEvict?.(key, entry.value)
    }
  }
}
