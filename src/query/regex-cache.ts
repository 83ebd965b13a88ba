/**
 * Compiled pattern cache for `$regex`
 *
 * Patterns are screened by createSafeRegex() before compilation and kept in
 * a bounded LRU keyed by flags and source. The cache is shared by every
 * evaluation a PredicateEvaluator runs; a lost race between two lookups of
 * the same pattern only costs a second compilation.
 *
 * @module query/regex-cache
 */

import { LRUCache, type LRUCacheStats } from '../utils/lru-cache'
import { createSafeRegex } from '../utils/safe-regex'
import { DEFAULT_MAX_PATTERN_LENGTH, DEFAULT_REGEX_CACHE_SIZE } from '../constants'
import { ConfigurationError, ErrorCode } from '../errors'

export interface RegexCacheOptions {
  /** Maximum compiled patterns kept, at least 1 (default: 256) */
  maxEntries?: number | undefined
  /** Patterns longer than this are rejected as unsafe (default: 1000) */
  maxPatternLength?: number | undefined
}

export class RegexCache {
  private readonly cache: LRUCache<string, RegExp>
  private readonly maxPatternLength: number

  /**
   * @throws {ConfigurationError} If maxEntries is not a positive integer
   */
  constructor(options: RegexCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_REGEX_CACHE_SIZE
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ConfigurationError(
        `Invalid regex cache size: expected an integer >= 1, got ${maxEntries}`,
        { configKey: 'maxEntries', expectedValue: 'integer >= 1', actualValue: maxEntries },
        ErrorCode.INVALID_CONFIG
      )
    }
    this.cache = new LRUCache({ maxEntries })
    this.maxPatternLength = options.maxPatternLength ?? DEFAULT_MAX_PATTERN_LENGTH
  }

  /**
   * Get the compiled form of a pattern, compiling it on a miss
   *
   * @throws {UnsafeRegexError} If the pattern fails the safety screen
   * @throws {SyntaxError} If the pattern or flags are not valid regex syntax
   */
  compile(pattern: string, flags = ''): RegExp {
    // Flags are letters only, so '/' cannot appear on the left of the key
    const key = `${flags}/${pattern}`
    const cached = this.cache.get(key)
    if (cached) return cached

    const regex = createSafeRegex(pattern, flags, { maxLength: this.maxPatternLength })
    this.cache.set(key, regex)
    return regex
  }

  get size(): number {
    return this.cache.size
  }

  getStats(): LRUCacheStats {
    return this.cache.getStats()
  }

  clear(): void {
    this.cache.clear()
  }
}
