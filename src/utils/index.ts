/**
 * Utility functions for docspec
 *
 * @module utils
 */

export {
  type ValueTypeName,
  isRecord,
  isOperatorMap,
  isNullish,
  deepEqual,
  compareValues,
  getValueType,
  describeType,
} from './comparison'

export {
  type Logger,
  consoleLogger,
  noopLogger,
  getLogger,
  setLogger,
  withPrefix,
} from './logger'

export {
  type SafeRegexOptions,
  UnsafeRegexError,
  validateRegexPattern,
  createSafeRegex,
  isRegexSafe,
} from './safe-regex'

export {
  type LRUCacheOptions,
  type LRUCacheStats,
  LRUCache,
} from './lru-cache'

export { pLimit, mapWithConcurrency, type LimitFunction } from './concurrency'
