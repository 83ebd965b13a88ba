/**
 * Shared Comparison and Value Utilities
 *
 * Canonical implementations of value equality, ordering and runtime type
 * naming used by every operator family.
 */

import { OPERATOR_PREFIX, type TYPE_NAMES } from '../constants'

export type ValueTypeName = (typeof TYPE_NAMES)[number]

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a keyed mapping (plain object, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if a value is an operator map: a mapping with at least one `$` key
 *
 * @example
 * isOperatorMap({ $gte: 18 }) // true
 * isOperatorMap({ city: 'Leeds' }) // false
 * isOperatorMap({}) // false
 */
export function isOperatorMap(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false
  return Object.keys(value).some(key => key.startsWith(OPERATOR_PREFIX))
}

export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined
}

// =============================================================================
// Deep Equality
// =============================================================================

/**
 * Deep equality check for two values
 *
 * Handles:
 * - Primitives (strict equality; numbers compare by value, so 25 equals 25.0)
 * - null/undefined (treated as equal)
 * - Arrays (element-wise comparison, order matters)
 * - Objects (key-value comparison, key order ignored)
 *
 * Values of different runtime types are never equal: `deepEqual(1, '1')` is false.
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual([1, 2], [2, 1]) // false
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (isNullish(a)) return isNullish(b)

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isRecord(a) && isRecord(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => Object.prototype.hasOwnProperty.call(b, k) && deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Compare two values for ordering
 *
 * Only numbers against numbers and strings against strings are comparable;
 * strings compare by UTF-16 code unit order (case-sensitive). Every other
 * pairing, including NaN, returns undefined so callers can report a type
 * mismatch instead of guessing an order.
 *
 * @returns negative if a < b, 0 if equal, positive if a > b, undefined if incomparable
 *
 * @example
 * compareValues(1, 2) // -1
 * compareValues('b', 'a') // 1
 * compareValues(1, '1') // undefined
 */
export function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return undefined
    return a < b ? -1 : a > b ? 1 : 0
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0
  }
  return undefined
}

// =============================================================================
// Type Helpers
// =============================================================================

/**
 * Get the `$type` name of a value
 *
 * Anything that is not a scalar, list or null (functions, symbols, bigint,
 * undefined) has no name in the vocabulary and returns undefined.
 *
 * @example
 * getValueType(null) // 'null'
 * getValueType([1, 2]) // 'array'
 * getValueType({ a: 1 }) // 'object'
 */
export function getValueType(value: unknown): ValueTypeName | undefined {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  switch (typeof value) {
    case 'string':
      return 'string'
    case 'number':
      return 'number'
    case 'boolean':
      return 'boolean'
    case 'object':
      return 'object'
    default:
      return undefined
  }
}

/**
 * Describe a value's runtime type for diagnostics
 */
export function describeType(value: unknown): string {
  return getValueType(value) ?? typeof value
}
