/**
 * Safe regex creation with ReDoS protection
 *
 * `$regex` operands come from specification authors, so patterns are
 * screened before compilation:
 *
 * 1. **Length limit**: patterns longer than `maxLength` are rejected.
 * 2. **Dangerous constructs**: nested quantifiers such as `(a+)+`, quantified
 *    optional or empty groups, and very large repetition counts.
 * 3. **Star height**: nesting of `*` / `+` / `{n,}` beyond `maxStarHeight`.
 * 4. **Backreferences**: rejected unless explicitly allowed.
 *
 * A pattern that passes screening can still be a syntax error; that surfaces
 * as the `SyntaxError` thrown by the RegExp constructor.
 *
 * @module utils/safe-regex
 */

import { DocSpecError, ErrorCode } from '../errors'
import { DEFAULT_MAX_PATTERN_LENGTH } from '../constants'

/**
 * Configuration options for regex safety checks
 */
export interface SafeRegexOptions {
  /** Maximum allowed pattern length (default: 1000) */
  maxLength?: number | undefined
  /** Maximum star height (nested repetitions) allowed (default: 1) */
  maxStarHeight?: number | undefined
  /** Allow backreferences like \1, \2 (default: false) */
  allowBackreferences?: boolean | undefined
}

const DEFAULT_OPTIONS = {
  maxLength: DEFAULT_MAX_PATTERN_LENGTH,
  maxStarHeight: 1,
  allowBackreferences: false,
}

/**
 * Error thrown when a regex pattern is considered unsafe
 */
export class UnsafeRegexError extends DocSpecError {
  override readonly name = 'UnsafeRegexError'

  constructor(
    message: string,
    public readonly pattern: string
  ) {
    super(`Unsafe regex pattern: ${message}`, ErrorCode.INVALID_PATTERN, { pattern })
    Object.setPrototypeOf(this, UnsafeRegexError.prototype)
  }
}

/**
 * Constructs known to cause catastrophic backtracking
 */
const DANGEROUS_PATTERNS: Array<{ pattern: RegExp; description: string }> = [
  // (a+)+, (a*)*, (a+){2,}
  { pattern: /\([^)]*[+*]\)[+*{]/, description: 'nested quantifiers' },
  // (.+)+
  { pattern: /\(\.[+*]\)[+*]/, description: 'repeated wildcard group' },
  // (a?)+
  { pattern: /\([^)]*\?\)[+*]/, description: 'quantified optional group' },
  // ()+
  { pattern: /\(\)[+*?]/, description: 'empty quantified group' },
  // a{1000,}
  { pattern: /\{\d{4,},?\d*\}/, description: 'excessive repetition count' },
]

function hasBackreferences(pattern: string): boolean {
  return /\\[1-9]|\\k</.test(pattern)
}

/**
 * Calculate the "star height" of a pattern: the deepest nesting of unbounded
 * repetition. `a*` has height 1, `(a*)*` height 2.
 */
function calculateStarHeight(pattern: string): number {
  // Height of the unbounded repetitions inside each open group
  const stack: number[] = [0]
  let lastGroupHeight = 0
  let maxHeight = 0
  let inCharClass = false

  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]

    if (char === '\\') {
      i++
      lastGroupHeight = 0
      continue
    }
    if (inCharClass) {
      if (char === ']') inCharClass = false
      continue
    }

    if (char === '[') {
      inCharClass = true
      lastGroupHeight = 0
    } else if (char === '(') {
      stack.push(0)
      lastGroupHeight = 0
    } else if (char === ')') {
      lastGroupHeight = stack.length > 1 ? (stack.pop() ?? 0) : 0
      const top = stack.length - 1
      stack[top] = Math.max(stack[top] ?? 0, lastGroupHeight)
      continue
    } else if (char === '*' || char === '+' || (char === '{' && /^\{\d+,\}/.test(pattern.slice(i)))) {
      const height = lastGroupHeight + 1
      const top = stack.length - 1
      stack[top] = Math.max(stack[top] ?? 0, height)
      maxHeight = Math.max(maxHeight, height)
      lastGroupHeight = 0
    } else {
      lastGroupHeight = 0
    }
  }

  return maxHeight
}

/**
 * Validate a regex pattern for safety
 *
 * @throws {UnsafeRegexError} If the pattern is considered unsafe
 */
export function validateRegexPattern(pattern: string, options: SafeRegexOptions = {}): void {
  const opts = {
    maxLength: options.maxLength ?? DEFAULT_OPTIONS.maxLength,
    maxStarHeight: options.maxStarHeight ?? DEFAULT_OPTIONS.maxStarHeight,
    allowBackreferences: options.allowBackreferences ?? DEFAULT_OPTIONS.allowBackreferences,
  }

  if (pattern.length > opts.maxLength) {
    throw new UnsafeRegexError(
      `Pattern exceeds maximum length of ${opts.maxLength} characters`,
      pattern
    )
  }

  if (!opts.allowBackreferences && hasBackreferences(pattern)) {
    throw new UnsafeRegexError('Backreferences are not allowed', pattern)
  }

  for (const { pattern: dangerousPattern, description } of DANGEROUS_PATTERNS) {
    if (dangerousPattern.test(pattern)) {
      throw new UnsafeRegexError(`Pattern contains dangerous construct: ${description}`, pattern)
    }
  }

  const starHeight = calculateStarHeight(pattern)
  if (starHeight > opts.maxStarHeight) {
    throw new UnsafeRegexError(
      `Pattern has star height of ${starHeight}, which exceeds maximum of ${opts.maxStarHeight}`,
      pattern
    )
  }
}

/**
 * Create a RegExp safely from a pattern string
 *
 * @throws {UnsafeRegexError} If the pattern is considered unsafe
 * @throws {SyntaxError} If the pattern is invalid regex syntax
 *
 * @example
 * ```typescript
 * const regex = createSafeRegex('^admin', 'i')
 *
 * // Throws UnsafeRegexError
 * createSafeRegex('(a+)+$')
 * ```
 */
export function createSafeRegex(pattern: string, flags?: string, options?: SafeRegexOptions): RegExp {
  validateRegexPattern(pattern, options)
  return new RegExp(pattern, flags ?? '')
}

/**
 * Check if a pattern is safe without throwing
 */
export function isRegexSafe(pattern: string, options?: SafeRegexOptions): boolean {
  try {
    validateRegexPattern(pattern, options)
    return true
  } catch (error) {
    if (error instanceof UnsafeRegexError) return false
    throw error
  }
}
