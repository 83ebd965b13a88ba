/**
 * Pattern operators: $regex and its companion $options
 *
 * `$regex` is a search: the pattern may match anywhere in the value unless
 * it is anchored. Flags come from a sibling `$options` clause, restricted
 * to `i`, `m`, `s` and `u`.
 *
 * The pattern and flags are checked before the value, so a malformed
 * pattern is undetermined whatever the field holds.
 */

import { ALLOWED_REGEX_FLAGS } from '../../constants'
import { ErrorCode } from '../../errors'
import {
  invalidOperand,
  isUndetermined,
  undetermined,
  type OperatorTable,
  type Undetermined,
} from './types'

/**
 * Validate a `$options` operand, returning the flag string
 */
export function parseRegexFlags(options: unknown): string | Undetermined {
  if (options === undefined) return ''
  if (typeof options !== 'string') return invalidOperand('$options', 'a string of regex flags')

  for (const [index, flag] of [...options].entries()) {
    if (!ALLOWED_REGEX_FLAGS.includes(flag) || options.indexOf(flag) !== index) {
      return undetermined(
        ErrorCode.INVALID_OPERAND,
        `Invalid regex flags '${options}': allowed flags are ${[...ALLOWED_REGEX_FLAGS].join(', ')}, each at most once`
      )
    }
  }
  return options
}

export const patternOperators: OperatorTable = {
  $regex: (value, operand, context) => {
    if (typeof operand !== 'string') {
      return undetermined(ErrorCode.INVALID_PATTERN, 'Invalid pattern for $regex: expected a string')
    }

    const flags = parseRegexFlags(context.operators.$options)
    if (isUndetermined(flags)) return flags

    let regex: RegExp
    try {
      regex = context.regexCache.compile(operand, flags)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return undetermined(ErrorCode.INVALID_PATTERN, `Invalid pattern '${operand}': ${message}`)
    }

    return typeof value === 'string' && regex.test(value)
  },

  // Read by $regex; on its own it only validates the flags
  $options: (_value, operand) => {
    const flags = parseRegexFlags(operand)
    return isUndetermined(flags) ? flags : true
  },
}
