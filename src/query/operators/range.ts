/**
 * Range operator: $between
 *
 * `{ $between: [low, high] }` matches `low <= value <= high` (inclusive) using
 * the same ordering as $gte/$lte. Any operand other than a two-element list
 * does not match.
 */

import { compareValues } from '../../utils/comparison'
import { typeMismatch, type OperatorTable } from './types'

export const rangeOperators: OperatorTable = {
  $between: (value, operand) => {
    if (!Array.isArray(operand) || operand.length !== 2) return false

    const [low, high] = operand
    const fromLow = compareValues(value, low)
    const toHigh = compareValues(value, high)
    if (fromLow === undefined || toHigh === undefined) {
      return typeMismatch('$between', 'a value comparable with both bounds', value)
    }
    return fromLow >= 0 && toHigh <= 0
  },
}
