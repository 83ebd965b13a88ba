/**
 * Comparison operators: $eq, $ne, $gt, $gte, $lt, $lte
 *
 * Equality is deep and never a type mismatch (`1` and `"1"` are simply
 * unequal). Ordering is only defined for number/number and string/string;
 * any other pairing is undetermined.
 */

import { compareValues, deepEqual } from '../../utils/comparison'
import { invalidOperand, typeMismatch, type OperatorHandler, type OperatorTable } from './types'

function isOrderable(operand: unknown): operand is number | string {
  return typeof operand === 'string' || (typeof operand === 'number' && !Number.isNaN(operand))
}

function ordering(operator: string, test: (cmp: number) => boolean): OperatorHandler {
  return (value, operand) => {
    if (!isOrderable(operand)) return invalidOperand(operator, 'a number or string')

    const cmp = compareValues(value, operand)
    if (cmp === undefined) return typeMismatch(operator, typeof operand, value)
    return test(cmp)
  }
}

export const comparisonOperators: OperatorTable = {
  $eq: (value, operand) => deepEqual(value, operand),
  $ne: (value, operand) => !deepEqual(value, operand),
  $gt: ordering('$gt', cmp => cmp > 0),
  $gte: ordering('$gte', cmp => cmp >= 0),
  $lt: ordering('$lt', cmp => cmp < 0),
  $lte: ordering('$lte', cmp => cmp <= 0),
}
