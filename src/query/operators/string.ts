/**
 * String operators: $contains, $startsWith, $endsWith
 *
 * Case-sensitive. `$contains` doubles as list membership when the field
 * holds a list. Any other combination does not match.
 */

import { deepEqual } from '../../utils/comparison'
import type { OperatorHandler, OperatorTable } from './types'

function stringTest(test: (value: string, operand: string) => boolean): OperatorHandler {
  return (value, operand) => {
    if (typeof value !== 'string' || typeof operand !== 'string') return false
    return test(value, operand)
  }
}

const substring = stringTest((value, operand) => value.includes(operand))

export const stringOperators: OperatorTable = {
  $contains: (value, operand, context) => {
    if (Array.isArray(value)) return value.some(item => deepEqual(item, operand))
    return substring(value, operand, context)
  },
  $startsWith: stringTest((value, operand) => value.startsWith(operand)),
  $endsWith: stringTest((value, operand) => value.endsWith(operand)),
}
