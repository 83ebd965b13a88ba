/**
 * Existence and type operators: $exists, $type
 *
 * A field that does not resolve never reaches these handlers: the predicate
 * is already UNDETERMINED for missing data. `$exists` therefore only decides
 * whether the author asked for presence (`true`) or absence (`false`).
 */

import { TYPE_NAMES } from '../../constants'
import { getValueType, type ValueTypeName } from '../../utils/comparison'
import { invalidOperand, type OperatorTable } from './types'

function isTypeName(operand: unknown): operand is ValueTypeName {
  return TYPE_NAMES.some(name => name === operand)
}

export const existenceOperators: OperatorTable = {
  $exists: (_value, operand) => {
    if (typeof operand !== 'boolean') return invalidOperand('$exists', 'a boolean')
    return operand
  },

  $type: (value, operand) => {
    if (!isTypeName(operand)) return invalidOperand('$type', `one of ${TYPE_NAMES.join(', ')}`)
    return getValueType(value) === operand
  },
}
