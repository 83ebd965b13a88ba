/**
 * Collection operators: $in, $nin, $all, $size
 */

import { deepEqual } from '../../utils/comparison'
import { invalidOperand, typeMismatch, type OperatorTable } from './types'

function includesDeep(list: readonly unknown[], value: unknown): boolean {
  return list.some(item => deepEqual(item, value))
}

export const collectionOperators: OperatorTable = {
  // Whole-value membership: a list value must equal one operand element
  $in: (value, operand) => {
    if (!Array.isArray(operand)) return invalidOperand('$in', 'a list')
    return includesDeep(operand, value)
  },

  $nin: (value, operand) => {
    if (!Array.isArray(operand)) return invalidOperand('$nin', 'a list')
    return !includesDeep(operand, value)
  },

  // Set containment; duplicates in the operand need only one match each
  $all: (value, operand) => {
    if (!Array.isArray(operand)) return invalidOperand('$all', 'a list')
    if (!Array.isArray(value)) return typeMismatch('$all', 'array', value)
    return operand.every(required => includesDeep(value, required))
  },

  $size: (value, operand) => {
    if (typeof operand !== 'number' || !Number.isInteger(operand) || operand < 0) {
      return invalidOperand('$size', 'a non-negative integer')
    }
    if (!Array.isArray(value)) return typeMismatch('$size', 'array', value)
    return value.length === operand
  },
}
