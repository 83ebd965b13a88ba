/**
 * Structural operator: $elemMatch
 *
 * Two operand forms:
 * - an operator map (`{ $gte: 80 }`) is applied to each element directly;
 * - a field query (`{ sku: 'A1', qty: { $gt: 2 } }`) is matched against each
 *   element as a sub-document.
 */

import { isOperatorMap, isRecord } from '../../utils/comparison'
import { invalidOperand, isUndetermined, type OperatorTable } from './types'

export const structuralOperators: OperatorTable = {
  $elemMatch: (value, operand, context) => {
    if (!isRecord(operand)) return invalidOperand('$elemMatch', 'an operator map or a field query')
    if (!Array.isArray(value)) return false

    const condition = operand
    const matchElement = isOperatorMap(condition)
      ? (element: unknown) => context.evaluate(element, condition)
      : (element: unknown) => context.matchQuery(element, condition)

    let matched = false
    for (const element of value) {
      const verdict = matchElement(element)
      if (isUndetermined(verdict)) return verdict
      if (verdict) matched = true
    }
    return matched
  },
}
