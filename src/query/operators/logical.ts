/**
 * Logical operators: $and, $or, $not
 *
 * Each applies nested operator maps to the same field value. Every branch
 * is evaluated so an unknown operator anywhere is still reported; the first
 * undetermined branch decides the clause.
 *
 * A malformed operand (not a list, or a list holding non-maps) does not
 * match.
 */

import { isRecord } from '../../utils/comparison'
import { isUndetermined, type ClauseVerdict, type OperatorContext, type OperatorTable } from './types'

function evaluateBranches(
  value: unknown,
  operand: unknown,
  context: OperatorContext
): boolean[] | ClauseVerdict {
  if (!Array.isArray(operand) || !operand.every(isRecord)) return false

  const verdicts: boolean[] = []
  for (const branch of operand) {
    const verdict = context.evaluate(value, branch)
    if (isUndetermined(verdict)) return verdict
    verdicts.push(verdict)
  }
  return verdicts
}

export const logicalOperators: OperatorTable = {
  $and: (value, operand, context) => {
    const verdicts = evaluateBranches(value, operand, context)
    return Array.isArray(verdicts) ? verdicts.every(Boolean) : verdicts
  },

  $or: (value, operand, context) => {
    const verdicts = evaluateBranches(value, operand, context)
    return Array.isArray(verdicts) ? verdicts.some(Boolean) : verdicts
  },

  // An undetermined inner clause stays undetermined
  $not: (value, operand, context) => {
    if (!isRecord(operand)) return false
    const verdict = context.evaluate(value, operand)
    return isUndetermined(verdict) ? verdict : !verdict
  },
}
