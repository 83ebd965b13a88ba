/**
 * Operator handler contract
 *
 * A handler receives the resolved field value, its operand and a context
 * giving recursive access to the engine. It answers with a ClauseVerdict:
 * `true`/`false` when the clause applies, or an Undetermined verdict when
 * it cannot be decided (type mismatch, malformed operand, unknown operator).
 *
 * Handlers may also throw an EvaluationError; the predicate evaluator turns
 * it into an UNDETERMINED result carrying the error message.
 *
 * @module query/operators/types
 */

import { ErrorCode } from '../../errors'
import type { Logger } from '../../utils/logger'
import { describeType } from '../../utils/comparison'
import type { RegexCache } from '../regex-cache'

/**
 * Verdict for a clause that could not be decided
 */
export interface Undetermined {
  readonly undetermined: true
  readonly code: ErrorCode
  readonly reason: string
}

export type ClauseVerdict = boolean | Undetermined

export function undetermined(code: ErrorCode, reason: string): Undetermined {
  return { undetermined: true, code, reason }
}

export function isUndetermined(verdict: unknown): verdict is Undetermined {
  return typeof verdict === 'object' && verdict !== null && 'undetermined' in verdict && verdict.undetermined === true
}

/**
 * Undetermined verdict for a malformed operand
 */
export function invalidOperand(operator: string, expected: string): Undetermined {
  return undetermined(ErrorCode.INVALID_OPERAND, `Invalid operand for ${operator}: expected ${expected}`)
}

/**
 * Undetermined verdict for a value the operator cannot handle
 */
export function typeMismatch(operator: string, expected: string, value: unknown): Undetermined {
  return undetermined(
    ErrorCode.TYPE_MISMATCH,
    `Type mismatch for ${operator}: expected ${expected}, got ${describeType(value)}`
  )
}

/**
 * Engine access handed to every handler
 */
export interface OperatorContext {
  /** Evaluate an operator map against a value (used by $not, $and, $or, $elemMatch) */
  evaluate(value: unknown, operators: Record<string, unknown>): ClauseVerdict
  /**
   * Match a field query against a sub-document. Non-object values and
   * missing fields are non-matches.
   */
  matchQuery(value: unknown, query: Record<string, unknown>): ClauseVerdict
  /** The operator map the current clause belongs to */
  readonly operators: Readonly<Record<string, unknown>>
  readonly regexCache: RegexCache
  /** Current time in epoch milliseconds */
  now(): number
  readonly logger: Logger
}

export type OperatorHandler = (value: unknown, operand: unknown, context: OperatorContext) => ClauseVerdict

/**
 * A family of handlers keyed by operator name
 */
export type OperatorTable = Readonly<Record<string, OperatorHandler>>
