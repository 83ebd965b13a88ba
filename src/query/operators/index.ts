/**
 * Operator table: handler contract, registry and built-in families
 *
 * @module query/operators
 */

export type {
  Undetermined,
  ClauseVerdict,
  OperatorContext,
  OperatorHandler,
  OperatorTable,
} from './types'
export { undetermined, isUndetermined, invalidOperand, typeMismatch } from './types'

export {
  type OperatorRegistryOptions,
  OperatorRegistry,
  BUILTIN_OPERATORS,
  createOperatorRegistry,
} from './registry'

export { comparisonOperators } from './comparison'
export { collectionOperators } from './collection'
export { existenceOperators } from './existence'
export { patternOperators, parseRegexFlags } from './pattern'
export { structuralOperators } from './structural'
export { logicalOperators } from './logical'
export { rangeOperators } from './range'
export { dateOperators, parseInstant } from './date'
export { stringOperators } from './string'
