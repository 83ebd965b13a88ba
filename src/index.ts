/**
 * docspec
 *
 * Tri-state evaluation of MongoDB-style predicates against structured
 * documents. Predicates resolve to MATCHED, NOT_MATCHED or UNDETERMINED, so
 * missing data and inapplicable clauses are reported instead of read as
 * false.
 *
 * @example
 * ```typescript
 * import { SpecificationEvaluator, createSpecification, createPredicate } from 'docspec'
 *
 * const evaluator = new SpecificationEvaluator()
 * const outcome = await evaluator.evaluate({ age: 25 }, createSpecification('checks', [
 *   createPredicate('adult', { age: { $gte: 18 } }),
 *   createPredicate('named', { name: { $exists: true } }),
 * ]))
 *
 * outcome.summary // { total: 2, matched: 1, notMatched: 0, undetermined: 1, fullyDetermined: false }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Evaluation
// =============================================================================

export * from './query'

// =============================================================================
// Model
// =============================================================================

export * from './types'

// =============================================================================
// Configuration
// =============================================================================

export {
  type EvaluatorConfig,
  type EnvSource,
  type EnvSettings,
  DEFAULT_EVALUATOR_CONFIG,
  resolveEvaluatorConfig,
  validateEvaluatorConfig,
  readEnvSettings,
} from './config'

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  type SerializedError,
  DocSpecError,
  ConfigurationError,
  EvaluationError,
  UnknownOperatorError,
  InvalidOperandError,
  TypeMismatchError,
  isDocSpecError,
  isEvaluationError,
  isConfigurationError,
  wrapError,
} from './errors'

// =============================================================================
// Utilities
// =============================================================================

export {
  type Logger,
  consoleLogger,
  noopLogger,
  getLogger,
  setLogger,
  type LRUCacheOptions,
  type LRUCacheStats,
  LRUCache,
  UnsafeRegexError,
  isRegexSafe,
  deepEqual,
  compareValues,
  getValueType,
  type ValueTypeName,
} from './utils'
