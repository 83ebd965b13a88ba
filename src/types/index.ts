/**
 * docspec Type Definitions
 *
 * | Module        | Description                                              |
 * |---------------|----------------------------------------------------------|
 * | document      | DocumentValue, Query, OperatorMap                        |
 * | specification | Predicate, PredicateGroup, Junction, Specification       |
 * | result        | EvaluationState, PredicateResult, GroupResult, summaries |
 *
 * @module types
 */

export type {
  DocumentScalar,
  DocumentValue,
  BuiltinOperatorName,
  OperatorMap,
  Condition,
  Query,
} from './document'

export type { Predicate, PredicateGroup, Specification } from './specification'
export { Junction, createPredicate, createGroup, createSpecification } from './specification'

export type { PredicateResult, GroupResult, EvaluationSummary, EvaluationOutcome } from './result'
export { EvaluationState } from './result'
