/**
 * Evaluation result types
 */

import type { Junction } from './specification'

/**
 * Tri-state outcome of evaluating one predicate
 */
export enum EvaluationState {
  /** Every clause held */
  MATCHED = 'MATCHED',
  /** All data was present and at least one clause failed */
  NOT_MATCHED = 'NOT_MATCHED',
  /** Missing data, an unknown operator, or an inapplicable clause */
  UNDETERMINED = 'UNDETERMINED',
}

/**
 * Result of one predicate against one document.
 *
 * A MATCHED result never carries missing paths or a failure reason.
 */
export interface PredicateResult {
  readonly predicateId: string
  readonly state: EvaluationState
  /** Paths that failed to resolve, deduplicated in first-seen order */
  readonly missingPaths: readonly string[]
  readonly failureReason?: string | undefined
}

export interface GroupResult {
  readonly groupId: string
  readonly junction: Junction
  readonly memberResults: readonly PredicateResult[]
  readonly matched: boolean
}

/**
 * Counts over the individual predicate results of a run (groups excluded)
 */
export interface EvaluationSummary {
  readonly total: number
  readonly matched: number
  readonly notMatched: number
  readonly undetermined: number
  /** True when no predicate is UNDETERMINED */
  readonly fullyDetermined: boolean
}

/**
 * Complete result of evaluating a specification against a document
 */
export interface EvaluationOutcome {
  readonly specificationId: string
  readonly predicateResults: readonly PredicateResult[]
  readonly groupResults: readonly GroupResult[]
  readonly summary: EvaluationSummary
}
