/**
 * Result construction and inspection helpers
 *
 * @module query/result
 */

import {
  EvaluationState,
  type EvaluationSummary,
  type GroupResult,
  type PredicateResult,
} from '../types/result'

// =============================================================================
// Construction
// =============================================================================

/**
 * Build a frozen PredicateResult. Missing paths are deduplicated, keeping
 * the first occurrence.
 */
export function createPredicateResult(
  predicateId: string,
  state: EvaluationState,
  missingPaths: readonly string[] = [],
  failureReason?: string
): PredicateResult {
  const result: PredicateResult = {
    predicateId,
    state,
    missingPaths: Object.freeze([...new Set(missingPaths)]),
    ...(failureReason !== undefined ? { failureReason } : {}),
  }
  return Object.freeze(result)
}

export function matchedResult(predicateId: string): PredicateResult {
  return createPredicateResult(predicateId, EvaluationState.MATCHED)
}

export function notMatchedResult(predicateId: string): PredicateResult {
  return createPredicateResult(predicateId, EvaluationState.NOT_MATCHED)
}

export function undeterminedResult(
  predicateId: string,
  failureReason?: string,
  missingPaths: readonly string[] = []
): PredicateResult {
  return createPredicateResult(predicateId, EvaluationState.UNDETERMINED, missingPaths, failureReason)
}

// =============================================================================
// Inspection
// =============================================================================

export function isMatched(result: PredicateResult): boolean {
  return result.state === EvaluationState.MATCHED
}

/**
 * True when the predicate could be decided either way
 */
export function isDetermined(result: PredicateResult): boolean {
  return result.state !== EvaluationState.UNDETERMINED
}

/**
 * Human-readable explanation of a result, or undefined when it matched
 *
 * @example
 * describeResult(undeterminedResult('age', undefined, ['age'])) // 'Missing data at: age'
 */
export function describeResult(result: PredicateResult): string | undefined {
  switch (result.state) {
    case EvaluationState.MATCHED:
      return undefined
    case EvaluationState.NOT_MATCHED:
      return 'Non-matching values'
    case EvaluationState.UNDETERMINED:
      if (result.failureReason !== undefined) return result.failureReason
      if (result.missingPaths.length > 0) return `Missing data at: ${result.missingPaths.join(', ')}`
      return 'Evaluation failed'
  }
}

/**
 * Explanations of a group's unmatched members, joined with ', '
 */
export function describeGroup(group: GroupResult): string {
  return group.memberResults
    .map(describeResult)
    .filter((reason): reason is string => reason !== undefined)
    .join(', ')
}

/**
 * Count predicate results by state
 */
export function summarize(results: readonly PredicateResult[]): EvaluationSummary {
  let matched = 0
  let notMatched = 0
  let undetermined = 0

  for (const result of results) {
    switch (result.state) {
      case EvaluationState.MATCHED:
        matched++
        break
      case EvaluationState.NOT_MATCHED:
        notMatched++
        break
      case EvaluationState.UNDETERMINED:
        undetermined++
        break
    }
  }

  return Object.freeze({
    total: results.length,
    matched,
    notMatched,
    undetermined,
    fullyDetermined: undetermined === 0,
  })
}
