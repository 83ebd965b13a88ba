/**
 * Specification Evaluation
 *
 * Evaluates a whole specification against a document in two phases:
 *
 * 1. Every top-level predicate runs once, as an independent task through a
 *    concurrency limiter. A task that fails becomes an UNDETERMINED result,
 *    never a failed run. Results are cached by predicate id.
 * 2. Once phase 1 has settled, each group resolves its members from that
 *    cache. A member with no cached result is evaluated as declared, so a
 *    reference to an undefined predicate reports "Predicate definition not
 *    found" instead of disappearing.
 *
 * The summary counts phase-1 results only; groups are reported separately.
 *
 * @example
 * ```typescript
 * const evaluator = new SpecificationEvaluator()
 * const outcome = await evaluator.evaluate(
 *   { age: 25, country: 'UK' },
 *   createSpecification(
 *     'eligibility',
 *     [createPredicate('adult', { age: { $gte: 18 } }), createPredicate('uk', { country: 'UK' })],
 *     [createGroup('eligible', ['adult', 'uk'])]
 *   )
 * )
 * outcome.groupResults[0].matched // true
 * ```
 *
 * @module query/specification
 */

import { INTERNAL_ERROR_REASON } from '../constants'
import { mapWithConcurrency } from '../utils/concurrency'
import { getLogger, withPrefix, consoleLogger, type Logger } from '../utils/logger'
import { Junction, type Predicate, type PredicateGroup, type Specification } from '../types/specification'
import type { EvaluationOutcome, GroupResult, PredicateResult } from '../types/result'
import { PredicateEvaluator, type PredicateEvaluatorOptions } from './predicate'
import { isMatched, summarize, undeterminedResult } from './result'

export interface SpecificationEvaluatorOptions extends PredicateEvaluatorOptions {
  /** Use an existing predicate evaluator; the other options then only configure logging and concurrency */
  predicateEvaluator?: PredicateEvaluator | undefined
}

export class SpecificationEvaluator {
  readonly predicateEvaluator: PredicateEvaluator
  private readonly logger: Logger

  constructor(options: SpecificationEvaluatorOptions = {}) {
    this.predicateEvaluator = options.predicateEvaluator ?? new PredicateEvaluator(options)
    const baseLogger = options.logger ?? (this.predicateEvaluator.config.debug ? consoleLogger : getLogger)
    this.logger = withPrefix(baseLogger, '[SpecificationEvaluator]')
  }

  get concurrency(): number {
    return this.predicateEvaluator.config.concurrency
  }

  /**
   * Evaluate a specification against one document
   */
  async evaluate(document: unknown, specification: Specification): Promise<EvaluationOutcome> {
    const predicates = this.uniquePredicates(specification)

    // Phase 1: top-level predicates, each evaluated exactly once
    const predicateResults = await mapWithConcurrency(predicates, this.concurrency, predicate =>
      this.evaluatePredicate(document, predicate)
    )
    const cache: ReadonlyMap<string, PredicateResult> = new Map(
      predicateResults.map(result => [result.predicateId, result])
    )

    // Phase 2: groups read the settled cache
    const groupResults = await mapWithConcurrency(specification.groups, this.concurrency, group =>
      this.evaluateGroup(document, group, cache)
    )

    const summary = summarize(predicateResults)
    this.logger.debug(
      `${specification.id}: ${summary.matched} matched, ${summary.notMatched} not matched, ${summary.undetermined} undetermined`
    )

    return Object.freeze({
      specificationId: specification.id,
      predicateResults: Object.freeze(predicateResults),
      groupResults: Object.freeze(groupResults),
      summary,
    })
  }

  /**
   * Evaluate one specification against many documents, in document order
   */
  async evaluateAll(documents: readonly unknown[], specification: Specification): Promise<EvaluationOutcome[]> {
    const outcomes: EvaluationOutcome[] = []
    for (const document of documents) {
      outcomes.push(await this.evaluate(document, specification))
    }
    return outcomes
  }

  private async evaluatePredicate(document: unknown, predicate: Predicate): Promise<PredicateResult> {
    try {
      return this.predicateEvaluator.evaluate(document, predicate)
    } catch (error) {
      this.logger.error(`${predicate.id}: ${INTERNAL_ERROR_REASON}`, error)
      return undeterminedResult(predicate.id, INTERNAL_ERROR_REASON)
    }
  }

  private async evaluateGroup(
    document: unknown,
    group: PredicateGroup,
    cache: ReadonlyMap<string, PredicateResult>
  ): Promise<GroupResult> {
    const memberResults: PredicateResult[] = []
    for (const member of group.members) {
      memberResults.push(cache.get(member.id) ?? (await this.evaluatePredicate(document, member)))
    }

    const matched =
      group.junction === Junction.OR ? memberResults.some(isMatched) : memberResults.every(isMatched)

    return Object.freeze({
      groupId: group.id,
      junction: group.junction,
      memberResults: Object.freeze(memberResults),
      matched,
    })
  }

  /**
   * Top-level predicates with duplicate ids removed; the first definition wins
   */
  private uniquePredicates(specification: Specification): Predicate[] {
    const seen = new Set<string>()
    const unique: Predicate[] = []
    for (const predicate of specification.predicates) {
      if (seen.has(predicate.id)) {
        this.logger.warn(`${specification.id}: duplicate predicate id '${predicate.id}' ignored`)
        continue
      }
      seen.add(predicate.id)
      unique.push(predicate)
    }
    return unique
  }
}
