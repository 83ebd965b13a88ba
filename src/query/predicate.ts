/**
 * Predicate Evaluation
 *
 * Evaluates one predicate's query against one document and produces a
 * tri-state result:
 *
 * - **UNDETERMINED** when the query is empty, a field path does not resolve,
 *   or a clause cannot be decided (unknown operator, type mismatch,
 *   malformed operand, handler failure). Missing paths are reported
 *   together and no clause is evaluated.
 * - **NOT_MATCHED** when every path resolved and some clause is false.
 * - **MATCHED** when every clause holds.
 *
 * Clauses combine with an implicit AND. A false clause does not stop the
 * scan, so a later unknown operator is still reported; the first
 * undetermined clause does.
 *
 * Nothing thrown by a handler escapes evaluate().
 *
 * @module query/predicate
 */

import { DEFINITION_NOT_FOUND_REASON, INTERNAL_ERROR_REASON } from '../constants'
import { resolveEvaluatorConfig, type EvaluatorConfig } from '../config'
import { ErrorCode, UnknownOperatorError, isEvaluationError } from '../errors'
import { consoleLogger, getLogger, withPrefix, type Logger } from '../utils/logger'
import { deepEqual, isOperatorMap, isRecord } from '../utils/comparison'
import type { Predicate } from '../types/specification'
import type { PredicateResult } from '../types/result'
import { resolvePath } from './path'
import { RegexCache } from './regex-cache'
import { createOperatorRegistry, type OperatorRegistry } from './operators/registry'
import {
  isUndetermined,
  undetermined,
  type ClauseVerdict,
  type OperatorContext,
  type Undetermined,
} from './operators/types'
import { matchedResult, notMatchedResult, undeterminedResult } from './result'

export interface PredicateEvaluatorOptions {
  /** Operator table; frozen by the evaluator (default: built-ins only) */
  registry?: OperatorRegistry | undefined
  /** Shared compiled-pattern cache (default: one sized from config) */
  regexCache?: RegexCache | undefined
  /** Overrides applied over DOCSPEC_* environment settings and defaults */
  config?: Partial<EvaluatorConfig> | undefined
  /** Clock for the date operators' "now" (default: Date.now) */
  now?: (() => number) | undefined
  logger?: Logger | undefined
}

export class PredicateEvaluator {
  readonly registry: OperatorRegistry
  readonly regexCache: RegexCache
  readonly config: Readonly<EvaluatorConfig>
  private readonly clock: () => number
  private readonly logger: Logger

  constructor(options: PredicateEvaluatorOptions = {}) {
    this.config = resolveEvaluatorConfig(options.config)
    const baseLogger = options.logger ?? (this.config.debug ? consoleLogger : getLogger)
    this.logger = withPrefix(baseLogger, '[PredicateEvaluator]')
    this.registry = (options.registry ?? createOperatorRegistry({ logger: options.logger })).freeze()
    this.regexCache =
      options.regexCache ??
      new RegexCache({
        maxEntries: this.config.regexCacheSize,
        maxPatternLength: this.config.maxPatternLength,
      })
    this.clock = options.now ?? Date.now
  }

  /**
   * Evaluate a predicate against a document
   */
  evaluate(document: unknown, predicate: Predicate): PredicateResult {
    const { id } = predicate
    try {
      const entries = isRecord(predicate.query) ? Object.entries(predicate.query) : []
      if (entries.length === 0) {
        this.logger.debug(`${id}: ${DEFINITION_NOT_FOUND_REASON}`, { code: ErrorCode.DEFINITION_NOT_FOUND })
        return undeterminedResult(id, DEFINITION_NOT_FOUND_REASON)
      }

      // Resolve every path before evaluating anything
      const missingPaths: string[] = []
      const resolved: Array<{ value: unknown; condition: unknown }> = []
      for (const [path, condition] of entries) {
        const resolution = resolvePath(document, path)
        if (resolution.found) {
          resolved.push({ value: resolution.value, condition })
        } else {
          missingPaths.push(resolution.path)
        }
      }

      if (missingPaths.length > 0) {
        this.logger.debug(`${id}: missing data at ${missingPaths.join(', ')}`, { code: ErrorCode.MISSING_DATA })
        return undeterminedResult(id, undefined, missingPaths)
      }

      let matched = true
      for (const { value, condition } of resolved) {
        const verdict = this.evaluateCondition(value, condition)
        if (isUndetermined(verdict)) {
          this.report(id, verdict)
          return undeterminedResult(id, verdict.reason)
        }
        if (!verdict) matched = false
      }

      return matched ? matchedResult(id) : notMatchedResult(id)
    } catch (error) {
      if (isEvaluationError(error)) {
        this.logger.warn(`${id}: ${error.message}`, { code: error.code })
        return undeterminedResult(id, error.message)
      }
      this.logger.error(`${id}: ${INTERNAL_ERROR_REASON}`, error)
      return undeterminedResult(id, INTERNAL_ERROR_REASON)
    }
  }

  /**
   * Evaluate a field condition: an operator map, or a bare value compared with `$eq`.
   * An empty object is an operator map with no clauses, so it always holds.
   */
  evaluateCondition(value: unknown, condition: unknown): ClauseVerdict {
    if (isOperatorMap(condition) || (isRecord(condition) && Object.keys(condition).length === 0)) {
      return this.evaluateOperators(value, condition)
    }
    return deepEqual(value, condition)
  }

  /**
   * Evaluate every entry of an operator map against one value
   */
  evaluateOperators(value: unknown, operators: Record<string, unknown>): ClauseVerdict {
    const context = this.createContext(operators)

    let matched = true
    for (const [name, operand] of Object.entries(operators)) {
      const handler = this.registry.lookup(name)
      if (!handler) {
        return undetermined(ErrorCode.UNKNOWN_OPERATOR, new UnknownOperatorError(name).message)
      }

      const verdict = handler(value, operand, context)
      if (isUndetermined(verdict)) return verdict
      if (!verdict) matched = false
    }
    return matched
  }

  /**
   * Match a field query against a sub-document. Unlike a top-level
   * predicate, a missing field here is a plain non-match.
   */
  matchQuery(value: unknown, query: Record<string, unknown>): ClauseVerdict {
    if (!isRecord(value)) return false

    let matched = true
    for (const [path, condition] of Object.entries(query)) {
      const resolution = resolvePath(value, path)
      if (!resolution.found) {
        matched = false
        continue
      }

      const verdict = this.evaluateCondition(resolution.value, condition)
      if (isUndetermined(verdict)) return verdict
      if (!verdict) matched = false
    }
    return matched
  }

  private createContext(operators: Record<string, unknown>): OperatorContext {
    return {
      evaluate: (value, nested) => this.evaluateOperators(value, nested),
      matchQuery: (value, query) => this.matchQuery(value, query),
      operators,
      regexCache: this.regexCache,
      now: this.clock,
      logger: this.logger,
    }
  }

  private report(predicateId: string, verdict: Undetermined): void {
    switch (verdict.code) {
      case ErrorCode.UNKNOWN_OPERATOR:
      case ErrorCode.INVALID_PATTERN:
        this.logger.warn(`${predicateId}: ${verdict.reason}`, { code: verdict.code })
        break
      default:
        this.logger.debug(`${predicateId}: ${verdict.reason}`, { code: verdict.code })
    }
  }
}
