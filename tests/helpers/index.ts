/**
 * Test Helpers Module
 *
 * @example
 * ```typescript
 * import { createTestEvaluator, createMockLogger } from '../../helpers'
 *
 * const { check } = createTestEvaluator()
 * expect(check({ age: 25 }, { age: { $gte: 18 } })).toBeMatched()
 * ```
 */

import { vi } from 'vitest'
import { PredicateEvaluator, type PredicateEvaluatorOptions } from '../../src/query/predicate'
import type { PredicateResult, Query } from '../../src/types'

/** Fixed clock for date tests: 2025-06-15T00:00:00.000Z */
export const TEST_NOW = Date.UTC(2025, 5, 15)

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }
}

/**
 * Predicate evaluator pinned to TEST_NOW, plus a shorthand that evaluates
 * a single query under the id 'test'
 */
export function createTestEvaluator(options: PredicateEvaluatorOptions = {}): {
  evaluator: PredicateEvaluator
  check: (document: unknown, query: Query) => PredicateResult
} {
  const evaluator = new PredicateEvaluator({ now: () => TEST_NOW, ...options })
  return {
    evaluator,
    check: (document, query) => evaluator.evaluate(document, { id: 'test', query }),
  }
}
