/**
 * PredicateEvaluator Tests
 *
 * Tri-state evaluation of a single predicate: path resolution, clause
 * combination, failure containment and diagnostics.
 */

import { describe, it, expect, vi } from 'vitest'
import { PredicateEvaluator } from '../../../src/query/predicate'
import { createOperatorRegistry } from '../../../src/query/operators/registry'
import { EvaluationState } from '../../../src/types'
import { ErrorCode, InvalidOperandError, TypeMismatchError } from '../../../src/errors'
import { createMockLogger, createTestEvaluator } from '../../helpers'

describe('PredicateEvaluator', () => {
  const { evaluator, check } = createTestEvaluator()

  // ===========================================================================
  // Outcomes
  // ===========================================================================

  describe('outcomes', () => {
    it('matches when every clause holds', () => {
      const result = evaluator.evaluate({ age: 25 }, { id: 'a', query: { age: { $gte: 18 } } })
      expect(result).toEqual({ predicateId: 'a', state: EvaluationState.MATCHED, missingPaths: [] })
    })

    it('is undetermined with the missing path when the field is absent', () => {
      const result = evaluator.evaluate({}, { id: 'a', query: { age: { $gte: 18 } } })
      expect(result).toEqual({ predicateId: 'a', state: EvaluationState.UNDETERMINED, missingPaths: ['age'] })
    })

    it('does not match when a clause is false', () => {
      expect(check({ age: 15 }, { age: { $gte: 18 } })).toBeNotMatched()
    })

    it('combines clauses with an implicit AND', () => {
      const query = { age: { $gte: 18 }, country: 'UK' }
      expect(check({ age: 25, country: 'UK' }, query)).toBeMatched()
      expect(check({ age: 25, country: 'FR' }, query)).toBeNotMatched()
    })

    it('combines operators on one field with an implicit AND', () => {
      expect(check({ age: 25 }, { age: { $gte: 18, $lt: 65 } })).toBeMatched()
      expect(check({ age: 70 }, { age: { $gte: 18, $lt: 65 } })).toBeNotMatched()
    })

    it('compares bare values for deep equality', () => {
      expect(check({ tags: ['a', 'b'] }, { tags: ['a', 'b'] })).toBeMatched()
      expect(check({ tags: ['a', 'b'] }, { tags: ['b', 'a'] })).toBeNotMatched()
    })

    it('resolves dotted paths', () => {
      expect(check({ address: { city: 'London' } }, { 'address.city': 'London' })).toBeMatched()
    })

    it('treats an empty object condition as an operator map with no clauses', () => {
      expect(check({ age: 25 }, { age: {} })).toBeMatched()
      expect(check({ meta: { a: 1 } }, { meta: {} })).toBeMatched()
      expect(check({ age: 25 }, { age: {}, name: {} })).toBeUndetermined(['name'])
    })

    it('does not match an empty $or', () => {
      expect(check({ value: 1 }, { value: { $or: [] } })).toBeNotMatched()
    })
  })

  // ===========================================================================
  // Missing data
  // ===========================================================================

  describe('missing data', () => {
    it('reports every missing path in query order', () => {
      const result = check(
        { name: 'Ada' },
        { age: { $gte: 18 }, name: 'Ada', 'address.city': 'London' }
      )
      expect(result).toBeUndetermined(['age', 'address.city'])
      expect(result.failureReason).toBeUndefined()
    })

    it('evaluates no clause when a path is missing', () => {
      const spy = vi.fn(() => true)
      const registry = createOperatorRegistry().register('$spy', spy)
      const { check: checkWithSpy } = createTestEvaluator({ registry })

      expect(checkWithSpy({ a: 1 }, { a: { $spy: 1 }, b: 1 })).toBeUndetermined(['b'])
      expect(spy).not.toHaveBeenCalled()
    })

    it('treats a null or non-object document as missing every path', () => {
      expect(check(null, { age: { $gte: 18 } })).toBeUndetermined(['age'])
      expect(check('text', { age: 1, name: 'x' })).toBeUndetermined(['age', 'name'])
    })

    it('treats a present null as a value', () => {
      expect(check({ middleName: null }, { middleName: null })).toBeMatched()
      expect(check({ middleName: null }, { middleName: { $type: 'null' } })).toBeMatched()
    })

    it('is undetermined for an empty query', () => {
      const result = check({ age: 25 }, {})
      expect(result).toBeUndetermined()
      expect(result.failureReason).toBe('Predicate definition not found')
    })
  })

  // ===========================================================================
  // Undetermined clauses
  // ===========================================================================

  describe('undetermined clauses', () => {
    it('reports an unknown operator even after a false clause', () => {
      const result = check({ age: 25, name: 'Ada' }, { age: { $lt: 18 }, name: { $soundsLike: 'Ada' } })
      expect(result).toBeUndetermined()
      expect(result.failureReason).toBe('Unknown operator: $soundsLike')
    })

    it('stops at the first undetermined clause', () => {
      const spy = vi.fn(() => true)
      const registry = createOperatorRegistry().register('$spy', spy)
      const { check: checkWithSpy } = createTestEvaluator({ registry })

      const result = checkWithSpy({ a: 1, b: 2 }, { a: { $gt: 'x' }, b: { $spy: true } })
      expect(result.failureReason).toBe('Type mismatch for $gt: expected string, got number')
      expect(spy).not.toHaveBeenCalled()
    })

    it('turns an evaluation error thrown by a handler into its message', () => {
      const registry = createOperatorRegistry()
        .register('$strict', () => {
          throw new InvalidOperandError('$strict', 'Operand for $strict must be positive', -1)
        })
        .register('$typed', () => {
          throw new TypeMismatchError('$typed', 'number', 'string')
        })
      const { check: checkCustom } = createTestEvaluator({ registry })

      expect(checkCustom({ a: 1 }, { a: { $strict: -1 } }).failureReason).toBe(
        'Operand for $strict must be positive'
      )
      expect(checkCustom({ a: 1 }, { a: { $typed: 1 } }).failureReason).toBe(
        'Type mismatch for $typed: expected number, got string'
      )
    })

    it('contains any other handler failure', () => {
      const registry = createOperatorRegistry().register('$broken', () => {
        throw new Error('boom')
      })
      const { check: checkBroken } = createTestEvaluator({ registry })

      const result = checkBroken({ a: 1 }, { a: { $broken: true } })
      expect(result).toBeUndetermined()
      expect(result.failureReason).toBe('Internal error while evaluating predicate')
    })
  })

  // ===========================================================================
  // Custom operators
  // ===========================================================================

  describe('custom operators', () => {
    it('passes the value and operand to the handler', () => {
      const handler = vi.fn((value: unknown, operand: unknown) => value === operand)
      const registry = createOperatorRegistry().register('$same', handler)
      const { check: checkCustom } = createTestEvaluator({ registry })

      expect(checkCustom({ a: 'x' }, { a: { $same: 'x' } })).toBeMatched()
      expect(handler).toHaveBeenCalledTimes(1)
      expect(handler.mock.calls[0]?.[0]).toBe('x')
      expect(handler.mock.calls[0]?.[1]).toBe('x')
    })

    it('works inside logical operators and $elemMatch', () => {
      const registry = createOperatorRegistry().register(
        '$even',
        value => typeof value === 'number' && value % 2 === 0
      )
      const { check: checkCustom } = createTestEvaluator({ registry })

      expect(checkCustom({ n: 3 }, { n: { $not: { $even: true } } })).toBeMatched()
      expect(checkCustom({ ns: [1, 3, 4] }, { ns: { $elemMatch: { $even: true } } })).toBeMatched()
    })
  })

  // ===========================================================================
  // Results
  // ===========================================================================

  describe('results', () => {
    it('are frozen', () => {
      const result = check({}, { age: 1 })
      expect(Object.isFrozen(result)).toBe(true)
      expect(Object.isFrozen(result.missingPaths)).toBe(true)
    })

    it('carry the predicate id', () => {
      expect(evaluator.evaluate({ a: 1 }, { id: 'has-a', query: { a: 1 } }).predicateId).toBe('has-a')
    })
  })

  // ===========================================================================
  // Logging
  // ===========================================================================

  describe('logging', () => {
    it('logs missing data at debug level', () => {
      const logger = createMockLogger()
      createTestEvaluator({ logger }).check({}, { age: 1, name: 'x' })

      expect(logger.debug).toHaveBeenCalledWith('[PredicateEvaluator] test: missing data at age, name', {
        code: ErrorCode.MISSING_DATA,
      })
    })

    it('logs an empty query at debug level', () => {
      const logger = createMockLogger()
      createTestEvaluator({ logger }).check({ a: 1 }, {})

      expect(logger.debug).toHaveBeenCalledWith('[PredicateEvaluator] test: Predicate definition not found', {
        code: ErrorCode.DEFINITION_NOT_FOUND,
      })
    })

    it('warns about unknown operators', () => {
      const logger = createMockLogger()
      createTestEvaluator({ logger }).check({ a: 1 }, { a: { $nope: 1 } })

      expect(logger.warn).toHaveBeenCalledWith('[PredicateEvaluator] test: Unknown operator: $nope', {
        code: ErrorCode.UNKNOWN_OPERATOR,
      })
    })

    it('logs type mismatches at debug level', () => {
      const logger = createMockLogger()
      createTestEvaluator({ logger }).check({ a: 'x' }, { a: { $gt: 1 } })

      expect(logger.debug).toHaveBeenCalledWith(
        '[PredicateEvaluator] test: Type mismatch for $gt: expected number, got string',
        { code: ErrorCode.TYPE_MISMATCH }
      )
      expect(logger.warn).not.toHaveBeenCalled()
    })

    it('logs contained handler failures with the error', () => {
      const logger = createMockLogger()
      const failure = new Error('boom')
      const registry = createOperatorRegistry().register('$broken', () => {
        throw failure
      })
      createTestEvaluator({ logger, registry }).check({ a: 1 }, { a: { $broken: true } })

      expect(logger.error).toHaveBeenCalledWith(
        '[PredicateEvaluator] test: Internal error while evaluating predicate',
        failure
      )
    })
  })

  // ===========================================================================
  // Construction
  // ===========================================================================

  describe('construction', () => {
    it('freezes its registry', () => {
      const own = new PredicateEvaluator()
      expect(own.registry.isFrozen).toBe(true)
      expect(() => own.registry.register('$late', () => true)).toThrow(
        'Cannot register $late: operator registry is frozen'
      )
    })

    it('sizes its regex cache from config', () => {
      const own = new PredicateEvaluator({ config: { regexCacheSize: 1 } })
      own.evaluate({ a: 'x' }, { id: 'p', query: { a: { $regex: 'x' } } })
      own.evaluate({ a: 'y' }, { id: 'p', query: { a: { $regex: 'y' } } })

      expect(own.regexCache.size).toBe(1)
    })

    it('rejects invalid config', () => {
      expect(() => new PredicateEvaluator({ config: { concurrency: 0 } })).toThrow(
        'Invalid concurrency: expected an integer >= 1, got 0'
      )
    })
  })
})
