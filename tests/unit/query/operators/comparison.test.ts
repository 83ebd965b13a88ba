/**
 * Comparison Operator Tests
 *
 * $eq, $ne, $gt, $gte, $lt, $lte and bare-value equality.
 */

import { describe, it, expect } from 'vitest'
import { createTestEvaluator } from '../../../helpers'

const { check } = createTestEvaluator()

// =============================================================================
// Equality
// =============================================================================

describe('$eq / $ne', () => {
  it('matches equal scalars', () => {
    expect(check({ status: 'active' }, { status: { $eq: 'active' } })).toBeMatched()
    expect(check({ status: 'active' }, { status: { $eq: 'closed' } })).toBeNotMatched()
  })

  it('treats a bare value as $eq', () => {
    expect(check({ status: 'active' }, { status: 'active' })).toBeMatched()
    expect(check({ count: 3 }, { count: 4 })).toBeNotMatched()
  })

  it('compares numbers by value', () => {
    expect(check({ age: 25 }, { age: { $eq: 25.0 } })).toBeMatched()
  })

  it('compares lists and mappings structurally', () => {
    expect(check({ tags: ['a', 'b'] }, { tags: { $eq: ['a', 'b'] } })).toBeMatched()
    expect(check({ tags: ['a', 'b'] }, { tags: ['b', 'a'] })).toBeNotMatched()
    expect(check({ address: { city: 'Leeds', zip: 'LS1' } }, { address: { zip: 'LS1', city: 'Leeds' } })).toBeMatched()
  })

  it('matches a present null', () => {
    expect(check({ value: null }, { value: null })).toBeMatched()
    expect(check({ value: null }, { value: { $eq: 0 } })).toBeNotMatched()
  })

  it('never reports a type mismatch for equality', () => {
    expect(check({ age: 25 }, { age: '25' })).toBeNotMatched()
    expect(check({ age: 25 }, { age: { $ne: '25' } })).toBeMatched()
  })

  it('negates equality with $ne', () => {
    expect(check({ status: 'active' }, { status: { $ne: 'closed' } })).toBeMatched()
    expect(check({ status: 'active' }, { status: { $ne: 'active' } })).toBeNotMatched()
  })
})

// =============================================================================
// Ordering
// =============================================================================

describe('$gt / $gte / $lt / $lte', () => {
  it('orders numbers', () => {
    const document = { age: 25 }
    expect(check(document, { age: { $gt: 18 } })).toBeMatched()
    expect(check(document, { age: { $gt: 25 } })).toBeNotMatched()
    expect(check(document, { age: { $gte: 25 } })).toBeMatched()
    expect(check(document, { age: { $lt: 30 } })).toBeMatched()
    expect(check(document, { age: { $lt: 25 } })).toBeNotMatched()
    expect(check(document, { age: { $lte: 25 } })).toBeMatched()
  })

  it('orders strings case-sensitively', () => {
    expect(check({ name: 'bob' }, { name: { $gt: 'alice' } })).toBeMatched()
    expect(check({ name: 'Bob' }, { name: { $gt: 'alice' } })).toBeNotMatched()
  })

  it('requires every operator in the map to hold', () => {
    expect(check({ age: 40 }, { age: { $gte: 18, $lt: 65 } })).toBeMatched()
    expect(check({ age: 70 }, { age: { $gte: 18, $lt: 65 } })).toBeNotMatched()
  })

  it('is undetermined when value and operand types differ', () => {
    const result = check({ age: '25' }, { age: { $gt: 18 } })
    expect(result).toBeUndetermined([])
    expect(result.failureReason).toBe('Type mismatch for $gt: expected number, got string')
  })

  it('is undetermined for a null value', () => {
    const result = check({ age: null }, { age: { $gte: 18 } })
    expect(result).toBeUndetermined()
    expect(result.failureReason).toBe('Type mismatch for $gte: expected number, got null')
  })

  it('is undetermined for an operand that cannot be ordered', () => {
    const result = check({ age: 25 }, { age: { $lt: true } })
    expect(result).toBeUndetermined()
    expect(result.failureReason).toBe('Invalid operand for $lt: expected a number or string')
  })
})
