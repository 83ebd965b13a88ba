/**
 * Path Resolution Tests
 */

import { describe, it, expect } from 'vitest'
import { resolvePath } from '../../../src/query/path'

describe('resolvePath', () => {
  const document = {
    name: 'Ada',
    nothing: null,
    customer: {
      address: { city: 'Leeds', postcode: 'LS1' },
      tags: ['vip', 'trade'],
    },
    items: [{ sku: 'A1' }],
  }

  it('resolves a top-level field', () => {
    expect(resolvePath(document, 'name')).toEqual({ found: true, value: 'Ada' })
  })

  it('resolves nested fields', () => {
    expect(resolvePath(document, 'customer.address.city')).toEqual({ found: true, value: 'Leeds' })
  })

  it('resolves a nested mapping as a whole', () => {
    expect(resolvePath(document, 'customer.address')).toEqual({
      found: true,
      value: { city: 'Leeds', postcode: 'LS1' },
    })
  })

  it('distinguishes a present null from a missing key', () => {
    expect(resolvePath(document, 'nothing')).toEqual({ found: true, value: null })
    expect(resolvePath(document, 'absent')).toEqual({ found: false, path: 'absent' })
  })

  it('reports the full requested path when an intermediate key is missing', () => {
    expect(resolvePath(document, 'customer.phone.mobile')).toEqual({
      found: false,
      path: 'customer.phone.mobile',
    })
  })

  it('does not descend through null', () => {
    expect(resolvePath(document, 'nothing.deeper')).toEqual({ found: false, path: 'nothing.deeper' })
  })

  it('does not descend through scalars', () => {
    expect(resolvePath(document, 'name.length')).toEqual({ found: false, path: 'name.length' })
  })

  it('treats lists as terminal values', () => {
    expect(resolvePath(document, 'customer.tags')).toEqual({ found: true, value: ['vip', 'trade'] })
    expect(resolvePath(document, 'customer.tags.0')).toEqual({ found: false, path: 'customer.tags.0' })
    expect(resolvePath(document, 'items.sku')).toEqual({ found: false, path: 'items.sku' })
  })

  it('never resolves through the prototype chain', () => {
    expect(resolvePath(document, 'constructor')).toEqual({ found: false, path: 'constructor' })
    expect(resolvePath(document, 'customer.toString')).toEqual({ found: false, path: 'customer.toString' })
  })

  it('treats empty paths and empty segments as missing', () => {
    expect(resolvePath(document, '')).toEqual({ found: false, path: '' })
    expect(resolvePath(document, 'customer..city')).toEqual({ found: false, path: 'customer..city' })
  })

  it('treats a non-object document as having no fields', () => {
    expect(resolvePath(null, 'a')).toEqual({ found: false, path: 'a' })
    expect(resolvePath(['a'], 'length')).toEqual({ found: false, path: 'length' })
  })

  it('resolves keys that contain no dots only as single segments', () => {
    expect(resolvePath({ 'a.b': 1 }, 'a.b')).toEqual({ found: false, path: 'a.b' })
  })
})
