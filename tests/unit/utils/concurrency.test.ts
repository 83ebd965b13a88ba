/**
 * Concurrency Limiter Tests
 */

import { describe, it, expect } from 'vitest'
import { mapWithConcurrency, pLimit } from '../../../src/utils/concurrency'

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

describe('pLimit', () => {
  it('rejects a concurrency below 1', () => {
    expect(() => pLimit(0)).toThrow('Expected `concurrency` to be a number from 1 and up')
    expect(() => pLimit(1.5)).toThrow(TypeError)
  })

  it('accepts an unbounded concurrency', () => {
    expect(() => pLimit(Infinity)).not.toThrow()
  })

  it('never runs more tasks than allowed', async () => {
    const limit = pLimit(2)
    let active = 0
    let peak = 0

    const task = async (ms: number) => {
      active++
      peak = Math.max(peak, active)
      await delay(ms)
      active--
      return ms
    }

    const results = await Promise.all([5, 1, 3, 2, 4].map(ms => limit(() => task(ms))))

    expect(results).toEqual([5, 1, 3, 2, 4])
    expect(peak).toBe(2)
  })

  it('accepts synchronous thunks', async () => {
    const limit = pLimit(1)
    expect(await limit(() => 42)).toBe(42)
  })

  it('propagates a rejection and keeps going', async () => {
    const limit = pLimit(1)

    const failed = limit(async () => {
      throw new Error('boom')
    })
    const next = limit(() => 'after')

    await expect(failed).rejects.toThrow('boom')
    expect(await next).toBe('after')
  })
})

describe('mapWithConcurrency', () => {
  it('keeps the order of the input', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms)
      return `${index}:${ms}`
    })

    expect(results).toEqual(['0:30', '1:10', '2:20'])
  })

  it('runs tasks one at a time with a concurrency of 1', async () => {
    const order: string[] = []
    await mapWithConcurrency(['a', 'b', 'c'], 1, async item => {
      order.push(`start ${item}`)
      await delay(1)
      order.push(`end ${item}`)
    })

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c'])
  })

  it('returns an empty list for no items', async () => {
    expect(await mapWithConcurrency([], 4, item => item)).toEqual([])
  })
})
