/**
 * Concurrency limiting for async tasks
 *
 * A small p-limit style limiter: at most `concurrency` thunks run at once,
 * the rest wait in FIFO order.
 *
 * @module utils/concurrency
 */

/**
 * A concurrency-limited runner returned by pLimit()
 */
export type LimitFunction = <T>(fn: () => Promise<T> | T) => Promise<T>

/**
 * Create a limiter that runs at most `concurrency` tasks at once
 *
 * @example
 * ```typescript
 * const limit = pLimit(4)
 * const results = await Promise.all(items.map(item => limit(() => work(item))))
 * ```
 */
export function pLimit(concurrency: number): LimitFunction {
  if (!((Number.isInteger(concurrency) || concurrency === Infinity) && concurrency > 0)) {
    throw new TypeError('Expected `concurrency` to be a number from 1 and up')
  }

  const queue: Array<() => void> = []
  let activeCount = 0

  const next = (): void => {
    activeCount--
    queue.shift()?.()
  }

  const execute = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    activeCount++
    try {
      return await fn()
    } finally {
      next()
    }
  }

  return <T>(fn: () => Promise<T> | T): Promise<T> => {
    if (activeCount < concurrency) {
      return execute(fn)
    }
    return new Promise<T>((resolve, reject) => {
      queue.push(() => {
        execute(fn).then(resolve, reject)
      })
    })
  }
}

/**
 * Map items through an async function with bounded concurrency.
 * Results keep the order of `items`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R> | R
): Promise<R[]> {
  const limit = pLimit(concurrency)
  return Promise.all(items.map((item, index) => limit(() => fn(item, index))))
}
