/**
 * Document path resolution
 *
 * Resolves dot-separated field paths (`customer.address.city`) against a
 * document tree. Resolution reports where it failed instead of collapsing a
 * missing field into `undefined`, so callers can tell "absent" from "null".
 *
 * Lists are terminal: `items.0` does not index into a list, it is missing.
 *
 * @module query/path
 */

import { isRecord } from '../utils/comparison'

/** A path that resolved to a value (possibly `null`) */
export interface PathFound {
  readonly found: true
  readonly value: unknown
}

/** A path that failed to resolve; `path` is the full path as requested */
export interface PathMissing {
  readonly found: false
  readonly path: string
}

export type PathResolution = PathFound | PathMissing

/**
 * Resolve a dot-separated path against a document
 *
 * @example
 * resolvePath({ a: { b: 1 } }, 'a.b') // { found: true, value: 1 }
 * resolvePath({ a: null }, 'a') // { found: true, value: null }
 * resolvePath({ a: null }, 'a.b') // { found: false, path: 'a.b' }
 * resolvePath({ items: [{ x: 1 }] }, 'items.x') // { found: false, path: 'items.x' }
 */
export function resolvePath(document: unknown, path: string): PathResolution {
  const missing: PathMissing = { found: false, path }
  if (path === '') return missing

  let current: unknown = document
  for (const segment of path.split('.')) {
    if (segment === '' || !isRecord(current)) return missing
    if (!Object.prototype.hasOwnProperty.call(current, segment)) return missing
    current = current[segment]
  }

  // Not a document value; only reachable from hand-built objects
  if (current === undefined) return missing

  return { found: true, value: current }
}
