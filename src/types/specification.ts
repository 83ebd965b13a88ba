/**
 * Specification model: predicates, groups and the specification itself
 */

import type { Query } from './document'

/**
 * A single named condition over one or more document field paths
 */
export interface Predicate {
  /** Unique within a specification */
  id: string
  query: Query
}

/**
 * How a group combines its members
 */
export enum Junction {
  AND = 'AND',
  OR = 'OR',
}

/**
 * A named AND/OR composition of predicates.
 *
 * Members usually reference top-level predicates by id and carry an empty
 * query; a member with its own query is evaluated as declared when no
 * top-level predicate has its id.
 */
export interface PredicateGroup {
  id: string
  junction: Junction
  members: Predicate[]
}

/**
 * An immutable set of predicates and groups, reusable across documents
 */
export interface Specification {
  id: string
  predicates: Predicate[]
  groups: PredicateGroup[]
}

// =============================================================================
// Factories
// =============================================================================

export function createPredicate(id: string, query: Query = {}): Predicate {
  return { id, query }
}

/**
 * Create a group, defaulting the junction to AND
 *
 * Members may be given as predicates or as bare ids (reference-only members).
 *
 * @example
 * ```typescript
 * const eligible = createGroup('eligible', ['adult', 'resident'])
 * const anyContact = createGroup('contact', ['has-email', 'has-phone'], Junction.OR)
 * ```
 */
export function createGroup(
  id: string,
  members: ReadonlyArray<Predicate | string>,
  junction: Junction = Junction.AND
): PredicateGroup {
  return {
    id,
    junction,
    members: members.map(member => (typeof member === 'string' ? createPredicate(member) : member)),
  }
}

export function createSpecification(
  id: string,
  predicates: Predicate[],
  groups: PredicateGroup[] = []
): Specification {
  return { id, predicates, groups }
}
