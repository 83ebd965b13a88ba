/**
 * Document and query types
 */

// =============================================================================
// Documents
// =============================================================================

/** A scalar leaf of a document tree */
export type DocumentScalar = null | boolean | number | string

/**
 * A deserialized document: nested mappings and lists of scalars.
 *
 * Evaluation entry points accept `unknown` and narrow at run time, since
 * documents usually arrive straight from a JSON or YAML parser.
 */
export type DocumentValue = DocumentScalar | DocumentValue[] | { [key: string]: DocumentValue }

// =============================================================================
// Queries
// =============================================================================

/** Names of the operators shipped with the engine */
export type BuiltinOperatorName =
  | '$eq'
  | '$ne'
  | '$gt'
  | '$gte'
  | '$lt'
  | '$lte'
  | '$in'
  | '$nin'
  | '$all'
  | '$size'
  | '$exists'
  | '$type'
  | '$regex'
  | '$options'
  | '$elemMatch'
  | '$and'
  | '$or'
  | '$not'
  | '$between'
  | '$dateBefore'
  | '$dateAfter'
  | '$contains'
  | '$startsWith'
  | '$endsWith'

/**
 * Operator name to operand
 *
 * @example
 * const adult: OperatorMap = { $gte: 18, $lt: 65 }
 */
export type OperatorMap = { [K in BuiltinOperatorName]?: unknown } & Record<string, unknown>

/**
 * Condition on one field: an operator map, or a bare value meaning `$eq`
 */
export type Condition = OperatorMap | DocumentValue

/**
 * Field path to condition
 *
 * @example
 * const query: Query = {
 *   'customer.age': { $gte: 18 },
 *   status: 'active',
 * }
 */
export type Query = Record<string, Condition>
