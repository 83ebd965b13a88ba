/**
 * docspec Constants
 *
 * Centralized defaults used by the evaluation engine and its configuration.
 */

// =============================================================================
// Concurrency
// =============================================================================

/**
 * Default number of predicate (or group) evaluations in flight at once
 */
export const DEFAULT_CONCURRENCY = 8

// =============================================================================
// Regex
// =============================================================================

/**
 * Default number of compiled patterns kept by the regex cache
 */
export const DEFAULT_REGEX_CACHE_SIZE = 256

/**
 * Default maximum length of a `$regex` pattern
 */
export const DEFAULT_MAX_PATTERN_LENGTH = 1000

/**
 * Flags accepted by `$options`
 */
export const ALLOWED_REGEX_FLAGS = 'imsu'

// =============================================================================
// Operators
// =============================================================================

/**
 * Prefix every operator name carries
 */
export const OPERATOR_PREFIX = '$'

/**
 * Token accepted by the date operators for the current wall-clock time
 */
export const NOW_TOKEN = 'now'

/**
 * Type names understood by `$type`
 */
export const TYPE_NAMES = ['string', 'number', 'boolean', 'array', 'object', 'null'] as const

// =============================================================================
// Diagnostics
// =============================================================================

export const DEFINITION_NOT_FOUND_REASON = 'Predicate definition not found'

export const INTERNAL_ERROR_REASON = 'Internal error while evaluating predicate'

// =============================================================================
// Environment
// =============================================================================

/**
 * Environment variables read by resolveEvaluatorConfig()
 */
export const ENV_CONCURRENCY = 'DOCSPEC_CONCURRENCY'
export const ENV_REGEX_CACHE_SIZE = 'DOCSPEC_REGEX_CACHE_SIZE'
export const ENV_MAX_PATTERN_LENGTH = 'DOCSPEC_MAX_PATTERN_LENGTH'
export const ENV_DEBUG = 'DOCSPEC_DEBUG'
