/**
 * docspec Error Handling Module
 *
 * Provides the error hierarchy used across the evaluation engine.
 * All errors extend from DocSpecError which provides:
 * - Error codes for programmatic handling
 * - Serialization support
 * - Cause chaining for debugging
 * - Type guards for error checking
 *
 * Evaluation itself never throws past a predicate boundary: these errors are
 * raised by configuration and registry misuse, or thrown by operator handlers
 * and converted into UNDETERMINED results by the predicate evaluator.
 *
 * Error Hierarchy:
 * - DocSpecError (base class)
 *   - ConfigurationError (invalid configuration, registry misuse)
 *   - EvaluationError (failures raised while matching a clause)
 *     - UnknownOperatorError (operator name absent from the table)
 *     - InvalidOperandError (malformed operand for an operator)
 *     - TypeMismatchError (value/operand runtime types are incompatible)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for docspec operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Evaluation errors
  MISSING_DATA = 'MISSING_DATA',
  UNKNOWN_OPERATOR = 'UNKNOWN_OPERATOR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  INVALID_OPERAND = 'INVALID_OPERAND',
  INVALID_PATTERN = 'INVALID_PATTERN',
  DEFINITION_NOT_FOUND = 'DEFINITION_NOT_FOUND',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INVALID_CONFIG = 'INVALID_CONFIG',
  REGISTRY_FROZEN = 'REGISTRY_FROZEN',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (included outside production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all docspec errors.
 *
 * @example
 * ```typescript
 * throw new DocSpecError('Operation failed', ErrorCode.INTERNAL, {
 *   predicateId: 'age-check',
 * })
 * ```
 */
export class DocSpecError extends Error {
  override readonly name: string = 'DocSpecError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error to a plain object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: process.env.NODE_ENV !== 'production' ? this.stack : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof DocSpecError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid or the operator registry is misused.
 */
export class ConfigurationError extends DocSpecError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }

  get configKey(): string | undefined {
    const key = this.context.configKey
    return typeof key === 'string' ? key : undefined
  }
}

// =============================================================================
// Evaluation Errors
// =============================================================================

/**
 * Error raised while matching a single clause.
 *
 * Handlers may throw any subclass; the predicate evaluator turns it into an
 * UNDETERMINED result carrying the error message as its failure reason.
 */
export class EvaluationError extends DocSpecError {
  override readonly name: string = 'EvaluationError'

  constructor(
    message: string,
    code: ErrorCode,
    context?: {
      operator?: string
      path?: string
      operand?: unknown
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, EvaluationError.prototype)
  }

  get operator(): string | undefined {
    const operator = this.context.operator
    return typeof operator === 'string' ? operator : undefined
  }
}

/**
 * Error for an operator name that is not registered.
 */
export class UnknownOperatorError extends EvaluationError {
  override readonly name = 'UnknownOperatorError'

  constructor(operator: string) {
    super(`Unknown operator: ${operator}`, ErrorCode.UNKNOWN_OPERATOR, { operator })
    Object.setPrototypeOf(this, UnknownOperatorError.prototype)
  }
}

/**
 * Error for a malformed operand (wrong arity, wrong type, bad pattern).
 */
export class InvalidOperandError extends EvaluationError {
  override readonly name = 'InvalidOperandError'

  constructor(operator: string, message: string, operand?: unknown, cause?: Error) {
    super(message, ErrorCode.INVALID_OPERAND, { operator, operand }, cause)
    Object.setPrototypeOf(this, InvalidOperandError.prototype)
  }
}

/**
 * Error for a value whose runtime type the operator cannot compare.
 */
export class TypeMismatchError extends EvaluationError {
  override readonly name = 'TypeMismatchError'

  constructor(operator: string, expectedType: string, actualType: string) {
    super(
      `Type mismatch for ${operator}: expected ${expectedType}, got ${actualType}`,
      ErrorCode.TYPE_MISMATCH,
      { operator }
    )
    Object.setPrototypeOf(this, TypeMismatchError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a DocSpecError
 */
export function isDocSpecError(error: unknown): error is DocSpecError {
  return error instanceof DocSpecError
}

/**
 * Check if an error is an EvaluationError (or any subclass)
 */
export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Wrap an unknown error in a DocSpecError
 */
export function wrapError(error: unknown, context?: Record<string, unknown>): DocSpecError {
  if (error instanceof DocSpecError) {
    return error
  }

  if (error instanceof Error) {
    return new DocSpecError(error.message, ErrorCode.INTERNAL, context, error)
  }

  return new DocSpecError(String(error), ErrorCode.UNKNOWN, context)
}
