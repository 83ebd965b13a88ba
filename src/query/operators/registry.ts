/**
 * Operator Registry
 *
 * Maps operator names to handlers. A registry starts with the built-in
 * operators, accepts custom ones until it is frozen, and is read-only from
 * then on. PredicateEvaluator freezes the registry it is given, so a table
 * never changes while evaluations share it.
 *
 * @example
 * ```typescript
 * const registry = createOperatorRegistry()
 * registry.register('$even', value => typeof value === 'number' && value % 2 === 0)
 * const evaluator = new PredicateEvaluator({ registry })
 * ```
 *
 * @module query/operators/registry
 */

import { OPERATOR_PREFIX } from '../../constants'
import { ConfigurationError, ErrorCode } from '../../errors'
import { getLogger, withPrefix, type Logger } from '../../utils/logger'
import type { OperatorHandler, OperatorTable } from './types'
import { comparisonOperators } from './comparison'
import { collectionOperators } from './collection'
import { existenceOperators } from './existence'
import { patternOperators } from './pattern'
import { structuralOperators } from './structural'
import { logicalOperators } from './logical'
import { rangeOperators } from './range'
import { dateOperators } from './date'
import { stringOperators } from './string'

/**
 * All built-in operator families, in registration order
 */
export const BUILTIN_OPERATORS: OperatorTable = Object.freeze({
  ...comparisonOperators,
  ...collectionOperators,
  ...existenceOperators,
  ...patternOperators,
  ...structuralOperators,
  ...logicalOperators,
  ...rangeOperators,
  ...dateOperators,
  ...stringOperators,
})

export interface OperatorRegistryOptions {
  /** Start from the built-in operators (default: true) */
  builtins?: boolean | undefined
  logger?: Logger | undefined
}

export class OperatorRegistry {
  private readonly handlers = new Map<string, OperatorHandler>()
  private readonly logger: Logger
  private frozen = false

  constructor(options: OperatorRegistryOptions = {}) {
    this.logger = withPrefix(options.logger ?? getLogger, '[OperatorRegistry]')
    if (options.builtins ?? true) {
      for (const [name, handler] of Object.entries(BUILTIN_OPERATORS)) {
        this.handlers.set(name, handler)
      }
    }
  }

  /**
   * Register a handler under a `$`-prefixed name, replacing any existing one
   *
   * @throws {ConfigurationError} If the registry is frozen or the name lacks the `$` prefix
   */
  register(name: string, handler: OperatorHandler): this {
    if (this.frozen) {
      throw new ConfigurationError(
        `Cannot register ${name}: operator registry is frozen`,
        { configKey: name },
        ErrorCode.REGISTRY_FROZEN
      )
    }
    if (!name.startsWith(OPERATOR_PREFIX) || name.length === OPERATOR_PREFIX.length) {
      throw new ConfigurationError(
        `Invalid operator name '${name}': must start with '${OPERATOR_PREFIX}'`,
        { configKey: name, expectedValue: `${OPERATOR_PREFIX}<name>`, actualValue: name },
        ErrorCode.INVALID_CONFIG
      )
    }

    if (this.handlers.has(name)) {
      this.logger.warn(`Overriding operator ${name}`)
    }
    this.handlers.set(name, handler)
    return this
  }

  lookup(name: string): OperatorHandler | undefined {
    return this.handlers.get(name)
  }

  has(name: string): boolean {
    return this.handlers.has(name)
  }

  names(): string[] {
    return [...this.handlers.keys()]
  }

  /**
   * Make the registry read-only. Idempotent.
   */
  freeze(): this {
    this.frozen = true
    return this
  }

  get isFrozen(): boolean {
    return this.frozen
  }
}

/**
 * Create a registry holding every built-in operator
 */
export function createOperatorRegistry(options: OperatorRegistryOptions = {}): OperatorRegistry {
  return new OperatorRegistry(options)
}
