/**
 * docspec Configuration
 *
 * Evaluator settings resolve in three layers, later ones winning:
 * 1. DEFAULT_EVALUATOR_CONFIG
 * 2. DOCSPEC_* environment variables
 * 3. Explicit overrides passed by the caller
 *
 * @example
 * ```typescript
 * // DOCSPEC_CONCURRENCY=16 in the environment
 * const config = resolveEvaluatorConfig({ regexCacheSize: 64 })
 * // { concurrency: 16, regexCacheSize: 64, maxPatternLength: 1000, debug: false }
 * ```
 */

import { ConfigurationError, ErrorCode } from '../errors'
import { DEFAULT_CONCURRENCY, DEFAULT_MAX_PATTERN_LENGTH, DEFAULT_REGEX_CACHE_SIZE } from '../constants'
import { readEnvSettings, type EnvSource } from './env'

export { readEnvSettings, type EnvSource, type EnvSettings } from './env'

export interface EvaluatorConfig {
  /** Predicate or group evaluations in flight at once (>= 1) */
  concurrency: number
  /** Compiled `$regex` patterns kept in the LRU cache (>= 1) */
  regexCacheSize: number
  /** Longest `$regex` pattern accepted (>= 1) */
  maxPatternLength: number
  /** Log through the console logger when no logger is given */
  debug: boolean
}

export const DEFAULT_EVALUATOR_CONFIG: Readonly<EvaluatorConfig> = Object.freeze({
  concurrency: DEFAULT_CONCURRENCY,
  regexCacheSize: DEFAULT_REGEX_CACHE_SIZE,
  maxPatternLength: DEFAULT_MAX_PATTERN_LENGTH,
  debug: false,
})

function requireInteger(key: keyof EvaluatorConfig, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `Invalid ${key}: expected an integer >= ${min}, got ${value}`,
      { configKey: key, expectedValue: `integer >= ${min}`, actualValue: value },
      ErrorCode.INVALID_CONFIG
    )
  }
}

/**
 * Validate a complete configuration
 *
 * @throws {ConfigurationError} If any setting is out of range
 */
export function validateEvaluatorConfig(config: EvaluatorConfig): void {
  requireInteger('concurrency', config.concurrency, 1)
  requireInteger('regexCacheSize', config.regexCacheSize, 1)
  requireInteger('maxPatternLength', config.maxPatternLength, 1)
}

/**
 * Merge defaults, environment settings and overrides into a frozen config
 *
 * @param overrides - Explicit settings, applied last
 * @param env - Environment map to read DOCSPEC_* variables from
 * @throws {ConfigurationError} If an environment variable or override is invalid
 */
export function resolveEvaluatorConfig(
  overrides: Partial<EvaluatorConfig> = {},
  env: EnvSource = process.env
): Readonly<EvaluatorConfig> {
  const fromEnv = readEnvSettings(env)
  const config: EvaluatorConfig = {
    concurrency: overrides.concurrency ?? fromEnv.concurrency ?? DEFAULT_EVALUATOR_CONFIG.concurrency,
    regexCacheSize: overrides.regexCacheSize ?? fromEnv.regexCacheSize ?? DEFAULT_EVALUATOR_CONFIG.regexCacheSize,
    maxPatternLength:
      overrides.maxPatternLength ?? fromEnv.maxPatternLength ?? DEFAULT_EVALUATOR_CONFIG.maxPatternLength,
    debug: overrides.debug ?? fromEnv.debug ?? DEFAULT_EVALUATOR_CONFIG.debug,
  }

  validateEvaluatorConfig(config)
  return Object.freeze(config)
}
