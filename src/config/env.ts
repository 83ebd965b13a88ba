/**
 * Environment Variables
 *
 * Reads evaluator settings from an environment map (process.env by
 * default). Unset or blank variables are ignored; malformed ones throw.
 */

import { ConfigurationError, ErrorCode } from '../errors'
import {
  ENV_CONCURRENCY,
  ENV_DEBUG,
  ENV_MAX_PATTERN_LENGTH,
  ENV_REGEX_CACHE_SIZE,
} from '../constants'

export type EnvSource = Readonly<Record<string, string | undefined>>

/**
 * Settings found in the environment
 */
export interface EnvSettings {
  concurrency?: number | undefined
  regexCacheSize?: number | undefined
  maxPatternLength?: number | undefined
  debug?: boolean | undefined
}

function readRaw(env: EnvSource, name: string): string | undefined {
  const raw = env[name]?.trim()
  return raw ? raw : undefined
}

function readInteger(env: EnvSource, name: string): number | undefined {
  const raw = readRaw(env, name)
  if (raw === undefined) return undefined

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(
      `${name} must be a non-negative integer, got '${raw}'`,
      { configKey: name, expectedValue: 'integer', actualValue: raw },
      ErrorCode.INVALID_CONFIG
    )
  }
  return Number(raw)
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on'])
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off'])

function readBoolean(env: EnvSource, name: string): boolean | undefined {
  const raw = readRaw(env, name)?.toLowerCase()
  if (raw === undefined) return undefined
  if (TRUE_VALUES.has(raw)) return true
  if (FALSE_VALUES.has(raw)) return false

  throw new ConfigurationError(
    `${name} must be a boolean (true/false, 1/0, yes/no, on/off), got '${raw}'`,
    { configKey: name, expectedValue: 'boolean', actualValue: raw },
    ErrorCode.INVALID_CONFIG
  )
}

/**
 * Read DOCSPEC_* settings from an environment map
 *
 * @throws {ConfigurationError} If a variable is set to a malformed value
 */
export function readEnvSettings(env: EnvSource = process.env): EnvSettings {
  return {
    concurrency: readInteger(env, ENV_CONCURRENCY),
    regexCacheSize: readInteger(env, ENV_REGEX_CACHE_SIZE),
    maxPatternLength: readInteger(env, ENV_MAX_PATTERN_LENGTH),
    debug: readBoolean(env, ENV_DEBUG),
  }
}
