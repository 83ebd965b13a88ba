/**
 * Logger utility for docspec
 *
 * Evaluation diagnostics (missing data, unknown operators, invalid patterns,
 * contained internal errors) go through this interface. Defaults to a noop
 * logger; switch to the console logger for development or plug in the
 * application's own logger.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Console logger implementation
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

let globalLogger: Logger = noopLogger

/**
 * Get the global logger instance
 */
export function getLogger(): Logger {
  return globalLogger
}

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from 'docspec'
 *
 * // Enable console logging for development
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  globalLogger = l
}

/**
 * Wrap a logger so every message carries a component prefix.
 *
 * Pass a function to resolve the target lazily, so a later setLogger() call
 * still reaches components created before it.
 *
 * @example
 * ```typescript
 * const log = withPrefix(getLogger, '[PredicateEvaluator]')
 * log.warn('Unknown operator $foo') // "[PredicateEvaluator] Unknown operator $foo"
 * ```
 */
export function withPrefix(base: Logger | (() => Logger), prefix: string): Logger {
  const target = typeof base === 'function' ? base : () => base
  return {
    debug: (message, ...args) => target().debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => target().info(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => target().warn(`${prefix} ${message}`, ...args),
    error: (message, error, ...args) => target().error(`${prefix} ${message}`, error, ...args),
  }
}
