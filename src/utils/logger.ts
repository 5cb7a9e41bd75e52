/**
 * Logger utility for lexibloom
 *
 * A swappable global logger. Library code logs through `logger` and never
 * writes to the console directly; the default is the noop logger, and the
 * CLI (or `applyLogging`) installs a console logger when debug output is
 * requested.
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

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped (default: 'debug') */
  level?: LogLevel
  /** Tag printed before the level marker */
  prefix?: string
}

/**
 * Create a console-backed logger
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const min = LEVEL_ORDER[options.level ?? 'debug']
  const tag = options.prefix ? `[${options.prefix}] ` : ''
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= min

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(`${tag}[DEBUG] ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.info(`${tag}[INFO] ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(`${tag}[WARN] ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`${tag}[ERROR] ${message}`, error, ...args)
      } else {
        console.error(`${tag}[ERROR] ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger with every level enabled
 */
export const consoleLogger: Logger = createConsoleLogger()

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, createConsoleLogger } from './utils/logger'
 *
 * setLogger(createConsoleLogger({ level: 'warn', prefix: 'lexibloom' }))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
