/**
 * Grid diagnostics
 *
 * GeoGrid reports the chosen precision, skipped inserts and exhausted ring
 * expansions through a Logger. Nothing is printed unless a logger is
 * installed with setLogger() or passed as `GeoGridOptions.logger`.
 *
 * @module utils/logger
 */

/**
 * Sink for grid diagnostics. Extra arguments carry structured context,
 * e.g. `{ wanted, found }` on exhaustion warnings.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Writes to the console with a `[LEVEL]` prefix
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

/** Default */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance, used by every grid that was not given its own
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from 'geogrid'
 *
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Returns the logger currently installed with setLogger()
 */
export function getLogger(): Logger {
  return logger
}
