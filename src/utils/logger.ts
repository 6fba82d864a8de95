/**
 * Logging for verbforms
 *
 * The pipeline logs per-entry warnings at debug level and a run summary at
 * info level. Defaults to the noop logger so library use stays silent; the
 * `debug` config flag or the CLI switches to the console logger.
 *
 * @module utils/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/** Level-prefixed lines on the console (`--debug`) */
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

/** CLI default: the console logger without per-entry debug lines */
export const quietConsoleLogger: Logger = {
  ...consoleLogger,
  debug(): void {},
}

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/** Shared by every module; replace it with setLogger, never reassign an import */
export let logger: Logger = noopLogger

export function setLogger(next: Logger): void {
  logger = next
}
