/**
 * Logging for pipeline stages
 * @module utils/logger
 */

/**
 * Logger interface accepted by every pipeline stage
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = {
  debug: (message: string, context?: Record<string, unknown>) => {
    console.log(`[DEBUG] ${message}`, context ?? '')
  },
  info: (message: string, context?: Record<string, unknown>) => {
    console.log(`[INFO] ${message}`, context ?? '')
  },
  warn: (message: string, context?: Record<string, unknown>) => {
    console.warn(`[WARN] ${message}`, context ?? '')
  },
  error: (message: string, context?: Record<string, unknown>) => {
    console.error(`[ERROR] ${message}`, context ?? '')
  },
}

/**
 * Creates a no-op logger for silent operation
 */
export function createSilentLogger(): Logger {
  const noop = () => {}
  return {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
  }
}

/**
 * Creates a logger that prefixes messages with a stage name
 */
export function createPrefixedLogger(
  stageName: string,
  baseLogger: Logger
): Logger {
  const prefix = `[${stageName}]`
  return {
    debug: (message, context) =>
      baseLogger.debug(`${prefix} ${message}`, context),
    info: (message, context) =>
      baseLogger.info(`${prefix} ${message}`, context),
    warn: (message, context) =>
      baseLogger.warn(`${prefix} ${message}`, context),
    error: (message, context) =>
      baseLogger.error(`${prefix} ${message}`, context),
  }
}
