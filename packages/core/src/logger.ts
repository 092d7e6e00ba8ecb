// =============================================================================
// rseq-midi - Logging
// =============================================================================

/**
 * Minimal logging surface. Decoder and CLI code write through this so the
 * destination stays a caller decision.
 */
export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

/**
 * Create a logger that forwards to the console, dropping messages below
 * `level`.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const enabled = (target: LogLevel) => LEVEL_ORDER[target] >= LEVEL_ORDER[level]
  return {
    debug: (message) => { if (enabled('debug')) console.debug(message) },
    info: (message) => { if (enabled('info')) console.info(message) },
    warn: (message) => { if (enabled('warn')) console.warn(message) },
    error: (message) => { if (enabled('error')) console.error(message) }
  }
}

/**
 * Console logger at `info` level.
 */
export const consoleLogger: Logger = createConsoleLogger()

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
