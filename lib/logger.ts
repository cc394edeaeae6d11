/**
 * Console logger
 *
 * Gated by NODE_ENV and LOG_LEVEL:
 * - Production: warnings and errors only
 * - Development / scripts: every level
 */

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number]

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL
  if (isLogLevel(fromEnv)) return fromEnv
  return process.env.NODE_ENV === 'production' ? 'warn' : 'debug'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel()]
}

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  // eslint-disable-next-line no-console
  debug: (...args) => console.log(...args),
  // eslint-disable-next-line no-console
  info: (...args) => console.info(...args),
  // eslint-disable-next-line no-console
  warn: (...args) => console.warn(...args),
  // eslint-disable-next-line no-console
  error: (...args) => console.error(...args),
}

function emit(level: LogLevel, prefix: string, message: string, data?: Record<string, unknown>) {
  if (!shouldLog(level)) return
  if (data) {
    WRITERS[level](prefix, message, data)
  } else {
    WRITERS[level](prefix, message)
  }
}

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void
  info: (message: string, data?: Record<string, unknown>) => void
  warn: (message: string, data?: Record<string, unknown>) => void
  error: (message: string, error?: unknown) => void
}

/**
 * Create a logger for a specific module
 *
 * @param module - Module name (e.g., 'nflverse', 'api/defense', 'season-report')
 */
export function createLogger(module: string): Logger {
  const prefix = `[${module}]`

  return {
    /** Tracing: cache hits, row counts, timings */
    debug: (message, data) => emit('debug', prefix, message, data),

    /** Operation completion, downloads finished */
    info: (message, data) => emit('info', prefix, message, data),

    /** Degraded data: skipped rows, unknown team codes */
    warn: (message, data) => emit('warn', prefix, message, data),

    error: (message, error) => {
      if (error instanceof Error) {
        emit('error', prefix, message, { error: error.message })
      } else if (error !== undefined) {
        emit('error', prefix, message, { error })
      } else {
        emit('error', prefix, message)
      }
    },
  }
}
