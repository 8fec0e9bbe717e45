/**
 * @fileoverview Structured logging for the outer layers.
 *
 * The decoding core never logs; the directory scanner and CLI do, through
 * this small structured logger. Entries are plain objects handed to a
 * handler, which by default prints them as JSON on stderr.
 *
 * @module utils/logger
 *
 * @example
 * ```typescript
 * import { createLogger, LogLevel } from './utils/logger'
 *
 * const logger = createLogger({ component: 'scan', minLevel: LogLevel.DEBUG })
 * logger.debug('Found store', { name: 'test-malware-simple' })
 * const listLogger = logger.child({ list: 'test-malware-simple' })
 * listLogger.error('Decode failed', err, { code: err.code })
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

/**
 * Structured log entry.
 */
export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string
  level: LogLevel
  message: string
  /** Component or module name */
  component?: string
  error?: {
    name: string
    message: string
    code?: string
  }
  /** Merged logger context and call data */
  data?: Record<string, unknown>
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, error?: Error, data?: Record<string, unknown>): void
  /**
   * Create a child logger whose entries carry additional context.
   */
  child(context: Record<string, unknown>): Logger
}

export interface LoggerOptions {
  component?: string
  /** Minimum level to output (default: WARN) */
  minLevel?: LogLevel
  context?: Record<string, unknown>
  /** Receives every entry at or above `minLevel` (default: JSON on stderr) */
  handler?: (entry: LogEntry) => void
}

// ============================================================================
// Level parsing
// ============================================================================

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
}

/**
 * Parses a level name (case-insensitive).
 *
 * @returns The level, or undefined when the name is not a known level
 */
export function parseLogLevel(value: string): LogLevel | undefined {
  return LEVELS_BY_NAME[value.trim().toLowerCase()]
}

// ============================================================================
// Logger Implementation
// ============================================================================

function defaultHandler(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n')
}

/**
 * Create a structured logger instance.
 *
 * @example
 * ```typescript
 * const lines: LogEntry[] = []
 * const logger = createLogger({ component: 'cli', handler: (e) => lines.push(e) })
 * logger.warn('Skipping list', { name: 'goog-phish-shavar' })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    component,
    minLevel = LogLevel.WARN,
    context = {},
    handler = defaultHandler,
  } = options

  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel]
  }

  function log(level: LogLevel, message: string, error?: Error, data?: Record<string, unknown>): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    }

    if (component) {
      entry.component = component
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
      entry.error = {
        name: error.name,
        message: error.message,
        ...(code !== undefined && { code }),
      }
    }

    const mergedData = { ...context, ...data }
    if (Object.keys(mergedData).length > 0) {
      entry.data = mergedData
    }

    handler(entry)
  }

  return {
    debug(message, data) {
      log(LogLevel.DEBUG, message, undefined, data)
    },
    info(message, data) {
      log(LogLevel.INFO, message, undefined, data)
    },
    warn(message, data) {
      log(LogLevel.WARN, message, undefined, data)
    },
    error(message, error, data) {
      log(LogLevel.ERROR, message, error, data)
    },
    child(childContext) {
      return createLogger({
        ...(component !== undefined && { component }),
        minLevel,
        context: { ...context, ...childContext },
        handler,
      })
    },
  }
}

/**
 * Logger that discards all messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => noopLogger,
}
