/**
 * Logging
 *
 * Structured component logger. Entries carry a timestamp, level, component
 * and optional data, and are handed to a transport (console by default).
 */

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
} as const

export type LogLevel = keyof typeof LOG_LEVELS

export type LogEntry = {
  timestamp: string
  level: Exclude<LogLevel, 'silent'>
  component: string
  message: string
  data?: Record<string, unknown>
  error?: { name: string; message: string; stack?: string }
}

export type LogTransport = {
  name: string
  log(entry: LogEntry): void
}

export type LoggerOptions = {
  level?: LogLevel
  transport?: LogTransport
}

export type Logger = {
  readonly component: string
  trace(message: string, data?: Record<string, unknown>): void
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, err?: unknown, data?: Record<string, unknown>): void
  child(component: string): Logger
}

// ============================================================================
// Transports
// ============================================================================

export const consoleTransport: LogTransport = {
  name: 'console',
  log(entry) {
    const line = `[${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.component}: ${entry.message}`
    const extra = entry.error ?? entry.data
    const args: unknown[] = extra !== undefined ? [line, extra] : [line]
    switch (entry.level) {
      case 'error':
        console.error(...args)
        break
      case 'warn':
        console.warn(...args)
        break
      case 'info':
        console.info(...args)
        break
      default:
        console.debug(...args)
    }
  },
}

/** Keeps entries in memory; handy for asserting on log output */
export function createMemoryTransport(): LogTransport & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return {
    name: 'memory',
    entries,
    log(entry) {
      entries.push(entry)
    },
  }
}

// ============================================================================
// Logger
// ============================================================================

function serializeError(err: unknown): NonNullable<LogEntry['error']> {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, ...(err.stack ? { stack: err.stack } : {}) }
  }
  return { name: 'Error', message: String(err) }
}

export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const transport = options.transport ?? consoleTransport
  const threshold = LOG_LEVELS[level]

  function write(entryLevel: LogEntry['level'], message: string, data?: Record<string, unknown>, err?: unknown) {
    if (LOG_LEVELS[entryLevel] < threshold) return
    transport.log({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      component,
      message,
      ...(data !== undefined ? { data } : {}),
      ...(err !== undefined ? { error: serializeError(err) } : {}),
    })
  }

  return {
    component,
    trace: (message, data) => write('trace', message, data),
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, err, data) => write('error', message, data, err),
    child: (name) => createLogger(`${component}.${name}`, options),
  }
}
