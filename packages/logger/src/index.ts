/**
 * @sanctionwatch/logger
 *
 * Structured logging for the sanctions monitor and its packages.
 *
 * - JSON lines in production, colored single-line output in development
 * - ISO 8601 timestamps
 * - Levels: debug, info, warn, error, fatal
 * - Child loggers carry a component path (`monitor:download:OFAC`) and context
 * - Values under secret-looking keys are redacted before output
 *
 * Environment variables:
 * - LOG_LEVEL: Minimum log level (debug, info, warn, error, fatal). Default: info
 * - LOG_FORMAT: Output format (json, pretty). Default: json in production, pretty otherwise
 * - NODE_ENV: Used to determine defaults
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal'

export interface LogContext {
  [key: string]: unknown
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  service: string
  component?: string
  message: string
  error?: {
    name: string
    message: string
    code?: string
    stack?: string
  }
  [key: string]: unknown
}

/**
 * Receives every entry that passes the level filter.
 * The default sink writes formatted lines to the console.
 */
export type LogSink = (entry: LogEntry) => void

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
}

const LOG_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
}

const RESET = '\x1b[0m'
const DIM = '\x1b[2m'
const BRIGHT = '\x1b[1m'

const REDACTED = '[REDACTED]'

const SENSITIVE_KEY_PATTERNS = [
  /authorization/i,
  /password/i,
  /secret/i,
  /token/i,
  /api[-_]?key/i,
  /webhook[-_]?url/i,
  /connection[-_]?string/i,
]

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase()
  return isLogLevel(level) ? level : 'info'
}

function getLogFormat(): 'json' | 'pretty' {
  const format = process.env.LOG_FORMAT?.toLowerCase()
  if (format === 'json' || format === 'pretty') {
    return format
  }
  return process.env.NODE_ENV === 'production' ? 'json' : 'pretty'
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()]
}

function formatError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    }
  }

  return {
    name: 'UnknownError',
    message: String(error),
  }
}

/**
 * Replace values stored under secret-looking keys, one level deep
 * into nested plain objects.
 */
export function redactContext(context: LogContext, depth = 0): LogContext {
  const result: LogContext = {}
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_KEY_PATTERNS.some(pattern => pattern.test(key))) {
      result[key] = REDACTED
    } else if (depth < 1 && isPlainObject(value)) {
      result[key] = redactContext(value, depth + 1)
    } else {
      result[key] = value
    }
  }
  return result
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry)
}

function formatPretty(entry: LogEntry): string {
  const color = LOG_COLORS[entry.level]
  const levelStr = entry.level.toUpperCase().padEnd(5)

  const componentPath = entry.component ? `${entry.service}:${entry.component}` : entry.service

  const { timestamp, level: _level, service: _service, component: _component, message, error, ...meta } = entry

  const metaStr = Object.keys(meta).length > 0 ? ` ${DIM}${JSON.stringify(meta)}${RESET}` : ''
  const errorStr = error ? `\n  ${DIM}${error.stack || error.message}${RESET}` : ''

  return `${DIM}${timestamp}${RESET} ${color}${BRIGHT}${levelStr}${RESET} ${DIM}[${componentPath}]${RESET} ${message}${metaStr}${errorStr}`
}

const consoleSink: LogSink = entry => {
  const formatted = getLogFormat() === 'json' ? formatJson(entry) : formatPretty(entry)

  switch (entry.level) {
    case 'debug':
      console.debug(formatted)
      break
    case 'info':
      console.info(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
    case 'fatal':
      console.error(formatted)
      break
  }
}

let activeSink: LogSink = consoleSink

/**
 * Route all log output to a different sink (log shipping, tests).
 * Returns a function that restores the previous sink.
 */
export function setLogSink(sink: LogSink): () => void {
  const previous = activeSink
  activeSink = sink
  return () => {
    activeSink = previous
  }
}

export interface ILogger {
  debug(message: string, meta?: LogContext): void
  info(message: string, meta?: LogContext): void
  warn(message: string, meta?: LogContext, error?: unknown): void
  error(message: string, meta?: LogContext, error?: unknown): void
  fatal(message: string, meta?: LogContext, error?: unknown): void
  /**
   * Create a child logger.
   * A string extends the component path; an object only adds context.
   */
  child(componentOrContext: string | LogContext, defaultContext?: LogContext): ILogger
}

export class Logger implements ILogger {
  private readonly service: string
  private readonly component?: string
  private readonly defaultContext: LogContext

  constructor(service: string, component?: string, defaultContext: LogContext = {}) {
    this.service = service
    this.component = component
    this.defaultContext = defaultContext
  }

  private log(level: LogLevel, message: string, meta?: LogContext, error?: unknown): void {
    if (!shouldLog(level)) return

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
      ...redactContext({ ...this.defaultContext, ...meta }),
    }

    if (this.component) {
      entry.component = this.component
    }

    if (error !== undefined) {
      entry.error = formatError(error)
    }

    activeSink(entry)
  }

  debug(message: string, meta?: LogContext): void {
    this.log('debug', message, meta)
  }

  info(message: string, meta?: LogContext): void {
    this.log('info', message, meta)
  }

  warn(message: string, meta?: LogContext, error?: unknown): void {
    this.log('warn', message, meta, error)
  }

  error(message: string, meta?: LogContext, error?: unknown): void {
    this.log('error', message, meta, error)
  }

  fatal(message: string, meta?: LogContext, error?: unknown): void {
    this.log('fatal', message, meta, error)
  }

  child(componentOrContext: string | LogContext, defaultContext: LogContext = {}): ILogger {
    if (typeof componentOrContext === 'object') {
      return new Logger(this.service, this.component, {
        ...this.defaultContext,
        ...componentOrContext,
      })
    }
    const newComponent = this.component ? `${this.component}:${componentOrContext}` : componentOrContext
    return new Logger(this.service, newComponent, {
      ...this.defaultContext,
      ...defaultContext,
    })
  }
}

/**
 * Create a logger for a service.
 *
 * @example
 * ```ts
 * const logger = createLogger('monitor')
 * const log = logger.child('download')
 * log.info('Downloaded list', { source: 'OFAC', sizeBytes: 1024 })
 * ```
 */
export function createLogger(service: string): ILogger {
  return new Logger(service)
}
