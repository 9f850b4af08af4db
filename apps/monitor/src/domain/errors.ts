/**
 * Error taxonomy and classification
 *
 * Every failure the pipeline raises on purpose is a MonitorError with a
 * stable code. classifyError() turns anything thrown into the shape used
 * for logs and for a failed run's errorMessage.
 */

import { ZodError } from 'zod'
import { RunningRunExistsError, TerminalRunError } from '@sanctionwatch/db'

export const ERROR_CODES = {
  DOWNLOAD_TRANSIENT: 'DOWNLOAD_TRANSIENT',
  DOWNLOAD_PERMANENT: 'DOWNLOAD_PERMANENT',
  PARSE_RECORD: 'PARSE_RECORD',
  PARSE_FORMAT: 'PARSE_FORMAT',
  RUN_CONFLICT: 'RUN_CONFLICT',
  INVALID_STATE: 'INVALID_STATE',
  NOTIFICATION_TRANSIENT: 'NOTIFICATION_TRANSIENT',
  NOTIFICATION_EXHAUSTED: 'NOTIFICATION_EXHAUSTED',
  RUN_ABORTED: 'RUN_ABORTED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  UNKNOWN_SOURCE: 'UNKNOWN_SOURCE',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  NETWORK_ERROR: 'NETWORK_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export class MonitorError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly isRetryable = false,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = new.target.name
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Download
// ═══════════════════════════════════════════════════════════════════════════════

export type DownloadErrorKind = 'transient' | 'permanent'

export class DownloadError extends MonitorError {
  constructor(
    message: string,
    readonly kind: DownloadErrorKind,
    readonly statusCode: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(
      message,
      kind === 'transient' ? ERROR_CODES.DOWNLOAD_TRANSIENT : ERROR_CODES.DOWNLOAD_PERMANENT,
      kind === 'transient',
      options
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Parse
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * `record`: one malformed record, skipped and counted.
 * `format`: the payload no longer matches the expected layout; the run fails.
 */
export type ParseErrorLevel = 'record' | 'format'

export class ParseError extends MonitorError {
  constructor(
    readonly level: ParseErrorLevel,
    readonly field: string,
    readonly reason: string,
    readonly recordId: string | null = null
  ) {
    super(
      recordId ? `Record ${recordId}: ${field}: ${reason}` : `${field}: ${reason}`,
      level === 'record' ? ERROR_CODES.PARSE_RECORD : ERROR_CODES.PARSE_FORMAT
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

export class ConflictError extends MonitorError {
  constructor(readonly source: string) {
    super(`A run for ${source} is already running`, ERROR_CODES.RUN_CONFLICT)
  }
}

export class InvalidStateError extends MonitorError {
  constructor(message: string) {
    super(message, ERROR_CODES.INVALID_STATE)
  }
}

export class RunAbortedError extends MonitorError {
  constructor(readonly runId: string, reason = 'aborted') {
    super(`Run ${runId} ${reason}`, ERROR_CODES.RUN_ABORTED)
  }
}

export class UnknownSourceError extends MonitorError {
  constructor(readonly source: string) {
    super(`No adapter registered for source ${source}`, ERROR_CODES.UNKNOWN_SOURCE)
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Notification
// ═══════════════════════════════════════════════════════════════════════════════

export class NotificationError extends MonitorError {
  constructor(
    readonly channel: string,
    readonly kind: 'transient' | 'exhausted',
    message: string
  ) {
    super(
      `${channel}: ${message}`,
      kind === 'transient' ? ERROR_CODES.NOTIFICATION_TRANSIENT : ERROR_CODES.NOTIFICATION_EXHAUSTED,
      kind === 'transient'
    )
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export class ConfigurationError extends MonitorError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`, ERROR_CODES.CONFIGURATION_ERROR)
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Classification
// ═══════════════════════════════════════════════════════════════════════════════

export interface ClassifiedError {
  code: ErrorCode
  message: string
  isRetryable: boolean
}

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EAI_AGAIN']

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof MonitorError) {
    return { code: error.code, message: error.message, isRetryable: error.isRetryable }
  }

  if (error instanceof RunningRunExistsError) {
    return { code: ERROR_CODES.RUN_CONFLICT, message: error.message, isRetryable: false }
  }

  if (error instanceof TerminalRunError) {
    return { code: ERROR_CODES.INVALID_STATE, message: error.message, isRetryable: false }
  }

  if (error instanceof ZodError) {
    return {
      code: ERROR_CODES.VALIDATION_FAILED,
      message: error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
      isRetryable: false,
    }
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : ''
    if (NETWORK_ERROR_CODES.includes(code)) {
      return { code: ERROR_CODES.NETWORK_ERROR, message: error.message, isRetryable: true }
    }
    return { code: ERROR_CODES.INTERNAL_ERROR, message: error.message, isRetryable: false }
  }

  return { code: ERROR_CODES.INTERNAL_ERROR, message: String(error), isRetryable: false }
}

/**
 * `CODE: message`, the form stored in a failed run's errorMessage.
 */
export function describeError(error: unknown): string {
  const classified = classifyError(error)
  return `${classified.code}: ${classified.message}`
}
