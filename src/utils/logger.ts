/**
 * Structured Logging Utility
 * Provides consistent JSON logging in production for log aggregation
 * Automatically masks recipient emails and redacts credentials
 */

import { env } from '../config/env.js'
import { sanitizeForLogging, maskEmail } from './pii.js'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  requestId?: string
  contactId?: number
  jobId?: string
  action?: string
  duration?: number
  [key: string]: unknown
}

interface StructuredLog {
  timestamp: string
  level: LogLevel
  message: string
  context?: Record<string, unknown>
  error?: {
    name: string
    message: string
    stack?: string
  }
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

// Minimum log level based on environment
const MIN_LEVEL: LogLevel = env.NODE_ENV === 'production' ? 'info' : 'debug'

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[MIN_LEVEL]
}

function formatLog(level: LogLevel, message: string, context?: LogContext, error?: Error): string {
  const log: StructuredLog = {
    timestamp: new Date().toISOString(),
    level,
    message,
  }

  if (context && Object.keys(context).length > 0) {
    log.context = sanitizeForLogging(context)
  }

  if (error) {
    log.error = {
      name: error.name,
      message: error.message,
      stack: env.NODE_ENV !== 'production' ? error.stack : undefined,
    }
  }

  // In production, output JSON for log aggregators
  // In development, output formatted logs for readability
  if (env.NODE_ENV === 'production') {
    return JSON.stringify(log)
  }

  // Development format: [timestamp] LEVEL message {context}
  const contextStr = log.context ? ` ${JSON.stringify(log.context)}` : ''
  const errorStr = error ? ` | Error: ${error.message}` : ''
  return `[${log.timestamp}] ${level.toUpperCase()} ${message}${contextStr}${errorStr}`
}

function logMessage(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
  if (!shouldLog(level)) return

  const formatted = formatLog(level, message, context, error)

  switch (level) {
    case 'debug':
    case 'info':
      console.log(formatted)
      break
    case 'warn':
      console.warn(formatted)
      break
    case 'error':
      console.error(formatted)
      break
  }
}

/**
 * Logger instance with structured logging methods
 */
export const logger = {
  debug(message: string, context?: LogContext): void {
    logMessage('debug', message, context)
  },

  info(message: string, context?: LogContext): void {
    logMessage('info', message, context)
  },

  warn(message: string, context?: LogContext): void {
    logMessage('warn', message, context)
  },

  error(message: string, error?: unknown, context?: LogContext): void {
    const err = error instanceof Error ? error : undefined
    logMessage('error', message, context, err)
  },

  /**
   * Create a child logger with preset context
   * Useful for request-scoped logging
   */
  child(baseContext: LogContext) {
    return {
      debug: (message: string, context?: LogContext) =>
        logMessage('debug', message, { ...baseContext, ...context }),
      info: (message: string, context?: LogContext) =>
        logMessage('info', message, { ...baseContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        logMessage('warn', message, { ...baseContext, ...context }),
      error: (message: string, error?: unknown, context?: LogContext) =>
        logMessage('error', message, { ...baseContext, ...context }, error instanceof Error ? error : undefined),
    }
  },

  /**
   * Log campaign runs
   */
  campaign: {
    started(total: number, intervalMinutes: number): void {
      logMessage('info', 'Campaign started', { total, intervalMinutes })
    },

    finished(succeeded: number, failed: number, total: number): void {
      logMessage('info', 'Campaign finished', { succeeded, failed, total })
    },

    empty(): void {
      logMessage('info', 'No pending contacts to send emails to')
    },
  },

  /**
   * Log reminder chain events
   */
  reminder: {
    scheduled(contactId: number, jobId: string, fireAt: Date): void {
      logMessage('info', 'Reminder scheduled', { contactId, jobId, fireAt: fireAt.toISOString() })
    },

    sent(contactId: number, reminderNumber: number): void {
      logMessage('info', 'Reminder sent', { contactId, reminderNumber })
    },

    capped(contactId: number, maxReminders: number): void {
      logMessage('info', 'Reminder cap reached, marked not_interested', { contactId, maxReminders })
    },

    skipped(contactId: number, reason: string): void {
      logMessage('info', 'Reminder skipped', { contactId, reason })
    },

    failed(contactId: number, reminderNumber: number, reason: string): void {
      logMessage('warn', 'Reminder failed, chain stopped', { contactId, reminderNumber, reason })
    },
  },
}

// ============================================
// Safe Error Response Utilities
// ============================================

/**
 * Safe error codes for client responses
 * Use these instead of exposing raw error messages
 */
export const ErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  STORE_ERROR: 'STORE_ERROR',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

const SAFE_ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCodes.INTERNAL_ERROR]: 'An unexpected error occurred. Please try again.',
  [ErrorCodes.STORE_ERROR]: 'Campaign data is temporarily unavailable.',
}

/**
 * Get a safe error message for client response
 */
export function getSafeErrorMessage(code: ErrorCode): string {
  return SAFE_ERROR_MESSAGES[code] || SAFE_ERROR_MESSAGES[ErrorCodes.INTERNAL_ERROR]
}

/**
 * Create a safe error response for API endpoints
 * Logs full error details server-side, returns safe message to client
 *
 * @example
 * app.onError((err, c) => c.json(safeError('INTERNAL_ERROR', err, 'http'), 500))
 */
export function safeError(
  code: ErrorCode,
  error: unknown,
  source?: string,
  context?: LogContext
): { error: string; code: ErrorCode } {
  const errorDetail = error instanceof Error ? error.message : String(error)
  const prefix = source ? `[${source}]` : ''

  logger.error(`${prefix} ${code}: ${errorDetail}`, error, context)

  return {
    error: getSafeErrorMessage(code),
    code,
  }
}

/**
 * Email logging helper - always masks the email address
 */
export function logEmail(action: string, email: string, context?: LogContext): void {
  logger.info(`Email ${action} to ${maskEmail(email)}`, context)
}

/**
 * Log an email send event with proper masking
 */
export function logEmailSent(type: string, email: string, context?: LogContext): void {
  logEmail(`${type} sent`, email, context)
}

/**
 * Log an email failure with proper masking
 */
export function logEmailFailed(type: string, email: string, error: unknown, context?: LogContext): void {
  const errorMsg = error instanceof Error ? error.message : String(error)
  logger.error(`Email ${type} failed to ${maskEmail(email)}: ${errorMsg}`, error, context)
}
