/**
 * Logger Unit Tests
 *
 * Tests for the structured logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

// Spy on console methods before importing logger
const consoleSpy = {
  log: vi.spyOn(console, 'log').mockImplementation(() => {}),
  warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
  error: vi.spyOn(console, 'error').mockImplementation(() => {}),
}

// Import logger after setting up spies
import { logger, safeError, logEmailSent, logEmailFailed, getSafeErrorMessage } from '../../src/utils/logger.js'

function lastLine(spy: typeof consoleSpy.log): string {
  const call = spy.mock.calls.at(-1)
  return String(call?.[0])
}

describe('structured logger', () => {
  beforeEach(() => {
    consoleSpy.log.mockClear()
    consoleSpy.warn.mockClear()
    consoleSpy.error.mockClear()
  })

  afterEach(() => {
    vi.clearAllMocks()
  })

  describe('core methods', () => {
    it('logs info messages', () => {
      logger.info('Test info message')

      expect(consoleSpy.log).toHaveBeenCalledTimes(1)
      expect(lastLine(consoleSpy.log)).toMatch(/^\[.+\] INFO Test info message$/)
    })

    it('logs info with context', () => {
      logger.info('Campaign step', { contactId: 7, jobId: 'reminder_7_1' })

      expect(lastLine(consoleSpy.log)).toContain('Campaign step {"contactId":7,"jobId":"reminder_7_1"}')
    })

    it('logs debug outside production', () => {
      logger.debug('Debug detail')

      expect(lastLine(consoleSpy.log)).toContain('DEBUG Debug detail')
    })

    it('logs warn messages', () => {
      logger.warn('Test warning')

      expect(consoleSpy.warn).toHaveBeenCalledTimes(1)
      expect(lastLine(consoleSpy.warn)).toContain('WARN Test warning')
    })

    it('logs error messages with the error text', () => {
      logger.error('Something failed', new Error('Test error'))

      expect(consoleSpy.error).toHaveBeenCalledTimes(1)
      expect(lastLine(consoleSpy.error)).toMatch(/ERROR Something failed \| Error: Test error$/)
    })

    it('logs error without error object', () => {
      logger.error('Plain failure', 'not an Error instance')

      expect(lastLine(consoleSpy.error)).toMatch(/ERROR Plain failure$/)
    })
  })

  describe('context sanitization', () => {
    it('masks email addresses in context', () => {
      logger.info('Email queued', { email: 'jane@example.com' })

      const output = lastLine(consoleSpy.log)
      expect(output).toContain('"email":"j***@example.com"')
      expect(output).not.toContain('jane@example.com')
    })

    it('redacts credentials', () => {
      logger.info('Transport ready', { smtpPassword: 'test-secret', apiKey: 'test-key' })

      expect(lastLine(consoleSpy.log)).toContain('{"smtpPassword":"[REDACTED]","apiKey":"[REDACTED]"}')
    })
  })

  describe('child logger', () => {
    it('merges base context', () => {
      const child = logger.child({ requestId: 'req-1' })
      child.warn('Slow request', { duration: 1200 })

      expect(lastLine(consoleSpy.warn)).toContain('Slow request {"requestId":"req-1","duration":1200}')
    })
  })

  describe('domain helpers', () => {
    it('logs campaign completion counts', () => {
      logger.campaign.finished(4, 1, 5)

      expect(lastLine(consoleSpy.log)).toContain('Campaign finished {"succeeded":4,"failed":1,"total":5}')
    })

    it('logs reminder failures as warnings', () => {
      logger.reminder.failed(3, 2, 'timeout')

      expect(lastLine(consoleSpy.warn)).toContain(
        'Reminder failed, chain stopped {"contactId":3,"reminderNumber":2,"reason":"timeout"}'
      )
    })

    it('masks the recipient in send logs', () => {
      logEmailSent('campaign', 'jane@example.com', { contactId: 1 })

      expect(lastLine(consoleSpy.log)).toContain('Email campaign sent to j***@example.com {"contactId":1}')
    })

    it('masks the recipient in failure logs', () => {
      logEmailFailed('reminder 2', 'jane@example.com', new Error('bad auth'))

      expect(lastLine(consoleSpy.error)).toContain('Email reminder 2 failed to j***@example.com: bad auth')
    })
  })

  describe('safeError', () => {
    it('returns a client-safe body and logs the detail', () => {
      const body = safeError('STORE_ERROR', new Error('EACCES: contacts.json'), 'http')

      expect(body).toEqual({ error: getSafeErrorMessage('STORE_ERROR'), code: 'STORE_ERROR' })
      expect(lastLine(consoleSpy.error)).toContain('[http] STORE_ERROR: EACCES: contacts.json')
    })
  })
})
