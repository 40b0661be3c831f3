// PII Masking Utilities
// Use these to prevent recipient addresses and credentials from leaking into logs

/**
 * Mask email, showing first char and domain
 * "john@example.com" -> "j***@example.com"
 */
export function maskEmail(email: string | null | undefined): string {
  if (!email || !email.includes('@')) return '****'
  const [local, domain] = email.split('@')
  return local[0] + '***@' + domain
}

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization']

/**
 * Create a sanitized version of an object for logging
 * Redacts credentials and masks anything keyed as an email
 */
export function sanitizeForLogging(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase()

    if (SENSITIVE_FIELDS.some(f => lowerKey.includes(f))) {
      result[key] = '[REDACTED]'
    } else if (lowerKey.includes('email') && typeof value === 'string') {
      result[key] = maskEmail(value)
    } else if (isPlainRecord(value)) {
      result[key] = sanitizeForLogging(value)
    } else {
      result[key] = value
    }
  }

  return result
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}
