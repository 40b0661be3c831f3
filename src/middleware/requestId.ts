/**
 * Request ID Middleware
 *
 * Adds correlation IDs to requests for error tracking and debugging.
 * Uses existing X-Request-ID header if present, otherwise generates one.
 */

import crypto from 'node:crypto'
import type { Context, Next } from 'hono'

export type AppEnv = {
  Variables: {
    requestId: string
  }
}

export async function requestIdMiddleware(c: Context<AppEnv>, next: Next) {
  // Use existing request ID from header (e.g., from a reverse proxy)
  const requestId = c.req.header('x-request-id') || crypto.randomUUID()

  c.set('requestId', requestId)

  // Add to response headers for client-side correlation
  c.header('x-request-id', requestId)

  await next()
}

export function getRequestId(c: Context<AppEnv>): string {
  return c.get('requestId') || 'unknown'
}
