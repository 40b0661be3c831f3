import { serve } from '@hono/node-server'
import { createApp } from './app.js'
import { env } from './config/env.js'
import { createStore } from './db/store.js'

if (!env.SCHEDULING_LINK) {
  console.error('❌ SCHEDULING_LINK is required to serve the interested redirect')
  process.exit(1)
}

const port = Number.parseInt(env.APP_PORT, 10)
if (!Number.isFinite(port) || port <= 0) {
  throw new Error(`Invalid APP_PORT: ${env.APP_PORT}`)
}

const hostname = process.env.HOST || (env.NODE_ENV === 'production' ? '0.0.0.0' : undefined)

const app = createApp({
  store: createStore(env),
  schedulingLink: env.SCHEDULING_LINK,
})

console.log(`
╔═══════════════════════════════════════╗
║       CAMPAIGN RESPONSE TRACKER       ║
╚═══════════════════════════════════════╝

Environment: ${env.NODE_ENV}
Port: ${port}
Base URL: ${env.BASE_URL}
Contacts: ${env.CONTACTS_FILE}
`)

const server = serve({
  fetch: app.fetch,
  port,
  ...(hostname ? { hostname } : {}),
})

console.log(`✅ Server running on http://${hostname || 'localhost'}:${port}`)

// Graceful shutdown handler
let isShuttingDown = false

function gracefulShutdown(signal: string) {
  if (isShuttingDown) return
  isShuttingDown = true

  console.log(`\n⏳ Received ${signal}, shutting down gracefully...`)

  // Stop accepting new connections; in-flight requests finish first
  server.close((err) => {
    if (err) {
      console.error('Error closing HTTP server:', err)
      process.exit(1)
    }
    console.log('👋 Shutdown complete')
    process.exit(0)
  })
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'))
process.on('SIGINT', () => gracefulShutdown('SIGINT'))
