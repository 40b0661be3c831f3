import { Hono } from 'hono'
import { logger as requestLogger } from 'hono/logger'
import { secureHeaders } from 'hono/secure-headers'
import { HTTPException } from 'hono/http-exception'
import type { CampaignStore } from './db/store.js'
import { requestIdMiddleware, getRequestId, type AppEnv } from './middleware/requestId.js'
import { LockTimeoutError } from './services/lock.js'
import { logger, safeError } from './utils/logger.js'

// Routes
import { responseRoutes } from './routes/responses.js'
import { statsRoutes } from './routes/stats.js'

export interface AppDeps {
  store: CampaignStore
  schedulingLink: string
}

export function createApp({ store, schedulingLink }: AppDeps) {
  const app = new Hono<AppEnv>()

  // Global middleware
  app.use('*', requestIdMiddleware)
  app.use('*', requestLogger((message) => logger.info(message)))
  app.use('*', secureHeaders({
    xContentTypeOptions: 'nosniff',
    xFrameOptions: 'DENY',
  }))

  app.get('/', (c) => c.json({
    message: 'Email campaign response tracker',
    endpoints: {
      interested: '/interested/:id',
      notInterested: '/not-interested/:id',
      stats: '/stats',
      contacts: '/contacts',
      health: '/health',
    },
  }))

  // Liveness probe
  app.get('/health', (c) => c.json({ status: 'ok', timestamp: new Date().toISOString() }))

  app.route('/', responseRoutes({ store, schedulingLink }))
  app.route('/', statsRoutes({ store }))

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ error: err.message }, err.status)
    }
    const context = { requestId: getRequestId(c), path: c.req.path }
    if (err instanceof LockTimeoutError) {
      return c.json(safeError('STORE_ERROR', err, 'http', context), 503)
    }
    return c.json(safeError('INTERNAL_ERROR', err, 'http', context), 500)
  })

  return app
}

export type App = ReturnType<typeof createApp>
