/**
 * Response Routes - tracking link targets
 *
 * Recipients land here from the links in campaign emails. Whatever happens
 * to the bookkeeping, the recipient always gets the redirect or the page.
 */

import { Hono } from 'hono'
import { zValidator } from '@hono/zod-validator'
import { z } from 'zod'
import type { CampaignStore } from '../db/store.js'
import { getRequestId, type AppEnv } from '../middleware/requestId.js'
import { recordResponse, type ResponseAction } from '../services/responses.js'
import { logger } from '../utils/logger.js'

export interface ResponseRouteDeps {
  store: CampaignStore
  schedulingLink: string
}

const contactParam = z.object({ id: z.coerce.number().int() })

export const NOT_INTERESTED_PAGE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Thank you</title>
</head>
<body style="font-family: Arial, sans-serif; text-align: center; padding: 50px;">
  <h1>Thank you for your response</h1>
  <p>We appreciate you letting us know. We won't send you any more emails about this.</p>
</body>
</html>`

export function responseRoutes({ store, schedulingLink }: ResponseRouteDeps) {
  const responses = new Hono<AppEnv>()

  async function record(requestId: string, contactId: number, action: ResponseAction): Promise<void> {
    const log = logger.child({ requestId, contactId, action })
    try {
      const contact = await recordResponse(store, contactId, action)
      if (contact) {
        log.info('Response recorded')
      } else {
        log.warn('Response for unknown contact')
      }
    } catch (err) {
      log.error('Failed to record response', err)
    }
  }

  /**
   * GET /interested/:id
   * Marks the contact interested and sends them to the booking page
   */
  responses.get('/interested/:id', zValidator('param', contactParam), async (c) => {
    const { id } = c.req.valid('param')
    await record(getRequestId(c), id, 'interested')
    return c.redirect(schedulingLink, 302)
  })

  /**
   * GET /not-interested/:id
   * Marks the contact not interested and shows a static thank-you page
   */
  responses.get('/not-interested/:id', zValidator('param', contactParam), async (c) => {
    const { id } = c.req.valid('param')
    await record(getRequestId(c), id, 'not_interested')
    return c.html(NOT_INTERESTED_PAGE)
  })

  return responses
}
