/**
 * Stats Routes - campaign progress and contact dump
 */

import { Hono } from 'hono'
import type { CampaignStore } from '../db/store.js'
import type { AppEnv } from '../middleware/requestId.js'
import { getCampaignStats } from '../services/stats.js'

export function statsRoutes({ store }: { store: CampaignStore }) {
  const stats = new Hono<AppEnv>()

  /**
   * GET /stats
   * Status counts, response rate and the last ten tracking events
   */
  stats.get('/stats', async (c) => {
    return c.json(await getCampaignStats(store))
  })

  /**
   * GET /contacts
   */
  stats.get('/contacts', async (c) => {
    const contacts = await store.listContacts()
    return c.json({ contacts, total: contacts.length })
  })

  return stats
}
