import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { createApp, type App } from '../../src/app.js'
import { trackingEvent, type TrackingEvent } from '../../src/db/schema.js'
import { formatResponseRate } from '../../src/services/stats.js'
import { createTempStore, makeContact, seedContacts, type TempStore } from '../helpers/campaign.js'

describe('stats routes', () => {
  let temp: TempStore
  let app: App

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    temp = await createTempStore()
    app = createApp({ store: temp.store, schedulingLink: 'https://calendar.example.com/demo' })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await temp.cleanup()
  })

  describe('GET /stats', () => {
    it('counts statuses and returns the last ten events', async () => {
      const contacts = [
        makeContact({ id: 1 }),
        makeContact({ id: 2, status: 'interested' }),
        makeContact({ id: 3, status: 'not_interested' }),
      ]
      await seedContacts(temp.contactsPath, contacts)

      const events: TrackingEvent[] = []
      for (let i = 0; i < 12; i++) {
        events.push(trackingEvent(contacts[i % 3], 'email_sent', new Date(Date.UTC(2026, 9, 1, 9, i))))
      }
      await writeFile(temp.trackingPath, JSON.stringify(events, null, 2))

      const res = await app.request('/stats')

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({
        total_contacts: 3,
        interested: 1,
        not_interested: 1,
        pending: 1,
        response_rate: '66.7%',
        recent_responses: events.slice(2),
      })
    })

    it('reports a zero rate with no contacts', async () => {
      const res = await app.request('/stats')

      expect(await res.json()).toEqual({
        total_contacts: 0,
        interested: 0,
        not_interested: 0,
        pending: 0,
        response_rate: '0%',
        recent_responses: [],
      })
    })
  })

  describe('formatResponseRate', () => {
    it('uses one decimal place', () => {
      expect(formatResponseRate(1, 4)).toBe('25.0%')
      expect(formatResponseRate(4, 4)).toBe('100.0%')
      expect(formatResponseRate(0, 0)).toBe('0%')
    })
  })

  describe('GET /contacts', () => {
    it('dumps every contact with a total', async () => {
      const contacts = [makeContact({ id: 1 }), makeContact({ id: 2, status: 'interested' })]
      await seedContacts(temp.contactsPath, contacts)

      const res = await app.request('/contacts')

      expect(await res.json()).toEqual({ contacts, total: 2 })
    })
  })
})
