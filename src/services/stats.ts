/**
 * Campaign statistics for the /stats endpoint
 */

import type { CampaignStore } from '../db/store.js'
import type { ContactStatus, TrackingEvent } from '../db/schema.js'

const RECENT_RESPONSES = 10

export interface CampaignStats {
  total_contacts: number
  interested: number
  not_interested: number
  pending: number
  response_rate: string
  recent_responses: TrackingEvent[]
}

export function formatResponseRate(responded: number, total: number): string {
  if (total === 0) return '0%'
  return `${((responded / total) * 100).toFixed(1)}%`
}

export async function getCampaignStats(store: CampaignStore): Promise<CampaignStats> {
  const [contacts, tracking] = await Promise.all([store.listContacts(), store.listTracking()])

  const count = (status: ContactStatus) => contacts.filter(contact => contact.status === status).length
  const interested = count('interested')
  const notInterested = count('not_interested')

  return {
    total_contacts: contacts.length,
    interested,
    not_interested: notInterested,
    pending: count('pending'),
    response_rate: formatResponseRate(interested + notInterested, contacts.length),
    recent_responses: tracking.slice(-RECENT_RESPONSES),
  }
}
