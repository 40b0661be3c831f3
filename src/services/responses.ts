/**
 * Response recording
 *
 * A click on either tracking link resolves the contact. Clearing
 * `next_reminder_at` keeps a restarted worker from re-arming the chain; a
 * job already armed in a running worker becomes a no-op when it fires and
 * finds the contact no longer pending.
 */

import type { CampaignStore } from '../db/store.js'
import { trackingEvent, type Contact } from '../db/schema.js'

export type ResponseAction = 'interested' | 'not_interested'

/**
 * @returns The updated contact, or null when the id is unknown
 */
export async function recordResponse(
  store: CampaignStore,
  contactId: number,
  action: ResponseAction
): Promise<Contact | null> {
  const now = new Date()

  const contact = await store.updateContact(contactId, current => ({
    ...current,
    status: action,
    updated_at: now.toISOString(),
    next_reminder_at: null,
  }))

  if (contact) {
    await store.appendTracking(trackingEvent(contact, action, now))
  }

  return contact
}
