/**
 * Campaign Run
 *
 * Sends the initial email to every pending contact, then arms one reminder
 * per successful send. Tracking events are appended as each send lands;
 * contact fields are persisted once, after the loop, in a single
 * read-modify-write of the collection.
 */

import { trackingEvent } from '../db/schema.js'
import { logger } from '../utils/logger.js'
import { armReminder, isReminderJobFor, nextReminderTime, type CampaignContext, type CampaignResult } from './reminders/index.js'

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export async function runCampaign(ctx: CampaignContext, intervalMinutes: number): Promise<CampaignResult> {
  const { store, notifier, settings } = ctx

  const contacts = await store.listContacts()
  const pending = contacts.filter(contact => contact.status === 'pending')

  if (pending.length === 0) {
    logger.campaign.empty()
    return { succeeded: 0, failed: 0, total: 0 }
  }

  logger.campaign.started(pending.length, intervalMinutes)

  // contact id -> time its initial email went out
  const sent = new Map<number, Date>()
  let failed = 0

  for (const [index, contact] of pending.entries()) {
    const result = await notifier.sendInitial(contact)

    if (result.success) {
      const sentAt = new Date()
      sent.set(contact.id, sentAt)
      await store.appendTracking(trackingEvent(contact, 'email_sent', sentAt))
    } else {
      failed++
    }

    if (settings.sendDelayMs > 0 && index < pending.length - 1) {
      await sleep(settings.sendDelayMs)
    }
  }

  if (sent.size > 0) {
    const updated = await store.updateContacts(current =>
      current.map(contact => {
        const sentAt = sent.get(contact.id)
        if (!sentAt) return contact

        const stillPending = contact.status === 'pending'
        return {
          ...contact,
          sent_at: sentAt.toISOString(),
          updated_at: sentAt.toISOString(),
          reminder_count: 0,
          next_reminder_at: stillPending ? nextReminderTime(sentAt, intervalMinutes).toISOString() : null,
          reminder_interval_minutes: stillPending ? intervalMinutes : contact.reminder_interval_minutes,
        }
      })
    )

    // Armed only after the save so a fire always sees the stored send
    for (const contact of updated) {
      const sentAt = sent.get(contact.id)
      if (!sentAt) continue
      // Any chain still armed for this contact restarts from this send
      ctx.timer.cancelWhere(job => isReminderJobFor(job.jobId, contact.id))
      if (contact.status !== 'pending') continue
      armReminder(ctx, contact, nextReminderTime(sentAt, intervalMinutes), intervalMinutes)
    }
  }

  const result: CampaignResult = { succeeded: sent.size, failed, total: pending.length }
  logger.campaign.finished(result.succeeded, result.failed, result.total)
  return result
}
