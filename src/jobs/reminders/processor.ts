/**
 * Reminder Processor
 *
 * Runs when a reminder job fires. The contact is always reloaded from the
 * store first: a click on either tracking link resolves the contact, and
 * that status change is what cancels the rest of the chain.
 */

import { reminderAction, trackingEvent, type Contact } from '../../db/schema.js'
import { logger } from '../../utils/logger.js'
import { hasReachedCap, isScheduledFor, nextReminderTime, reminderJobId } from './core.js'
import type { CampaignContext, ReminderOutcome } from './types.js'

/**
 * Arm the follow-up for `contact` on the context's timer.
 * The job id carries the ordinal of the reminder it will send.
 */
export function armReminder(ctx: CampaignContext, contact: Contact, fireAt: Date, intervalMinutes: number): string {
  const jobId = reminderJobId(contact.id, contact.reminder_count + 1)

  const job = ctx.timer.scheduleAt(fireAt, jobId, fireReminder, [ctx, contact.id, intervalMinutes, fireAt])
  if (job) {
    logger.reminder.scheduled(contact.id, jobId, fireAt)
  }

  return jobId
}

/**
 * @param scheduledFor - Fire time the job was armed with. When given, the job
 * is dropped unless the contact still records that time.
 */
export async function fireReminder(
  ctx: CampaignContext,
  contactId: number,
  intervalMinutes: number,
  scheduledFor?: Date
): Promise<ReminderOutcome> {
  const { store, notifier, settings } = ctx

  const contact = await store.findContact(contactId)
  if (!contact) {
    logger.reminder.skipped(contactId, 'not_found')
    return { status: 'skipped', contactId, reason: 'not_found' }
  }

  if (contact.status !== 'pending') {
    logger.reminder.skipped(contactId, 'resolved')
    return { status: 'skipped', contactId, reason: 'resolved' }
  }

  if (scheduledFor && !isScheduledFor(contact, scheduledFor)) {
    logger.reminder.skipped(contactId, 'superseded')
    return { status: 'skipped', contactId, reason: 'superseded' }
  }

  if (hasReachedCap(contact, settings.maxReminders)) {
    await store.updateContact(contactId, current => {
      if (current.status !== 'pending') return current
      return {
        ...current,
        status: 'not_interested',
        updated_at: new Date().toISOString(),
        next_reminder_at: null,
      }
    })
    logger.reminder.capped(contactId, settings.maxReminders)
    return { status: 'capped', contactId }
  }

  const reminderNumber = contact.reminder_count + 1
  const result = await notifier.sendReminder(contact, reminderNumber)

  if (!result.success) {
    // No retry: the chain ends here until the next campaign run
    await store.updateContact(contactId, current => ({ ...current, next_reminder_at: null }))
    logger.reminder.failed(contactId, reminderNumber, result.error)
    return { status: 'failed', contactId, reminderNumber, error: result.error }
  }

  const sentAt = new Date()
  const fireAt = nextReminderTime(sentAt, intervalMinutes)

  const updated = await store.updateContact(contactId, current => {
    const stillPending = current.status === 'pending'
    return {
      ...current,
      reminder_count: reminderNumber,
      last_reminder_sent: sentAt.toISOString(),
      updated_at: sentAt.toISOString(),
      next_reminder_at: stillPending ? fireAt.toISOString() : null,
      reminder_interval_minutes: intervalMinutes,
    }
  })

  await store.appendTracking(trackingEvent(updated ?? contact, reminderAction(reminderNumber), sentAt))
  logger.reminder.sent(contactId, reminderNumber)

  // Resolved while the reminder was in flight
  if (!updated || updated.status !== 'pending') {
    return { status: 'sent', contactId, reminderNumber, nextReminderAt: null }
  }

  armReminder(ctx, updated, fireAt, intervalMinutes)
  return { status: 'sent', contactId, reminderNumber, nextReminderAt: fireAt }
}
