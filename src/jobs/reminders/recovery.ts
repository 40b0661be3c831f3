/**
 * Reminder Recovery
 *
 * Timer jobs live in memory only. On startup, re-arm every pending contact
 * that still has a `next_reminder_at` recorded.
 */

import { parseISO, isValid } from 'date-fns'
import { logger } from '../../utils/logger.js'
import { isAwaitingReminder } from './core.js'
import { armReminder } from './processor.js'
import type { CampaignContext } from './types.js'

/**
 * Re-arm reminders that were owed when the previous process stopped.
 * Past timestamps fire as soon as the timer runs.
 * @returns Number of re-armed jobs
 */
export async function recoverReminders(ctx: CampaignContext, defaultIntervalMinutes: number): Promise<number> {
  let recovered = 0
  const contacts = await ctx.store.listContacts()

  for (const contact of contacts) {
    if (!isAwaitingReminder(contact)) continue

    const fireAt = parseISO(contact.next_reminder_at)
    if (!isValid(fireAt)) {
      logger.warn('Skipping reminder with unreadable fire time', {
        contactId: contact.id,
        nextReminderAt: contact.next_reminder_at,
      })
      continue
    }

    armReminder(ctx, contact, fireAt, contact.reminder_interval_minutes ?? defaultIntervalMinutes)
    recovered++
  }

  if (recovered > 0) {
    logger.info('Recovered pending reminders', { count: recovered })
  }

  return recovered
}
