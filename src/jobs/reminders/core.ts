/**
 * Core Reminder Helpers
 *
 * Pure rules shared by the campaign run, the reminder processor and recovery.
 */

import { addMinutes, isValid, parseISO } from 'date-fns'
import type { Contact } from '../../db/schema.js'

export function reminderJobId(contactId: number, reminderNumber: number): string {
  return `reminder_${contactId}_${reminderNumber}`
}

export function isReminderJobFor(jobId: string, contactId: number): boolean {
  return jobId.startsWith(`reminder_${contactId}_`)
}

/**
 * Cadence is per contact: measured from that contact's last send
 */
export function nextReminderTime(from: Date, intervalMinutes: number): Date {
  return addMinutes(from, intervalMinutes)
}

export function hasReachedCap(contact: Pick<Contact, 'reminder_count'>, maxReminders: number): boolean {
  return contact.reminder_count >= maxReminders
}

/**
 * A contact is owed a reminder only while it is pending and has one armed
 */
export function isAwaitingReminder(contact: Contact): contact is Contact & { next_reminder_at: string } {
  return contact.status === 'pending' && contact.next_reminder_at !== null
}

/**
 * A fired job is current only if it still matches the stored fire time.
 * Anything else was replaced by a later send or a new campaign run.
 */
export function isScheduledFor(contact: Pick<Contact, 'next_reminder_at'>, fireAt: Date): boolean {
  if (contact.next_reminder_at === null) return false
  const stored = parseISO(contact.next_reminder_at)
  return isValid(stored) && stored.getTime() === fireAt.getTime()
}
