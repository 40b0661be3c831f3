/**
 * Reminders Module
 *
 * Follow-up chain for campaign emails: one job per contact, re-armed after
 * each send until the contact responds or the cap is reached.
 */

// Types
export * from './types.js'

// Core rules
export { reminderJobId, isReminderJobFor, nextReminderTime, hasReachedCap, isAwaitingReminder, isScheduledFor } from './core.js'

// Processor (timer callback)
export { fireReminder, armReminder } from './processor.js'

// Recovery (startup)
export { recoverReminders } from './recovery.js'
