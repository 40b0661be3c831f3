/**
 * Reminder System Types
 */

import type { CampaignStore } from '../../db/store.js'
import type { ReminderTimer } from '../../lib/scheduler.js'
import type { ContactNotifier } from '../../services/email.js'

export interface CampaignSettings {
  maxReminders: number
  sendDelayMs: number
}

/**
 * Everything a campaign run or reminder fire touches. Built once by the
 * worker and passed down; nothing here is looked up globally.
 */
export interface CampaignContext {
  store: CampaignStore
  notifier: ContactNotifier
  timer: ReminderTimer
  settings: CampaignSettings
}

export interface CampaignResult {
  succeeded: number
  failed: number
  total: number
}

export type ReminderOutcome =
  | { status: 'skipped'; contactId: number; reason: 'not_found' | 'resolved' | 'superseded' }
  | { status: 'capped'; contactId: number }
  | { status: 'sent'; contactId: number; reminderNumber: number; nextReminderAt: Date | null }
  | { status: 'failed'; contactId: number; reminderNumber: number; error: string }
