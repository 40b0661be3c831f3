/**
 * Persisted record shapes for contacts.json and email_tracking.json.
 * Keys stay snake_case so seed files and the HTTP dump share one format.
 */

import { z } from 'zod'

export const CONTACT_STATUSES = ['pending', 'interested', 'not_interested'] as const

export const contactStatusSchema = z.enum(CONTACT_STATUSES)
export type ContactStatus = z.infer<typeof contactStatusSchema>

const timestamp = z.string().nullable().default(null)

export const contactSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  email: z.string(),
  company: z.string().nullable().optional(),
  status: contactStatusSchema.default('pending'),
  reminder_count: z.number().int().min(0).default(0),
  sent_at: timestamp,
  last_reminder_sent: timestamp,
  updated_at: timestamp,
  // Durable shadow of the armed reminder job; re-armed after a restart
  next_reminder_at: timestamp,
  reminder_interval_minutes: z.number().int().positive().nullable().default(null),
})
  // Seed files may carry their own fields; they survive every rewrite
  .passthrough()

export type Contact = z.output<typeof contactSchema>

// ============================================
// TRACKING EVENTS
// ============================================

export type TrackingAction = 'email_sent' | 'interested' | 'not_interested' | `reminder_${number}_sent`

const TRACKING_ACTION_PATTERN = /^(email_sent|interested|not_interested|reminder_\d+_sent)$/

export const trackingActionSchema = z.custom<TrackingAction>(
  value => typeof value === 'string' && TRACKING_ACTION_PATTERN.test(value),
  { message: 'Unknown tracking action' }
)

export const trackingEventSchema = z.object({
  contact_id: z.number().int(),
  contact_name: z.string(),
  contact_email: z.string(),
  action: trackingActionSchema,
  timestamp: z.string(),
})

export type TrackingEvent = z.output<typeof trackingEventSchema>

export function reminderAction(reminderNumber: number): TrackingAction {
  return `reminder_${reminderNumber}_sent`
}

export function trackingEvent(contact: Contact, action: TrackingAction, at: Date): TrackingEvent {
  return {
    contact_id: contact.id,
    contact_name: contact.name,
    contact_email: contact.email,
    action,
    timestamp: at.toISOString(),
  }
}
