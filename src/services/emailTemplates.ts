// Email Template Infrastructure
//
// The campaign body lives in an HTML file so copy can change without a
// deploy. Placeholders:
//   {{name}}               HTML-escaped value, empty when unset or false
//   {{#name}}...{{/name}}  kept only when the value is truthy
//
// Subjects and sender lines are built here too so the initial send and
// every reminder stay worded consistently.

import { readFile } from 'node:fs/promises'
import type { Contact } from '../db/schema.js'
import type { SenderSettings } from '../config/env.js'

export type TemplateValue = string | number | boolean | null | undefined

export type TemplateVars = {
  contact_name: string
  contact_email: string
  contact_company: string
  company_name: string
  product_name: string
  sender_name: string
  interested_link: string
  not_interested_link: string
  is_reminder?: boolean
  reminder_number?: number
}

export const DEFAULT_COMPANY_LABEL = 'your organization'

const SECTION_PATTERN = /\{\{#\s*(\w+)\s*\}\}([\s\S]*?)\{\{\/\s*\1\s*\}\}/g
const VARIABLE_PATTERN = /\{\{\s*(\w+)\s*\}\}/g

// ============================================
// HELPERS
// ============================================

export function escapeHtml(value: string): string {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    '\'': '&#39;',
  }
  return value.replace(/[&<>"']/g, (ch) => map[ch] ?? ch)
}

export function sanitizeEmailSubject(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim()
}

function isTruthy(value: TemplateValue): boolean {
  return value !== undefined && value !== null && value !== false && value !== '' && value !== 0
}

// ============================================
// RENDERING
// ============================================

export function renderTemplate(template: string, vars: Readonly<Record<string, TemplateValue>>): string {
  return template
    .replace(SECTION_PATTERN, (_match, name: string, body: string) => (isTruthy(vars[name]) ? body : ''))
    .replace(VARIABLE_PATTERN, (_match, name: string) => {
      const value = vars[name]
      if (value === undefined || value === null || value === false) return ''
      return escapeHtml(String(value))
    })
}

export async function loadTemplate(templatePath: string): Promise<string> {
  return readFile(templatePath, 'utf8')
}

export function trackingLinks(baseUrl: string, contactId: number): { interested: string; notInterested: string } {
  const base = baseUrl.replace(/\/+$/, '')
  return {
    interested: `${base}/interested/${contactId}`,
    notInterested: `${base}/not-interested/${contactId}`,
  }
}

export function buildTemplateVars(contact: Contact, sender: SenderSettings, reminderNumber?: number): TemplateVars {
  const links = trackingLinks(sender.baseUrl, contact.id)
  const vars: TemplateVars = {
    contact_name: contact.name,
    contact_email: contact.email,
    contact_company: contact.company || DEFAULT_COMPANY_LABEL,
    company_name: sender.companyName,
    product_name: sender.productName,
    sender_name: sender.senderName,
    interested_link: links.interested,
    not_interested_link: links.notInterested,
  }

  if (reminderNumber !== undefined) {
    vars.is_reminder = true
    vars.reminder_number = reminderNumber
  }

  return vars
}

export function buildSubject(companyName: string, reminderNumber?: number): string {
  const subject = `Let's Schedule a Demo - ${companyName}`
  return sanitizeEmailSubject(reminderNumber === undefined ? subject : `Reminder ${reminderNumber}: ${subject}`)
}

export function formatSender(sender: Pick<SenderSettings, 'senderName' | 'senderEmail'>): string {
  return `${sender.senderName} <${sender.senderEmail}>`
}
