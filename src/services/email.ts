// Email Service - campaign and reminder sends
//
// Template infrastructure lives in emailTemplates.ts, delivery in transport.ts.
// Sends never throw: every failure comes back as an EmailResult so the
// campaign engine decides what a failed send means for the contact.

import type { SenderSettings } from '../config/env.js'
import type { Contact } from '../db/schema.js'
import { logEmailSent, logEmailFailed } from '../utils/logger.js'
import { errorMessage } from '../utils/errors.js'
import type { EmailTransport } from './transport.js'
import {
  buildSubject,
  buildTemplateVars,
  formatSender,
  loadTemplate,
  renderTemplate,
  type TemplateVars,
} from './emailTemplates.js'

export type EmailResult =
  | { success: true; messageId: string }
  | { success: false; error: string }

/**
 * What the campaign engine needs from a notifier
 */
export interface ContactNotifier {
  sendInitial(contact: Contact): Promise<EmailResult>
  sendReminder(contact: Contact, reminderNumber: number): Promise<EmailResult>
}

export interface NotifierOptions {
  transport: EmailTransport
  sender: SenderSettings
  templatePath: string
}

export class Notifier implements ContactNotifier {
  constructor(private readonly options: NotifierOptions) {}

  /**
   * Render the campaign template for `contact` and hand it to the transport.
   * The template is re-read on every send so edits apply to the next email.
   */
  async send(contact: Contact, vars: TemplateVars): Promise<EmailResult> {
    const type = vars.is_reminder ? `reminder ${vars.reminder_number ?? ''}`.trim() : 'campaign'

    try {
      const template = await loadTemplate(this.options.templatePath)
      const { messageId } = await this.options.transport.send({
        from: formatSender(this.options.sender),
        to: contact.email,
        subject: buildSubject(this.options.sender.companyName, vars.is_reminder ? vars.reminder_number : undefined),
        html: renderTemplate(template, vars),
      })

      logEmailSent(type, contact.email, { contactId: contact.id, messageId, transport: this.options.transport.name })
      return { success: true, messageId }
    } catch (err) {
      logEmailFailed(type, contact.email, err, { contactId: contact.id, transport: this.options.transport.name })
      return { success: false, error: errorMessage(err) }
    }
  }

  sendInitial(contact: Contact): Promise<EmailResult> {
    return this.send(contact, buildTemplateVars(contact, this.options.sender))
  }

  sendReminder(contact: Contact, reminderNumber: number): Promise<EmailResult> {
    return this.send(contact, buildTemplateVars(contact, this.options.sender, reminderNumber))
  }
}
