import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { contactSchema, type Contact } from '../../src/db/schema.js'
import { CampaignStore } from '../../src/db/store.js'
import { ReminderTimer } from '../../src/lib/scheduler.js'
import type { ContactNotifier, EmailResult } from '../../src/services/email.js'
import type { EmailTransport, OutgoingEmail } from '../../src/services/transport.js'
import type { CampaignContext } from '../../src/jobs/reminders/index.js'

export interface TempStore {
  dir: string
  store: CampaignStore
  contactsPath: string
  trackingPath: string
  cleanup: () => Promise<void>
}

export async function createTempStore(): Promise<TempStore> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'campaign-test-'))
  const contactsPath = path.join(dir, 'contacts.json')
  const trackingPath = path.join(dir, 'email_tracking.json')

  return {
    dir,
    store: new CampaignStore({ contactsPath, trackingPath, lockRetries: 50, lockRetryDelayMs: 5 }),
    contactsPath,
    trackingPath,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  }
}

export function makeContact(overrides: Partial<Contact> & { id: number }): Contact {
  return contactSchema.parse({
    name: `Contact ${overrides.id}`,
    email: `contact${overrides.id}@example.com`,
    company: 'Example Corp',
    ...overrides,
  })
}

export async function seedContacts(file: string, contacts: Contact[]): Promise<void> {
  await writeFile(file, JSON.stringify(contacts, null, 2), 'utf8')
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, 'utf8'))
}

/**
 * Records every send; contacts listed in `failFor` get a failed result
 */
export class FakeNotifier implements ContactNotifier {
  readonly initial: number[] = []
  readonly reminders: Array<{ contactId: number; reminderNumber: number }> = []
  readonly failFor = new Set<number>()
  private nextId = 0

  async sendInitial(contact: Contact): Promise<EmailResult> {
    this.initial.push(contact.id)
    return this.result(contact)
  }

  async sendReminder(contact: Contact, reminderNumber: number): Promise<EmailResult> {
    this.reminders.push({ contactId: contact.id, reminderNumber })
    return this.result(contact)
  }

  private result(contact: Contact): EmailResult {
    if (this.failFor.has(contact.id)) {
      return { success: false, error: 'SMTP connection refused' }
    }
    return { success: true, messageId: `msg-${++this.nextId}` }
  }
}

/**
 * In-process transport; set `failWith` to make every send reject
 */
export class FakeTransport implements EmailTransport {
  readonly name = 'fake'
  readonly sent: OutgoingEmail[] = []
  failWith: Error | null = null

  async send(message: OutgoingEmail): Promise<{ messageId: string }> {
    if (this.failWith) throw this.failWith
    this.sent.push(message)
    return { messageId: `fake-${this.sent.length}` }
  }
}

export function createTestContext(
  store: CampaignStore,
  options: { notifier?: FakeNotifier; timer?: ReminderTimer; maxReminders?: number } = {}
): CampaignContext & { notifier: FakeNotifier } {
  return {
    store,
    notifier: options.notifier ?? new FakeNotifier(),
    timer: options.timer ?? new ReminderTimer(),
    settings: {
      maxReminders: options.maxReminders ?? 3,
      sendDelayMs: 0,
    },
  }
}
