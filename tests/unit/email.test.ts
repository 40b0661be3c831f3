import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { Notifier } from '../../src/services/email.js'
import type { SenderSettings } from '../../src/config/env.js'
import { FakeTransport, makeContact } from '../helpers/campaign.js'

const sender: SenderSettings = {
  senderEmail: 'sender@example.com',
  senderName: 'Sam Sender',
  companyName: 'Acme',
  productName: 'Widget Pro',
  baseUrl: 'http://localhost:8000',
}

const TEMPLATE =
  '<p>{{#is_reminder}}Reminder {{reminder_number}}: {{/is_reminder}}Hi {{contact_name}} from {{contact_company}}</p>' +
  '<a href="{{interested_link}}">yes</a>'

describe('Notifier', () => {
  let dir: string
  let templatePath: string
  let transport: FakeTransport
  let notifier: Notifier

  const contact = makeContact({ id: 1, name: 'Jane', email: 'jane@example.com', company: 'Example Corp' })

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    dir = await mkdtemp(path.join(os.tmpdir(), 'notifier-test-'))
    templatePath = path.join(dir, 'email_template.html')
    await writeFile(templatePath, TEMPLATE)

    transport = new FakeTransport()
    notifier = new Notifier({ transport, sender, templatePath })
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('sends the initial email', async () => {
    const result = await notifier.sendInitial(contact)

    expect(result).toEqual({ success: true, messageId: 'fake-1' })
    expect(transport.sent).toEqual([
      {
        from: 'Sam Sender <sender@example.com>',
        to: 'jane@example.com',
        subject: "Let's Schedule a Demo - Acme",
        html: '<p>Hi Jane from Example Corp</p><a href="http://localhost:8000/interested/1">yes</a>',
      },
    ])
  })

  it('sends a numbered reminder', async () => {
    await notifier.sendReminder(contact, 2)

    expect(transport.sent[0]?.subject).toBe("Reminder 2: Let's Schedule a Demo - Acme")
    expect(transport.sent[0]?.html).toBe(
      '<p>Reminder 2: Hi Jane from Example Corp</p><a href="http://localhost:8000/interested/1">yes</a>'
    )
  })

  it('picks up template edits on the next send', async () => {
    await notifier.sendInitial(contact)
    await writeFile(templatePath, 'Updated for {{contact_name}}')
    await notifier.sendInitial(contact)

    expect(transport.sent[1]?.html).toBe('Updated for Jane')
  })

  it('logs the send with a masked recipient', async () => {
    await notifier.sendInitial(contact)

    const line = String(vi.mocked(console.log).mock.calls.at(-1)?.[0])
    expect(line).toContain('Email campaign sent to j***@example.com')
  })

  it('returns a failure instead of throwing on transport errors', async () => {
    transport.failWith = new Error('535 authentication failed')

    const result = await notifier.sendReminder(contact, 1)

    expect(result).toEqual({ success: false, error: '535 authentication failed' })
    const line = String(vi.mocked(console.error).mock.calls.at(-1)?.[0])
    expect(line).toContain('Email reminder 1 failed to j***@example.com: 535 authentication failed')
  })

  it('returns a failure when the template is missing', async () => {
    const broken = new Notifier({ transport, sender, templatePath: path.join(dir, 'missing.html') })

    const result = await broken.sendInitial(contact)

    expect(result.success).toBe(false)
    expect(result.success ? '' : result.error).toContain('ENOENT')
    expect(transport.sent).toEqual([])
  })
})
