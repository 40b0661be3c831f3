/**
 * Campaign Store
 *
 * Contacts and tracking events live in two JSON documents that are read and
 * written as whole snapshots. Every mutation is a single read-modify-write
 * performed while holding the document's lock file, so the HTTP server and
 * the campaign worker cannot overwrite each other's updates.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { withLock } from '../services/lock.js'
import { errorCode, errorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { contactSchema, trackingEventSchema, type Contact, type TrackingEvent } from './schema.js'

export interface StoreOptions {
  contactsPath: string
  trackingPath: string
  lockTtlMs?: number
  lockRetries?: number
  lockRetryDelayMs?: number
}

/**
 * Load a JSON array document. Missing, empty and malformed files all read
 * as an empty collection; malformed ones are logged, invalid records at error level.
 */
async function readCollection<S extends z.ZodTypeAny>(file: string, itemSchema: S): Promise<z.output<S>[]> {
  let raw: string
  try {
    raw = await readFile(file, 'utf8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return []
    throw err
  }

  if (!raw.trim()) return []

  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch (err) {
    logger.warn('Store file is not valid JSON, treating as empty', { file, reason: errorMessage(err) })
    return []
  }

  const parsed = z.array(itemSchema).safeParse(document)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    // Index of the first bad record; absent when the document itself is not an array
    const record = issue?.path[0]
    logger.error('Store file has an invalid record, treating as empty', undefined, {
      file,
      record: typeof record === 'number' ? record : null,
      reason: issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid',
    })
    return []
  }

  return parsed.data
}

async function writeCollection(file: string, records: unknown[]): Promise<void> {
  // Write beside the target and rename so readers never see a partial file
  const tmp = `${file}.tmp`
  await writeFile(tmp, JSON.stringify(records, null, 2), 'utf8')
  await rename(tmp, file)
}

export class CampaignStore {
  private readonly contactsPath: string
  private readonly trackingPath: string

  constructor(private readonly options: StoreOptions) {
    this.contactsPath = path.resolve(options.contactsPath)
    this.trackingPath = path.resolve(options.trackingPath)
  }

  // ============================================
  // CONTACTS
  // ============================================

  listContacts(): Promise<Contact[]> {
    return readCollection(this.contactsPath, contactSchema)
  }

  async findContact(id: number): Promise<Contact | null> {
    const contacts = await this.listContacts()
    return contacts.find(contact => contact.id === id) ?? null
  }

  /**
   * Atomically apply `mutate` to one contact against the latest stored copy
   * @returns The stored result, or null if no contact has that id
   */
  updateContact(id: number, mutate: (contact: Contact) => Contact): Promise<Contact | null> {
    return this.exclusive(this.contactsPath, async () => {
      const contacts = await this.listContacts()
      const index = contacts.findIndex(contact => contact.id === id)
      if (index === -1) return null

      const updated = mutate(contacts[index])
      contacts[index] = updated
      await writeCollection(this.contactsPath, contacts)
      return updated
    })
  }

  /**
   * Atomically rewrite the collection from its latest stored copy
   */
  updateContacts(mutate: (contacts: Contact[]) => Contact[]): Promise<Contact[]> {
    return this.exclusive(this.contactsPath, async () => {
      const updated = mutate(await this.listContacts())
      await writeCollection(this.contactsPath, updated)
      return updated
    })
  }

  // ============================================
  // TRACKING
  // ============================================

  listTracking(): Promise<TrackingEvent[]> {
    return readCollection(this.trackingPath, trackingEventSchema)
  }

  async appendTracking(event: TrackingEvent): Promise<void> {
    await this.exclusive(this.trackingPath, async () => {
      const events = await this.listTracking()
      events.push(event)
      await writeCollection(this.trackingPath, events)
    })
  }

  private async exclusive<T>(file: string, fn: () => Promise<T>): Promise<T> {
    await mkdir(path.dirname(file), { recursive: true })
    return withLock(
      file,
      {
        ttlMs: this.options.lockTtlMs ?? 10000,
        maxRetries: this.options.lockRetries,
        retryDelayMs: this.options.lockRetryDelayMs,
      },
      fn
    )
  }
}

export function createStore(config: { CONTACTS_FILE: string; TRACKING_FILE: string; LOCK_TTL_MS: number }): CampaignStore {
  return new CampaignStore({
    contactsPath: config.CONTACTS_FILE,
    trackingPath: config.TRACKING_FILE,
    lockTtlMs: config.LOCK_TTL_MS,
  })
}
