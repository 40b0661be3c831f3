/**
 * File Locking Service
 *
 * Lock files guard the JSON store so the HTTP server and the campaign
 * worker never interleave read-modify-write cycles on the same document.
 *
 * Each lock file holds an ownership token: only the holder that wrote the
 * token may release it. A lock older than its TTL belongs to a writer that
 * died mid-update and may be taken over.
 */

import crypto from 'node:crypto'
import { readFile, rm, stat, writeFile } from 'node:fs/promises'
import { errorCode } from '../utils/errors.js'

const LOCK_SUFFIX = '.lock'

export interface LockOptions {
  ttlMs: number
  maxRetries?: number
  retryDelayMs?: number
}

export class LockTimeoutError extends Error {
  public readonly resource: string

  constructor(resource: string, attempts: number) {
    super(`Could not lock ${resource} after ${attempts} attempts`)
    this.name = 'LockTimeoutError'
    this.resource = resource
  }
}

function lockPath(resource: string): string {
  return `${resource}${LOCK_SUFFIX}`
}

async function tryCreate(path: string, token: string): Promise<boolean> {
  try {
    // wx - fail if the file already exists
    await writeFile(path, token, { flag: 'wx' })
    return true
  } catch (err) {
    if (errorCode(err) === 'EEXIST') return false
    throw err
  }
}

async function readHolder(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8')
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null
    throw err
  }
}

/**
 * Age of the lock file, or null once it is gone
 */
async function lockAge(path: string): Promise<number | null> {
  try {
    const info = await stat(path)
    return Date.now() - info.mtimeMs
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null
    throw err
  }
}

/**
 * Acquire a lock on a resource path with an ownership token
 * @param resource - Path of the guarded file (lock lives beside it)
 * @param ttlMs - Age after which an existing lock counts as abandoned
 * @returns Lock token if acquired, null if already locked
 */
export async function acquireLock(resource: string, ttlMs: number): Promise<string | null> {
  const path = lockPath(resource)
  const lockToken = crypto.randomUUID()

  if (await tryCreate(path, lockToken)) return lockToken

  const holder = await readHolder(path)
  const age = holder === null ? null : await lockAge(path)

  // Released since our attempt
  if (holder === null || age === null) {
    return (await tryCreate(path, lockToken)) ? lockToken : null
  }

  if (age <= ttlMs) return null

  // Only remove the holder that was judged stale, never one that replaced it
  if ((await readHolder(path)) !== holder) return null

  console.warn(`[lock] Taking over expired lock ${path}`)
  await rm(path, { force: true })
  return (await tryCreate(path, lockToken)) ? lockToken : null
}

/**
 * Release a lock (only if we own it)
 * @returns true if lock was released, false if we didn't own it
 */
export async function releaseLock(resource: string, token: string): Promise<boolean> {
  const path = lockPath(resource)

  const holder = await readHolder(path)
  if (holder !== token) return false

  await rm(path, { force: true })
  return true
}

/**
 * Try to acquire lock with retry
 * @returns Lock token if acquired, null if failed after all retries
 */
export async function acquireLockWithRetry(
  resource: string,
  ttlMs: number,
  maxRetries: number = 50,
  retryDelayMs: number = 100
): Promise<string | null> {
  for (let i = 0; i <= maxRetries; i++) {
    const token = await acquireLock(resource, ttlMs)
    if (token) return token

    if (i < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, retryDelayMs))
    }
  }

  return null
}

/**
 * Execute a function while holding the lock on a resource
 *
 * @throws LockTimeoutError if the lock could not be acquired within the retries
 *
 * @example
 * const contact = await withLock('contacts.json', { ttlMs: 10000 }, async () => {
 *   // read, modify, write contacts.json
 * })
 */
export async function withLock<T>(
  resource: string,
  options: LockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const maxRetries = options.maxRetries ?? 50
  const token = await acquireLockWithRetry(resource, options.ttlMs, maxRetries, options.retryDelayMs)

  if (!token) {
    throw new LockTimeoutError(resource, maxRetries + 1)
  }

  try {
    return await fn()
  } finally {
    const released = await releaseLock(resource, token)
    if (!released) {
      // Lock expired and was taken over while we held it
      console.warn(`[lock] Failed to release lock ${resource} - may have expired or been taken over`)
    }
  }
}
