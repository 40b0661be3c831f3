/**
 * Test Setup
 *
 * Every store a test touches lives in its own temp directory (see
 * helpers/campaign.ts), and mail goes to an in-process fake transport, so
 * nothing here needs a server.
 */

import { config } from 'dotenv'
import fs from 'node:fs'
import path from 'node:path'

// Load test env before modules read config/env.ts
const cwd = process.cwd()
const envTestPath = path.join(cwd, '.env.test')
if (fs.existsSync(envTestPath)) {
  config({ path: envTestPath })
}

process.env.NODE_ENV = 'test'
// Vitest exposes its own BASE_URL ('/'), which is not a tracking link base
process.env.BASE_URL = 'http://localhost:8000'

// Provide safe defaults so env validation passes in tests
const defaults: Record<string, string> = {
  APP_PORT: '8001',
  SCHEDULING_LINK: 'https://calendar.example.com/demo',
  EMAIL_TRANSPORT: 'smtp',
  SMTP_SERVER: 'smtp.example.com',
  SMTP_PORT: '587',
  SMTP_USERNAME: 'test-user',
  SMTP_PASSWORD: 'test-secret',
  SENDER_EMAIL: 'sender@example.com',
  SENDER_NAME: 'Sam Sender',
  COMPANY_NAME: 'Acme',
  PRODUCT_NAME: 'Widget Pro',
  MAX_REMINDERS: '3',
  REMINDER_INTERVAL_MINUTES: '1',
  SEND_DELAY_MS: '0',
}

for (const [key, value] of Object.entries(defaults)) {
  if (!process.env[key]) {
    process.env[key] = value
  }
}
