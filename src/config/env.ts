import 'dotenv/config'
import { z } from 'zod'

function normalizeUrlEnv(value: unknown): unknown {
  if (typeof value !== 'string') return value
  // Strip whitespace aggressively to avoid broken URLs from env var copy/paste.
  const trimmed = value.trim().replace(/\s+/g, '')
  if (!trimmed) return trimmed

  // Fix accidental double scheme prefixes (e.g., "https://https://example.com").
  if (/^(https?:\/\/){2,}/i.test(trimmed)) {
    const withoutScheme = trimmed.replace(/^(https?:\/\/)+/i, '')
    const isLocalhost = /^(localhost|127\.0\.0\.1|0\.0\.0\.0)(:|$)/.test(withoutScheme)
    const protocol = isLocalhost ? 'http://' : 'https://'
    return `${protocol}${withoutScheme}`
  }

  if (/^[a-zA-Z][a-zA-Z\d+.-]*:\/\//.test(trimmed)) return trimmed.replace(/\/+$/, '')

  // Default to https for production-ish hostnames; use http for localhost.
  const isLocalhost = /^(localhost|127\.0\.0\.1|0\.0\.0\.0)(:|$)/.test(trimmed)
  const protocol = isLocalhost ? 'http://' : 'https://'
  return `${protocol}${trimmed.replace(/\/+$/, '')}`
}

const envSchema = z.object({
  // App
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  APP_PORT: z.string().default('8000'),
  BASE_URL: z.preprocess(normalizeUrlEnv, z.string().url()).default('http://localhost:8000'), // Tracking link base
  SCHEDULING_LINK: z.preprocess(normalizeUrlEnv, z.string().url()).optional(), // Where "interested" clicks land

  // Storage
  CONTACTS_FILE: z.string().default('contacts.json'),
  TRACKING_FILE: z.string().default('email_tracking.json'),
  TEMPLATE_FILE: z.string().default('templates/email_template.html'),
  LOCK_TTL_MS: z.coerce.number().int().positive().default(10000),

  // Email
  EMAIL_TRANSPORT: z.enum(['smtp', 'resend']).default('smtp'),
  SMTP_SERVER: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().optional(),
  SMTP_USERNAME: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  RESEND_API_KEY: z.string().startsWith('re_').optional(),
  SENDER_EMAIL: z.string().email().optional(),
  SENDER_NAME: z.string().optional(),
  COMPANY_NAME: z.string().optional(),
  PRODUCT_NAME: z.string().optional(),

  // Campaign
  MAX_REMINDERS: z.coerce.number().int().min(0).default(3),
  REMINDER_INTERVAL_MINUTES: z.coerce.number().int().positive().default(1),
  SEND_DELAY_MS: z.coerce.number().int().min(0).default(1000), // Pause between initial sends
})

export type Env = z.infer<typeof envSchema>

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env)

  if (!parsed.success) {
    console.error('❌ Invalid environment variables:')
    console.error(parsed.error.flatten().fieldErrors)
    process.exit(1)
  }

  const data = parsed.data

  if (data.NODE_ENV === 'production') {
    // Recipients click these links from their inbox
    if (!data.BASE_URL.startsWith('https://')) {
      console.error('❌ FATAL: BASE_URL must use HTTPS in production')
      process.exit(1)
    }

    console.log('✅ Production environment validated')
  }

  return data
}

export const env = loadEnv()

// ============================================
// MAIL SETTINGS
// ============================================

export class ConfigError extends Error {
  public readonly missing: string[]

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`)
    this.name = 'ConfigError'
    this.missing = missing
  }
}

export interface SenderSettings {
  senderEmail: string
  senderName: string
  companyName: string
  productName: string
  baseUrl: string
}

export type TransportSettings =
  | { kind: 'smtp'; host: string; port: number; username: string; password: string }
  | { kind: 'resend'; apiKey: string }

export interface MailSettings {
  sender: SenderSettings
  transport: TransportSettings
}

const senderSchema = z.object({
  SENDER_EMAIL: z.string().min(1),
  SENDER_NAME: z.string().min(1),
  COMPANY_NAME: z.string().min(1),
  PRODUCT_NAME: z.string().min(1),
  BASE_URL: z.string().min(1),
})

const smtpSchema = senderSchema.extend({
  SMTP_SERVER: z.string().min(1),
  SMTP_PORT: z.number().int().positive(),
  SMTP_USERNAME: z.string().min(1),
  SMTP_PASSWORD: z.string().min(1),
})

const resendSchema = senderSchema.extend({
  RESEND_API_KEY: z.string().min(1),
})

type MailEnv = Pick<
  Env,
  | 'BASE_URL'
  | 'EMAIL_TRANSPORT'
  | 'SMTP_SERVER'
  | 'SMTP_PORT'
  | 'SMTP_USERNAME'
  | 'SMTP_PASSWORD'
  | 'RESEND_API_KEY'
  | 'SENDER_EMAIL'
  | 'SENDER_NAME'
  | 'COMPANY_NAME'
  | 'PRODUCT_NAME'
>

function missingKeys(error: z.ZodError): string[] {
  return [...new Set(error.issues.map(issue => String(issue.path[0])))]
}

function senderFrom(data: z.infer<typeof senderSchema>): SenderSettings {
  return {
    senderEmail: data.SENDER_EMAIL,
    senderName: data.SENDER_NAME,
    companyName: data.COMPANY_NAME,
    productName: data.PRODUCT_NAME,
    baseUrl: data.BASE_URL,
  }
}

/**
 * Resolve everything the campaign worker needs to send mail.
 * Throws ConfigError naming every missing variable at once.
 */
export function resolveMailSettings(source: MailEnv): MailSettings {
  if (source.EMAIL_TRANSPORT === 'resend') {
    const parsed = resendSchema.safeParse(source)
    if (!parsed.success) throw new ConfigError(missingKeys(parsed.error))
    return {
      sender: senderFrom(parsed.data),
      transport: { kind: 'resend', apiKey: parsed.data.RESEND_API_KEY },
    }
  }

  const parsed = smtpSchema.safeParse(source)
  if (!parsed.success) throw new ConfigError(missingKeys(parsed.error))
  return {
    sender: senderFrom(parsed.data),
    transport: {
      kind: 'smtp',
      host: parsed.data.SMTP_SERVER,
      port: parsed.data.SMTP_PORT,
      username: parsed.data.SMTP_USERNAME,
      password: parsed.data.SMTP_PASSWORD,
    },
  }
}
