// Mail transports
//
// The notifier only knows `EmailTransport`. SMTP goes through nodemailer
// (STARTTLS on 587, implicit TLS on 465); Resend is kept for accounts that
// send through its API instead.

import nodemailer from 'nodemailer'
import { Resend } from 'resend'
import type { TransportSettings } from '../config/env.js'

export interface OutgoingEmail {
  from: string
  to: string
  subject: string
  html: string
}

export interface EmailTransport {
  readonly name: string
  /** Resolves with the provider's message id; rejects on any delivery error */
  send(message: OutgoingEmail): Promise<{ messageId: string }>
}

export class TransportError extends Error {
  public readonly transport: string

  constructor(message: string, transport: string) {
    super(message)
    this.name = 'TransportError'
    this.transport = transport
  }
}

export function createSmtpTransport(settings: Extract<TransportSettings, { kind: 'smtp' }>): EmailTransport {
  const implicitTls = settings.port === 465
  const transporter = nodemailer.createTransport({
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: {
      user: settings.username,
      pass: settings.password,
    },
  })

  return {
    name: 'smtp',
    async send(message) {
      const info = await transporter.sendMail(message)
      return { messageId: info.messageId }
    },
  }
}

export function createResendTransport(settings: Extract<TransportSettings, { kind: 'resend' }>): EmailTransport {
  const resend = new Resend(settings.apiKey)

  return {
    name: 'resend',
    async send(message) {
      const { data, error } = await resend.emails.send(message)
      if (error) {
        throw new TransportError(error.message, 'resend')
      }
      if (!data?.id) {
        throw new TransportError('No response data', 'resend')
      }
      return { messageId: data.id }
    },
  }
}

export function createTransport(settings: TransportSettings): EmailTransport {
  switch (settings.kind) {
    case 'smtp':
      return createSmtpTransport(settings)
    case 'resend':
      return createResendTransport(settings)
  }
}
