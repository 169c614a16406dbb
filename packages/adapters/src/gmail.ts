/**
 * Gmail REST sender
 *
 * Sends through users.messages.send with a caller-supplied OAuth access
 * token. Token refresh happens outside this process.
 */

import type { EmailMessage, EmailReceipt, EmailSender } from './types'
import { bearerHeaders, readJsonObject, readString } from './http'

const GMAIL_SEND_URL = 'https://gmail.googleapis.com/gmail/v1/users/me/messages/send'

/** Header values are single-line: CR and LF become spaces */
function headerValue(value: string): string {
  return value.replace(/[\r\n]+/g, ' ')
}

/**
 * RFC 2047 encoded-word for subjects outside printable ASCII.
 */
export function encodeSubject(subject: string): string {
  const value = headerValue(subject)
  if (/^[\x20-\x7e]*$/.test(value)) return value
  return `=?UTF-8?B?${Buffer.from(value, 'utf8').toString('base64')}?=`
}

export function encodeRfc2822(message: EmailMessage): string {
  const lines = [
    `From: ${headerValue(message.from)}`,
    `To: ${headerValue(message.to)}`,
    `Subject: ${encodeSubject(message.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    '',
    message.body,
  ]
  return Buffer.from(lines.join('\r\n'), 'utf8').toString('base64url')
}

export class GmailEmailSender implements EmailSender {
  readonly name = 'gmail'

  constructor(
    private readonly accessToken: string,
    private readonly endpoint: string = GMAIL_SEND_URL
  ) {}

  async send(message: EmailMessage): Promise<EmailReceipt> {
    const res = await fetch(this.endpoint, {
      method: 'POST',
      headers: bearerHeaders(this.accessToken),
      body: JSON.stringify({ raw: encodeRfc2822(message) }),
    })
    const data = await readJsonObject(res, 'Gmail')

    return {
      messageId: readString(data, 'id') ?? 'unknown',
      to: message.to,
      sentAt: new Date().toISOString(),
    }
  }
}
