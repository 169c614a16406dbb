/**
 * Outreach Adapter Types
 */

import type { EmailComposer, GeoScoringOracle, TextGenerator } from '@consultflow/core'

export type { GeoScoringOracle, TextGenerator }

export type AdapterMode = 'mock' | 'live'

export interface EmailMessage {
  to: string
  from: string
  subject: string
  body: string
}

export interface EmailReceipt {
  messageId: string
  to: string
  sentAt: string
}

export interface MeetingRequest {
  organizer: string
  invitee: string
  title: string
  description: string
  durationMinutes: number
}

export interface MeetingBooking {
  eventId: string
  link: string
  startTime: string
}

export interface ChatPost {
  channel: string
  text: string
}

/**
 * Email delivery. Rejects when the message was not accepted.
 */
export interface EmailSender {
  readonly name: string
  send(message: EmailMessage): Promise<EmailReceipt>
}

export interface CalendarAdapter {
  readonly name: string
  createMeeting(request: MeetingRequest): Promise<MeetingBooking>
}

/**
 * Chat notification. Resolves false when the channel did not accept the post.
 */
export interface ChatNotifier {
  readonly name: string
  post(message: ChatPost): Promise<boolean>
}

export interface AdapterConfig {
  mode: AdapterMode
  /** Prefer generated email drafts over the template when a text generator exists */
  smartEmails?: boolean
  openaiApiKey?: string
  openaiModel?: string
  gmailAccessToken?: string
  calendarAccessToken?: string
  slackWebhookUrl?: string
  geoScoringUrl?: string
}

/**
 * Everything the workflow and agent services call out to.
 * `textGenerator` and `geoOracle` are null when nothing is configured.
 */
export interface OutreachAdapters {
  readonly mode: AdapterMode
  emailSender: EmailSender
  calendar: CalendarAdapter
  chat: ChatNotifier
  textGenerator: TextGenerator | null
  geoOracle: GeoScoringOracle | null
  composer: EmailComposer
}
