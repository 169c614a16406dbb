/**
 * Mock adapters
 *
 * In-process stand-ins that record every call. Used in mock mode and by
 * tests; failures can be injected per recipient.
 */

import type { GeoScore, GeoScoringOracle, TextGenerator } from '@consultflow/core'
import type {
  CalendarAdapter,
  ChatNotifier,
  ChatPost,
  EmailMessage,
  EmailReceipt,
  EmailSender,
  MeetingBooking,
  MeetingRequest,
} from './types'
import { meetingStartTime } from './google-calendar'

export class MockEmailSender implements EmailSender {
  readonly name = 'mock-email'
  readonly sent: EmailMessage[] = []
  readonly attempts: EmailMessage[] = []
  private readonly failures = new Map<string, string>()

  failFor(address: string, reason = 'Mock delivery failure'): this {
    this.failures.set(address, reason)
    return this
  }

  async send(message: EmailMessage): Promise<EmailReceipt> {
    this.attempts.push({ ...message })
    const reason = this.failures.get(message.to)
    if (reason !== undefined) {
      throw new Error(reason)
    }
    this.sent.push({ ...message })
    return {
      messageId: `mock-email-${this.sent.length}`,
      to: message.to,
      sentAt: new Date().toISOString(),
    }
  }
}

export class MockCalendarAdapter implements CalendarAdapter {
  readonly name = 'mock-calendar'
  readonly booked: MeetingRequest[] = []
  private readonly failures = new Map<string, string>()

  failFor(invitee: string, reason = 'Mock calendar failure'): this {
    this.failures.set(invitee, reason)
    return this
  }

  async createMeeting(request: MeetingRequest): Promise<MeetingBooking> {
    const reason = this.failures.get(request.invitee)
    if (reason !== undefined) {
      throw new Error(reason)
    }
    this.booked.push({ ...request })
    const eventId = `mock-event-${this.booked.length}`
    return {
      eventId,
      link: `https://calendar.example.com/event/${eventId}`,
      startTime: meetingStartTime(new Date()).toISOString(),
    }
  }
}

export class MockChatNotifier implements ChatNotifier {
  readonly name = 'mock-chat'
  readonly posts: ChatPost[] = []
  /** When false, posts are recorded but reported as undelivered */
  deliver = true

  async post(message: ChatPost): Promise<boolean> {
    this.posts.push({ ...message })
    return this.deliver
  }
}

export type MockReply = string | ((systemInstructions: string, userPrompt: string) => string)

export class MockTextGenerator implements TextGenerator {
  readonly calls: Array<{ systemInstructions: string; userPrompt: string }> = []
  private failure: string | null = null

  constructor(private readonly reply: MockReply = 'Mock response') {}

  failWith(reason: string | null): this {
    this.failure = reason
    return this
  }

  async ask(systemInstructions: string, userPrompt: string): Promise<string> {
    this.calls.push({ systemInstructions, userPrompt })
    if (this.failure !== null) {
      throw new Error(this.failure)
    }
    return typeof this.reply === 'string' ? this.reply : this.reply(systemInstructions, userPrompt)
  }
}

export class MockGeoScoringOracle implements GeoScoringOracle {
  readonly calls: Array<{ latitude: number; longitude: number }> = []
  private failure: string | null = null

  constructor(
    private readonly result: GeoScore = {
      totalScore: 72.5,
      componentScores: { water: 80, biodiversity: 65, heritage: 72 },
      nearestFeatures: { waterway: 'Don River', park: 'Riverdale Park' },
      recommendations: ['Protect the riparian buffer'],
    }
  ) {}

  failWith(reason: string | null): this {
    this.failure = reason
    return this
  }

  async score(latitude: number, longitude: number): Promise<GeoScore> {
    this.calls.push({ latitude, longitude })
    if (this.failure !== null) {
      throw new Error(this.failure)
    }
    return {
      ...this.result,
      componentScores: { ...this.result.componentScores },
      nearestFeatures: { ...this.result.nearestFeatures },
      recommendations: [...this.result.recommendations],
    }
  }
}
