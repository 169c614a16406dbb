import { createSmartEmailComposer, createTemplateEmailComposer } from '@consultflow/core'
import type { AdapterConfig, OutreachAdapters, TextGenerator } from './types'
import { MockCalendarAdapter, MockChatNotifier, MockEmailSender, MockGeoScoringOracle } from './mock'
import { GmailEmailSender } from './gmail'
import { GoogleCalendarAdapter } from './google-calendar'
import { SlackWebhookNotifier } from './slack-webhook'
import { OpenAITextGenerator } from './openai-text'
import { HttpGeoScoringOracle } from './http-geo-oracle'

function missing(service: string, variable: string): void {
  console.warn(`[adapters] ${variable} not set; ${service} falls back to mock`)
}

/**
 * Build the collaborator set for a mode.
 *
 * Mock mode never touches the network and has no text generator, so
 * emails come from the template. In live mode each collaborator whose
 * credential is missing falls back to its mock.
 */
export function createAdapters(config: AdapterConfig): OutreachAdapters {
  const template = createTemplateEmailComposer()

  if (config.mode === 'mock') {
    return {
      mode: 'mock',
      emailSender: new MockEmailSender(),
      calendar: new MockCalendarAdapter(),
      chat: new MockChatNotifier(),
      textGenerator: null,
      geoOracle: new MockGeoScoringOracle(),
      composer: template,
    }
  }

  if (config.mode !== 'live') {
    throw new Error(`Unknown adapter mode: ${String(config.mode)}`)
  }

  if (!config.gmailAccessToken) missing('email', 'GMAIL_ACCESS_TOKEN')
  if (!config.calendarAccessToken) missing('calendar', 'GOOGLE_CALENDAR_ACCESS_TOKEN')
  if (!config.slackWebhookUrl) missing('chat notifications', 'SLACK_WEBHOOK_URL')
  if (!config.openaiApiKey) {
    console.warn('[adapters] OPENAI_API_KEY not set; emails use the template and agents answer locally')
  }

  const textGenerator: TextGenerator | null = config.openaiApiKey
    ? new OpenAITextGenerator({ apiKey: config.openaiApiKey, model: config.openaiModel })
    : null

  return {
    mode: 'live',
    emailSender: config.gmailAccessToken ? new GmailEmailSender(config.gmailAccessToken) : new MockEmailSender(),
    calendar: config.calendarAccessToken
      ? new GoogleCalendarAdapter(config.calendarAccessToken)
      : new MockCalendarAdapter(),
    chat: config.slackWebhookUrl ? new SlackWebhookNotifier(config.slackWebhookUrl) : new MockChatNotifier(),
    textGenerator,
    geoOracle: config.geoScoringUrl ? new HttpGeoScoringOracle(config.geoScoringUrl) : null,
    composer:
      textGenerator && config.smartEmails !== false ? createSmartEmailComposer(textGenerator, template) : template,
  }
}
