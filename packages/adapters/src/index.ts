/**
 * @consultflow/adapters
 *
 * Outreach collaborators with two modes:
 * - mock: in-process recorders, no network
 * - live: Gmail, Google Calendar, Slack webhook, OpenAI and an HTTP
 *   geospatial scoring service, each falling back to its mock when its
 *   credential is missing
 */

export * from './types'
export * from './adapter'
export * from './mock'
export * from './timeout'
export * from './http'
export { GmailEmailSender, encodeRfc2822, encodeSubject } from './gmail'
export { GoogleCalendarAdapter, meetingStartTime } from './google-calendar'
export { SlackWebhookNotifier } from './slack-webhook'
export { OpenAITextGenerator, DEFAULT_OPENAI_MODEL } from './openai-text'
export { HttpGeoScoringOracle, parseGeoScore } from './http-geo-oracle'
