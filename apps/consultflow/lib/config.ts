/**
 * Runtime configuration
 *
 * Read from the environment once per service container. Empty strings
 * count as unset.
 */

import type { AdapterConfig, AdapterMode } from '@consultflow/adapters'
import { DEFAULT_OPENAI_MODEL } from '@consultflow/adapters'
import { DEFAULT_NOTIFICATION_CHANNEL } from '@consultflow/core'

export const DEFAULT_EMAIL_SENDER = 'outreach@example.com'
export const DEFAULT_MEETING_ORGANIZER = 'meetings@example.com'
export const DEFAULT_CALL_TIMEOUT_MS = 15_000

export interface ConsultflowConfig {
  adapterMode: AdapterMode
  emailSender: string
  meetingOrganizer: string
  slackChannel: string
  callTimeoutMs: number
  smartEmails: boolean
  adapters: AdapterConfig
}

type Env = Record<string, string | undefined>

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function parseBooleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback
  const normalized = value.trim().toLowerCase()
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true
  if (['false', '0', 'no', 'off'].includes(normalized)) return false
  return fallback
}

function parseAdapterMode(value: string | undefined): AdapterMode {
  if (value === undefined) return 'mock'
  const normalized = value.toLowerCase()
  if (normalized === 'mock' || normalized === 'live') return normalized
  console.warn(`[config] Unknown CONSULTFLOW_ADAPTER_MODE "${value}", using mock`)
  return 'mock'
}

function parseTimeout(value: string | undefined): number {
  if (value === undefined) return DEFAULT_CALL_TIMEOUT_MS
  const parsed = Number.parseInt(value, 10)
  if (!Number.isFinite(parsed) || parsed < 0) {
    console.warn(`[config] Invalid CONSULTFLOW_CALL_TIMEOUT_MS "${value}", using ${DEFAULT_CALL_TIMEOUT_MS}`)
    return DEFAULT_CALL_TIMEOUT_MS
  }
  return parsed
}

export function loadConfig(env: Env = process.env): ConsultflowConfig {
  const adapterMode = parseAdapterMode(readString(env, 'CONSULTFLOW_ADAPTER_MODE'))
  const smartEmails = parseBooleanEnv(readString(env, 'CONSULTFLOW_SMART_EMAILS'), true)

  return {
    adapterMode,
    emailSender: readString(env, 'CONSULTFLOW_EMAIL_SENDER') ?? DEFAULT_EMAIL_SENDER,
    meetingOrganizer: readString(env, 'CONSULTFLOW_MEETING_ORGANIZER') ?? DEFAULT_MEETING_ORGANIZER,
    slackChannel: readString(env, 'CONSULTFLOW_SLACK_CHANNEL') ?? DEFAULT_NOTIFICATION_CHANNEL,
    callTimeoutMs: parseTimeout(readString(env, 'CONSULTFLOW_CALL_TIMEOUT_MS')),
    smartEmails,
    adapters: {
      mode: adapterMode,
      smartEmails,
      openaiApiKey: readString(env, 'OPENAI_API_KEY'),
      openaiModel: readString(env, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
      gmailAccessToken: readString(env, 'GMAIL_ACCESS_TOKEN'),
      calendarAccessToken: readString(env, 'GOOGLE_CALENDAR_ACCESS_TOKEN'),
      slackWebhookUrl: readString(env, 'SLACK_WEBHOOK_URL'),
      geoScoringUrl: readString(env, 'GEO_SCORING_URL'),
    },
  }
}
