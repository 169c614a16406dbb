import { afterEach, describe, expect, it, vi } from 'vitest'
import {
  AdapterTimeoutError,
  GmailEmailSender,
  MockCalendarAdapter,
  MockChatNotifier,
  MockEmailSender,
  SlackWebhookNotifier,
  createAdapters,
  encodeRfc2822,
  encodeSubject,
  meetingStartTime,
  parseGeoScore,
  withTimeout,
} from '@consultflow/adapters'

afterEach(() => {
  vi.unstubAllGlobals()
  vi.restoreAllMocks()
})

describe('createAdapters', () => {
  it('uses mocks and the template composer in mock mode', () => {
    const adapters = createAdapters({ mode: 'mock' })

    expect(adapters.emailSender).toBeInstanceOf(MockEmailSender)
    expect(adapters.textGenerator).toBeNull()
    expect(adapters.composer.kind).toBe('template')
  })

  it('falls back to mocks for missing live credentials', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const adapters = createAdapters({ mode: 'live', openaiApiKey: 'test-secret' })

    expect(adapters.mode).toBe('live')
    expect(adapters.emailSender).toBeInstanceOf(MockEmailSender)
    expect(adapters.calendar).toBeInstanceOf(MockCalendarAdapter)
    expect(adapters.chat).toBeInstanceOf(MockChatNotifier)
    expect(adapters.composer.kind).toBe('smart')
    expect(warn).toHaveBeenCalledWith('[adapters] GMAIL_ACCESS_TOKEN not set; email falls back to mock')
  })

  it('keeps the template composer when smart emails are off', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})

    const adapters = createAdapters({ mode: 'live', openaiApiKey: 'test-secret', smartEmails: false })

    expect(adapters.composer.kind).toBe('template')
  })
})

describe('GmailEmailSender', () => {
  it('posts a base64url message with the bearer token', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ id: 'msg-1' }), { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)
    const message = { to: 'chief@example.ca', from: 'sender@example.ca', subject: 'Hello', body: 'Body' }

    const receipt = await new GmailEmailSender('test-token').send(message)

    expect(receipt.messageId).toBe('msg-1')
    expect(fetchMock).toHaveBeenCalledWith('https://gmail.googleapis.com/gmail/v1/users/me/messages/send', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      body: JSON.stringify({ raw: encodeRfc2822(message) }),
    })
  })

  it('rejects on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota', { status: 429 })))

    await expect(
      new GmailEmailSender('test-token').send({ to: 'a@example.ca', from: 'b@example.ca', subject: 's', body: 'b' })
    ).rejects.toThrow('Gmail responded with HTTP 429: quota')
  })

  it('encodes headers and body', () => {
    const raw = encodeRfc2822({ to: 'a@example.ca', from: 'b@example.ca', subject: 'Hi', body: 'Text' })

    expect(Buffer.from(raw, 'base64url').toString('utf8')).toBe(
      'From: b@example.ca\r\nTo: a@example.ca\r\nSubject: Hi\r\nMIME-Version: 1.0\r\nContent-Type: text/plain; charset="UTF-8"\r\n\r\nText'
    )
  })

  it('keeps a title with line breaks inside the subject header', () => {
    const raw = encodeRfc2822({
      to: 'chief@example.ca',
      from: 'outreach@example.com',
      subject: 'Riverside Park\r\nBcc: extra@example.net - Water Consultation',
      body: 'Hello',
    })

    const decoded = Buffer.from(raw, 'base64url').toString('utf8')
    const headers = decoded.slice(0, decoded.indexOf('\r\n\r\n')).split('\r\n')
    expect(headers).toEqual([
      'From: outreach@example.com',
      'To: chief@example.ca',
      'Subject: Riverside Park Bcc: extra@example.net - Water Consultation',
      'MIME-Version: 1.0',
      'Content-Type: text/plain; charset="UTF-8"',
    ])
  })

  it('encodes non-ASCII subjects as UTF-8 encoded-words', () => {
    expect(encodeSubject('Consultation: Tkaronto')).toBe('Consultation: Tkaronto')
    expect(encodeSubject('Île de Montréal')).toBe(
      `=?UTF-8?B?${Buffer.from('Île de Montréal', 'utf8').toString('base64')}?=`
    )
  })
})

describe('SlackWebhookNotifier', () => {
  it('reports rejected posts as undelivered', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.stubGlobal('fetch', vi.fn(async () => new Response('no_service', { status: 404 })))

    await expect(
      new SlackWebhookNotifier('https://hooks.example.com/test').post({ channel: '#general', text: 'hi' })
    ).resolves.toBe(false)
  })
})

describe('meetingStartTime', () => {
  it('books three days out at 14:00 UTC', () => {
    expect(meetingStartTime(new Date('2026-03-01T09:30:00Z')).toISOString()).toBe('2026-03-04T14:00:00.000Z')
  })
})

describe('parseGeoScore', () => {
  it('reads wrapped snake_case payloads', () => {
    expect(
      parseGeoScore({
        sustainability: {
          total_score: 61,
          component_scores: { water: 20, label: 'skip' },
          nearest_features: { park: 'Riverdale' },
          recommendations: ['Plant natives', 3],
        },
      })
    ).toEqual({
      totalScore: 61,
      componentScores: { water: 20 },
      nearestFeatures: { park: 'Riverdale' },
      recommendations: ['Plant natives'],
    })
  })

  it('rejects payloads without a total', () => {
    expect(() => parseGeoScore({ score: 1 })).toThrow('Geo scoring response is missing total_score')
  })
})

describe('withTimeout', () => {
  it('rejects when the call outlives the limit', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 50))

    await expect(withTimeout(slow, 5, 'email send')).rejects.toBeInstanceOf(AdapterTimeoutError)
  })

  it('passes through results inside the limit', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'email send')).resolves.toBe('ok')
  })
})
