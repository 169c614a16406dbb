import { describe, expect, it, vi } from 'vitest'
import {
  createSmartEmailComposer,
  createTemplateEmailComposer,
  parseEmailDraft,
  regenerateInstructions,
  type GenerationInput,
  type Stakeholder,
  type TextGenerator,
} from '@consultflow/core'

function stakeholder(address: string, role: string, context: string, engagement: Stakeholder['engagement']): Stakeholder {
  return { address, role, context, engagement, addedAt: '2026-01-01T00:00:00.000Z' }
}

function input(stakeholders: Stakeholder[]): GenerationInput {
  return {
    proposalTitle: 'Riverside Park',
    location: 'Toronto',
    sustainabilityContext: '',
    indigenousContext: '',
    emailSender: 'sender@example.ca',
    meetingOrganizer: 'organizer@example.ca',
    stakeholders,
  }
}

const composer = createTemplateEmailComposer()

describe('regenerateInstructions', () => {
  it('emits only the milestone for an empty registry', async () => {
    const instructions = await regenerateInstructions(input([]), composer)

    expect(instructions).toHaveLength(1)
    expect(instructions[0]).toEqual({
      id: 'milestone_001',
      type: 'milestone',
      target: 'planning',
      subject: 'Workflow Plan: Riverside Park',
      body: [
        'PROPOSAL SYNTHESIS FOR: Riverside Park',
        'Location: Toronto',
        '',
        '=== SUSTAINABILITY INSIGHTS ===',
        '(not provided)',
        '',
        '=== INDIGENOUS PERSPECTIVES ===',
        '(not provided)',
        '',
        '=== STAKEHOLDERS (0) ===',
        '(none yet)',
        '',
        '=== ACTION PLAN ===',
        'Emails planned: 0',
        'Meetings planned: 0',
        'All emails sent from: sender@example.ca',
        'All meetings scheduled for: organizer@example.ca',
      ].join('\n'),
      status: 'pending',
      metadata: {},
    })
  })

  it('emits email, meeting and notification for a stakeholder engaged both ways', async () => {
    const instructions = await regenerateInstructions(
      input([stakeholder('chief@example.ca', 'Tribal Chief', 'water rights', 'both')]),
      composer
    )

    expect(instructions.map((i) => i.id)).toEqual(['milestone_001', 'email_002', 'meeting_003', 'slack_004'])

    const [, email, meeting, slack] = instructions
    expect(email.target).toBe('chief@example.ca')
    expect(email.subject).toBe('Riverside Park - Water Consultation')
    expect(email.metadata).toEqual({ role: 'Tribal Chief', context: 'water rights' })

    expect(meeting.target).toBe('organizer@example.ca')
    expect(meeting.subject).toBe('Riverside Park - Water Discussion with Tribal Chief')
    expect(meeting.metadata).toEqual({
      attendeeEmail: 'chief@example.ca',
      attendeeRole: 'Tribal Chief',
      durationMinutes: 30,
      context: 'water rights',
    })

    expect(slack.target).toBe('#general')
    expect(slack.body).toBe(
      [
        'Outreach workflow launched for Riverside Park',
        'Location: Toronto',
        'Stakeholders (1): Tribal Chief',
        'Emails to send: 1',
        'Meetings to schedule: 1',
      ].join('\n')
    )
    expect(slack.metadata).toEqual({ stakeholderCount: 1, emailCount: 1, meetingCount: 1 })
  })

  it('skips the email for meeting-only stakeholders', async () => {
    const instructions = await regenerateInstructions(
      input([stakeholder('chief@example.ca', 'Tribal Chief', 'water rights', 'meeting')]),
      composer
    )

    expect(instructions.map((i) => i.type)).toEqual(['milestone', 'meeting', 'slack'])
    expect(instructions.map((i) => i.id)).toEqual(['milestone_001', 'meeting_002', 'slack_003'])
  })

  it('keeps outreach counts equal to what engagement types imply', async () => {
    const stakeholders = [
      stakeholder('a@example.ca', 'Chief', '', 'both'),
      stakeholder('b@example.ca', 'Elder', '', 'email'),
      stakeholder('c@example.ca', 'Liaison', '', 'meeting'),
      stakeholder('d@example.ca', 'Planner', 'zoning', 'both'),
    ]
    const instructions = await regenerateInstructions(input(stakeholders), composer)
    const count = (type: string) => instructions.filter((i) => i.type === type).length

    expect(count('milestone')).toBe(1)
    expect(count('email')).toBe(3)
    expect(count('meeting')).toBe(3)
    expect(count('slack')).toBe(1)
    expect(count('email') + count('meeting')).toBeLessThanOrEqual(2 * stakeholders.length)
  })

  it('is deterministic for identical state', async () => {
    const state = input([
      stakeholder('a@example.ca', 'Chief', 'water', 'both'),
      stakeholder('b@example.ca', 'Elder', '', 'meeting'),
    ])

    const first = await regenerateInstructions(state, composer)
    const second = await regenerateInstructions(state, composer)

    expect(JSON.stringify(second)).toBe(JSON.stringify(first))
  })

  it('honours the notification channel and meeting length options', async () => {
    const instructions = await regenerateInstructions(
      input([stakeholder('a@example.ca', 'Chief', '', 'meeting')]),
      composer,
      { notificationChannel: '#outreach', meetingMinutes: 45 }
    )

    expect(instructions[1].metadata.durationMinutes).toBe(45)
    expect(instructions[1].body.startsWith('45-minute consultation with Chief (a@example.ca)')).toBe(true)
    expect(instructions[2].target).toBe('#outreach')
  })
})

describe('email composers', () => {
  const request = {
    proposalTitle: 'Riverside Park',
    location: 'Toronto',
    sustainabilityContext: '',
    indigenousContext: '',
    recipientAddress: 'chief@example.ca',
    role: 'Tribal Chief',
    context: '',
  }

  it('uses the generic template without context', async () => {
    const draft = await createTemplateEmailComposer().compose(request)

    expect(draft).toEqual({
      subject: 'Consultation: Riverside Park',
      body: [
        'Hi Tribal Chief,',
        '',
        "I'm reaching out regarding Riverside Park at Toronto.",
        '',
        "Your perspective would be valuable. I'd like to schedule a consultation.",
        '',
        'Best regards',
      ].join('\n'),
    })
  })

  it('parses a generated draft', async () => {
    const generator: TextGenerator = {
      ask: vi.fn(async () => 'SUBJECT: Water rights on Riverside Park\nBODY: Dear Chief,\n\nThank you.'),
    }
    const draft = await createSmartEmailComposer(generator).compose(request)

    expect(draft).toEqual({ subject: 'Water rights on Riverside Park', body: 'Dear Chief,\n\nThank you.' })
  })

  it('falls back to the template when generation fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const generator: TextGenerator = {
      ask: vi.fn(async () => {
        throw new Error('quota exceeded')
      }),
    }

    const draft = await createSmartEmailComposer(generator).compose(request)

    expect(draft.subject).toBe('Consultation: Riverside Park')
    expect(warn).toHaveBeenCalledWith(
      '[composer] Email draft for chief@example.ca fell back to template:',
      'quota exceeded'
    )
    warn.mockRestore()
  })

  it('rejects drafts without a body', () => {
    expect(parseEmailDraft('Only a subject line')).toBeNull()
    expect(parseEmailDraft('')).toBeNull()
    expect(parseEmailDraft('Subject\nBody text')).toEqual({ subject: 'Subject', body: 'Body text' })
  })
})
