import { describe, expect, it } from 'vitest'
import {
  collectRecipients,
  describeAction,
  isActionType,
  selectActionInstructions,
  type Instruction,
} from '@consultflow/core'

function instruction(id: string, type: Instruction['type'], target: string, attendeeEmail?: string): Instruction {
  return {
    id,
    type,
    target,
    subject: id,
    body: '',
    status: 'pending',
    metadata: attendeeEmail ? { attendeeEmail } : {},
  }
}

const list: Instruction[] = [
  instruction('milestone_001', 'milestone', 'planning'),
  instruction('email_002', 'email', 'a@example.ca'),
  instruction('meeting_003', 'meeting', 'organizer@example.ca', 'a@example.ca'),
  instruction('meeting_004', 'meeting', 'organizer@example.ca', 'b@example.ca'),
  instruction('slack_005', 'slack', '#general'),
]

describe('governor', () => {
  it('scopes each action to its instruction types', () => {
    expect(selectActionInstructions('send_email', list).map((i) => i.id)).toEqual(['email_002'])
    expect(selectActionInstructions('schedule_meeting', list).map((i) => i.id)).toEqual(['meeting_003', 'meeting_004'])
    expect(selectActionInstructions('full_outreach', list)).toHaveLength(5)
    expect(selectActionInstructions('delete_contact', list)).toEqual([])
  })

  it('collects unique recipients from emails and meetings', () => {
    expect(collectRecipients(list)).toEqual(['a@example.ca', 'b@example.ca'])
  })

  it('recognises action types', () => {
    expect(isActionType('full_outreach')).toBe(true)
    expect(isActionType('drop_tables')).toBe(false)
  })

  it('describes actions', () => {
    expect(describeAction('send_email', 'Riverside Park', { instructionCount: 2, recipientCount: 2 })).toBe(
      'Send 2 email(s) for Riverside Park'
    )
    expect(
      describeAction('delete_contact', 'Riverside Park', {
        instructionCount: 0,
        recipientCount: 0,
        contactAddress: 'a@example.ca',
      })
    ).toBe('Remove a@example.ca from Riverside Park')
  })
})
