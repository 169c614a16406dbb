import { describe, expect, it } from 'vitest'
import { WorkflowThread, createTemplateEmailComposer } from '@consultflow/core'

const composer = createTemplateEmailComposer()
const clock = () => '2026-01-01T00:00:00.000Z'

function newThread(): WorkflowThread {
  return new WorkflowThread(
    {
      threadId: 'riverside',
      proposalTitle: 'Riverside Park',
      location: 'Toronto',
      sustainabilityContext: 'Flood plain restoration',
      indigenousContext: '',
      emailSender: 'sender@example.ca',
      meetingOrganizer: 'organizer@example.ca',
    },
    { now: clock }
  )
}

describe('WorkflowThread', () => {
  it('acknowledges each mutation kind', () => {
    const thread = newThread()

    expect(
      thread.applyMutation({
        kind: 'upsert_stakeholder',
        address: 'chief@example.ca',
        role: 'Tribal Chief',
        context: 'water rights',
        engagement: 'both',
      }).acknowledgement
    ).toBe('✓ Added Tribal Chief (chief@example.ca) - water rights')

    expect(
      thread.applyMutation({
        kind: 'upsert_stakeholder',
        address: 'elder@example.ca',
        role: 'Elder',
        context: 'land use',
        engagement: 'meeting',
      }).acknowledgement
    ).toBe('✓ Scheduled meeting with Elder (elder@example.ca) regarding land use')

    expect(thread.applyMutation({ kind: 'remove_stakeholder', address: 'elder@example.ca' })).toEqual({
      mutation: { kind: 'remove_stakeholder', address: 'elder@example.ca' },
      applied: true,
      acknowledgement: '✓ Removed Elder (elder@example.ca)',
    })

    expect(thread.applyMutation({ kind: 'remove_stakeholder', address: 'ghost@example.ca' })).toEqual({
      mutation: { kind: 'remove_stakeholder', address: 'ghost@example.ca' },
      applied: false,
      acknowledgement: 'Email ghost@example.ca not found in stakeholders',
    })

    expect(thread.applyMutation({ kind: 'set_sender', address: 'ops@example.ca' }).acknowledgement).toBe(
      '✓ Updated email sender to ops@example.ca'
    )
    expect(thread.applyMutation({ kind: 'set_organizer', address: 'cal@example.ca' }).acknowledgement).toBe(
      '✓ Updated meeting organizer to cal@example.ca'
    )
    expect(thread.emailSender).toBe('ops@example.ca')
    expect(thread.meetingOrganizer).toBe('cal@example.ca')
  })

  it('replaces the instruction list and bumps the generation on regenerate', async () => {
    const thread = newThread()
    await thread.regenerate(composer)
    expect(thread.generation).toBe(1)
    expect(thread.instructions).toHaveLength(1)

    thread.applyMutation({
      kind: 'upsert_stakeholder',
      address: 'chief@example.ca',
      role: 'Tribal Chief',
      context: '',
      engagement: 'both',
    })
    await thread.regenerate(composer)

    expect(thread.generation).toBe(2)
    expect(thread.instructions.map((i) => i.id)).toEqual(['milestone_001', 'email_002', 'meeting_003', 'slack_004'])
    expect(thread.summary()).toMatchObject({ stakeholderCount: 1, emailCount: 1, meetingCount: 1, totalInstructions: 4 })
  })

  it('regenerates the same list after a snapshot round-trip', async () => {
    const thread = newThread()
    thread.applyMutation({
      kind: 'upsert_stakeholder',
      address: 'chief@example.ca',
      role: 'Tribal Chief',
      context: 'water rights',
      engagement: 'both',
    })
    thread.applyMutation({
      kind: 'upsert_stakeholder',
      address: 'elder@example.ca',
      role: 'Elder',
      context: '',
      engagement: 'meeting',
    })
    thread.addMessage('user', 'add Tribal Chief at chief@example.ca')
    const before = await thread.regenerate(composer)

    const snapshot = JSON.parse(JSON.stringify(thread.toSnapshot()))
    const restored = WorkflowThread.fromSnapshot(snapshot, { now: clock })

    expect(restored.toSnapshot()).toEqual(thread.toSnapshot())
    expect(await restored.regenerate(composer)).toEqual(before)
  })

  it('does not expose its internal lists', async () => {
    const thread = newThread()
    await thread.regenerate(composer)

    const [milestone] = thread.instructions
    milestone.status = 'executed'

    expect(thread.instructions[0].status).toBe('pending')
  })
})
