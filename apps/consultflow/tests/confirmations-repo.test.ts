import { beforeEach, describe, expect, it, vi } from 'vitest'
import type { PendingActionDetails } from '@consultflow/core'
import { createMemoryConfirmationsRepo } from '@/lib/repo'

const details: PendingActionDetails = {
  threadId: 'riverside',
  generation: 2,
  instructions: [
    {
      id: 'email_2',
      type: 'email',
      target: 'chief@example.ca',
      subject: 'Consultation',
      body: 'Hello',
      status: 'pending',
      metadata: {},
    },
  ],
  recipients: ['chief@example.ca'],
  emailSender: 'outreach@example.com',
  meetingOrganizer: 'meetings@example.com',
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
})

describe('confirmations repo', () => {
  it('issues prefixed ids and stores a copy of the details', () => {
    const repo = createMemoryConfirmationsRepo(() => '2026-01-01T00:00:00.000Z')
    const input = structuredClone(details)

    const pending = repo.request('send_email', 'Send 1 email(s) for Riverside', input)
    input.recipients.push('late@example.ca')

    expect(pending.actionId).toMatch(/^send_email_[0-9a-f]{8}$/)
    expect(pending.createdAt).toBe('2026-01-01T00:00:00.000Z')
    expect(repo.get(pending.actionId)?.details.recipients).toEqual(['chief@example.ca'])
  })

  it('resolves each action exactly once', () => {
    const repo = createMemoryConfirmationsRepo()
    const { actionId } = repo.request('send_email', 'desc', details)

    expect(repo.approve(actionId)).toBe(true)
    expect(repo.approve(actionId)).toBe(false)
    expect(repo.reject(actionId)).toBe(false)
    expect(repo.get(actionId)).toMatchObject({ confirmed: true, rejected: false })
    expect(repo.approve('send_email_unknown')).toBe(false)
  })

  it('counts pending, executed and rejected actions', () => {
    const repo = createMemoryConfirmationsRepo()
    const a = repo.request('send_email', 'a', details)
    const b = repo.request('full_outreach', 'b', details)
    repo.request('schedule_meeting', 'c', details)

    repo.approve(a.actionId)
    repo.reject(b.actionId)

    const summary = repo.summary()
    expect(summary.pendingCount).toBe(1)
    expect(summary.executedCount).toBe(1)
    expect(summary.rejectedCount).toBe(1)
    expect(summary.pending[0].description).toBe('c')
    expect(repo.audit()).toEqual({ executedIds: [a.actionId], rejectedIds: [b.actionId] })
  })

  it('stores execution results only on approved actions', () => {
    const repo = createMemoryConfirmationsRepo()
    const { actionId } = repo.request('send_email', 'desc', details)
    const executed = details.instructions.map((i) => ({ ...i, status: 'executed' as const }))

    expect(repo.recordExecution(actionId, executed)).toBe(false)
    repo.approve(actionId)
    expect(repo.recordExecution(actionId, executed)).toBe(true)
    expect(repo.get(actionId)?.details.instructions[0].status).toBe('executed')
  })

  it('sweeps resolved records and keeps pending ones', () => {
    const repo = createMemoryConfirmationsRepo()
    const a = repo.request('send_email', 'a', details)
    const b = repo.request('send_email', 'b', details)
    repo.reject(a.actionId)

    expect(repo.sweep()).toBe(1)
    expect(repo.get(a.actionId)).toBeNull()
    expect(repo.get(b.actionId)).not.toBeNull()
    expect(repo.summary().rejectedCount).toBe(1)
  })
})
