import { describe, expect, it } from 'vitest'
import { CHAT_GUIDANCE, parseChatIntent } from '@consultflow/core'

describe('parseChatIntent', () => {
  it('parses an add command with role and context', () => {
    expect(parseChatIntent('add Tribal Chief at chief@example.ca for water rights')).toEqual({
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address: 'chief@example.ca',
        role: 'Tribal Chief',
        context: 'water rights',
        engagement: 'both',
      },
    })
  })

  it('reads the role from "<address> as <role>"', () => {
    const intent = parseChatIntent('please include chief@example.ca as Tribal Chief for water rights')
    expect(intent).toEqual({
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address: 'chief@example.ca',
        role: 'Tribal Chief',
        context: 'water rights',
        engagement: 'both',
      },
    })
  })

  it('falls back to the default role', () => {
    const intent = parseChatIntent('invite x@example.ca')
    expect(intent).toEqual({
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address: 'x@example.ca',
        role: 'Stakeholder',
        context: '',
        engagement: 'both',
      },
    })
  })

  it('treats single-character roles as missing', () => {
    const intent = parseChatIntent('add A at a@example.ca')
    expect(intent.kind).toBe('mutation')
    if (intent.kind === 'mutation' && intent.mutation.kind === 'upsert_stakeholder') {
      expect(intent.mutation.role).toBe('Stakeholder')
    }
  })

  it('books a meeting-only stakeholder', () => {
    expect(parseChatIntent('book meeting with Elder Council at elders@example.ca about land use.')).toEqual({
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address: 'elders@example.ca',
        role: 'Elder Council',
        context: 'land use',
        engagement: 'meeting',
      },
    })
  })

  it('parses remove, sender and organizer updates', () => {
    expect(parseChatIntent('remove chief@example.ca')).toEqual({
      kind: 'mutation',
      mutation: { kind: 'remove_stakeholder', address: 'chief@example.ca' },
    })
    expect(parseChatIntent('update sender to ops@example.ca')).toEqual({
      kind: 'mutation',
      mutation: { kind: 'set_sender', address: 'ops@example.ca' },
    })
    expect(parseChatIntent('change the meeting organizer to cal@example.ca')).toEqual({
      kind: 'mutation',
      mutation: { kind: 'set_organizer', address: 'cal@example.ca' },
    })
  })

  it('returns guidance when a recognised command has no address', () => {
    expect(parseChatIntent('add someone')).toEqual({
      kind: 'guidance',
      message: 'Please include an email address (e.g., person@example.com)',
    })
    expect(parseChatIntent('schedule meeting with the board')).toEqual({
      kind: 'guidance',
      message: 'Please include an email address for the meeting (e.g., person@example.com)',
    })
    expect(parseChatIntent('remove please')).toEqual({
      kind: 'guidance',
      message: "Could not parse email to remove. Try: 'remove [email@example.com]'",
    })
  })

  it('returns the command list for anything else', () => {
    expect(parseChatIntent('hello there')).toEqual({ kind: 'guidance', message: CHAT_GUIDANCE })
    expect(parseChatIntent('   ')).toEqual({ kind: 'guidance', message: CHAT_GUIDANCE })
  })
})
