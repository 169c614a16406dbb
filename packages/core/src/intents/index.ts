/**
 * Chat intent parser
 *
 * Best-effort extraction of one thread mutation from free text. Total:
 * every input yields either a typed mutation or a guidance message, and
 * nothing here throws.
 */

import type { ChatIntent } from '../types'
import { findContactAddress } from '../invariants'

export const CHAT_GUIDANCE =
  "Message noted. Commands: 'add [Role] at [email] for [topic]', " +
  "'book meeting with [Role] at [email] about [topic]', 'remove [email]', " +
  "'update sender to [email]', 'update organizer to [email]'"

export const DEFAULT_STAKEHOLDER_ROLE = 'Stakeholder'

const MEETING_KEYWORDS = ['book meeting', 'schedule meeting', 'meeting with', 'schedule call', 'book call']

const REMOVE_RE = /\bremove\b/i
const SENDER_RE = /\bemail from\b|\b(?:update|set|change)\b[^@]*\bsender\b/i
const ORGANIZER_RE = /\bmeeting recipient\b|\b(?:update|set|change)\b[^@]*\b(?:organizer|calendar|recipient)\b/i
const ADD_RE = /\b(?:add|include|contact|reach out|send to|email|invite)\b/i
const CONTEXT_RE = /\b(?:for|about|regarding|on)\s+(.+)$/i

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function cleanRole(raw: string | undefined): string {
  const role = (raw ?? '')
    .trim()
    .replace(/^(?:an?|the)\s+/i, '')
    .replace(/[\s:,-]+$/, '')
  return role.length >= 2 ? role : DEFAULT_STAKEHOLDER_ROLE
}

function extractRole(text: string, address: string, verbs: string): string {
  const escaped = escapeRegExp(address)

  const before = text.match(new RegExp(`\\b(?:${verbs})\\s+([^@]+?)\\s+(?:at|:|as|@)?\\s*${escaped}`, 'i'))
  if (before) return cleanRole(before[1])

  const after = text.match(
    new RegExp(`${escaped}\\s+as\\s+([^,.]+?)(?=\\s+(?:for|about|regarding|on)\\b|[,.]|$)`, 'i')
  )
  if (after) return cleanRole(after[1])

  return DEFAULT_STAKEHOLDER_ROLE
}

/**
 * Consultation context: whatever follows a for/about/regarding/on keyword
 * after the address.
 */
function extractContext(text: string, address: string): string {
  const tail = text.slice(text.indexOf(address) + address.length)
  const match = tail.match(CONTEXT_RE)
  if (!match) return ''
  return match[1].trim().replace(/[.!?\s]+$/, '')
}

export function parseChatIntent(text: string): ChatIntent {
  const message = typeof text === 'string' ? text.trim() : ''
  if (!message) {
    return { kind: 'guidance', message: CHAT_GUIDANCE }
  }

  const lower = message.toLowerCase()
  const address = findContactAddress(message)

  if (MEETING_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    if (!address) {
      return {
        kind: 'guidance',
        message: 'Please include an email address for the meeting (e.g., person@example.com)',
      }
    }
    return {
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address,
        role: extractRole(message, address, 'with|for'),
        context: extractContext(message, address),
        engagement: 'meeting',
      },
    }
  }

  if (REMOVE_RE.test(message)) {
    if (!address) {
      return {
        kind: 'guidance',
        message: "Could not parse email to remove. Try: 'remove [email@example.com]'",
      }
    }
    return { kind: 'mutation', mutation: { kind: 'remove_stakeholder', address } }
  }

  if (SENDER_RE.test(message)) {
    if (!address) {
      return {
        kind: 'guidance',
        message: "Please include the new sender address (e.g., 'update sender to person@example.com')",
      }
    }
    return { kind: 'mutation', mutation: { kind: 'set_sender', address } }
  }

  if (ORGANIZER_RE.test(message)) {
    if (!address) {
      return {
        kind: 'guidance',
        message: "Please include the new organizer address (e.g., 'update organizer to person@example.com')",
      }
    }
    return { kind: 'mutation', mutation: { kind: 'set_organizer', address } }
  }

  if (ADD_RE.test(message)) {
    if (!address) {
      return { kind: 'guidance', message: 'Please include an email address (e.g., person@example.com)' }
    }
    return {
      kind: 'mutation',
      mutation: {
        kind: 'upsert_stakeholder',
        address,
        role: extractRole(message, address, 'add|include|contact|invite'),
        context: extractContext(message, address),
        engagement: 'both',
      },
    }
  }

  return { kind: 'guidance', message: CHAT_GUIDANCE }
}
