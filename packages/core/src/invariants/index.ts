/**
 * Global invariants and validation rules
 */

import type { InstructionType } from '../types'

/**
 * Email-shaped token, as accepted in chat messages and config updates.
 */
export const CONTACT_ADDRESS_PATTERN = '[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}'

/**
 * Find the first email-shaped token in free text
 */
export function findContactAddress(text: string): string | null {
  const match = text.match(new RegExp(CONTACT_ADDRESS_PATTERN))
  return match ? match[0] : null
}

/**
 * Format an instruction id: <type>_NNN
 */
export function formatInstructionId(type: InstructionType, seq: number): string {
  return `${type}_${String(seq).padStart(3, '0')}`
}

/**
 * Caller-chosen thread ids are free-form but URL-safe
 */
export const THREAD_ID_PATTERN = '^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$'

/**
 * Single-line text: no ASCII control characters. Titles and locations end
 * up in mail headers.
 */
export const SINGLE_LINE_PATTERN = '^[^\\x00-\\x1f\\x7f]*$'

export const DEFAULT_MEETING_MINUTES = 30

export const DEFAULT_NOTIFICATION_CHANNEL = '#general'

export const MILESTONE_TARGET = 'planning'

/**
 * Maximum sizes for free-text fields (in characters)
 */
export const SIZE_LIMITS = {
  PROPOSAL_TITLE: 300,
  CONTEXT_BLOB: 20000,
  CHAT_MESSAGE: 4000,
} as const
