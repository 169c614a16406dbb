/**
 * Request body JSON Schemas
 *
 * Validated with Ajv at the API boundary. Contact addresses use an anchored
 * pattern rather than `format: email` so no format plugin is needed.
 */

import { ACTION_TYPES, AGENT_KINDS } from '../types'
import { CONTACT_ADDRESS_PATTERN, SINGLE_LINE_PATTERN, SIZE_LIMITS, THREAD_ID_PATTERN } from '../invariants'

const contactAddress = {
  type: 'string',
  pattern: `^${CONTACT_ADDRESS_PATTERN}$`,
  maxLength: 320,
} as const

export interface InitializeThreadBody {
  threadId?: string
  proposalTitle: string
  location: string
  sustainabilityContext?: string
  indigenousContext?: string
  emailSender?: string
  meetingOrganizer?: string
  starterStakeholders?: boolean
}

export const INITIALIZE_THREAD_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['proposalTitle', 'location'],
  properties: {
    threadId: { type: 'string', pattern: THREAD_ID_PATTERN },
    proposalTitle: {
      type: 'string',
      minLength: 1,
      maxLength: SIZE_LIMITS.PROPOSAL_TITLE,
      pattern: SINGLE_LINE_PATTERN,
    },
    location: { type: 'string', minLength: 1, maxLength: SIZE_LIMITS.PROPOSAL_TITLE, pattern: SINGLE_LINE_PATTERN },
    sustainabilityContext: { type: 'string', maxLength: SIZE_LIMITS.CONTEXT_BLOB },
    indigenousContext: { type: 'string', maxLength: SIZE_LIMITS.CONTEXT_BLOB },
    emailSender: contactAddress,
    meetingOrganizer: contactAddress,
    starterStakeholders: { type: 'boolean' },
  },
  additionalProperties: false,
} as const

export interface PostMessageBody {
  message: string
}

export const POST_MESSAGE_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string', minLength: 1, maxLength: SIZE_LIMITS.CHAT_MESSAGE },
  },
  additionalProperties: false,
} as const

export interface UpdateConfigBody {
  emailSender?: string
  meetingOrganizer?: string
}

export const UPDATE_CONFIG_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  minProperties: 1,
  properties: {
    emailSender: contactAddress,
    meetingOrganizer: contactAddress,
  },
  additionalProperties: false,
} as const

export interface RequestActionBody {
  actionType: (typeof ACTION_TYPES)[number]
  eventTypeName?: string
  contactAddress?: string
  emailSender?: string
  meetingOrganizer?: string
}

export const REQUEST_ACTION_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['actionType'],
  properties: {
    actionType: { type: 'string', enum: ACTION_TYPES },
    eventTypeName: { type: 'string', maxLength: 200 },
    contactAddress: { type: 'string', maxLength: 320 },
    emailSender: contactAddress,
    meetingOrganizer: contactAddress,
  },
  additionalProperties: false,
} as const

export interface ConfirmActionBody {
  approved: boolean
}

export const CONFIRM_ACTION_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['approved'],
  properties: {
    approved: { type: 'boolean' },
  },
  additionalProperties: false,
} as const

export interface StartConversationBody {
  agent: (typeof AGENT_KINDS)[number]
  context?: {
    proposalTitle?: string
    location?: string
    latitude?: number
    longitude?: number
  }
}

export const START_CONVERSATION_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  type: 'object',
  required: ['agent'],
  properties: {
    agent: { type: 'string', enum: AGENT_KINDS },
    context: {
      type: 'object',
      properties: {
        proposalTitle: { type: 'string', maxLength: SIZE_LIMITS.PROPOSAL_TITLE },
        location: { type: 'string', maxLength: SIZE_LIMITS.PROPOSAL_TITLE },
        latitude: { type: 'number', minimum: -90, maximum: 90 },
        longitude: { type: 'number', minimum: -180, maximum: 180 },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const

export const AGENT_MESSAGE_SCHEMA = POST_MESSAGE_SCHEMA
