/**
 * Agent Conversations Repository
 *
 * In-memory chat history per agent conversation.
 */

import { randomBytes } from 'node:crypto'
import type { AgentKind, AgentSiteContext, AgentTurn } from '@consultflow/core'
import type { AgentConversationDTO, AgentConversationSummaryDTO } from './types'

// ============================================================================
// REPOSITORY INTERFACE
// ============================================================================

export interface AgentConversationsRepo {
  create(agent: AgentKind, context: AgentSiteContext): AgentConversationDTO
  get(conversationId: string): AgentConversationDTO | null
  list(): AgentConversationSummaryDTO[]
  appendTurns(conversationId: string, turns: AgentTurn[]): AgentConversationDTO | null
  delete(conversationId: string): boolean
}

function copy(conversation: AgentConversationDTO): AgentConversationDTO {
  return {
    ...conversation,
    context: { ...conversation.context },
    turns: conversation.turns.map((turn) => ({ ...turn })),
  }
}

function toSummary(conversation: AgentConversationDTO): AgentConversationSummaryDTO {
  const last = conversation.turns[conversation.turns.length - 1]
  return {
    conversationId: conversation.conversationId,
    agent: conversation.agent,
    turnCount: conversation.turns.length,
    lastMessage: last ? last.content : null,
    createdAt: conversation.createdAt,
    updatedAt: conversation.updatedAt,
  }
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

export function createMemoryConversationsRepo(
  now: () => string = () => new Date().toISOString()
): AgentConversationsRepo {
  const conversations = new Map<string, AgentConversationDTO>()

  return {
    create(agent, context) {
      const timestamp = now()
      const conversation: AgentConversationDTO = {
        conversationId: `conv_${randomBytes(6).toString('hex')}`,
        agent,
        context: { ...context },
        turns: [],
        createdAt: timestamp,
        updatedAt: timestamp,
      }
      conversations.set(conversation.conversationId, conversation)
      return copy(conversation)
    },

    get(conversationId) {
      const conversation = conversations.get(conversationId)
      return conversation ? copy(conversation) : null
    },

    list() {
      return Array.from(conversations.values(), toSummary).sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
    },

    appendTurns(conversationId, turns) {
      const conversation = conversations.get(conversationId)
      if (!conversation) return null
      conversation.turns.push(...turns.map((turn) => ({ ...turn })))
      conversation.updatedAt = now()
      return copy(conversation)
    },

    delete(conversationId) {
      return conversations.delete(conversationId)
    },
  }
}
