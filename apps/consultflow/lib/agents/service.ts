/**
 * Agent Conversation Service
 */

import type { AgentKind, AgentTurn } from '@consultflow/core'
import { KeyedLock } from '@/lib/concurrency/keyed-lock'
import type { AgentConversationsRepo } from '@/lib/repo/conversations'
import type { AgentConversationDTO, AgentConversationSummaryDTO } from '@/lib/repo/types'
import { formatAjvErrors, validateAgentMessage, validateStartConversation } from '@/lib/workflows/validation'
import { createAgent, type Agent, type AgentDeps, type AgentReply } from './agents'

export class AgentServiceError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AgentServiceError'
  }
}

export interface AgentServiceDeps extends AgentDeps {
  conversations: AgentConversationsRepo
  lock?: KeyedLock
  now?: () => string
}

export interface AgentMessageResult {
  conversationId: string
  agent: AgentKind
  reply: AgentReply
  turns: AgentTurn[]
}

export interface AgentConversationService {
  startConversation(body: unknown): AgentConversationDTO
  sendMessage(conversationId: string, body: unknown): Promise<AgentMessageResult>
  getConversation(conversationId: string): AgentConversationDTO
  listConversations(): AgentConversationSummaryDTO[]
  deleteConversation(conversationId: string): { conversationId: string; deleted: true }
}

function conversationNotFound(conversationId: string): AgentServiceError {
  return new AgentServiceError(`Conversation ${conversationId} not found`, 'CONVERSATION_NOT_FOUND', 404, {
    conversationId,
  })
}

export function createAgentConversationService(deps: AgentServiceDeps): AgentConversationService {
  const { conversations } = deps
  const lock = deps.lock ?? new KeyedLock()
  const now = deps.now ?? (() => new Date().toISOString())
  const agents = new Map<AgentKind, Agent>()

  const agentFor = (kind: AgentKind): Agent => {
    let agent = agents.get(kind)
    if (!agent) {
      agent = createAgent(kind, { textGenerator: deps.textGenerator, geoOracle: deps.geoOracle })
      agents.set(kind, agent)
    }
    return agent
  }

  const requireConversation = (conversationId: string): AgentConversationDTO => {
    const conversation = conversations.get(conversationId)
    if (!conversation) throw conversationNotFound(conversationId)
    return conversation
  }

  return {
    startConversation(body) {
      if (!validateStartConversation(body)) {
        throw new AgentServiceError(
          `Invalid conversation: ${formatAjvErrors(validateStartConversation.errors)}`,
          'INVALID_REQUEST',
          400
        )
      }
      const created = conversations.create(body.agent, body.context ?? {})
      const greeting: AgentTurn = { role: 'assistant', content: agentFor(body.agent).definition.greeting, timestamp: now() }
      const conversation = conversations.appendTurns(created.conversationId, [greeting]) ?? created
      console.log(`[agents] Conversation ${conversation.conversationId} started with ${body.agent}`)
      return conversation
    },

    async sendMessage(conversationId, body) {
      if (!validateAgentMessage(body)) {
        throw new AgentServiceError(
          `Invalid message: ${formatAjvErrors(validateAgentMessage.errors)}`,
          'INVALID_REQUEST',
          400
        )
      }
      const text = body.message

      return lock.run(conversationId, async () => {
        const conversation = requireConversation(conversationId)
        const agent = agentFor(conversation.agent)
        const reply = await agent.respond(text, { site: conversation.context, history: conversation.turns })

        const userTurn: AgentTurn = { role: 'user', content: text, timestamp: now() }
        const assistantTurn: AgentTurn = { role: 'assistant', content: reply.content, timestamp: now() }
        const updated = conversations.appendTurns(conversationId, [userTurn, assistantTurn])
        if (!updated) throw conversationNotFound(conversationId)

        return { conversationId, agent: conversation.agent, reply, turns: updated.turns }
      })
    },

    getConversation(conversationId) {
      return requireConversation(conversationId)
    },

    listConversations() {
      return conversations.list()
    },

    deleteConversation(conversationId) {
      if (!conversations.delete(conversationId)) throw conversationNotFound(conversationId)
      return { conversationId, deleted: true }
    },
  }
}
