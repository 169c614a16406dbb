/**
 * Repository Types - Stable DTOs for API responses
 */

import type { AgentKind, AgentSiteContext, AgentTurn } from '@consultflow/core'

// ============================================================================
// AGENT CONVERSATIONS
// ============================================================================

export interface AgentConversationDTO {
  conversationId: string
  agent: AgentKind
  context: AgentSiteContext
  turns: AgentTurn[]
  createdAt: string
  updatedAt: string
}

export interface AgentConversationSummaryDTO {
  conversationId: string
  agent: AgentKind
  turnCount: number
  lastMessage: string | null
  createdAt: string
  updatedAt: string
}

// ============================================================================
// CONFIRMATION AUDIT
// ============================================================================

export interface ConfirmationAuditDTO {
  executedIds: string[]
  rejectedIds: string[]
}
