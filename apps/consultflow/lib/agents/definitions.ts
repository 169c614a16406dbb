/**
 * Agent prompt definitions, loaded from prompts.json.
 */

import type { AgentKind } from '@consultflow/core'
import prompts from './prompts.json'

export interface AgentDefinition {
  displayName: string
  greeting: string
  systemPrompt: string
  basePrompt: string
  constraints: string[]
  /** Local answer used when the text generator is unavailable; `{site}` is substituted */
  fallback: string
}

interface PromptCatalog {
  agents: Record<AgentKind, AgentDefinition>
  rejectPatterns: string[]
}

const catalog: PromptCatalog = prompts

export const AGENT_DEFINITIONS: Readonly<Record<AgentKind, AgentDefinition>> = catalog.agents

/** Lower-case phrases that are refused outright */
export const REJECT_PATTERNS: readonly string[] = catalog.rejectPatterns.map((p) => p.toLowerCase())

export function getAgentDefinition(kind: AgentKind): AgentDefinition {
  return AGENT_DEFINITIONS[kind]
}

export function matchRejectPattern(message: string): string | null {
  const lower = message.toLowerCase()
  return REJECT_PATTERNS.find((pattern) => lower.includes(pattern)) ?? null
}

export function buildSystemInstructions(definition: AgentDefinition): string {
  const constraints = definition.constraints.map((c) => `- ${c}`).join('\n')
  return `${definition.systemPrompt}\n\nGuiding principles: ${definition.basePrompt}\n\nConstraints:\n${constraints}`
}
