/**
 * Advisory agents
 *
 * Three agents share one reply path: reject-pattern check, prompt assembly,
 * text generation, local fallback. Only the sustainability agent consults
 * the geospatial scoring oracle.
 */

import type { AgentKind, AgentSiteContext, AgentTurn, GeoScore, GeoScoringOracle, TextGenerator } from '@consultflow/core'
import { buildSystemInstructions, getAgentDefinition, matchRejectPattern, type AgentDefinition } from './definitions'

/** Turns of history passed to the text generator */
export const AGENT_HISTORY_WINDOW = 10

export interface AgentReply {
  content: string
  source: 'generated' | 'fallback' | 'rejected'
}

export interface AgentRespondContext {
  site: AgentSiteContext
  history: AgentTurn[]
}

export interface AgentDeps {
  textGenerator: TextGenerator | null
  geoOracle: GeoScoringOracle | null
}

interface AgentBase {
  readonly definition: AgentDefinition
  respond(message: string, context: AgentRespondContext): Promise<AgentReply>
}

export interface SustainabilityAgent extends AgentBase {
  readonly kind: 'sustainability'
  /** Null when no oracle is configured or the oracle call fails */
  analyzeSite(latitude: number, longitude: number): Promise<GeoScore | null>
}

export interface IndigenousContextAgent extends AgentBase {
  readonly kind: 'indigenous_context'
}

export interface ProposalWorkflowAgent extends AgentBase {
  readonly kind: 'proposal_workflow'
}

export type Agent = SustainabilityAgent | IndigenousContextAgent | ProposalWorkflowAgent

// ============================================================================
// PROMPT ASSEMBLY
// ============================================================================

function siteName(site: AgentSiteContext): string {
  return site.location?.trim() || site.proposalTitle?.trim() || 'this site'
}

function formatFeature(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value) : JSON.stringify(value)
}

export function formatGeoScore(score: GeoScore): string {
  const components = Object.entries(score.componentScores)
    .map(([name, value]) => `${name}: ${value}`)
    .join(', ')
  const features = Object.entries(score.nearestFeatures)
    .map(([name, value]) => `${name}: ${formatFeature(value)}`)
    .join(', ')
  const lines = [
    'GEOSPATIAL ANALYSIS:',
    `Total score: ${score.totalScore}/100`,
    `Component scores: ${components || 'none'}`,
    `Nearest features: ${features || 'none'}`,
  ]
  if (score.recommendations.length > 0) {
    lines.push('Recommendations:', ...score.recommendations.map((r) => `- ${r}`))
  }
  return lines.join('\n')
}

export function buildUserPrompt(
  message: string,
  context: AgentRespondContext,
  geo: GeoScore | null = null
): string {
  const { site, history } = context
  const sections: string[] = []

  const siteLines: string[] = []
  if (site.proposalTitle) siteLines.push(`Proposal: ${site.proposalTitle}`)
  if (site.location) siteLines.push(`Location: ${site.location}`)
  if (site.latitude !== undefined && site.longitude !== undefined) {
    siteLines.push(`Coordinates: ${site.latitude}, ${site.longitude}`)
  }
  if (siteLines.length > 0) sections.push(`SITE CONTEXT:\n${siteLines.join('\n')}`)

  if (geo) sections.push(formatGeoScore(geo))

  const recent = history.slice(-AGENT_HISTORY_WINDOW)
  if (recent.length > 0) {
    sections.push(`CONVERSATION SO FAR:\n${recent.map((turn) => `${turn.role}: ${turn.content}`).join('\n')}`)
  }

  sections.push(`USER REQUEST:\n${message}`)
  return sections.join('\n\n')
}

export function localFallback(definition: AgentDefinition, site: AgentSiteContext, reason: string): string {
  const guidance = definition.fallback.split('{site}').join(siteName(site))
  return `${definition.displayName}: Unable to reach model; using quick local guidance. (${reason}) ${guidance}`
}

function rejection(definition: AgentDefinition, pattern: string): string {
  return (
    `${definition.displayName} cannot help with "${pattern}". ` +
    'Recommendations here must respect indigenous sovereignty and ecosystem health.'
  )
}

// ============================================================================
// FACTORY
// ============================================================================

function createReplier(
  definition: AgentDefinition,
  textGenerator: TextGenerator | null,
  enrich: (site: AgentSiteContext) => Promise<GeoScore | null>
): (message: string, context: AgentRespondContext) => Promise<AgentReply> {
  const systemInstructions = buildSystemInstructions(definition)

  return async (message, context) => {
    const rejected = matchRejectPattern(message)
    if (rejected) {
      console.warn(`[agents] ${definition.displayName} refused request matching "${rejected}"`)
      return { content: rejection(definition, rejected), source: 'rejected' }
    }

    if (!textGenerator) {
      return { content: localFallback(definition, context.site, 'no text generator configured'), source: 'fallback' }
    }

    const geo = await enrich(context.site)
    try {
      const answer = await textGenerator.ask(systemInstructions, buildUserPrompt(message, context, geo))
      return { content: answer.trim(), source: 'generated' }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      console.warn(`[agents] ${definition.displayName} fell back to local guidance:`, reason)
      return { content: localFallback(definition, context.site, reason), source: 'fallback' }
    }
  }
}

const noEnrichment = async (): Promise<GeoScore | null> => null

export function createAgent(kind: AgentKind, deps: AgentDeps): Agent {
  const definition = getAgentDefinition(kind)

  switch (kind) {
    case 'sustainability': {
      const analyzeSite = async (latitude: number, longitude: number): Promise<GeoScore | null> => {
        if (!deps.geoOracle) return null
        try {
          return await deps.geoOracle.score(latitude, longitude)
        } catch (error) {
          console.warn(
            `[agents] Geospatial scoring failed for ${latitude}, ${longitude}:`,
            error instanceof Error ? error.message : String(error)
          )
          return null
        }
      }
      const enrich = (site: AgentSiteContext) =>
        site.latitude !== undefined && site.longitude !== undefined
          ? analyzeSite(site.latitude, site.longitude)
          : noEnrichment()
      return {
        kind,
        definition,
        analyzeSite,
        respond: createReplier(definition, deps.textGenerator, enrich),
      }
    }
    case 'indigenous_context':
      return { kind, definition, respond: createReplier(definition, deps.textGenerator, noEnrichment) }
    case 'proposal_workflow':
      return { kind, definition, respond: createReplier(definition, deps.textGenerator, noEnrichment) }
  }
}
