/**
 * Core domain types for consultflow
 */

// Stakeholder types

/**
 * What outreach a stakeholder receives.
 * `both` = email and meeting, `email` = email only, `meeting` = meeting only.
 */
export type EngagementType = 'both' | 'email' | 'meeting'

export interface Stakeholder {
  address: string
  role: string
  context: string
  engagement: EngagementType
  addedAt: string // ISO
}

export function includesEmail(engagement: EngagementType): boolean {
  return engagement === 'both' || engagement === 'email'
}

export function includesMeeting(engagement: EngagementType): boolean {
  return engagement === 'both' || engagement === 'meeting'
}

// Instruction types
export type InstructionType = 'milestone' | 'email' | 'meeting' | 'slack'

export type InstructionStatus = 'pending' | 'executed' | 'failed'

export interface InstructionMetadata {
  role?: string
  context?: string
  attendeeEmail?: string
  attendeeRole?: string
  durationMinutes?: number
  stakeholderCount?: number
  emailCount?: number
  meetingCount?: number
}

export interface Instruction {
  id: string
  type: InstructionType
  /** Recipient address, organizer address, channel name, or `planning` */
  target: string
  subject: string
  body: string
  status: InstructionStatus
  metadata: InstructionMetadata
}

// Thread types
export type MessageRole = 'user' | 'assistant' | 'system'

export interface ThreadMessage {
  role: MessageRole
  content: string
  timestamp: string // ISO
}

export interface ProposalContext {
  proposalTitle: string
  location: string
  sustainabilityContext: string
  indigenousContext: string
}

export interface OutreachConfig {
  emailSender: string
  meetingOrganizer: string
}

export interface ThreadSummary {
  threadId: string
  proposalTitle: string
  location: string
  emailSender: string
  meetingOrganizer: string
  stakeholderCount: number
  emailCount: number
  meetingCount: number
  totalInstructions: number
  generation: number
  createdAt: string
  updatedAt: string
}

/**
 * Serialized thread state. Reconstructing a thread from a snapshot and
 * regenerating yields the same instruction list.
 */
export interface ThreadSnapshot extends ProposalContext, OutreachConfig {
  threadId: string
  stakeholders: Stakeholder[]
  instructions: Instruction[]
  messages: ThreadMessage[]
  runs: WorkflowRunRecord[]
  generation: number
  createdAt: string
  updatedAt: string
}

// Thread mutations (typed commands produced by the chat intent parser)
export type ThreadMutation =
  | {
      kind: 'upsert_stakeholder'
      address: string
      role: string
      context: string
      engagement: EngagementType
    }
  | { kind: 'remove_stakeholder'; address: string }
  | { kind: 'set_sender'; address: string }
  | { kind: 'set_organizer'; address: string }

export type ThreadMutationKind = ThreadMutation['kind']

export interface MutationOutcome {
  mutation: ThreadMutation
  applied: boolean
  acknowledgement: string
}

export type ChatIntent =
  | { kind: 'mutation'; mutation: ThreadMutation }
  | { kind: 'guidance'; message: string }

// Execution types
export type ExecutionResult =
  | {
      success: true
      instructionId: string
      type: InstructionType
      target: string
      message: string
      result: Record<string, unknown>
      executedAt: string
    }
  | {
      success: false
      instructionId: string
      type: InstructionType
      target: string
      message: string
      error: string
      executedAt: string
    }

export interface WorkflowRunSummary {
  total: number
  executedCount: number
  failedCount: number
  /** Percentage with one decimal; 0 for an empty batch */
  successRate: number
  results: ExecutionResult[]
}

export interface WorkflowRunRecord {
  actionId: string
  actionType: ActionType
  generation: number
  total: number
  executedCount: number
  failedCount: number
  successRate: number
  completedAt: string
}

// Confirmation types
export const ACTION_TYPES = [
  'send_email',
  'schedule_meeting',
  'full_outreach',
  'delete_contact',
] as const

export type ActionType = (typeof ACTION_TYPES)[number]

export type RiskLevel = 'safe' | 'caution' | 'danger'

export interface PendingActionDetails {
  threadId: string
  /** Thread generation the instruction snapshot was taken from */
  generation: number
  instructions: Instruction[]
  recipients: string[]
  emailSender: string
  meetingOrganizer: string
  eventTypeName?: string
  contactAddress?: string
}

export interface PendingConfirmation {
  actionId: string
  actionType: ActionType
  riskLevel: RiskLevel
  description: string
  details: PendingActionDetails
  confirmed: boolean
  rejected: boolean
  createdAt: string
  resolvedAt: string | null
}

export interface ConfirmationSummary {
  pendingCount: number
  executedCount: number
  rejectedCount: number
  pending: PendingConfirmation[]
}

// Collaborator contracts the core depends on
export interface TextGenerator {
  ask(systemInstructions: string, userPrompt: string): Promise<string>
}

export interface EmailDraftRequest extends ProposalContext {
  recipientAddress: string
  role: string
  context: string
}

export interface EmailDraft {
  subject: string
  body: string
}

export interface EmailComposer {
  readonly kind: 'template' | 'smart'
  compose(request: EmailDraftRequest): Promise<EmailDraft>
}

// Agent types
export const AGENT_KINDS = ['sustainability', 'indigenous_context', 'proposal_workflow'] as const

export type AgentKind = (typeof AGENT_KINDS)[number]

export interface AgentTurn {
  role: 'user' | 'assistant'
  content: string
  timestamp: string // ISO
}

/**
 * Site context a conversation is anchored to. Coordinates enable
 * geospatial scoring for the sustainability agent.
 */
export interface AgentSiteContext {
  proposalTitle?: string
  location?: string
  latitude?: number
  longitude?: number
}

export interface GeoScore {
  totalScore: number
  componentScores: Record<string, number>
  nearestFeatures: Record<string, unknown>
  recommendations: string[]
}

export interface GeoScoringOracle {
  score(latitude: number, longitude: number): Promise<GeoScore>
}
