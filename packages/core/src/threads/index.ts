/**
 * Workflow Thread
 *
 * One proposal, its stakeholders and the instruction list derived from them.
 * The instruction list is never edited in place: every state change is
 * followed by `regenerate()`, which replaces it wholesale and bumps the
 * generation counter. Callers serialize access per thread id.
 */

import type {
  EmailComposer,
  Instruction,
  MessageRole,
  MutationOutcome,
  OutreachConfig,
  ProposalContext,
  Stakeholder,
  ThreadMessage,
  ThreadMutation,
  ThreadSnapshot,
  ThreadSummary,
  WorkflowRunRecord,
} from '../types'
import { StakeholderRegistry } from '../stakeholders'
import { countPlannedOutreach, regenerateInstructions, type GenerationOptions } from '../instructions'

export interface ThreadInit extends ProposalContext, OutreachConfig {
  threadId: string
}

export type Clock = () => string

const systemClock: Clock = () => new Date().toISOString()

function copyInstruction(instruction: Instruction): Instruction {
  return { ...instruction, metadata: { ...instruction.metadata } }
}

function withRoleDetail(base: string, stakeholder: Stakeholder, connector: string): string {
  return stakeholder.context ? `${base} ${connector} ${stakeholder.context}` : base
}

export interface ThreadOptions {
  now?: Clock
  createdAt?: string
}

export class WorkflowThread {
  readonly threadId: string
  readonly proposalTitle: string
  readonly location: string
  readonly sustainabilityContext: string
  readonly indigenousContext: string
  readonly createdAt: string

  private sender: string
  private organizer: string
  private updated: string
  private gen = 0
  private instructionList: Instruction[] = []
  private readonly history: ThreadMessage[] = []
  private readonly runHistory: WorkflowRunRecord[] = []
  private readonly registry: StakeholderRegistry
  private readonly clock: Clock

  constructor(init: ThreadInit, options: ThreadOptions = {}) {
    this.clock = options.now ?? systemClock
    this.threadId = init.threadId
    this.proposalTitle = init.proposalTitle
    this.location = init.location
    this.sustainabilityContext = init.sustainabilityContext
    this.indigenousContext = init.indigenousContext
    this.sender = init.emailSender
    this.organizer = init.meetingOrganizer
    this.createdAt = options.createdAt ?? this.clock()
    this.updated = this.createdAt
    this.registry = new StakeholderRegistry([], this.clock)
  }

  /**
   * Rebuild a thread from `toSnapshot()` output. Stored timestamps, the
   * instruction list and the generation are restored as-is; regenerating
   * afterwards yields the same list for the same composer.
   */
  static fromSnapshot(snapshot: ThreadSnapshot, options: ThreadOptions = {}): WorkflowThread {
    const thread = new WorkflowThread(snapshot, { ...options, createdAt: snapshot.createdAt })
    thread.restore(snapshot)
    return thread
  }

  private restore(snapshot: ThreadSnapshot): void {
    this.registry.load(snapshot.stakeholders)
    this.history.push(...snapshot.messages.map((m) => ({ ...m })))
    this.runHistory.push(...snapshot.runs.map((r) => ({ ...r })))
    this.instructionList = snapshot.instructions.map(copyInstruction)
    this.gen = snapshot.generation
    this.updated = snapshot.updatedAt
  }

  get generation(): number {
    return this.gen
  }

  get emailSender(): string {
    return this.sender
  }

  get meetingOrganizer(): string {
    return this.organizer
  }

  get updatedAt(): string {
    return this.updated
  }

  get instructions(): Instruction[] {
    return this.instructionList.map(copyInstruction)
  }

  get messages(): ThreadMessage[] {
    return this.history.map((m) => ({ ...m }))
  }

  get runs(): WorkflowRunRecord[] {
    return this.runHistory.map((r) => ({ ...r }))
  }

  stakeholders(): Stakeholder[] {
    return this.registry.list()
  }

  hasStakeholder(address: string): boolean {
    return this.registry.has(address)
  }

  proposal(): ProposalContext {
    return {
      proposalTitle: this.proposalTitle,
      location: this.location,
      sustainabilityContext: this.sustainabilityContext,
      indigenousContext: this.indigenousContext,
    }
  }

  /**
   * Apply a parsed mutation. Does not regenerate; the caller does that
   * while still holding the thread lock.
   */
  applyMutation(mutation: ThreadMutation): MutationOutcome {
    this.touch()

    switch (mutation.kind) {
      case 'upsert_stakeholder': {
        const stakeholder = this.registry.upsert(
          mutation.address,
          mutation.role,
          mutation.context,
          mutation.engagement
        )
        const acknowledgement =
          mutation.engagement === 'meeting'
            ? withRoleDetail(`✓ Scheduled meeting with ${stakeholder.role} (${stakeholder.address})`, stakeholder, 'regarding')
            : withRoleDetail(`✓ Added ${stakeholder.role} (${stakeholder.address})`, stakeholder, '-')
        return { mutation, applied: true, acknowledgement }
      }

      case 'remove_stakeholder': {
        const existing = this.registry.get(mutation.address)
        if (!existing) {
          return {
            mutation,
            applied: false,
            acknowledgement: `Email ${mutation.address} not found in stakeholders`,
          }
        }
        this.registry.remove(mutation.address)
        return {
          mutation,
          applied: true,
          acknowledgement: `✓ Removed ${existing.role} (${existing.address})`,
        }
      }

      case 'set_sender':
        this.sender = mutation.address
        return { mutation, applied: true, acknowledgement: `✓ Updated email sender to ${mutation.address}` }

      case 'set_organizer':
        this.organizer = mutation.address
        return { mutation, applied: true, acknowledgement: `✓ Updated meeting organizer to ${mutation.address}` }
    }
  }

  updateConfig(config: Partial<OutreachConfig>): void {
    if (config.emailSender !== undefined) this.sender = config.emailSender
    if (config.meetingOrganizer !== undefined) this.organizer = config.meetingOrganizer
    this.touch()
  }

  /**
   * Rebuild the full instruction list and swap it in once complete.
   */
  async regenerate(composer: EmailComposer, options: GenerationOptions = {}): Promise<Instruction[]> {
    const next = await regenerateInstructions(
      {
        ...this.proposal(),
        emailSender: this.sender,
        meetingOrganizer: this.organizer,
        stakeholders: this.registry.list(),
      },
      composer,
      options
    )
    this.instructionList = next
    this.gen += 1
    this.touch()
    return this.instructions
  }

  addMessage(role: MessageRole, content: string): ThreadMessage {
    const message: ThreadMessage = { role, content, timestamp: this.clock() }
    this.history.push(message)
    this.updated = message.timestamp
    return { ...message }
  }

  recordRun(record: WorkflowRunRecord): void {
    this.runHistory.push({ ...record })
    this.touch()
  }

  summary(): ThreadSummary {
    const counts = countPlannedOutreach(this.registry.list())
    return {
      threadId: this.threadId,
      proposalTitle: this.proposalTitle,
      location: this.location,
      emailSender: this.sender,
      meetingOrganizer: this.organizer,
      stakeholderCount: this.registry.size,
      emailCount: counts.emails,
      meetingCount: counts.meetings,
      totalInstructions: this.instructionList.length,
      generation: this.gen,
      createdAt: this.createdAt,
      updatedAt: this.updated,
    }
  }

  toSnapshot(): ThreadSnapshot {
    return {
      threadId: this.threadId,
      ...this.proposal(),
      emailSender: this.sender,
      meetingOrganizer: this.organizer,
      stakeholders: this.registry.list(),
      instructions: this.instructions,
      messages: this.messages,
      runs: this.runs,
      generation: this.gen,
      createdAt: this.createdAt,
      updatedAt: this.updated,
    }
  }

  private touch(): void {
    this.updated = this.clock()
  }
}
