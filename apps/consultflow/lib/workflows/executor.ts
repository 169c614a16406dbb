/**
 * Workflow Executor
 *
 * Runs instructions against the outreach collaborators. Every instruction
 * ends as executed or failed; one instruction's failure never stops the
 * rest of a batch.
 */

import type {
  ExecutionResult,
  Instruction,
  OutreachConfig,
  WorkflowRunSummary,
} from '@consultflow/core'
import { DEFAULT_MEETING_MINUTES } from '@consultflow/core'
import { withTimeout, type CalendarAdapter, type ChatNotifier, type EmailSender } from '@consultflow/adapters'

export interface ExecutorDeps {
  emailSender: EmailSender
  calendar: CalendarAdapter
  chat: ChatNotifier
  /** Sender and organizer used when a run does not override them */
  defaults: OutreachConfig
  /** Per external call; 0 disables the limit */
  timeoutMs: number
  now?: () => string
}

export type ExecutionOverrides = Partial<OutreachConfig>

type Outcome = { message: string; result: Record<string, unknown> }

export function computeSuccessRate(executed: number, total: number): number {
  if (total === 0) return 0
  return Math.round((executed / total) * 1000) / 10
}

export class WorkflowExecutor {
  private readonly now: () => string

  constructor(private readonly deps: ExecutorDeps) {
    this.now = deps.now ?? (() => new Date().toISOString())
  }

  /**
   * Execute one instruction and record its status on it. Never rejects.
   */
  async execute(instruction: Instruction, overrides: ExecutionOverrides = {}): Promise<ExecutionResult> {
    try {
      const outcome = await this.dispatch(instruction, overrides)
      instruction.status = 'executed'
      console.log(`[workflow] ✓ ${instruction.id}: ${outcome.message}`)
      return {
        success: true,
        instructionId: instruction.id,
        type: instruction.type,
        target: instruction.target,
        message: outcome.message,
        result: outcome.result,
        executedAt: this.now(),
      }
    } catch (error) {
      instruction.status = 'failed'
      const reason = error instanceof Error ? error.message : String(error)
      console.warn(`[workflow] ✗ ${instruction.id}: ${reason}`)
      return {
        success: false,
        instructionId: instruction.id,
        type: instruction.type,
        target: instruction.target,
        message: `Failed to execute ${instruction.type} ${instruction.id}`,
        error: reason,
        executedAt: this.now(),
      }
    }
  }

  /**
   * Execute a batch in order. The result has one entry per instruction.
   */
  async executeWorkflow(instructions: Instruction[], overrides: ExecutionOverrides = {}): Promise<WorkflowRunSummary> {
    const results: ExecutionResult[] = []
    for (const instruction of instructions) {
      results.push(await this.execute(instruction, overrides))
    }

    const executedCount = results.filter((r) => r.success).length
    const failedCount = results.length - executedCount
    return {
      total: results.length,
      executedCount,
      failedCount,
      successRate: computeSuccessRate(executedCount, results.length),
      results,
    }
  }

  private async dispatch(instruction: Instruction, overrides: ExecutionOverrides): Promise<Outcome> {
    const label = `${instruction.type} ${instruction.id}`
    const timeoutMs = this.deps.timeoutMs

    switch (instruction.type) {
      case 'email': {
        const from = overrides.emailSender ?? this.deps.defaults.emailSender
        const receipt = await withTimeout(
          this.deps.emailSender.send({
            to: instruction.target,
            from,
            subject: instruction.subject,
            body: instruction.body,
          }),
          timeoutMs,
          label
        )
        return {
          message: `Email sent to ${instruction.target}`,
          result: { messageId: receipt.messageId, to: receipt.to, from, sentAt: receipt.sentAt },
        }
      }

      case 'meeting': {
        const invitee = instruction.metadata.attendeeEmail
        if (!invitee) {
          throw new Error('Meeting instruction has no attendee')
        }
        const organizer = overrides.meetingOrganizer ?? this.deps.defaults.meetingOrganizer
        const booking = await withTimeout(
          this.deps.calendar.createMeeting({
            organizer,
            invitee,
            title: instruction.subject,
            description: instruction.body,
            durationMinutes: instruction.metadata.durationMinutes ?? DEFAULT_MEETING_MINUTES,
          }),
          timeoutMs,
          label
        )
        return {
          message: `Meeting booked with ${invitee}`,
          result: { eventId: booking.eventId, link: booking.link, startTime: booking.startTime, organizer, invitee },
        }
      }

      case 'slack': {
        const delivered = await withTimeout(
          this.deps.chat.post({ channel: instruction.target, text: `${instruction.subject}\n${instruction.body}` }),
          timeoutMs,
          label
        )
        if (!delivered) {
          throw new Error(`Notification to ${instruction.target} was not delivered`)
        }
        return {
          message: `Notification posted to ${instruction.target}`,
          result: { channel: instruction.target, delivered },
        }
      }

      case 'milestone':
        return {
          message: `Milestone recorded: ${instruction.subject}`,
          result: { milestone: instruction.subject },
        }
    }
  }
}
