/**
 * Outreach Workflow Service
 *
 * Glue between the REST surface and the domain: validates request bodies,
 * serializes thread changes through the thread lock, puts side-effecting
 * actions behind the confirmation gate and runs approved ones.
 */

import { randomBytes } from 'node:crypto'
import {
  DEFAULT_EVENT_TYPE_NAME,
  WorkflowThread,
  collectRecipients,
  describeAction,
  getActionPolicy,
  parseChatIntent,
  selectActionInstructions,
  starterStakeholders,
  type ActionType,
  type ChatIntent,
  type EmailComposer,
  type Instruction,
  type PendingActionDetails,
  type PendingConfirmation,
  type ConfirmationSummary,
  type ThreadSnapshot,
  type ThreadSummary,
  type WorkflowRunRecord,
  type WorkflowRunSummary,
} from '@consultflow/core'
import type { ConfirmationsRepo } from '@/lib/repo/confirmations'
import type { ThreadsRepo } from '@/lib/repo/threads'
import type { WorkflowExecutor } from './executor'
import {
  formatAjvErrors,
  validateConfirmAction,
  validateInitializeThread,
  validatePostMessage,
  validateRequestAction,
  validateUpdateConfig,
} from './validation'

export class WorkflowServiceError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'WorkflowServiceError'
  }
}

// ============================================================================
// TYPES
// ============================================================================

export interface WorkflowServiceDeps {
  threads: ThreadsRepo
  confirmations: ConfirmationsRepo
  executor: WorkflowExecutor
  composer: EmailComposer
  defaults: {
    emailSender: string
    meetingOrganizer: string
    slackChannel: string
  }
  now?: () => string
}

export interface PostMessageResult {
  threadId: string
  intent: ChatIntent['kind']
  applied: boolean
  acknowledgement: string
  instructions: Instruction[]
  summary: ThreadSummary
}

export type ConfirmActionResult =
  | {
      status: 'executed'
      actionId: string
      actionType: ActionType
      threadId: string
      run: WorkflowRunSummary
      instructions: Instruction[]
    }
  | {
      status: 'contact_deleted'
      actionId: string
      threadId: string
      contactAddress: string
      removed: boolean
      acknowledgement: string
      instructions: Instruction[]
    }
  | {
      status: 'rejected'
      actionId: string
      actionType: ActionType
      threadId: string
    }

export interface OutreachWorkflowService {
  initializeThread(body: unknown): Promise<ThreadSnapshot>
  postMessage(threadId: string, body: unknown): Promise<PostMessageResult>
  updateConfig(threadId: string, body: unknown): Promise<ThreadSnapshot>
  requestAction(threadId: string, body: unknown): Promise<PendingConfirmation>
  confirmAction(actionId: string, body: unknown): Promise<ConfirmActionResult>
  getStatus(threadId: string): Promise<ThreadSnapshot>
  listThreads(): Promise<ThreadSummary[]>
  deleteThread(threadId: string): Promise<{ threadId: string; deleted: true }>
  getAction(actionId: string): PendingConfirmation
  listPendingActions(): PendingConfirmation[]
  confirmationSummary(): ConfirmationSummary
  sweepConfirmations(): { removed: number }
}

// ============================================================================
// HELPERS
// ============================================================================

function invalid(message: string): WorkflowServiceError {
  return new WorkflowServiceError(message, 'INVALID_REQUEST', 400)
}

function threadNotFound(threadId: string): WorkflowServiceError {
  return new WorkflowServiceError(`Thread ${threadId} not found`, 'THREAD_NOT_FOUND', 404, { threadId })
}

function alreadyProcessed(confirmation: PendingConfirmation): WorkflowServiceError {
  return new WorkflowServiceError(
    `Action ${confirmation.actionId} was already ${confirmation.confirmed ? 'approved' : 'rejected'}`,
    'ALREADY_PROCESSED',
    409,
    { actionId: confirmation.actionId }
  )
}

function newThreadId(): string {
  return `proposal-${randomBytes(6).toString('hex')}`
}

// ============================================================================
// SERVICE
// ============================================================================

export function createOutreachWorkflowService(deps: WorkflowServiceDeps): OutreachWorkflowService {
  const { threads, confirmations, executor, composer, defaults } = deps
  const now = deps.now ?? (() => new Date().toISOString())
  const generationOptions = { notificationChannel: defaults.slackChannel }

  const regenerate = (thread: WorkflowThread) => thread.regenerate(composer, generationOptions)

  async function requireThread<T>(threadId: string, fn: (thread: WorkflowThread) => Promise<T>): Promise<T> {
    const result = await threads.withThread(threadId, async (thread) => ({ value: await fn(thread) }))
    if (!result) throw threadNotFound(threadId)
    return result.value
  }

  function requireAction(actionId: string): PendingConfirmation {
    const confirmation = confirmations.get(actionId)
    if (!confirmation) {
      throw new WorkflowServiceError(`Action ${actionId} not found`, 'ACTION_NOT_FOUND', 404, { actionId })
    }
    return confirmation
  }

  async function noteOnThread(threadId: string, fn: (thread: WorkflowThread) => void): Promise<void> {
    const found = await threads.withThread(threadId, async (thread) => {
      fn(thread)
      return true
    })
    if (!found) {
      console.warn(`[workflow] Thread ${threadId} no longer exists; history not updated`)
    }
  }

  async function runApprovedBatch(confirmation: PendingConfirmation): Promise<ConfirmActionResult> {
    const { details } = confirmation
    const instructions = details.instructions
    const run = await executor.executeWorkflow(instructions, {
      emailSender: details.emailSender,
      meetingOrganizer: details.meetingOrganizer,
    })

    confirmations.recordExecution(confirmation.actionId, instructions)

    const record: WorkflowRunRecord = {
      actionId: confirmation.actionId,
      actionType: confirmation.actionType,
      generation: details.generation,
      total: run.total,
      executedCount: run.executedCount,
      failedCount: run.failedCount,
      successRate: run.successRate,
      completedAt: now(),
    }
    console.log(
      `[workflow] ${confirmation.actionId}: ${run.executedCount}/${run.total} executed (${run.successRate}%)`
    )

    await noteOnThread(details.threadId, (thread) => {
      thread.recordRun(record)
      thread.addMessage(
        'system',
        `Executed ${confirmation.actionId}: ${run.executedCount} of ${run.total} instruction(s) succeeded, ${run.failedCount} failed`
      )
    })

    return {
      status: 'executed',
      actionId: confirmation.actionId,
      actionType: confirmation.actionType,
      threadId: details.threadId,
      run,
      instructions,
    }
  }

  async function runApprovedDeletion(confirmation: PendingConfirmation): Promise<ConfirmActionResult> {
    const { threadId, contactAddress } = confirmation.details
    if (!contactAddress) {
      throw new WorkflowServiceError('Action has no contact address', 'MISSING_PARAMETER', 400, {
        actionId: confirmation.actionId,
      })
    }

    const result = await threads.withThread(threadId, async (thread): Promise<ConfirmActionResult> => {
      const outcome = thread.applyMutation({ kind: 'remove_stakeholder', address: contactAddress })
      if (outcome.applied) {
        await regenerate(thread)
      }
      thread.addMessage('system', outcome.acknowledgement)
      return {
        status: 'contact_deleted',
        actionId: confirmation.actionId,
        threadId,
        contactAddress,
        removed: outcome.applied,
        acknowledgement: outcome.acknowledgement,
        instructions: thread.instructions,
      }
    })
    if (result) return result

    console.warn(`[workflow] Thread ${threadId} no longer exists; ${contactAddress} not removed`)
    return {
      status: 'contact_deleted',
      actionId: confirmation.actionId,
      threadId,
      contactAddress,
      removed: false,
      acknowledgement: `Thread ${threadId} no longer exists`,
      instructions: [],
    }
  }

  return {
    async initializeThread(body) {
      if (!validateInitializeThread(body)) {
        throw invalid(`Invalid thread: ${formatAjvErrors(validateInitializeThread.errors)}`)
      }

      const threadId = body.threadId ?? newThreadId()
      if (threads.has(threadId)) {
        throw new WorkflowServiceError(`Thread ${threadId} already exists`, 'THREAD_EXISTS', 409, { threadId })
      }

      const thread = new WorkflowThread(
        {
          threadId,
          proposalTitle: body.proposalTitle,
          location: body.location,
          sustainabilityContext: body.sustainabilityContext ?? '',
          indigenousContext: body.indigenousContext ?? '',
          emailSender: body.emailSender ?? defaults.emailSender,
          meetingOrganizer: body.meetingOrganizer ?? defaults.meetingOrganizer,
        },
        { now }
      )
      thread.addMessage('system', `Workflow initialized for: ${body.proposalTitle}`)
      if (body.starterStakeholders) {
        for (const starter of starterStakeholders(body.location)) {
          thread.applyMutation({ kind: 'upsert_stakeholder', ...starter })
        }
      }
      await regenerate(thread)

      if (!threads.insert(thread)) {
        throw new WorkflowServiceError(`Thread ${threadId} already exists`, 'THREAD_EXISTS', 409, { threadId })
      }
      console.log(`[workflow] Thread ${threadId} initialized with ${thread.instructions.length} instruction(s)`)
      return thread.toSnapshot()
    },

    async postMessage(threadId, body) {
      if (!validatePostMessage(body)) {
        throw invalid(`Invalid message: ${formatAjvErrors(validatePostMessage.errors)}`)
      }
      const text = body.message

      return requireThread(threadId, async (thread) => {
        thread.addMessage('user', text)
        const intent = parseChatIntent(text)

        let applied = false
        let acknowledgement: string
        if (intent.kind === 'mutation') {
          const outcome = thread.applyMutation(intent.mutation)
          applied = outcome.applied
          acknowledgement = outcome.acknowledgement
          if (applied) {
            await regenerate(thread)
          }
        } else {
          acknowledgement = intent.message
        }

        thread.addMessage('assistant', acknowledgement)
        return {
          threadId,
          intent: intent.kind,
          applied,
          acknowledgement,
          instructions: thread.instructions,
          summary: thread.summary(),
        }
      })
    },

    async updateConfig(threadId, body) {
      if (!validateUpdateConfig(body)) {
        throw invalid(`Invalid configuration: ${formatAjvErrors(validateUpdateConfig.errors)}`)
      }

      return requireThread(threadId, async (thread) => {
        thread.updateConfig(body)
        await regenerate(thread)
        thread.addMessage(
          'system',
          `Configuration updated: emails from ${thread.emailSender}, meetings for ${thread.meetingOrganizer}`
        )
        return thread.toSnapshot()
      })
    },

    async requestAction(threadId, body) {
      if (!validateRequestAction(body)) {
        throw invalid(`Invalid action request: ${formatAjvErrors(validateRequestAction.errors)}`)
      }
      const actionType = body.actionType
      const policy = getActionPolicy(actionType)

      if (policy.requiredParam && !body[policy.requiredParam]?.trim()) {
        throw new WorkflowServiceError(
          `${policy.requiredParam} is required for ${actionType}`,
          'MISSING_PARAMETER',
          400,
          { parameter: policy.requiredParam }
        )
      }

      return requireThread(threadId, async (thread) => {
        const contactAddress = body.contactAddress?.trim()
        if (actionType === 'delete_contact' && contactAddress && !thread.hasStakeholder(contactAddress)) {
          throw new WorkflowServiceError(
            `Contact ${contactAddress} not found in thread ${threadId}`,
            'CONTACT_NOT_FOUND',
            404,
            { threadId, contactAddress }
          )
        }

        const selected = selectActionInstructions(actionType, thread.instructions)
        if (actionType !== 'delete_contact' && selected.length === 0) {
          throw new WorkflowServiceError(
            `Nothing to execute for ${actionType} in thread ${threadId}`,
            'NOTHING_TO_EXECUTE',
            400,
            { threadId, actionType }
          )
        }

        const recipients = actionType === 'delete_contact' && contactAddress ? [contactAddress] : collectRecipients(selected)
        const eventTypeName =
          actionType === 'schedule_meeting' || actionType === 'full_outreach'
            ? body.eventTypeName?.trim() || DEFAULT_EVENT_TYPE_NAME
            : undefined

        const details: PendingActionDetails = {
          threadId,
          generation: thread.generation,
          instructions: selected,
          recipients,
          emailSender: body.emailSender ?? thread.emailSender,
          meetingOrganizer: body.meetingOrganizer ?? thread.meetingOrganizer,
          ...(eventTypeName ? { eventTypeName } : {}),
          ...(actionType === 'delete_contact' && contactAddress ? { contactAddress } : {}),
        }
        const description = describeAction(actionType, thread.proposalTitle, {
          instructionCount: selected.length,
          recipientCount: recipients.length,
          contactAddress,
          eventTypeName,
        })

        const confirmation = confirmations.request(actionType, description, details)
        thread.addMessage('system', `Awaiting confirmation for ${confirmation.actionId}: ${description}`)
        return confirmation
      })
    },

    async confirmAction(actionId, body) {
      if (!validateConfirmAction(body)) {
        throw invalid(`Invalid confirmation: ${formatAjvErrors(validateConfirmAction.errors)}`)
      }

      const confirmation = requireAction(actionId)
      if (confirmation.confirmed || confirmation.rejected) {
        throw alreadyProcessed(confirmation)
      }

      if (!body.approved) {
        if (!confirmations.reject(actionId)) {
          throw alreadyProcessed(requireAction(actionId))
        }
        await noteOnThread(confirmation.details.threadId, (thread) => {
          thread.addMessage('system', `Action ${actionId} rejected`)
        })
        return {
          status: 'rejected',
          actionId,
          actionType: confirmation.actionType,
          threadId: confirmation.details.threadId,
        }
      }

      if (!confirmations.approve(actionId)) {
        throw alreadyProcessed(requireAction(actionId))
      }

      return confirmation.actionType === 'delete_contact'
        ? runApprovedDeletion(confirmation)
        : runApprovedBatch(confirmation)
    },

    async getStatus(threadId) {
      return requireThread(threadId, async (thread) => thread.toSnapshot())
    },

    async listThreads() {
      return threads.list()
    },

    async deleteThread(threadId) {
      if (!(await threads.delete(threadId))) {
        throw threadNotFound(threadId)
      }
      console.log(`[workflow] Thread ${threadId} deleted`)
      return { threadId, deleted: true }
    },

    getAction(actionId) {
      return requireAction(actionId)
    },

    listPendingActions() {
      return confirmations.listPending()
    },

    confirmationSummary() {
      return confirmations.summary()
    },

    sweepConfirmations() {
      return { removed: confirmations.sweep() }
    },
  }
}
