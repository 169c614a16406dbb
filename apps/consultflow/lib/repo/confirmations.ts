/**
 * Confirmations Repository
 *
 * Two-phase gate for side-effecting actions. Each record moves from
 * pending to exactly one of confirmed or rejected, and never back.
 * approve/reject are synchronous, so two concurrent resolutions of the same
 * action cannot both succeed. Resolving does not execute anything.
 */

import { randomBytes } from 'node:crypto'
import { getActionPolicy } from '@consultflow/core'
import type {
  ActionType,
  ConfirmationSummary,
  Instruction,
  PendingActionDetails,
  PendingConfirmation,
} from '@consultflow/core'
import type { ConfirmationAuditDTO } from './types'

// ============================================================================
// REPOSITORY INTERFACE
// ============================================================================

export interface ConfirmationsRepo {
  request(actionType: ActionType, description: string, details: PendingActionDetails): PendingConfirmation
  /** False when the id is unknown or already resolved */
  approve(actionId: string): boolean
  /** False when the id is unknown or already resolved */
  reject(actionId: string): boolean
  get(actionId: string): PendingConfirmation | null
  /** Store executed instruction statuses on an approved record's snapshot */
  recordExecution(actionId: string, instructions: Instruction[]): boolean
  listPending(): PendingConfirmation[]
  summary(): ConfirmationSummary
  audit(): ConfirmationAuditDTO
  /** Drops resolved records; pending ones are kept. Returns the number removed. */
  sweep(): number
}

export function isResolved(confirmation: PendingConfirmation): boolean {
  return confirmation.confirmed || confirmation.rejected
}

function newActionId(actionType: ActionType): string {
  return `${actionType}_${randomBytes(4).toString('hex')}`
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

export function createMemoryConfirmationsRepo(
  now: () => string = () => new Date().toISOString()
): ConfirmationsRepo {
  const records = new Map<string, PendingConfirmation>()
  const executedIds: string[] = []
  const rejectedIds: string[] = []

  const resolve = (actionId: string, outcome: 'confirmed' | 'rejected'): boolean => {
    const record = records.get(actionId)
    if (!record || isResolved(record)) return false

    record[outcome] = true
    record.resolvedAt = now()
    if (outcome === 'confirmed') {
      executedIds.push(actionId)
    } else {
      rejectedIds.push(actionId)
    }
    console.log(`[confirmations] ${actionId} ${outcome}`)
    return true
  }

  const repo: ConfirmationsRepo = {
    request(actionType, description, details) {
      let actionId = newActionId(actionType)
      while (records.has(actionId)) {
        actionId = newActionId(actionType)
      }

      const record: PendingConfirmation = {
        actionId,
        actionType,
        riskLevel: getActionPolicy(actionType).riskLevel,
        description,
        details: structuredClone(details),
        confirmed: false,
        rejected: false,
        createdAt: now(),
        resolvedAt: null,
      }
      records.set(actionId, record)
      console.log(`[confirmations] ${actionId} requested: ${description}`)
      return structuredClone(record)
    },

    approve(actionId) {
      return resolve(actionId, 'confirmed')
    },

    reject(actionId) {
      return resolve(actionId, 'rejected')
    },

    get(actionId) {
      const record = records.get(actionId)
      return record ? structuredClone(record) : null
    },

    recordExecution(actionId, instructions) {
      const record = records.get(actionId)
      if (!record || !record.confirmed) return false
      record.details.instructions = structuredClone(instructions)
      return true
    },

    listPending() {
      return Array.from(records.values())
        .filter((record) => !isResolved(record))
        .map((record) => structuredClone(record))
    },

    summary() {
      const pending = repo.listPending()
      return {
        pendingCount: pending.length,
        executedCount: executedIds.length,
        rejectedCount: rejectedIds.length,
        pending,
      }
    },

    audit() {
      return { executedIds: [...executedIds], rejectedIds: [...rejectedIds] }
    },

    sweep() {
      let removed = 0
      for (const [actionId, record] of records) {
        if (isResolved(record)) {
          records.delete(actionId)
          removed += 1
        }
      }
      if (removed > 0) {
        console.log(`[confirmations] Swept ${removed} resolved record(s)`)
      }
      return removed
    },
  }

  return repo
}
