/**
 * Governor - Policy table for outreach actions
 *
 * Defines risk level and instruction scope for every action that can be
 * requested against a thread. Every action waits for confirmation. This is
 * the single source of truth for "what an action touches".
 */

import type { ActionType, Instruction, InstructionType, RiskLevel } from '../types'
import { ACTION_TYPES } from '../types'

export type { ActionType, RiskLevel }

// ============================================================================
// TYPES
// ============================================================================

/** Policy for a single action */
export interface ActionPolicy {
  riskLevel: RiskLevel
  /** Instruction types executed on approval; empty for non-batch actions */
  instructionTypes: readonly InstructionType[]
  /** Action-specific parameter that must be present on request */
  requiredParam?: 'eventTypeName' | 'contactAddress'
  description: string
}

// ============================================================================
// POLICY DEFINITIONS
// ============================================================================

export const ACTION_POLICIES: Record<ActionType, ActionPolicy> = {
  send_email: {
    riskLevel: 'caution',
    instructionTypes: ['email'],
    description: 'Send outreach emails',
  },
  schedule_meeting: {
    riskLevel: 'caution',
    instructionTypes: ['meeting'],
    requiredParam: 'eventTypeName',
    description: 'Book stakeholder meetings',
  },
  full_outreach: {
    riskLevel: 'danger',
    instructionTypes: ['milestone', 'email', 'meeting', 'slack'],
    description: 'Run the full outreach workflow',
  },
  delete_contact: {
    riskLevel: 'danger',
    instructionTypes: [],
    requiredParam: 'contactAddress',
    description: 'Remove a stakeholder',
  },
}

export const DEFAULT_EVENT_TYPE_NAME = 'Consultation Meeting'

// ============================================================================
// HELPERS
// ============================================================================

const ACTION_TYPE_SET = new Set<string>(ACTION_TYPES)

export function isActionType(value: string): value is ActionType {
  return ACTION_TYPE_SET.has(value)
}

export function getActionPolicy(actionType: ActionType): ActionPolicy {
  return ACTION_POLICIES[actionType]
}

/**
 * Instructions an approved action would execute, in list order.
 */
export function selectActionInstructions(actionType: ActionType, instructions: Instruction[]): Instruction[] {
  const scope = ACTION_POLICIES[actionType].instructionTypes
  return instructions.filter((instruction) => scope.includes(instruction.type))
}

/**
 * Addresses an action reaches: email targets and meeting attendees.
 */
export function collectRecipients(instructions: Instruction[]): string[] {
  const recipients: string[] = []
  for (const instruction of instructions) {
    const address =
      instruction.type === 'email'
        ? instruction.target
        : instruction.type === 'meeting'
          ? instruction.metadata.attendeeEmail
          : undefined
    if (address && !recipients.includes(address)) {
      recipients.push(address)
    }
  }
  return recipients
}

/**
 * Human-readable description stored on the pending confirmation.
 */
export function describeAction(
  actionType: ActionType,
  proposalTitle: string,
  scope: { instructionCount: number; recipientCount: number; contactAddress?: string; eventTypeName?: string }
): string {
  switch (actionType) {
    case 'send_email':
      return `Send ${scope.instructionCount} email(s) for ${proposalTitle}`
    case 'schedule_meeting':
      return `Schedule ${scope.instructionCount} ${scope.eventTypeName ?? DEFAULT_EVENT_TYPE_NAME} meeting(s) for ${proposalTitle}`
    case 'full_outreach':
      return `Execute full outreach for ${proposalTitle}: ${scope.instructionCount} instruction(s) reaching ${scope.recipientCount} stakeholder(s)`
    case 'delete_contact':
      return `Remove ${scope.contactAddress ?? 'contact'} from ${proposalTitle}`
  }
}
