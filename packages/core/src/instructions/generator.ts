/**
 * Instruction Generator
 *
 * Rebuilds a thread's full instruction list from its state. There is no
 * incremental patching: every call starts from an empty list and a fresh
 * id counter.
 *
 * Emission order:
 * 1. one milestone
 * 2. per stakeholder (insertion order): email, then meeting, as the
 *    engagement type allows
 * 3. one notification when at least one stakeholder exists
 */

import {
  includesEmail,
  includesMeeting,
  type EmailComposer,
  type Instruction,
  type InstructionMetadata,
  type InstructionType,
  type OutreachConfig,
  type ProposalContext,
  type Stakeholder,
} from '../types'
import {
  DEFAULT_MEETING_MINUTES,
  DEFAULT_NOTIFICATION_CHANNEL,
  MILESTONE_TARGET,
  formatInstructionId,
} from '../invariants'
import {
  meetingBody,
  meetingSubject,
  milestoneBody,
  milestoneSubject,
  notificationBody,
  notificationSubject,
} from './templates'

export interface GenerationInput extends ProposalContext, OutreachConfig {
  stakeholders: Stakeholder[]
}

export interface GenerationOptions {
  notificationChannel?: string
  meetingMinutes?: number
}

export function countPlannedOutreach(stakeholders: Stakeholder[]): { emails: number; meetings: number } {
  let emails = 0
  let meetings = 0
  for (const stakeholder of stakeholders) {
    if (includesEmail(stakeholder.engagement)) emails += 1
    if (includesMeeting(stakeholder.engagement)) meetings += 1
  }
  return { emails, meetings }
}

export async function regenerateInstructions(
  input: GenerationInput,
  composer: EmailComposer,
  options: GenerationOptions = {}
): Promise<Instruction[]> {
  const channel = options.notificationChannel ?? DEFAULT_NOTIFICATION_CHANNEL
  const durationMinutes = options.meetingMinutes ?? DEFAULT_MEETING_MINUTES
  const counts = countPlannedOutreach(input.stakeholders)

  const instructions: Instruction[] = []
  const emit = (
    type: InstructionType,
    target: string,
    subject: string,
    body: string,
    metadata: InstructionMetadata = {}
  ) => {
    instructions.push({
      id: formatInstructionId(type, instructions.length + 1),
      type,
      target,
      subject,
      body: body.trim(),
      status: 'pending',
      metadata,
    })
  }

  emit('milestone', MILESTONE_TARGET, milestoneSubject(input), milestoneBody(input, input, input.stakeholders, counts))

  for (const stakeholder of input.stakeholders) {
    if (includesEmail(stakeholder.engagement)) {
      const draft = await composer.compose({
        proposalTitle: input.proposalTitle,
        location: input.location,
        sustainabilityContext: input.sustainabilityContext,
        indigenousContext: input.indigenousContext,
        recipientAddress: stakeholder.address,
        role: stakeholder.role,
        context: stakeholder.context,
      })
      emit('email', stakeholder.address, draft.subject, draft.body, {
        role: stakeholder.role,
        context: stakeholder.context,
      })
    }

    if (includesMeeting(stakeholder.engagement)) {
      emit(
        'meeting',
        input.meetingOrganizer,
        meetingSubject(input, stakeholder),
        meetingBody(stakeholder, durationMinutes),
        {
          attendeeEmail: stakeholder.address,
          attendeeRole: stakeholder.role,
          durationMinutes,
          context: stakeholder.context,
        }
      )
    }
  }

  if (input.stakeholders.length > 0) {
    emit('slack', channel, notificationSubject(input), notificationBody(input, input.stakeholders, counts), {
      stakeholderCount: input.stakeholders.length,
      emailCount: counts.emails,
      meetingCount: counts.meetings,
    })
  }

  return instructions
}
