/**
 * Instruction text templates
 *
 * Pure builders for milestone, email, meeting and notification text.
 * Nothing here reads the clock, so identical input gives identical text.
 */

import type { EmailDraft, EmailDraftRequest, ProposalContext, OutreachConfig, Stakeholder } from '../types'

/**
 * Capitalize the first letter of every letter run: "water-rights" → "Water-Rights"
 */
export function titleCase(word: string): string {
  return word
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase())
}

/**
 * First word of a consultation context, title-cased, used in subjects.
 */
export function contextHeadline(context: string): string {
  const [first] = context.trim().split(/\s+/)
  return titleCase(first ?? '')
}

function orPlaceholder(text: string): string {
  return text.trim() ? text.trim() : '(not provided)'
}

// ============================================================================
// MILESTONE
// ============================================================================

export function milestoneSubject(proposal: ProposalContext): string {
  return `Workflow Plan: ${proposal.proposalTitle}`
}

export function milestoneBody(
  proposal: ProposalContext,
  config: OutreachConfig,
  stakeholders: Stakeholder[],
  counts: { emails: number; meetings: number }
): string {
  const lines = [
    `PROPOSAL SYNTHESIS FOR: ${proposal.proposalTitle}`,
    `Location: ${proposal.location}`,
    '',
    '=== SUSTAINABILITY INSIGHTS ===',
    orPlaceholder(proposal.sustainabilityContext),
    '',
    '=== INDIGENOUS PERSPECTIVES ===',
    orPlaceholder(proposal.indigenousContext),
    '',
    `=== STAKEHOLDERS (${stakeholders.length}) ===`,
  ]

  if (stakeholders.length === 0) {
    lines.push('(none yet)')
  }
  for (const stakeholder of stakeholders) {
    lines.push(`• ${stakeholder.role} (${stakeholder.address})`)
  }

  lines.push(
    '',
    '=== ACTION PLAN ===',
    `Emails planned: ${counts.emails}`,
    `Meetings planned: ${counts.meetings}`,
    `All emails sent from: ${config.emailSender}`,
    `All meetings scheduled for: ${config.meetingOrganizer}`
  )

  return lines.join('\n').trim()
}

// ============================================================================
// EMAIL
// ============================================================================

export function templateEmailDraft(request: EmailDraftRequest): EmailDraft {
  const context = request.context.trim()
  const opening = `I'm reaching out regarding ${request.proposalTitle} at ${request.location}.`

  if (context) {
    return {
      subject: `${request.proposalTitle} - ${contextHeadline(context)} Consultation`,
      body: [
        `Hi ${request.role},`,
        '',
        opening,
        '',
        `Your expertise in ${context} would be invaluable. The project integrates sustainable development with Indigenous land stewardship.`,
        '',
        "I'd like to discuss your insights. Are you available for a 30-minute consultation?",
        '',
        'Best regards',
      ].join('\n'),
    }
  }

  return {
    subject: `Consultation: ${request.proposalTitle}`,
    body: [
      `Hi ${request.role},`,
      '',
      opening,
      '',
      "Your perspective would be valuable. I'd like to schedule a consultation.",
      '',
      'Best regards',
    ].join('\n'),
  }
}

// ============================================================================
// MEETING
// ============================================================================

export function meetingSubject(proposal: ProposalContext, stakeholder: Stakeholder): string {
  const context = stakeholder.context.trim()
  if (context) {
    return `${proposal.proposalTitle} - ${contextHeadline(context)} Discussion with ${stakeholder.role}`
  }
  return `${proposal.proposalTitle} - ${stakeholder.role} Consultation`
}

export function meetingBody(stakeholder: Stakeholder, durationMinutes: number): string {
  const context = stakeholder.context.trim()
  const header = `${durationMinutes}-minute consultation with ${stakeholder.role} (${stakeholder.address})`
  const footer = 'Location: Video call or in-person (TBD)'

  if (context) {
    return [
      header,
      '',
      `Topic: ${context}`,
      '',
      'Agenda:',
      '- Review project scope and timeline',
      `- Discuss ${context} requirements and recommendations`,
      '- Identify potential challenges and solutions',
      '- Next steps and deliverables',
      '',
      footer,
    ].join('\n')
  }

  return [
    header,
    '',
    'Agenda:',
    '- Project overview and objectives',
    '- Stakeholder input and expertise',
    '- Collaboration opportunities',
    '- Next steps',
    '',
    footer,
  ].join('\n')
}

// ============================================================================
// NOTIFICATION
// ============================================================================

export function notificationSubject(proposal: ProposalContext): string {
  return `Workflow Initiated: ${proposal.proposalTitle}`
}

export function notificationBody(
  proposal: ProposalContext,
  stakeholders: Stakeholder[],
  counts: { emails: number; meetings: number }
): string {
  return [
    `Outreach workflow launched for ${proposal.proposalTitle}`,
    `Location: ${proposal.location}`,
    `Stakeholders (${stakeholders.length}): ${stakeholders.map((s) => s.role).join(', ')}`,
    `Emails to send: ${counts.emails}`,
    `Meetings to schedule: ${counts.meetings}`,
  ].join('\n')
}
