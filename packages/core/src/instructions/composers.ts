/**
 * Email composers
 *
 * The instruction generator always goes through an EmailComposer. Whether
 * drafts come from the text generator or the template is decided when the
 * composer is built.
 */

import type { EmailComposer, EmailDraft, EmailDraftRequest, TextGenerator } from '../types'
import { templateEmailDraft } from './templates'

export const EMAIL_WRITER_SYSTEM_PROMPT =
  'You are a professional email writer for development proposal consultations. Generate clear, personalized emails.'

export function createTemplateEmailComposer(): EmailComposer {
  return {
    kind: 'template',
    async compose(request: EmailDraftRequest): Promise<EmailDraft> {
      return templateEmailDraft(request)
    },
  }
}

export function buildEmailPrompt(request: EmailDraftRequest): string {
  const expertise = request.context.trim() || request.role

  return `You are writing a professional consultation request email for a development project.

PROJECT DETAILS:
Title: ${request.proposalTitle}
Location: ${request.location}

SUSTAINABILITY ANALYSIS:
${request.sustainabilityContext}

INDIGENOUS PERSPECTIVES:
${request.indigenousContext}

RECIPIENT INFORMATION:
- Role/Title: ${request.role}
- Area of Expertise: ${expertise}
- Email: ${request.recipientAddress}

Write a personalized, professional email that:
1. Has a specific subject line mentioning the project location and their expertise area.
2. Greets them by role, introduces the project using the context above, explains why their expertise in "${expertise}" matters, lists 2-3 specific questions, and proposes a 30-minute consultation meeting.
3. Stays conversational but professional.

Format your response exactly as:
SUBJECT: [specific subject line]
BODY: [complete email body]`
}

/**
 * Parse a generated draft. Accepts `SUBJECT:` / `BODY:` markers, or a first
 * line subject followed by the body. Returns null when neither shape fits.
 */
export function parseEmailDraft(text: string): EmailDraft | null {
  const trimmed = text.trim()
  if (!trimmed) return null

  const subjectAt = trimmed.indexOf('SUBJECT:')
  const bodyAt = trimmed.indexOf('BODY:')
  if (subjectAt !== -1 && bodyAt > subjectAt) {
    const subject = trimmed
      .slice(subjectAt + 'SUBJECT:'.length, bodyAt)
      .trim()
      .split('\n')[0]
      .trim()
    const body = trimmed.slice(bodyAt + 'BODY:'.length).trim()
    return subject && body ? { subject, body } : null
  }

  const lines = trimmed.split('\n')
  if (lines.length < 2) return null
  const subject = lines[0].trim()
  const body = lines.slice(1).join('\n').trim()
  return subject && body ? { subject, body } : null
}

export function createSmartEmailComposer(
  generator: TextGenerator,
  fallback: EmailComposer = createTemplateEmailComposer()
): EmailComposer {
  return {
    kind: 'smart',
    async compose(request: EmailDraftRequest): Promise<EmailDraft> {
      try {
        const response = await generator.ask(EMAIL_WRITER_SYSTEM_PROMPT, buildEmailPrompt(request))
        const draft = parseEmailDraft(response)
        if (!draft) {
          throw new Error('Unparsable email draft')
        }
        return draft
      } catch (error) {
        console.warn(
          `[composer] Email draft for ${request.recipientAddress} fell back to template:`,
          error instanceof Error ? error.message : String(error)
        )
        return fallback.compose(request)
      }
    },
  }
}
