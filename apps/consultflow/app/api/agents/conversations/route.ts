import { getServices } from '@/lib/services/provider'
import { dataResponse, errorResponse, readJsonBody } from '@/lib/http/responses'

export async function GET() {
  try {
    return dataResponse(getServices().agents.listConversations())
  } catch (error) {
    return errorResponse(error, 'agents/conversations', 'Failed to list conversations')
  }
}

/**
 * POST /api/agents/conversations
 * Start a conversation; the agent greets first.
 */
export async function POST(request: Request) {
  const body = await readJsonBody(request)
  try {
    return dataResponse(getServices().agents.startConversation(body), 201)
  } catch (error) {
    return errorResponse(error, 'agents/conversations', 'Failed to start conversation')
  }
}
