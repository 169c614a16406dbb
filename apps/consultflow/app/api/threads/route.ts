import { getServices } from '@/lib/services/provider'
import { dataResponse, errorResponse, readJsonBody } from '@/lib/http/responses'

/**
 * GET /api/threads
 * Summaries of every thread, most recently updated first.
 */
export async function GET() {
  try {
    const threads = await getServices().workflows.listThreads()
    return dataResponse(threads)
  } catch (error) {
    return errorResponse(error, 'threads', 'Failed to list threads')
  }
}

/**
 * POST /api/threads
 * Create a thread and generate its first instruction list.
 */
export async function POST(request: Request) {
  const body = await readJsonBody(request)
  try {
    const snapshot = await getServices().workflows.initializeThread(body)
    return dataResponse(snapshot, 201)
  } catch (error) {
    return errorResponse(error, 'threads', 'Failed to initialize thread')
  }
}
