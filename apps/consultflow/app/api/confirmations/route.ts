import { getServices } from '@/lib/services/provider'
import { dataResponse, errorResponse } from '@/lib/http/responses'

/**
 * GET /api/confirmations
 * Pending actions plus counts by state.
 */
export async function GET() {
  try {
    const { workflows } = getServices()
    return dataResponse({
      pending: workflows.listPendingActions(),
      summary: workflows.confirmationSummary(),
    })
  } catch (error) {
    return errorResponse(error, 'confirmations', 'Failed to list confirmations')
  }
}

/**
 * DELETE /api/confirmations
 * Drop approved and rejected records.
 */
export async function DELETE() {
  try {
    return dataResponse(getServices().workflows.sweepConfirmations())
  } catch (error) {
    return errorResponse(error, 'confirmations', 'Failed to sweep confirmations')
  }
}
