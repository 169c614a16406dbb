import { NextResponse } from 'next/server'

/** Domain error shape shared by the workflow and agent services */
interface ServiceErrorLike {
  message: string
  code: string
  status: number
  details?: Record<string, unknown>
}

const SERVICE_ERROR_NAMES = new Set(['WorkflowServiceError', 'AgentServiceError'])

function asServiceError(error: unknown): ServiceErrorLike | null {
  if (
    error instanceof Error &&
    SERVICE_ERROR_NAMES.has(error.name) &&
    'code' in error &&
    typeof error.code === 'string' &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    const details =
      'details' in error && typeof error.details === 'object' && error.details !== null
        ? { ...error.details }
        : undefined
    return { message: error.message, code: error.code, status: error.status, details }
  }
  return null
}

/** Parsed JSON body, or null when the body is missing or malformed */
export async function readJsonBody(request: Request): Promise<unknown> {
  return request.json().catch(() => null)
}

export function dataResponse<T>(data: T, status = 200) {
  return NextResponse.json({ data }, { status })
}

export function errorResponse(error: unknown, route: string, fallbackMessage: string) {
  const serviceError = asServiceError(error)
  if (serviceError) {
    return NextResponse.json(
      { error: serviceError.message, code: serviceError.code, details: serviceError.details },
      { status: serviceError.status }
    )
  }

  console.error(`[api/${route}] ${fallbackMessage}:`, error)
  return NextResponse.json(
    { error: error instanceof Error ? error.message : fallbackMessage, code: 'INTERNAL_ERROR' },
    { status: 500 }
  )
}
