export class AdapterHttpError extends Error {
  constructor(
    readonly service: string,
    readonly status: number,
    detail: string
  ) {
    super(`${service} responded with HTTP ${status}${detail ? `: ${detail}` : ''}`)
    this.name = 'AdapterHttpError'
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function bearerHeaders(token: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    Authorization: `Bearer ${token}`,
  }
}

/**
 * Read a JSON object body, throwing on non-2xx responses.
 */
export async function readJsonObject(res: Response, service: string): Promise<Record<string, unknown>> {
  if (!res.ok) {
    const detail = await res.text().catch(() => '')
    throw new AdapterHttpError(service, res.status, detail.slice(0, 200))
  }
  const data: unknown = await res.json()
  if (!isRecord(data)) {
    throw new Error(`${service} returned a non-object response`)
  }
  return data
}

export function readString(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key]
  return typeof value === 'string' ? value : undefined
}
