import type { GeoScore, GeoScoringOracle } from '@consultflow/core'
import { isRecord, readJsonObject } from './http'

function numberRecord(value: unknown): Record<string, number> {
  const out: Record<string, number> = {}
  if (!isRecord(value)) return out
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'number') out[key] = entry
  }
  return out
}

/**
 * Normalise a scoring response. Accepts the payload wrapped in
 * `sustainability` or bare, with snake_case or camelCase keys.
 */
export function parseGeoScore(data: Record<string, unknown>): GeoScore {
  const body = isRecord(data.sustainability) ? data.sustainability : data
  const total = body.total_score ?? body.totalScore
  if (typeof total !== 'number') {
    throw new Error('Geo scoring response is missing total_score')
  }
  const features = body.nearest_features ?? body.nearestFeatures
  const recommendations = body.recommendations

  return {
    totalScore: total,
    componentScores: numberRecord(body.component_scores ?? body.componentScores),
    nearestFeatures: isRecord(features) ? { ...features } : {},
    recommendations: Array.isArray(recommendations)
      ? recommendations.filter((r): r is string => typeof r === 'string')
      : [],
  }
}

export class HttpGeoScoringOracle implements GeoScoringOracle {
  constructor(private readonly baseUrl: string) {}

  async score(latitude: number, longitude: number): Promise<GeoScore> {
    const base = this.baseUrl.replace(/\/+$/, '')
    const res = await fetch(`${base}/api/sustainability/analyze/${latitude}/${longitude}`)
    return parseGeoScore(await readJsonObject(res, 'Geo scoring'))
  }
}
