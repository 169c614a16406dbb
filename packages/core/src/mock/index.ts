/**
 * Starter fixtures
 *
 * Example stakeholders seeded into a new thread on request, so a fresh
 * workflow shows every instruction type.
 */

import type { EngagementType } from '../types'

export interface StarterStakeholder {
  address: string
  role: string
  context: string
  engagement: EngagementType
}

/**
 * "Toronto, ON" → "Toronto"
 */
export function locationName(location: string): string {
  const [first] = location.split(',')
  return (first ?? location).trim() || location
}

export function starterStakeholders(location: string): StarterStakeholder[] {
  return [
    {
      address: 'sustainability.lead@example.ca',
      role: 'Sustainability Lead',
      context: 'Oversee environmental compliance and green initiatives',
      engagement: 'both',
    },
    {
      address: 'indigenous.relations@example.ca',
      role: 'Indigenous Relations Officer',
      context: 'Ensure consultation and respect for traditional land stewardship',
      engagement: 'both',
    },
    {
      address: 'community.liaison@example.ca',
      role: 'Community Liaison',
      context: `Coordinate with ${locationName(location)} residents and local stakeholders`,
      engagement: 'both',
    },
  ]
}
