/**
 * Stakeholder Registry
 *
 * Per-thread map of contact address → role, context and engagement type.
 * Addresses are exact string keys (no case folding). Iteration follows
 * insertion order; re-adding an address keeps its original position.
 */

import type { EngagementType, Stakeholder } from '../types'

export class StakeholderRegistry {
  private readonly entries = new Map<string, Stakeholder>()

  constructor(
    initial: Iterable<Stakeholder> = [],
    private readonly now: () => string = () => new Date().toISOString()
  ) {
    for (const stakeholder of initial) {
      this.entries.set(stakeholder.address, { ...stakeholder })
    }
  }

  get size(): number {
    return this.entries.size
  }

  has(address: string): boolean {
    return this.entries.has(address)
  }

  get(address: string): Stakeholder | null {
    const entry = this.entries.get(address)
    return entry ? { ...entry } : null
  }

  upsert(
    address: string,
    role: string,
    context = '',
    engagement: EngagementType = 'both'
  ): Stakeholder {
    const stakeholder: Stakeholder = {
      address,
      role,
      context,
      engagement,
      addedAt: this.now(),
    }
    this.entries.set(address, stakeholder)
    return { ...stakeholder }
  }

  /**
   * Returns false when the address was not registered.
   */
  remove(address: string): boolean {
    return this.entries.delete(address)
  }

  /**
   * Replace every entry, keeping the given timestamps and order.
   */
  load(stakeholders: Iterable<Stakeholder>): void {
    this.entries.clear()
    for (const stakeholder of stakeholders) {
      this.entries.set(stakeholder.address, { ...stakeholder })
    }
  }

  list(): Stakeholder[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }))
  }
}
