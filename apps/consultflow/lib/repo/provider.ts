/**
 * Repository Provider
 *
 * Single entry point for repository creation. All repositories are
 * in-memory; a durable store can be added behind the same interfaces.
 */

import { createMemoryThreadsRepo, type ThreadsRepo } from './threads'
import { createMemoryConfirmationsRepo, type ConfirmationsRepo } from './confirmations'
import { createMemoryConversationsRepo, type AgentConversationsRepo } from './conversations'

// ============================================================================
// REPOSITORY CONTAINER
// ============================================================================

export interface Repos {
  threads: ThreadsRepo
  confirmations: ConfirmationsRepo
  conversations: AgentConversationsRepo
}

// ============================================================================
// PROVIDER
// ============================================================================

// Track if we've logged the data mode (prevents spam on hot reload)
let hasLoggedMode = false

export function createRepos(): Repos {
  if (!hasLoggedMode) {
    console.log('[repo] Data mode: in-memory')
    hasLoggedMode = true
  }

  return {
    threads: createMemoryThreadsRepo(),
    confirmations: createMemoryConfirmationsRepo(),
    conversations: createMemoryConversationsRepo(),
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let reposInstance: Repos | null = null

/**
 * Get the singleton repository instance.
 * Creates on first call, reuses on subsequent calls.
 */
export function getRepos(): Repos {
  if (!reposInstance) {
    reposInstance = createRepos()
  }
  return reposInstance
}

/**
 * Reset the singleton (useful for testing)
 */
export function resetRepos(): void {
  reposInstance = null
}
