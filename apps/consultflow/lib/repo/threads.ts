/**
 * Threads Repository
 *
 * In-memory thread store. Every read or write of a thread's state goes
 * through `withThread`, which holds that thread's lock for the duration.
 */

import type { ThreadSummary, WorkflowThread } from '@consultflow/core'
import { KeyedLock } from '../concurrency/keyed-lock'

// ============================================================================
// REPOSITORY INTERFACE
// ============================================================================

export interface ThreadsRepo {
  has(threadId: string): boolean
  /** Returns false when the id is already taken */
  insert(thread: WorkflowThread): boolean
  /** Runs `fn` under the thread lock; null when the thread does not exist */
  withThread<T>(threadId: string, fn: (thread: WorkflowThread) => Promise<T>): Promise<T | null>
  delete(threadId: string): Promise<boolean>
  list(): Promise<ThreadSummary[]>
}

// ============================================================================
// IN-MEMORY IMPLEMENTATION
// ============================================================================

export function createMemoryThreadsRepo(lock: KeyedLock = new KeyedLock()): ThreadsRepo {
  const threads = new Map<string, WorkflowThread>()

  const repo: ThreadsRepo = {
    has(threadId: string): boolean {
      return threads.has(threadId)
    },

    insert(thread: WorkflowThread): boolean {
      if (threads.has(thread.threadId)) return false
      threads.set(thread.threadId, thread)
      return true
    },

    async withThread<T>(threadId: string, fn: (thread: WorkflowThread) => Promise<T>): Promise<T | null> {
      return lock.run<T | null>(threadId, async () => {
        const thread = threads.get(threadId)
        if (!thread) return null
        return fn(thread)
      })
    },

    async delete(threadId: string): Promise<boolean> {
      return lock.run(threadId, async () => threads.delete(threadId))
    },

    async list(): Promise<ThreadSummary[]> {
      const ids = Array.from(threads.keys())
      const summaries = await Promise.all(ids.map((id) => repo.withThread(id, async (thread) => thread.summary())))
      return summaries
        .filter((summary): summary is ThreadSummary => summary !== null)
        .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
    },
  }

  return repo
}
