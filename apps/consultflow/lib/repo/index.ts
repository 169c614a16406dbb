export * from './provider'
export * from './types'
export type { ThreadsRepo } from './threads'
export type { ConfirmationsRepo } from './confirmations'
export type { AgentConversationsRepo } from './conversations'
export { createMemoryThreadsRepo } from './threads'
export { createMemoryConfirmationsRepo, isResolved } from './confirmations'
export { createMemoryConversationsRepo } from './conversations'
