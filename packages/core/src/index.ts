/**
 * @consultflow/core
 *
 * Shared domain types, instruction generation, chat intent parsing,
 * thread model, action policies, validation schemas and invariants
 * for the consultflow system.
 */

export * from './types'
export * from './invariants'
export * from './stakeholders'
export * from './instructions'
export * from './intents'
export * from './threads'
export * from './governor'
export * from './schemas'
export * from './mock'
