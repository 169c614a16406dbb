import Ajv, { type ErrorObject } from 'ajv'
import {
  AGENT_MESSAGE_SCHEMA,
  CONFIRM_ACTION_SCHEMA,
  INITIALIZE_THREAD_SCHEMA,
  POST_MESSAGE_SCHEMA,
  REQUEST_ACTION_SCHEMA,
  START_CONVERSATION_SCHEMA,
  UPDATE_CONFIG_SCHEMA,
  type ConfirmActionBody,
  type InitializeThreadBody,
  type PostMessageBody,
  type RequestActionBody,
  type StartConversationBody,
  type UpdateConfigBody,
} from '@consultflow/core'

const ajv = new Ajv({ allErrors: true })
export const validateInitializeThread = ajv.compile<InitializeThreadBody>(INITIALIZE_THREAD_SCHEMA)
export const validatePostMessage = ajv.compile<PostMessageBody>(POST_MESSAGE_SCHEMA)
export const validateUpdateConfig = ajv.compile<UpdateConfigBody>(UPDATE_CONFIG_SCHEMA)
export const validateRequestAction = ajv.compile<RequestActionBody>(REQUEST_ACTION_SCHEMA)
export const validateConfirmAction = ajv.compile<ConfirmActionBody>(CONFIRM_ACTION_SCHEMA)
export const validateStartConversation = ajv.compile<StartConversationBody>(START_CONVERSATION_SCHEMA)
export const validateAgentMessage = ajv.compile<PostMessageBody>(AGENT_MESSAGE_SCHEMA)

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown validation error'
  return errors
    .map((error) => {
      const at = error.instancePath ? ` at ${error.instancePath}` : ''
      const msg = error.message ?? 'invalid value'
      return `${msg}${at}`
    })
    .join('; ')
}
