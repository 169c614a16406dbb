/**
 * Service Provider
 *
 * Wires configuration, adapters and repositories into the two services the
 * route handlers use. Built once per process; tests reset it.
 */

import { createAdapters, type OutreachAdapters } from '@consultflow/adapters'
import { loadConfig, type ConsultflowConfig } from '@/lib/config'
import { getRepos } from '@/lib/repo'
import { WorkflowExecutor } from '@/lib/workflows/executor'
import { createOutreachWorkflowService, type OutreachWorkflowService } from '@/lib/workflows/service'
import { createAgentConversationService, type AgentConversationService } from '@/lib/agents/service'

export interface Services {
  config: ConsultflowConfig
  adapters: OutreachAdapters
  workflows: OutreachWorkflowService
  agents: AgentConversationService
}

export function createServices(config: ConsultflowConfig = loadConfig()): Services {
  const repos = getRepos()
  const adapters = createAdapters(config.adapters)
  const defaults = { emailSender: config.emailSender, meetingOrganizer: config.meetingOrganizer }

  const executor = new WorkflowExecutor({
    emailSender: adapters.emailSender,
    calendar: adapters.calendar,
    chat: adapters.chat,
    defaults,
    timeoutMs: config.callTimeoutMs,
  })

  console.log(`[services] Adapter mode: ${adapters.mode}, email composer: ${adapters.composer.kind}`)

  return {
    config,
    adapters,
    workflows: createOutreachWorkflowService({
      threads: repos.threads,
      confirmations: repos.confirmations,
      executor,
      composer: adapters.composer,
      defaults: { ...defaults, slackChannel: config.slackChannel },
    }),
    agents: createAgentConversationService({
      conversations: repos.conversations,
      textGenerator: adapters.textGenerator,
      geoOracle: adapters.geoOracle,
    }),
  }
}

let servicesInstance: Services | null = null

export function getServices(): Services {
  if (!servicesInstance) {
    servicesInstance = createServices()
  }
  return servicesInstance
}

export function resetServices(): void {
  servicesInstance = null
}
