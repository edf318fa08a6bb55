import { type AgentType, isAgentType } from '../agents/registry'
import type { RouterConfig } from '../config/env'
import {
  type DataSources,
  createDataSources,
  createHttpClient,
} from '../data-sources'
import {
  type LanguageModelClient,
  createLanguageModelClient,
} from '../llm/client'
import { type Logger, noopLogger } from '../observability/log'
import { createDispatcher } from './dispatcher'
import { parseModelResponse } from './parser'
import { cleanQuery } from './query'

export interface TurnResult {
  reply: string
  /** Validated agent the turn was routed to, `null` for general answers and errors */
  agentType: AgentType | null
  query: string
}

export interface IntentRouter {
  handle(utterance: string): Promise<TurnResult>
}

export interface IntentRouterOptions {
  config: RouterConfig
  logger?: Logger
  llm?: LanguageModelClient
  sources?: DataSources
  onRoute?: (agentType: AgentType, query: string) => void
}

/**
 * Wire the language-model client, data sources and dispatcher from a single
 * configuration object. One `handle()` call is one turn:
 * classify -> parse -> dispatch.
 */
export function createIntentRouter(options: IntentRouterOptions): IntentRouter {
  const logger = options.logger ?? noopLogger
  const llm =
    options.llm ??
    createLanguageModelClient({
      llm: options.config.llm,
      timeoutMs: options.config.timeoutMs,
      logger,
    })
  const sources =
    options.sources ??
    createDataSources(
      options.config,
      createHttpClient({ timeoutMs: options.config.timeoutMs }),
      logger
    )
  const dispatcher = createDispatcher({ sources, llm, logger })

  return {
    async handle(utterance) {
      const classified = await llm.classify(utterance)
      if (!classified.ok) {
        return { reply: classified.message, agentType: null, query: '' }
      }

      const routed = parseModelResponse(classified.value, logger)
      const query = cleanQuery(routed.rawQuery)
      const agentType =
        routed.agentType && isAgentType(routed.agentType)
          ? routed.agentType
          : null

      logger.debug('Routed utterance', {
        agentType: routed.agentType,
        query,
      })
      if (agentType) options.onRoute?.(agentType, query)

      const reply = await dispatcher.route(routed)
      return { reply, agentType, query }
    },
  }
}
