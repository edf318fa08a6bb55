/**
 * @intent-router/core
 *
 * Routes free-text requests to data sources via a language-model
 * classifier.
 */

// Agents
export {
  AGENTS,
  AGENT_TYPES,
  isAgentType,
} from './agents/registry'
export type { AgentDescriptor, AgentType } from './agents/registry'

// Config
export {
  ConfigError,
  DEFAULT_LLM_BASE_URL,
  DEFAULT_LLM_MODEL,
  MAX_TIMEOUT_MS,
  loadConfig,
} from './config/env'
export type { RouterConfig, RuntimeEnv } from './config/env'

// Data sources
export { createDataSources } from './data-sources'
export type { DataSources } from './data-sources'

// LLM
export { createLanguageModelClient } from './llm/client'
export type { LanguageModelClient } from './llm/client'

// Observability
export { createLogger, noopLogger } from './observability/log'
export type { Logger, LogLevel, LoggerOptions } from './observability/log'

// Router
export { NO_RESULTS_MESSAGE, createDispatcher } from './router/dispatcher'
export type { Dispatcher } from './router/dispatcher'
export { parseModelResponse } from './router/parser'
export { createIntentRouter } from './router/pipeline'
export type { IntentRouter, TurnResult } from './router/pipeline'
export { cleanQuery } from './router/query'

// Shared types
export { failure, success } from './types'
export type { Outcome, RoutedQuery, WebResult } from './types'
