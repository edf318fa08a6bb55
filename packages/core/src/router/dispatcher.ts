import { ZodError } from 'zod'
import { type AgentType, isAgentType } from '../agents/registry'
import type { DataSources } from '../data-sources'
import { HttpError, HttpTimeoutError } from '../data-sources/http'
import type { LanguageModelClient } from '../llm/client'
import type { Logger } from '../observability/log'
import { type Outcome, type RoutedQuery, describeError } from '../types'
import { cleanQuery } from './query'

export const NO_RESULTS_MESSAGE = 'No relevant results found.'

export interface DispatcherDeps {
  sources: DataSources
  llm: Pick<LanguageModelClient, 'summarize'>
  logger: Logger
}

export interface Dispatcher {
  /** Display text for one routed turn. Never throws. */
  route(routed: RoutedQuery): Promise<string>
}

function assertNever(value: never): never {
  throw new Error(`Unhandled agent type: ${String(value)}`)
}

const display = (outcome: Outcome<string>): string =>
  outcome.ok ? outcome.value : outcome.message

/**
 * Classify an error that escaped a data source into the notice shown to
 * the user.
 */
export function describeEscapedError(error: unknown): string {
  if (
    error instanceof HttpError ||
    error instanceof HttpTimeoutError ||
    (error instanceof TypeError && error.message === 'fetch failed')
  ) {
    return `Network error - ${error.message}`
  }
  if (error instanceof ZodError) {
    const fields = error.issues.map((issue) => issue.path.join('.')).join(', ')
    return `Data parsing error - missing ${fields || 'fields'}`
  }
  return `Unexpected error - ${describeError(error)}`
}

export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { sources, llm, logger } = deps

  async function renderWebResults(query: string): Promise<string> {
    const outcome = await sources.webSearch.search(query)
    if (!outcome.ok) return outcome.message
    if (outcome.value.length === 0) return NO_RESULTS_MESSAGE

    const results = outcome.value
    const summary = await llm.summarize(query, results)
    const lines = [
      `Here's what I found about ${query}:`,
      display(summary),
      '',
      'Sources:',
      ...results.map(
        (result, index) => `${index + 1}. ${result.title}\n   ${result.link}`
      ),
    ]
    return lines.join('\n')
  }

  async function invoke(agentType: AgentType, query: string): Promise<string> {
    switch (agentType) {
      case 'crypto_asset':
        return display(await sources.crypto.price(query))
      case 'stock_asset':
        return display(await sources.stock.quote(query))
      case 'weather_asset':
        return display(await sources.weather.current(query))
      case 'web_asset':
        return renderWebResults(query)
      default:
        return assertNever(agentType)
    }
  }

  return {
    async route(routed) {
      const query = cleanQuery(routed.rawQuery)

      if (!routed.agentType) {
        return routed.rawQuery
      }

      if (!isAgentType(routed.agentType)) {
        logger.warn('Unknown agent type', { agentType: routed.agentType })
        return `Unknown agent type: ${routed.agentType}`
      }

      try {
        return await invoke(routed.agentType, query)
      } catch (error) {
        logger.error('Dispatch failed', {
          agentType: routed.agentType,
          error: describeError(error),
        })
        return describeEscapedError(error)
      }
    },
  }
}
