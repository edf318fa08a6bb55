import { z } from 'zod'
import { type Logger, noopLogger } from '../observability/log'
import {
  type Outcome,
  type WebResult,
  describeError,
  failure,
  success,
} from '../types'
import type { HttpClient } from './http'

export const GOOGLE_SEARCH_API_BASE = 'https://www.googleapis.com/customsearch/v1'

/** Results kept per search */
export const MAX_WEB_RESULTS = 3

const SearchResponseSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            title: z.string().optional(),
            link: z.string().optional(),
            snippet: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough()

export interface WebSearchSource {
  search(query: string): Promise<Outcome<WebResult[]>>
}

export interface WebSearchSourceConfig {
  http: HttpClient
  logger?: Logger
  apiKey?: string
  searchEngineId?: string
  baseUrl?: string
}

/**
 * Google Programmable Search. Returns at most {@link MAX_WEB_RESULTS}
 * results in the order the provider ranked them.
 */
export function createWebSearchSource(
  config: WebSearchSourceConfig
): WebSearchSource {
  const baseUrl = config.baseUrl ?? GOOGLE_SEARCH_API_BASE
  const logger = config.logger ?? noopLogger

  return {
    async search(query) {
      if (!config.apiKey || !config.searchEngineId) {
        return failure(
          'Web Search Error: Missing Google API key or Search Engine ID.'
        )
      }

      const url = new URL(baseUrl)
      url.searchParams.set('key', config.apiKey)
      url.searchParams.set('cx', config.searchEngineId)
      url.searchParams.set('q', query)

      try {
        const data = await config.http.getJson(url, SearchResponseSchema)
        const items = data.items ?? []
        return success(
          items.slice(0, MAX_WEB_RESULTS).map((item) => ({
            title: item.title ?? 'No Title',
            link: item.link ?? 'No Link',
            snippet: item.snippet ?? '',
          }))
        )
      } catch (error) {
        logger.error('Web search failed', {
          query,
          error: describeError(error),
        })
        return failure(`Web Search Error: ${describeError(error)}`)
      }
    },
  }
}
