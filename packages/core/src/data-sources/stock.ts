import { z } from 'zod'
import { type Logger, noopLogger } from '../observability/log'
import { type Outcome, describeError, failure, success } from '../types'
import type { HttpClient } from './http'

export const ALPHAVANTAGE_API_BASE = 'https://www.alphavantage.co'

const GlobalQuoteSchema = z
  .object({
    'Global Quote': z
      .object({ '05. price': z.string().optional() })
      .passthrough()
      .optional(),
  })
  .passthrough()

export interface StockQuoteSource {
  quote(symbol: string): Promise<Outcome<string>>
}

export interface StockQuoteSourceConfig {
  http: HttpClient
  logger?: Logger
  apiKey?: string
  baseUrl?: string
}

/**
 * Latest trade price from Alpha Vantage's GLOBAL_QUOTE endpoint.
 */
export function createStockQuoteSource(
  config: StockQuoteSourceConfig
): StockQuoteSource {
  const baseUrl = (config.baseUrl ?? ALPHAVANTAGE_API_BASE).replace(/\/$/, '')
  const logger = config.logger ?? noopLogger

  return {
    async quote(query) {
      const symbol = query.trim().toUpperCase()
      if (!config.apiKey) {
        return failure('Stock API Error: Missing API key.')
      }

      const url = new URL(`${baseUrl}/query`)
      url.searchParams.set('function', 'GLOBAL_QUOTE')
      url.searchParams.set('symbol', symbol)
      url.searchParams.set('apikey', config.apiKey)

      try {
        const data = await config.http.getJson(url, GlobalQuoteSchema)
        const price = data['Global Quote']?.['05. price']
        if (!price) {
          return failure(`Stock data not available for ${symbol}.`)
        }
        return success(`${symbol}: $${price}`)
      } catch (error) {
        logger.error('Stock lookup failed', {
          symbol,
          error: describeError(error),
        })
        return failure(`Stock API Error: ${describeError(error)}`)
      }
    },
  }
}
