import { z } from 'zod'
import { type Logger, noopLogger } from '../observability/log'
import { type Outcome, describeError, failure, success } from '../types'
import { capitalize } from './format'
import { HttpError, type HttpClient, errorField } from './http'

export const COINGECKO_API_BASE = 'https://api.coingecko.com/api/v3'

export const INVALID_COIN_MESSAGE =
  "Invalid cryptocurrency format - use names like 'bitcoin' not symbols."

const COIN_ID_PATTERN = /^[a-z-]+$/

const SimplePriceSchema = z.record(
  z.string(),
  z.object({ usd: z.number().nullish() }).passthrough()
)

export interface CryptoPriceSource {
  price(coinId: string): Promise<Outcome<string>>
}

export interface CryptoPriceSourceConfig {
  http: HttpClient
  logger?: Logger
  baseUrl?: string
}

/**
 * USD spot price by CoinGecko coin id ("bitcoin", "bitcoin-cash").
 * Ticker symbols and anything outside lower-case letters and hyphens are
 * rejected before any request is made.
 */
export function createCryptoPriceSource(
  config: CryptoPriceSourceConfig
): CryptoPriceSource {
  const baseUrl = (config.baseUrl ?? COINGECKO_API_BASE).replace(/\/$/, '')
  const logger = config.logger ?? noopLogger

  return {
    async price(query) {
      const coinId = query.trim()
      if (!COIN_ID_PATTERN.test(coinId)) {
        return failure(INVALID_COIN_MESSAGE)
      }

      const url = new URL(`${baseUrl}/simple/price`)
      url.searchParams.set('ids', coinId)
      url.searchParams.set('vs_currencies', 'usd')

      try {
        const data = await config.http.getJson(url, SimplePriceSchema)
        const entry = data[coinId]
        if (!entry) {
          return failure(`Unknown cryptocurrency: ${coinId}`)
        }
        if (entry.usd === null || entry.usd === undefined) {
          return failure(`Price data not available for ${coinId}`)
        }
        return success(`${capitalize(coinId)}: $${entry.usd}`)
      } catch (error) {
        logger.error('Crypto lookup failed', {
          coinId,
          error: describeError(error),
        })
        if (error instanceof HttpError) {
          const reason = errorField(error.body, 'error') ?? 'Unknown error'
          return failure(`Crypto API Error: ${reason}`)
        }
        return failure(`Crypto Error: ${describeError(error)}`)
      }
    },
  }
}
