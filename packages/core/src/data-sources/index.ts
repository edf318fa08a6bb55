/**
 * Data sources, one per agent type.
 */

import type { RouterConfig } from '../config/env'
import { type Logger, noopLogger } from '../observability/log'
import { type CryptoPriceSource, createCryptoPriceSource } from './crypto'
import { type HttpClient, createHttpClient } from './http'
import { type StockQuoteSource, createStockQuoteSource } from './stock'
import { type WeatherSource, createWeatherSource } from './weather'
import { type WebSearchSource, createWebSearchSource } from './web-search'

export interface DataSources {
  crypto: CryptoPriceSource
  stock: StockQuoteSource
  weather: WeatherSource
  webSearch: WebSearchSource
}

export function createDataSources(
  config: RouterConfig,
  http: HttpClient = createHttpClient({ timeoutMs: config.timeoutMs }),
  logger: Logger = noopLogger
): DataSources {
  return {
    crypto: createCryptoPriceSource({ http, logger }),
    stock: createStockQuoteSource({
      http,
      logger,
      apiKey: config.stock.apiKey,
    }),
    weather: createWeatherSource({
      http,
      logger,
      apiKey: config.weather.apiKey,
    }),
    webSearch: createWebSearchSource({
      http,
      logger,
      apiKey: config.webSearch.apiKey,
      searchEngineId: config.webSearch.searchEngineId,
    }),
  }
}

export {
  COINGECKO_API_BASE,
  INVALID_COIN_MESSAGE,
  createCryptoPriceSource,
} from './crypto'
export type { CryptoPriceSource, CryptoPriceSourceConfig } from './crypto'
export {
  HttpError,
  HttpTimeoutError,
  createHttpClient,
  errorField,
} from './http'
export type { HttpClient, HttpClientConfig } from './http'
export { ALPHAVANTAGE_API_BASE, createStockQuoteSource } from './stock'
export type { StockQuoteSource, StockQuoteSourceConfig } from './stock'
export { OPENWEATHER_API_BASE, createWeatherSource } from './weather'
export type { WeatherSource, WeatherSourceConfig } from './weather'
export {
  GOOGLE_SEARCH_API_BASE,
  MAX_WEB_RESULTS,
  createWebSearchSource,
} from './web-search'
export type { WebSearchSource, WebSearchSourceConfig } from './web-search'
