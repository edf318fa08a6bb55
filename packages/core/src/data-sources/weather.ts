import { z } from 'zod'
import { type Logger, noopLogger } from '../observability/log'
import { type Outcome, describeError, failure, success } from '../types'
import { capitalize } from './format'
import { HttpError, type HttpClient, errorField } from './http'

export const OPENWEATHER_API_BASE = 'https://api.openweathermap.org/data/2.5'

const CurrentWeatherSchema = z
  .object({
    name: z.string().optional(),
    main: z.object({ temp: z.number().optional() }).passthrough().optional(),
    weather: z
      .array(z.object({ description: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough()

export interface WeatherSource {
  current(location: string): Promise<Outcome<string>>
}

export interface WeatherSourceConfig {
  http: HttpClient
  logger?: Logger
  apiKey?: string
  baseUrl?: string
}

/**
 * Current conditions for a free-text location, metric units.
 */
export function createWeatherSource(config: WeatherSourceConfig): WeatherSource {
  const baseUrl = (config.baseUrl ?? OPENWEATHER_API_BASE).replace(/\/$/, '')
  const logger = config.logger ?? noopLogger

  return {
    async current(query) {
      const location = query.trim()
      if (!config.apiKey) {
        return failure('Weather Error: Missing API key.')
      }

      const url = new URL(`${baseUrl}/weather`)
      url.searchParams.set('q', location)
      url.searchParams.set('appid', config.apiKey)
      url.searchParams.set('units', 'metric')

      try {
        const data = await config.http.getJson(url, CurrentWeatherSchema)
        const temp = data.main?.temp
        const description = capitalize(data.weather?.[0]?.description ?? '')
        const city = data.name ?? location
        if (temp === undefined || !description) {
          return failure('Incomplete weather data received.')
        }
        return success(`${city}: ${temp}°C, ${description}`)
      } catch (error) {
        logger.error('Weather lookup failed', {
          location,
          error: describeError(error),
        })
        if (error instanceof HttpError) {
          const reason = errorField(error.body, 'message') ?? 'Unknown error'
          return failure(`Weather Error: ${reason}`)
        }
        return failure(`Weather Error: ${describeError(error)}`)
      }
    },
  }
}
