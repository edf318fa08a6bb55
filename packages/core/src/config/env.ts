import { createEnv } from '@t3-oss/env-core'
import { z } from 'zod'
import { DEFAULT_DATASET } from '../observability/log'

/** Hard ceiling for any single outbound call (ms) */
export const MAX_TIMEOUT_MS = 10_000

export const DEFAULT_LLM_BASE_URL = 'http://localhost:1234/v1'
export const DEFAULT_LLM_MODEL = 'local-model'

/**
 * Process-wide configuration, read once at startup and passed explicitly
 * into every client and data source.
 */
export interface RouterConfig {
  llm: {
    baseUrl: string
    model: string
    apiKey?: string
  }
  stock: { apiKey?: string }
  weather: { apiKey?: string }
  webSearch: { apiKey?: string; searchEngineId?: string }
  timeoutMs: number
  axiom: { token?: string; dataset: string }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export type RuntimeEnv = Record<string, string | undefined>

/**
 * Validate the environment and build a frozen {@link RouterConfig}.
 *
 * Missing credentials are fine here; the affected data source reports them
 * when invoked. Malformed values fail fast with a {@link ConfigError}.
 */
export function loadConfig(runtimeEnv: RuntimeEnv = process.env): RouterConfig {
  const env = createEnv({
    server: {
      ALPHAVANTAGE_API_KEY: z.string().optional(),
      OPENWEATHER_API_KEY: z.string().optional(),
      GOOGLE_API_KEY: z.string().optional(),
      SEARCH_ENGINE_ID: z.string().optional(),
      LLM_BASE_URL: z.string().url().default(DEFAULT_LLM_BASE_URL),
      LLM_MODEL: z.string().default(DEFAULT_LLM_MODEL),
      LLM_API_KEY: z.string().optional(),
      REQUEST_TIMEOUT_MS: z.coerce
        .number()
        .int()
        .positive()
        .max(MAX_TIMEOUT_MS)
        .default(MAX_TIMEOUT_MS),
      AXIOM_TOKEN: z.string().optional(),
      AXIOM_DATASET: z.string().default(DEFAULT_DATASET),
    },
    runtimeEnv,
    isServer: true,
    emptyStringAsUndefined: true,
    onValidationError: (issues) => {
      const fields = issues
        .map((issue) =>
          (issue.path ?? [])
            .map((segment) =>
              typeof segment === 'object'
                ? String(segment.key)
                : String(segment)
            )
            .join('.')
        )
        .filter(Boolean)
        .join(', ')
      throw new ConfigError(`Invalid environment variables: ${fields}`)
    },
  })

  return Object.freeze({
    llm: {
      baseUrl: env.LLM_BASE_URL,
      model: env.LLM_MODEL,
      apiKey: env.LLM_API_KEY,
    },
    stock: { apiKey: env.ALPHAVANTAGE_API_KEY },
    weather: { apiKey: env.OPENWEATHER_API_KEY },
    webSearch: {
      apiKey: env.GOOGLE_API_KEY,
      searchEngineId: env.SEARCH_ENGINE_ID,
    },
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    axiom: { token: env.AXIOM_TOKEN, dataset: env.AXIOM_DATASET },
  })
}
