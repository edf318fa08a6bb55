import type { z } from 'zod'

/**
 * Non-2xx response from a data provider. `body` is the decoded JSON payload
 * (or `undefined` when the provider sent something else) so callers can
 * pull out provider-specific error fields.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: unknown,
    message: string
  ) {
    super(message)
    this.name = 'HttpError'
  }
}

export class HttpTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`)
    this.name = 'HttpTimeoutError'
  }
}

export interface HttpClientConfig {
  timeoutMs: number
}

export interface HttpClient {
  /**
   * GET a JSON resource and validate it with `schema`.
   * Exactly one attempt; no retries.
   */
  getJson<T>(url: string | URL, schema: z.ZodType<T>): Promise<T>
}

const isTimeout = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === 'TimeoutError' || error.name === 'AbortError')

export function createHttpClient(config: HttpClientConfig): HttpClient {
  async function getJson<T>(url: string | URL, schema: z.ZodType<T>) {
    let response: Response
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(config.timeoutMs),
      })
    } catch (error) {
      if (isTimeout(error)) throw new HttpTimeoutError(config.timeoutMs)
      throw error
    }

    if (!response.ok) {
      const body: unknown = await response.json().catch(() => undefined)
      throw new HttpError(
        response.status,
        body,
        `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`
      )
    }

    const data: unknown = await response.json()
    return schema.parse(data)
  }

  return { getJson }
}

/**
 * Read a string field off an error body, e.g. `{ "error": "..." }`.
 */
export function errorField(body: unknown, field: string): string | undefined {
  if (!body || typeof body !== 'object' || !(field in body)) return undefined
  const value: unknown = Reflect.get(body, field)
  return typeof value === 'string' ? value : undefined
}
