import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { noopLogger } from '../observability/log'
import { createHttpClient } from './http'
import { createStockQuoteSource } from './stock'

describe('createStockQuoteSource', () => {
  let fetchMock: ReturnType<typeof vi.fn>
  const http = createHttpClient({ timeoutMs: 10_000 })

  beforeEach(() => {
    fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('reports a missing API key without a network call', async () => {
    const source = createStockQuoteSource({ http })

    await expect(source.quote('tsla')).resolves.toEqual({
      ok: false,
      message: 'Stock API Error: Missing API key.',
    })
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('upper-cases the ticker and formats the price', async () => {
    fetchMock.mockResolvedValueOnce(
      Response.json({ 'Global Quote': { '05. price': '251.4400' } })
    )
    const source = createStockQuoteSource({ http, apiKey: 'test-key' })

    await expect(source.quote(' tsla ')).resolves.toEqual({
      ok: true,
      value: 'TSLA: $251.4400',
    })

    const [url] = fetchMock.mock.calls[0] ?? []
    expect(String(url)).toBe(
      'https://www.alphavantage.co/query?function=GLOBAL_QUOTE&symbol=TSLA&apikey=test-key'
    )
  })

  it('reports symbols without quote data', async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ 'Global Quote': {} }))
    const source = createStockQuoteSource({ http, apiKey: 'test-key' })

    await expect(source.quote('zzzz')).resolves.toEqual({
      ok: false,
      message: 'Stock data not available for ZZZZ.',
    })
  })

  it('treats a rate-limit note as missing data', async () => {
    fetchMock.mockResolvedValueOnce(
      Response.json({ Note: 'Thank you for using Alpha Vantage!' })
    )
    const source = createStockQuoteSource({ http, apiKey: 'test-key' })

    await expect(source.quote('aapl')).resolves.toEqual({
      ok: false,
      message: 'Stock data not available for AAPL.',
    })
  })

  it('tags timeouts with its category', async () => {
    fetchMock.mockRejectedValueOnce(
      new DOMException('The operation was aborted due to timeout', 'TimeoutError')
    )
    const source = createStockQuoteSource({ http, apiKey: 'test-key' })

    await expect(source.quote('aapl')).resolves.toEqual({
      ok: false,
      message: 'Stock API Error: Request timed out after 10000ms',
    })
  })

  it('logs failed lookups', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('oops', {
        status: 500,
        statusText: 'Internal Server Error',
      })
    )
    const logger = { ...noopLogger, error: vi.fn() }
    const source = createStockQuoteSource({ http, logger, apiKey: 'test-key' })

    await expect(source.quote('aapl')).resolves.toEqual({
      ok: false,
      message: 'Stock API Error: HTTP 500 Internal Server Error',
    })
    expect(logger.error).toHaveBeenCalledWith('Stock lookup failed', {
      symbol: 'AAPL',
      error: 'HTTP 500 Internal Server Error',
    })
  })
})
