import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import {
  HttpError,
  HttpTimeoutError,
  createHttpClient,
  errorField,
} from './http'

const PriceSchema = z.object({ usd: z.number() })

describe('createHttpClient', () => {
  let fetchMock: ReturnType<typeof vi.fn>

  beforeEach(() => {
    fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns the validated body', async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ usd: 42 }))
    const client = createHttpClient({ timeoutMs: 1000 })

    await expect(
      client.getJson('https://api.example.com/price', PriceSchema)
    ).resolves.toEqual({ usd: 42 })
    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.example.com/price',
      expect.objectContaining({ method: 'GET', signal: expect.any(AbortSignal) })
    )
  })

  it('raises HttpError with the decoded body on non-2xx', async () => {
    fetchMock.mockResolvedValueOnce(
      Response.json({ error: 'rate limited' }, { status: 429 })
    )
    const client = createHttpClient({ timeoutMs: 1000 })

    const error = await client
      .getJson('https://api.example.com/price', PriceSchema)
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(HttpError)
    expect(error).toMatchObject({ status: 429, body: { error: 'rate limited' } })
  })

  it('tolerates non-JSON error bodies', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('<html>bad gateway</html>', { status: 502 })
    )
    const client = createHttpClient({ timeoutMs: 1000 })

    const error = await client
      .getJson('https://api.example.com/price', PriceSchema)
      .catch((e: unknown) => e)

    expect(error).toMatchObject({ status: 502, body: undefined })
  })

  it('converts aborts into HttpTimeoutError', async () => {
    fetchMock.mockRejectedValueOnce(
      new DOMException('The operation was aborted due to timeout', 'TimeoutError')
    )
    const client = createHttpClient({ timeoutMs: 250 })

    await expect(
      client.getJson('https://api.example.com/price', PriceSchema)
    ).rejects.toThrow(new HttpTimeoutError(250))
  })

  it('passes other transport failures through', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))
    const client = createHttpClient({ timeoutMs: 1000 })

    await expect(
      client.getJson('https://api.example.com/price', PriceSchema)
    ).rejects.toThrow('fetch failed')
  })

  it('rejects bodies that do not match the schema', async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ usd: 'lots' }))
    const client = createHttpClient({ timeoutMs: 1000 })

    await expect(
      client.getJson('https://api.example.com/price', PriceSchema)
    ).rejects.toThrow(z.ZodError)
  })
})

describe('errorField', () => {
  it('reads string fields', () => {
    expect(errorField({ message: 'city not found' }, 'message')).toBe(
      'city not found'
    )
  })

  it('ignores missing or non-string fields', () => {
    expect(errorField({ message: 404 }, 'message')).toBeUndefined()
    expect(errorField(undefined, 'message')).toBeUndefined()
    expect(errorField('oops', 'message')).toBeUndefined()
  })
})
