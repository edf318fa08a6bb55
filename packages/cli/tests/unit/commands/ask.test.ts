import { describe, expect, it, vi } from 'vitest'
import { ask } from '../../../src/commands/ask'
import { EXIT_CODES, UsageError } from '../../../src/core/errors'
import { createTestContext, flush } from '../../helpers/test-context'

describe('ask', () => {
  it('joins the words and prints only the reply', async () => {
    const { ctx, getStdout, getStderr } = createTestContext()

    await ask(ctx, ['price', 'of', 'bitcoin'])
    await flush()

    expect(getStdout()).toBe('echo: price of bitcoin\n')
    expect(getStderr()).toBe('')
  })

  it('rejects an empty utterance with a usage error', async () => {
    const handle = vi.fn()
    const { ctx } = createTestContext({ router: { handle } })

    const error = await ask(ctx, ['  ', '']).catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(UsageError)
    expect(error).toMatchObject({
      userMessage: 'Nothing to ask.',
      exitCode: EXIT_CODES.usage,
    })
    expect(handle).not.toHaveBeenCalled()
  })
})
