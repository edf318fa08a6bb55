import type { CommandContext } from '../core/context'
import { UsageError } from '../core/errors'
import { answer } from './chat'

/**
 * Route a single utterance and print the reply.
 */
export async function ask(ctx: CommandContext, words: string[]): Promise<void> {
  const utterance = words.join(' ').trim()
  if (!utterance) {
    throw new UsageError({
      userMessage: 'Nothing to ask.',
      suggestion: 'Usage: intent-router ask "price of bitcoin"',
    })
  }

  ctx.output.data(await answer(ctx, utterance))
}
