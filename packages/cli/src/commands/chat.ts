import { createInterface } from 'node:readline'
import type { CommandContext } from '../core/context'

export const BANNER = "Intent router ready. Type 'exit' to quit."
export const PROMPT = '\nUser: '

const EXIT_WORDS = new Set(['exit', 'quit'])

/**
 * One turn, never throws: anything escaping the router is logged and shown
 * as an unexpected-error reply so the session keeps going.
 */
export async function answer(
  ctx: CommandContext,
  utterance: string
): Promise<string> {
  try {
    const result = await ctx.router.handle(utterance)
    return result.reply
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    ctx.logger.error('Turn failed', { error: reason })
    return `Unexpected error - ${reason}`
  }
}

/**
 * Interactive session: read a line, route it, print the reply, repeat
 * until `exit`/`quit` or end of input.
 */
export async function chat(ctx: CommandContext): Promise<void> {
  const rl = createInterface({
    input: ctx.stdin,
    output: ctx.stdout,
    terminal: 'isTTY' in ctx.stdin && ctx.stdin.isTTY === true,
    crlfDelay: Infinity,
  })
  rl.on('SIGINT', () => rl.close())

  ctx.output.data(BANNER)
  ctx.output.write(PROMPT)

  try {
    for await (const line of rl) {
      const utterance = line.trim()
      if (EXIT_WORDS.has(utterance.toLowerCase())) break

      if (utterance) {
        const reply = await answer(ctx, utterance)
        ctx.output.data(`Assistant: ${reply}`)
      }
      ctx.output.write(PROMPT)
    }
  } finally {
    rl.close()
  }
}
