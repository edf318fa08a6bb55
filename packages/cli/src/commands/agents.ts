import { AGENTS } from '@intent-router/core'
import type { CommandContext } from '../core/context'

export function listAgents(ctx: CommandContext): void {
  ctx.output.table(
    AGENTS.map((agent) => ({
      agent: agent.type,
      description: agent.description,
      example: `[${agent.type}] ${agent.example}`,
    })),
    ['agent', 'description', 'example']
  )
}
