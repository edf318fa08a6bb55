import { AGENT_TYPES } from '../agents/registry'
import type { Logger } from '../observability/log'
import { type RoutedQuery, describeError } from '../types'

/**
 * Extract `(agentType, query)` from raw model output.
 *
 * Grammar, first match wins:
 * 1. `[label] query`: split on the first `]`
 * 2. `label query`: a registered label followed by a space, matched
 *    case-insensitively in registry order
 * 3. anything else: no agent, the text is a general answer
 *
 * An empty label in (1) counts as (3). Other labels are not validated
 * here; that is the dispatcher's job.
 * Never throws.
 */
export function parseModelResponse(
  text: string,
  logger?: Logger
): RoutedQuery {
  try {
    if (text.startsWith('[') && text.includes(']')) {
      const close = text.indexOf(']')
      const label = text.slice(1, close).trim()
      // `[] text` carries no agent: the whole reply is the answer
      if (!label) return { agentType: null, rawQuery: text }
      return { agentType: label, rawQuery: text.slice(close + 1).trim() }
    }

    const lowered = text.toLowerCase()
    for (const agentType of AGENT_TYPES) {
      const prefix = `${agentType} `
      if (lowered.startsWith(prefix)) {
        return { agentType, rawQuery: text.slice(prefix.length).trim() }
      }
    }
  } catch (error) {
    logger?.error('Parse error', { error: describeError(error) })
  }

  return { agentType: null, rawQuery: text }
}
