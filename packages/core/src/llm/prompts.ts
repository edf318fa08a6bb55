import { AGENTS } from '../agents/registry'
import type { WebResult } from '../types'

const agentLines = AGENTS.map(
  (agent) =>
    `- ${agent.type}: ${agent.description} (e.g., "[${agent.type}] ${agent.example}")`
).join('\n')

export const CLASSIFY_SYSTEM_PROMPT = `You are a routing assistant. Format responses STRICTLY as:
[agent_type] query

Available agents:
${agentLines}

If unsure, provide a general answer. NEVER include text outside brackets!`

export function summarizeSystemPrompt(topic: string): string {
  return `Summarize web results about ${topic} in 3 concise points`
}

export function formatResultsForSummary(
  items: Pick<WebResult, 'title' | 'snippet'>[]
): string {
  return items.map((item) => `${item.title}: ${item.snippet}`).join('\n')
}
