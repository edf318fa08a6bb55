/**
 * Agent registry.
 *
 * The closed set of agents the model may route to. Order matters: the
 * response parser's bare-prefix fallback tries labels in this order.
 */

export const AGENT_TYPES = [
  'crypto_asset',
  'stock_asset',
  'weather_asset',
  'web_asset',
] as const

export type AgentType = (typeof AGENT_TYPES)[number]

export interface AgentDescriptor {
  type: AgentType
  description: string
  /** Sub-query shown to the model as the canonical example */
  example: string
}

export const AGENTS: readonly AgentDescriptor[] = [
  {
    type: 'crypto_asset',
    description: 'Cryptocurrency prices',
    example: 'ethereum',
  },
  { type: 'stock_asset', description: 'Stock prices', example: 'tsla' },
  { type: 'weather_asset', description: 'Weather', example: 'tokyo' },
  {
    type: 'web_asset',
    description: 'Web searches',
    example: 'pixel 9 reviews',
  },
]

const agentTypeSet = new Set<string>(AGENT_TYPES)

/**
 * Gate between "the model said X" and "we act on X".
 */
export function isAgentType(label: string): label is AgentType {
  return agentTypeSet.has(label)
}
