/**
 * Explicit success/failure result returned by every data source and
 * language-model call. `message` is already user-facing and carries the
 * category tag (e.g. "Crypto Error: ...").
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; message: string }

export const success = <T>(value: T): Outcome<T> => ({ ok: true, value })

export const failure = <T = never>(message: string): Outcome<T> => ({
  ok: false,
  message,
})

export interface WebResult {
  title: string
  link: string
  snippet: string
}

/**
 * Parsed model output. `agentType` is whatever label the model emitted and
 * has not been checked against the registry yet.
 */
export interface RoutedQuery {
  agentType: string | null
  rawQuery: string
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
