/**
 * Normalize a routed sub-query before it reaches a data source.
 *
 * Models like to append a clarifying note in parentheses
 * ("bitcoin (approx)"), so everything from the first `(` is dropped, then
 * the remainder is trimmed and lower-cased.
 */
export function cleanQuery(raw: string): string {
  const [head = ''] = raw.split('(')
  return head.trim().toLowerCase()
}
