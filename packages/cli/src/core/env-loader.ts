import { existsSync } from 'node:fs'
import path from 'node:path'
import { config } from 'dotenv-flow'

/**
 * Load `.env`, `.env.local` and their NODE_ENV variants from `dir` into
 * process.env. Variables already set in the environment win.
 *
 * Returns false when `dir` does not exist, so callers can warn about a bad
 * `--env-dir` instead of silently running without credentials.
 */
export function loadEnvFiles(dir: string): boolean {
  const resolved = path.resolve(dir)
  if (!existsSync(resolved)) {
    return false
  }

  config({ path: resolved, silent: true })
  return true
}
