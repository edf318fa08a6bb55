/**
 * Logging for the router.
 *
 * Entries are shipped to Axiom when a token is configured; warnings and
 * errors are always echoed to stderr, debug/info only in verbose mode.
 * Observability failures never propagate to the caller.
 */

import { Axiom } from '@axiomhq/js'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMetadata = Record<string, unknown>

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void
  info(message: string, metadata?: LogMetadata): void
  warn(message: string, metadata?: LogMetadata): void
  error(message: string, metadata?: LogMetadata): void
  flush(): Promise<void>
}

export interface LoggerOptions {
  axiomToken?: string
  dataset?: string
  stderr?: NodeJS.WritableStream
  verbose?: boolean
}

export const DEFAULT_DATASET = 'intent-router'

const PREFIX = '[intent-router]'

export function createLogger(options: LoggerOptions = {}): Logger {
  const stderr = options.stderr ?? process.stderr
  const verbose = options.verbose ?? false
  const dataset = options.dataset ?? DEFAULT_DATASET
  const axiom = options.axiomToken
    ? new Axiom({
        token: options.axiomToken,
        onError: (error) => {
          stderr.write(`${PREFIX} Failed to send log: ${error.message}\n`)
        },
      })
    : null

  const write = (level: LogLevel, message: string, metadata?: LogMetadata) => {
    if (level === 'warn' || level === 'error' || verbose) {
      const detail =
        metadata && Object.keys(metadata).length > 0
          ? ` ${JSON.stringify(metadata)}`
          : ''
      stderr.write(`${PREFIX} ${level}: ${message}${detail}\n`)
    }

    axiom?.ingest(dataset, {
      _time: new Date().toISOString(),
      ...metadata,
      level,
      message,
    })
  }

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, metadata) => write('error', message, metadata),
    async flush() {
      if (!axiom) return
      try {
        await axiom.flush()
      } catch (error) {
        stderr.write(
          `${PREFIX} Failed to flush logs: ${error instanceof Error ? error.message : String(error)}\n`
        )
      }
    },
  }
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  flush: async () => {},
}
