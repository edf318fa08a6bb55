import {
  ConfigError,
  type IntentRouter,
  type Logger,
  type RouterConfig,
  type RuntimeEnv,
  createIntentRouter,
  createLogger,
  loadConfig,
} from '@intent-router/core'
import { ConfigurationError } from './errors'
import { type OutputFormatter, createOutputFormatter } from './output'

export interface CommandContext {
  stdin: NodeJS.ReadableStream
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  config: RouterConfig
  logger: Logger
  router: IntentRouter
  output: OutputFormatter
  verbose: boolean
  quiet: boolean
}

export interface ContextOptions extends Partial<CommandContext> {
  /** Environment to build {@link RouterConfig} from when `config` is absent */
  env?: RuntimeEnv
}

function resolveConfig(env: RuntimeEnv): RouterConfig {
  try {
    return loadConfig(env)
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigurationError({
        userMessage: error.message,
        suggestion:
          'Check LLM_BASE_URL and REQUEST_TIMEOUT_MS (1-10000) in your environment or .env file.',
        cause: error,
      })
    }
    throw error
  }
}

export function createContext(options: ContextOptions = {}): CommandContext {
  const stdout = options.stdout ?? process.stdout
  const stderr = options.stderr ?? process.stderr
  const verbose = options.verbose ?? false
  const quiet = options.quiet ?? false
  const output =
    options.output ??
    createOutputFormatter({ stdout, stderr, verbose, quiet })
  const config = options.config ?? resolveConfig(options.env ?? process.env)
  const logger =
    options.logger ??
    createLogger({
      axiomToken: config.axiom.token,
      dataset: config.axiom.dataset,
      stderr,
      verbose,
    })
  const router =
    options.router ??
    createIntentRouter({
      config,
      logger,
      onRoute: (agentType, query) =>
        output.progress(`Routing to ${agentType}: ${query}`),
    })

  return {
    stdin: options.stdin ?? process.stdin,
    stdout,
    stderr,
    config,
    logger,
    router,
    output,
    verbose,
    quiet,
  }
}
