import { Command } from 'commander'
import { listAgents } from './commands/agents'
import { ask } from './commands/ask'
import { chat } from './commands/chat'
import {
  type CommandContext,
  type ContextOptions,
  createContext,
} from './core/context'
import { loadEnvFiles } from './core/env-loader'
import { CLIError, EXIT_CODES, formatError } from './core/errors'
import { createOutputFormatter } from './core/output'

export const VERSION = '0.1.0'

interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  envDir?: string
}

export interface ProgramOptions {
  /** Context overrides, used by tests to inject streams and a fake router */
  context?: ContextOptions
  /** Set the process exit code; defaults to writing `process.exitCode` */
  setExitCode?: (code: number) => void
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command()
  const setExitCode =
    options.setExitCode ??
    ((code: number) => {
      process.exitCode = code
    })

  const run = async (
    command: Command,
    action: (ctx: CommandContext) => Promise<void> | void
  ): Promise<void> => {
    const opts = command.optsWithGlobals<GlobalOptions>()
    const verbose = options.context?.verbose ?? opts.verbose === true
    const quiet = options.context?.quiet ?? opts.quiet === true
    const output =
      options.context?.output ??
      createOutputFormatter({
        stdout: options.context?.stdout ?? process.stdout,
        stderr: options.context?.stderr ?? process.stderr,
        verbose,
        quiet,
      })

    const envDir = opts.envDir ?? process.cwd()
    if (!loadEnvFiles(envDir)) {
      output.warn(`env directory not found: ${envDir}`)
    }

    let ctx: CommandContext
    try {
      ctx = createContext({ ...options.context, verbose, quiet, output })
    } catch (error) {
      output.error(formatError(error))
      setExitCode(error instanceof CLIError ? error.exitCode : EXIT_CODES.error)
      return
    }

    try {
      await action(ctx)
    } catch (error) {
      ctx.output.error(formatError(error))
      setExitCode(error instanceof CLIError ? error.exitCode : EXIT_CODES.error)
    } finally {
      await ctx.logger.flush()
    }
  }

  program
    .name('intent-router')
    .description(
      'Route natural-language requests to crypto, stock, weather and web lookups'
    )
    .version(VERSION)
    .option('-v, --verbose', 'show routing progress on stderr')
    .option('-q, --quiet', 'suppress informational output')
    .option('--env-dir <dir>', 'directory to load .env files from')

  program
    .command('chat', { isDefault: true })
    .description('start an interactive session')
    .action(async (_opts: unknown, command: Command) => {
      await run(command, chat)
    })

  program
    .command('ask')
    .description('route a single request and print the reply')
    .argument('<utterance...>', 'what to ask')
    .action(async (words: string[], _opts: unknown, command: Command) => {
      await run(command, (ctx) => ask(ctx, words))
    })

  program
    .command('agents')
    .description('list the agents requests can be routed to')
    .action(async (_opts: unknown, command: Command) => {
      await run(command, listAgents)
    })

  return program
}
