export const EXIT_CODES = {
  success: 0,
  error: 1,
  usage: 2,
  config: 3,
} as const

export interface CLIErrorOptions {
  userMessage: string
  exitCode?: number
  suggestion?: string
  cause?: unknown
}

export class CLIError extends Error {
  userMessage: string
  exitCode: number
  suggestion?: string

  constructor({
    userMessage,
    exitCode = EXIT_CODES.error,
    suggestion,
    cause,
  }: CLIErrorOptions) {
    super(userMessage)

    if (cause !== undefined) {
      this.cause = cause
    }

    this.name = 'CLIError'
    this.userMessage = userMessage
    this.exitCode = exitCode
    this.suggestion = suggestion
  }
}

export class UsageError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.usage })
    this.name = 'UsageError'
  }
}

/** Invalid environment (bad URL, timeout over the limit...) */
export class ConfigurationError extends CLIError {
  constructor(options: Omit<CLIErrorOptions, 'exitCode'>) {
    super({ ...options, exitCode: EXIT_CODES.config })
    this.name = 'ConfigurationError'
  }
}

export function formatError(error: unknown): string {
  if (error instanceof CLIError) {
    if (error.suggestion) {
      return `${error.userMessage}\nSuggestion: ${error.suggestion}`
    }

    return error.userMessage
  }

  if (error instanceof Error) {
    return error.message || 'An unexpected error occurred.'
  }

  return 'An unexpected error occurred.'
}
