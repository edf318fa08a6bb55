import { describe, expect, it } from 'vitest'
import {
  CLIError,
  ConfigurationError,
  EXIT_CODES,
  UsageError,
  formatError,
} from '../../../src/core/errors'

describe('CLIError', () => {
  it('stores message metadata', () => {
    const cause = new Error('root cause')
    const error = new CLIError({
      userMessage: 'Something went wrong',
      exitCode: EXIT_CODES.usage,
      suggestion: 'Try again',
      cause,
    })

    expect(error.name).toBe('CLIError')
    expect(error.userMessage).toBe('Something went wrong')
    expect(error.exitCode).toBe(EXIT_CODES.usage)
    expect(error.suggestion).toBe('Try again')
    expect(error.message).toBe('Something went wrong')
    expect(error.cause).toBe(cause)
  })

  it('defaults to the generic exit code', () => {
    const error = new CLIError({ userMessage: 'Failure' })

    expect(error.exitCode).toBe(EXIT_CODES.error)
    expect(error.message).toBe('Failure')
  })
})

describe('CLIError subclasses', () => {
  const cases = [
    { label: 'UsageError', ErrorClass: UsageError, exitCode: EXIT_CODES.usage },
    {
      label: 'ConfigurationError',
      ErrorClass: ConfigurationError,
      exitCode: EXIT_CODES.config,
    },
  ]

  for (const testCase of cases) {
    it(`sets ${testCase.label} exit code`, () => {
      const error = new testCase.ErrorClass({
        userMessage: 'Failure',
      })

      expect(error).toBeInstanceOf(CLIError)
      expect(error.exitCode).toBe(testCase.exitCode)
      expect(error.name).toBe(testCase.label)
    })
  }
})

describe('formatError', () => {
  it('renders user message and suggestion', () => {
    const error = new ConfigurationError({
      userMessage: 'Invalid environment variables: LLM_BASE_URL',
      suggestion: 'Set LLM_BASE_URL to a full URL',
    })

    expect(formatError(error)).toBe(
      'Invalid environment variables: LLM_BASE_URL\nSuggestion: Set LLM_BASE_URL to a full URL'
    )
  })

  it('renders the user message alone without a suggestion', () => {
    expect(formatError(new UsageError({ userMessage: 'Nothing to ask.' }))).toBe(
      'Nothing to ask.'
    )
  })

  it('handles unknown errors', () => {
    expect(formatError(new Error('Boom'))).toBe('Boom')
    expect(formatError(new Error(''))).toBe('An unexpected error occurred.')
    expect(formatError('boom')).toBe('An unexpected error occurred.')
  })
})
