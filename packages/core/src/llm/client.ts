/**
 * Language-model client for a local OpenAI-compatible chat endpoint
 * (LM Studio, llama.cpp server, vLLM...).
 *
 * Both calls make a single attempt bounded by the configured timeout and
 * never throw: failures come back as `{ ok: false }` with a tagged message.
 */

import { createOpenAICompatible } from '@ai-sdk/openai-compatible'
import { type LanguageModel, generateText } from 'ai'
import type { RouterConfig } from '../config/env'
import type { Logger } from '../observability/log'
import {
  type Outcome,
  type WebResult,
  describeError,
  failure,
  success,
} from '../types'
import {
  CLASSIFY_SYSTEM_PROMPT,
  formatResultsForSummary,
  summarizeSystemPrompt,
} from './prompts'

export const CLASSIFY_TEMPERATURE = 0.1
export const CLASSIFY_MAX_TOKENS = 100
export const SUMMARIZE_TEMPERATURE = 0.3
export const SUMMARIZE_MAX_TOKENS = 300

export interface LanguageModelClient {
  /** Raw routing text, e.g. "[crypto_asset] bitcoin" */
  classify(utterance: string): Promise<Outcome<string>>
  summarize(
    topic: string,
    items: Pick<WebResult, 'title' | 'snippet'>[]
  ): Promise<Outcome<string>>
}

export interface LanguageModelClientConfig {
  llm: RouterConfig['llm']
  timeoutMs: number
  logger: Logger
}

function createModel(llm: RouterConfig['llm']): LanguageModel {
  const provider = createOpenAICompatible({
    name: 'local',
    baseURL: llm.baseUrl.replace(/\/$/, ''),
    apiKey: llm.apiKey,
  })
  return provider.chatModel(llm.model)
}

export function createLanguageModelClient(
  config: LanguageModelClientConfig
): LanguageModelClient {
  const model = createModel(config.llm)
  const { logger, timeoutMs } = config

  async function complete(request: {
    system: string
    prompt: string
    temperature: number
    maxOutputTokens: number
  }): Promise<string> {
    const result = await generateText({
      model,
      ...request,
      maxRetries: 0,
      abortSignal: AbortSignal.timeout(timeoutMs),
    })
    return result.text
  }

  return {
    async classify(utterance) {
      try {
        const text = await complete({
          system: CLASSIFY_SYSTEM_PROMPT,
          prompt: utterance,
          temperature: CLASSIFY_TEMPERATURE,
          maxOutputTokens: CLASSIFY_MAX_TOKENS,
        })
        return success(text)
      } catch (error) {
        logger.error('LLM query failed', { error: describeError(error) })
        return failure(`LLM Error: ${describeError(error)}`)
      }
    },

    async summarize(topic, items) {
      try {
        const text = await complete({
          system: summarizeSystemPrompt(topic),
          prompt: formatResultsForSummary(items),
          temperature: SUMMARIZE_TEMPERATURE,
          maxOutputTokens: SUMMARIZE_MAX_TOKENS,
        })
        return success(text)
      } catch (error) {
        logger.error('Summarization failed', { error: describeError(error) })
        return failure(`Summarization Error: ${describeError(error)}`)
      }
    },
  }
}
