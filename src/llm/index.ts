/**
 * Completion Client
 *
 * Sends prompts to the configured provider, memoizing replies in the
 * response cache. A hit skips the remote call entirely; only successful
 * completions are stored.
 */

import type { CacheBackend } from '../cache/types'
import { type Config, getProviderApiKey } from '../config'
import type { Logger } from '../logger'
import type {
  ChatMessage,
  CompletionOptions,
  CompletionRequest,
  LlmProvider,
  PromptOptions,
  ProviderConfig,
  Result
} from '../types'
import { callProvider } from './providers'

export { callProvider } from './providers'

export const DEFAULT_TEMPERATURE = 0.3
export const DEFAULT_MAX_TOKENS = 4000

/** Remote completion call; injectable for tests and alternative transports. */
export type CompletionFn = (
  request: CompletionRequest,
  config: ProviderConfig
) => Promise<Result<string>>

export interface CompletionClientOptions {
  cache?: CacheBackend | undefined
  logger?: Logger | undefined
  callProvider?: CompletionFn | undefined
}

export interface CompletionClient {
  readonly provider: LlmProvider
  readonly model: string
  readonly cache: CacheBackend | undefined
  /** Single prompt with an optional system prompt */
  complete(prompt: string, options?: PromptOptions): Promise<Result<string>>
  /** Full message history */
  chatWithHistory(
    messages: readonly ChatMessage[],
    options?: CompletionOptions
  ): Promise<Result<string>>
}

/**
 * Build the message list for a single prompt.
 */
export function buildMessages(prompt: string, systemPrompt?: string): ChatMessage[] {
  const messages: ChatMessage[] = []
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt })
  }
  messages.push({ role: 'user', content: prompt })
  return messages
}

/**
 * Cache key for a completion request: the serialized message history,
 * the provider-qualified model and the temperature.
 */
export function completionCacheKey(
  cache: CacheBackend,
  messages: readonly ChatMessage[],
  providerConfig: ProviderConfig,
  temperature: number
): string {
  return cache.generateKey(
    JSON.stringify(messages),
    `${providerConfig.provider}/${providerConfig.model}`,
    temperature
  )
}

/**
 * Create a completion client for the configured provider and model.
 *
 * @example
 * ```ts
 * const config = loadConfig()
 * const client = createCompletionClient(config, { cache: setupCache(config.cache) })
 * const result = await client.complete('Summarize this task', { systemPrompt: 'Be brief' })
 * ```
 */
export function createCompletionClient(
  config: Config,
  options: CompletionClientOptions = {}
): CompletionClient {
  const { cache, logger } = options
  const send = options.callProvider ?? callProvider
  const providerConfig: ProviderConfig = {
    provider: config.llmProvider,
    model: config.llmModel,
    apiKey: getProviderApiKey(config),
    ...(config.llmProvider === 'ollama' && { baseUrl: config.ollamaBaseUrl })
  }

  async function chatWithHistory(
    messages: readonly ChatMessage[],
    completionOptions: CompletionOptions = {}
  ): Promise<Result<string>> {
    const temperature = completionOptions.temperature ?? DEFAULT_TEMPERATURE
    const maxTokens = completionOptions.maxTokens ?? DEFAULT_MAX_TOKENS

    let cacheKey: string | undefined
    if (cache) {
      cacheKey = completionCacheKey(cache, messages, providerConfig, temperature)
      const cached = cache.get(cacheKey)
      // Empty strings are never stored; treat anything else as a miss
      if (typeof cached === 'string' && cached !== '') {
        logger?.verbose(`cache hit: ${cacheKey.slice(0, 12)}`)
        return { ok: true, value: cached }
      }
    }

    const result = await send({ messages, temperature, maxTokens }, providerConfig)

    if (result.ok && cache && cacheKey) {
      if (!cache.set(cacheKey, result.value)) {
        logger?.verbose(`cache: could not store ${cacheKey.slice(0, 12)}`)
      }
    } else if (!result.ok) {
      logger?.error(`Error communicating with LLM: ${result.error.message}`)
    }

    return result
  }

  return {
    provider: providerConfig.provider,
    model: providerConfig.model,
    cache,
    complete: (prompt, promptOptions = {}) =>
      chatWithHistory(buildMessages(prompt, promptOptions.systemPrompt), promptOptions),
    chatWithHistory
  }
}
