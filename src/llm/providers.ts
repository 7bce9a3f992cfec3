/**
 * LLM Provider API Clients
 *
 * HTTP clients for OpenAI, Anthropic, Cohere and Ollama chat APIs.
 * Every client returns a Result - provider failures are values, not exceptions.
 */

import { DEFAULT_OLLAMA_BASE_URL } from '../config'
import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from '../http'
import type { CompletionRequest, ProviderConfig, Result } from '../types'

interface OpenAIResponse {
  choices: Array<{ message: { content: string | null } }>
}

interface AnthropicResponse {
  content: Array<{ type: string; text: string }>
}

interface CohereResponse {
  message: { content: Array<{ type: string; text: string }> }
}

interface OllamaResponse {
  message: { role: string; content: string }
}

const DEFAULT_BASE_URLS = {
  openai: 'https://api.openai.com',
  anthropic: 'https://api.anthropic.com',
  cohere: 'https://api.cohere.com',
  ollama: DEFAULT_OLLAMA_BASE_URL
} as const

function missingApiKey(provider: string): Result<never> {
  return { ok: false, error: { type: 'auth', message: `Missing API key for ${provider}` } }
}

function textResult(text: string | null | undefined): Result<string> {
  return text ? { ok: true, value: text } : emptyResponseError()
}

async function callOpenAI(
  request: CompletionRequest,
  config: ProviderConfig
): Promise<Result<string>> {
  if (!config.apiKey) return missingApiKey('openai')

  try {
    const baseUrl = config.baseUrl ?? DEFAULT_BASE_URLS.openai
    const response = await httpFetch(`${baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${config.apiKey}` },
      body: JSON.stringify({
        model: config.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as OpenAIResponse
    return textResult(data.choices[0]?.message?.content)
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Anthropic takes the system prompt as a top-level field, not a message.
 */
async function callAnthropic(
  request: CompletionRequest,
  config: ProviderConfig
): Promise<Result<string>> {
  if (!config.apiKey) return missingApiKey('anthropic')

  const system = request.messages
    .filter((m) => m.role === 'system')
    .map((m) => m.content)
    .join('\n\n')
  const messages = request.messages.filter((m) => m.role !== 'system')

  try {
    const baseUrl = config.baseUrl ?? DEFAULT_BASE_URLS.anthropic
    const response = await httpFetch(`${baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': config.apiKey,
        'anthropic-version': '2023-06-01'
      },
      body: JSON.stringify({
        model: config.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(system ? { system } : {}),
        messages
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as AnthropicResponse
    return textResult(data.content.find((block) => block.type === 'text')?.text)
  } catch (error) {
    return handleNetworkError(error)
  }
}

async function callCohere(
  request: CompletionRequest,
  config: ProviderConfig
): Promise<Result<string>> {
  if (!config.apiKey) return missingApiKey('cohere')

  try {
    const baseUrl = config.baseUrl ?? DEFAULT_BASE_URLS.cohere
    const response = await httpFetch(`${baseUrl}/v2/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${config.apiKey}` },
      body: JSON.stringify({
        model: config.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as CohereResponse
    return textResult(data.message?.content?.[0]?.text)
  } catch (error) {
    return handleNetworkError(error)
  }
}

async function callOllama(
  request: CompletionRequest,
  config: ProviderConfig
): Promise<Result<string>> {
  try {
    const baseUrl = config.baseUrl ?? DEFAULT_BASE_URLS.ollama
    const response = await httpFetch(`${baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: config.model,
        messages: request.messages,
        stream: false,
        options: { temperature: request.temperature, num_predict: request.maxTokens }
      })
    })

    if (!response.ok) return handleHttpError(response)

    const data = (await response.json()) as OllamaResponse
    return textResult(data.message?.content)
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Send one completion request to the configured provider.
 */
export async function callProvider(
  request: CompletionRequest,
  config: ProviderConfig
): Promise<Result<string>> {
  switch (config.provider) {
    case 'openai':
      return callOpenAI(request, config)
    case 'anthropic':
      return callAnthropic(request, config)
    case 'cohere':
      return callCohere(request, config)
    case 'ollama':
      return callOllama(request, config)
    default:
      return {
        ok: false,
        error: { type: 'invalid_request', message: `Unknown provider: ${String(config.provider)}` }
      }
  }
}
