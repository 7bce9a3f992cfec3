/**
 * LLM Types
 *
 * Types for the remote completion providers and the completion caller.
 */

import type { ChatMessage } from './common'

/** Provider type for completion APIs. */
export type LlmProvider = 'ollama' | 'openai' | 'anthropic' | 'cohere'

/** Configuration for a single provider call. */
export interface ProviderConfig {
  readonly provider: LlmProvider
  readonly model: string
  /** Not needed for ollama */
  readonly apiKey?: string | undefined
  /** Override the provider's API base URL (ollama defaults to localhost) */
  readonly baseUrl?: string | undefined
}

/** A single completion request sent to a provider. */
export interface CompletionRequest {
  readonly messages: readonly ChatMessage[]
  readonly temperature: number
  readonly maxTokens: number
}

export interface CompletionOptions {
  /** Sampling temperature (default: 0.3) */
  readonly temperature?: number | undefined
  /** Maximum tokens to generate (default: 4000) */
  readonly maxTokens?: number | undefined
}

export interface PromptOptions extends CompletionOptions {
  /** Prepended as a system message when set */
  readonly systemPrompt?: string | undefined
}
