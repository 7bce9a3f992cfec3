/**
 * taskspec Core Library
 *
 * Response caching and completion plumbing for the taskspec prompt pipeline.
 * The CLI loads config, builds the cache and hands it to the completion client.
 */

export const VERSION = '0.1.0'

// Cache module
export {
  BaseCache,
  CACHE_KINDS,
  type CacheBackend,
  CacheConfigError,
  type CacheEntry,
  type CacheKind,
  type CacheOptions,
  type CacheStatistics,
  type CacheValue,
  createCache,
  DEFAULT_CACHE_TTL_SECONDS,
  DiskCache,
  defaultCachePath,
  generateCacheKey,
  isCacheKind,
  isFresh,
  MemoryCache,
  resolveCacheLocation,
  type SetupCacheOptions,
  setupCache
} from './cache/index'
// Configuration
export {
  type CacheSettings,
  type Config,
  ConfigError,
  type ConfigOverrides,
  DEFAULT_MODELS,
  DEFAULT_OLLAMA_BASE_URL,
  getProviderApiKey,
  loadConfig,
  readEnvironment
} from './config'
// HTTP
export { type HttpResponse, UncachedHttpRequestError } from './http'
// Completion client
export {
  buildMessages,
  type CompletionClient,
  type CompletionClientOptions,
  type CompletionFn,
  callProvider,
  completionCacheKey,
  createCompletionClient,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE
} from './llm/index'
// Web search
export {
  DEFAULT_MAX_SEARCH_RESULTS,
  fetchSearchResults,
  type SearchOptions,
  type SearchResult,
  searchWeb
} from './search'
// Logging
export { createLogger, type Logger } from './logger'
// Types
export type {
  ApiError,
  ApiErrorType,
  ChatMessage,
  ChatRole,
  CompletionOptions,
  CompletionRequest,
  LlmProvider,
  PromptOptions,
  ProviderConfig,
  Result
} from './types'
