/**
 * Configuration
 *
 * Resolves provider, pipeline and cache settings from environment variables
 * (plus a `.env` file), with explicit overrides (e.g. from CLI flags) taking
 * precedence.
 */

import { existsSync, readFileSync } from 'node:fs'
import * as dotenv from 'dotenv'
import { DEFAULT_CACHE_TTL_SECONDS } from './cache/types'
import { DEFAULT_MAX_SEARCH_RESULTS } from './search'
import type { LlmProvider } from './types'

export interface CacheSettings {
  readonly enabled: boolean
  /** 'memory' or 'disk'; validated by createCache */
  readonly kind: string
  readonly ttlSeconds: number
  /** SQLite file path (default: ~/.taskspec/cache.db) */
  readonly location?: string | undefined
}

export interface Config {
  readonly llmProvider: LlmProvider
  readonly llmModel: string
  readonly openaiApiKey?: string | undefined
  readonly anthropicApiKey?: string | undefined
  readonly cohereApiKey?: string | undefined
  /** Brave Search key; web search is skipped without it */
  readonly braveApiKey?: string | undefined
  readonly ollamaBaseUrl: string
  /** Where generated documents are written */
  readonly outputDirectory: string
  readonly maxSearchResults: number
  /** Project conventions file fed into the prompts */
  readonly conventionsFile?: string | undefined
  /** Split generation into planning and per-step prompts */
  readonly multiStepEnabled: boolean
  /** Run the validate-and-fix loop on the generated document */
  readonly validationEnabled: boolean
  readonly maxValidationIterations: number
  readonly cache: CacheSettings
}

export interface ConfigOverrides {
  provider?: string | undefined
  model?: string | undefined
  cacheEnabled?: boolean | undefined
  cacheType?: string | undefined
  cacheTtl?: number | undefined
  cachePath?: string | undefined
  conventionsFile?: string | undefined
}

/** Default models for each provider. */
export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  ollama: 'athene-v2',
  openai: 'gpt-4o',
  anthropic: 'claude-3-opus-20240229',
  cohere: 'command-r'
}

const PROVIDERS = Object.keys(DEFAULT_MODELS)

export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434'

const TRUTHY = ['1', 'true', 'yes', 'on']

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function isProvider(value: string): value is LlmProvider {
  return PROVIDERS.includes(value)
}

/**
 * Parse a boolean env flag. Unset means `fallback`.
 */
function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback
  return TRUTHY.includes(raw.trim().toLowerCase())
}

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  expected = 'an integer'
): number {
  if (raw === undefined || raw.trim() === '') return fallback
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(`${name} must be ${expected}, got "${raw}"`)
  }
  return Number.parseInt(raw, 10)
}

/** Treat empty env vars as unset */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]
  return value === undefined || value === '' ? undefined : value
}

/**
 * Process environment merged over the variables of a `.env` file.
 * Variables already set in the process win.
 */
export function readEnvironment(
  path = '.env',
  processEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  if (!existsSync(path)) return processEnv
  return { ...dotenv.parse(readFileSync(path)), ...processEnv }
}

/**
 * Load configuration from the environment and optional overrides.
 *
 * @throws ConfigError for an unknown provider or a non-integer numeric setting
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = readEnvironment()
): Config {
  const provider = overrides.provider ?? readEnv(env, 'LLM_PROVIDER') ?? 'ollama'
  if (!isProvider(provider)) {
    throw new ConfigError(
      `Unknown LLM provider: ${provider} (expected one of: ${PROVIDERS.join(', ')})`
    )
  }

  const cache: CacheSettings = {
    enabled: overrides.cacheEnabled ?? parseFlag(env['CACHE_ENABLED'], true),
    kind: overrides.cacheType ?? readEnv(env, 'CACHE_TYPE') ?? 'disk',
    ttlSeconds:
      overrides.cacheTtl ??
      parseInteger(
        'CACHE_TTL',
        env['CACHE_TTL'],
        DEFAULT_CACHE_TTL_SECONDS,
        'an integer number of seconds'
      ),
    location: overrides.cachePath ?? readEnv(env, 'CACHE_PATH')
  }

  return Object.freeze({
    llmProvider: provider,
    llmModel: overrides.model ?? readEnv(env, 'LLM_MODEL') ?? DEFAULT_MODELS[provider],
    openaiApiKey: readEnv(env, 'OPENAI_API_KEY'),
    anthropicApiKey: readEnv(env, 'ANTHROPIC_API_KEY'),
    cohereApiKey: readEnv(env, 'COHERE_API_KEY'),
    braveApiKey: readEnv(env, 'BRAVE_API_KEY'),
    ollamaBaseUrl: readEnv(env, 'OLLAMA_BASE_URL') ?? DEFAULT_OLLAMA_BASE_URL,
    outputDirectory: readEnv(env, 'OUTPUT_DIRECTORY') ?? 'output',
    maxSearchResults: parseInteger(
      'MAX_SEARCH_RESULTS',
      env['MAX_SEARCH_RESULTS'],
      DEFAULT_MAX_SEARCH_RESULTS
    ),
    conventionsFile: overrides.conventionsFile ?? readEnv(env, 'CONVENTIONS_FILE'),
    multiStepEnabled: parseFlag(env['MULTI_STEP_ENABLED'], true),
    validationEnabled: parseFlag(env['VALIDATION_ENABLED'], true),
    maxValidationIterations: parseInteger(
      'MAX_VALIDATION_ITERATIONS',
      env['MAX_VALIDATION_ITERATIONS'],
      3
    ),
    cache: Object.freeze(cache)
  })
}

/**
 * API key for the configured provider, if any.
 */
export function getProviderApiKey(config: Config): string | undefined {
  switch (config.llmProvider) {
    case 'openai':
      return config.openaiApiKey
    case 'anthropic':
      return config.anthropicApiKey
    case 'cohere':
      return config.cohereApiKey
    case 'ollama':
      return undefined
  }
}
