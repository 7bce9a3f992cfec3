/**
 * Web Search
 *
 * Fetches extra context for the prompts from the Brave Search API.
 * Search is optional: without a key, or when a request fails, the pipeline
 * carries on with no results.
 */

import { emptyResponseError, handleHttpError, handleNetworkError, httpFetch } from './http'
import type { Logger } from './logger'
import type { Result } from './types'

const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search'

export const DEFAULT_MAX_SEARCH_RESULTS = 5

export interface SearchResult {
  readonly title: string
  readonly description: string
  readonly url: string
}

export interface SearchOptions {
  apiKey?: string | undefined
  maxResults?: number | undefined
  logger?: Logger | undefined
}

interface BraveSearchResponse {
  web?: {
    results?: Array<{
      title?: string
      description?: string
      url?: string
    }>
  }
}

/**
 * Query Brave Search. The query is widened towards implementation material.
 */
export async function fetchSearchResults(
  query: string,
  apiKey: string,
  maxResults: number = DEFAULT_MAX_SEARCH_RESULTS
): Promise<Result<SearchResult[]>> {
  const params = new URLSearchParams({
    q: `${query} programming implementation guide`,
    count: String(maxResults)
  })

  try {
    const response = await httpFetch(`${BRAVE_SEARCH_URL}?${params}`, {
      headers: {
        Accept: 'application/json',
        'X-Subscription-Token': apiKey
      }
    })

    if (!response.ok) {
      return handleHttpError(response)
    }

    const data = (await response.json()) as BraveSearchResponse | null
    if (!data) {
      return emptyResponseError()
    }

    const results = (data.web?.results ?? []).map((result) => ({
      title: result.title ?? '',
      description: result.description ?? '',
      url: result.url ?? ''
    }))
    return { ok: true, value: results }
  } catch (error) {
    return handleNetworkError(error)
  }
}

/**
 * Search the web for context. Returns an empty list (with a warning) when no
 * API key is configured or the request fails.
 */
export async function searchWeb(
  query: string,
  options: SearchOptions = {}
): Promise<SearchResult[]> {
  const { apiKey, logger } = options
  if (!apiKey) {
    logger?.log('Warning: No Brave API key found. Web search disabled.')
    return []
  }

  const result = await fetchSearchResults(query, apiKey, options.maxResults)
  if (!result.ok) {
    logger?.log(`Warning: Error during web search: ${result.error.message}`)
    return []
  }
  return result.value
}
