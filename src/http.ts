/**
 * HTTP Utilities
 *
 * Typed fetch wrapper and uniform error mapping for provider API calls.
 */

import type { Result } from './types'

/**
 * Check if running tests in CI. Real completion calls are never allowed there.
 */
function shouldBlockHttpRequests(): boolean {
  const isCI = process.env['CI'] === 'true'
  const isTest = process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true'
  return isCI && isTest
}

/**
 * Error thrown when a real HTTP request is attempted from tests in CI.
 */
export class UncachedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Mock the http module or serve the response from a cache.'
    )
    this.name = 'UncachedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Perform a fetch request and return a typed response.
 *
 * @throws UncachedHttpRequestError when HTTP requests are blocked
 */
export async function httpFetch(url: string, init?: RequestInit): Promise<HttpResponse> {
  if (shouldBlockHttpRequests()) {
    throw new UncachedHttpRequestError(url)
  }
  return fetch(url, init)
}

/**
 * Handle HTTP error responses uniformly across providers.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across providers.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}
