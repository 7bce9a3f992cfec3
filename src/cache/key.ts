/**
 * Cache Key Generation and Freshness
 *
 * Shared by every backend so key derivation and expiry policy never diverge.
 */

import { createHash } from 'node:crypto'

/**
 * Generate a deterministic cache key for a completion request.
 *
 * The key is a SHA256 hash of: content|model|temperature
 *
 * @param content - Serialized request (prompt text or full message history)
 * @param model - Provider-qualified model id, e.g. 'openai/gpt-4o'
 *
 * @example
 * ```ts
 * const key = generateCacheKey('[{"role":"user","content":"hi"}]', 'openai/gpt-4o', 0.3)
 * // Returns: 'e3b0c442...' (64 char hex string)
 * ```
 */
export function generateCacheKey(content: string, model: string, temperature: number): string {
  const input = `${content}|${model}|${temperature}`
  return createHash('sha256').update(input).digest('hex')
}

/**
 * Check whether an entry written at `timestamp` (epoch ms) is still fresh.
 * A TTL of zero or less means entries never expire.
 */
export function isFresh(timestamp: number, ttlSeconds: number, now: number = Date.now()): boolean {
  if (ttlSeconds <= 0) return true
  return now - timestamp < ttlSeconds * 1000
}
