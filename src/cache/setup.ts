/**
 * Cache Setup
 *
 * Turns loaded configuration into the backend handed to the completion caller.
 */

import type { CacheSettings } from '../config'
import type { Logger } from '../logger'
import { createCache } from './factory'
import type { CacheBackend } from './types'

export interface SetupCacheOptions {
  /** Remove all entries before the run */
  clearCache?: boolean | undefined
  logger?: Logger | undefined
}

/**
 * Build the configured cache, or undefined when caching is disabled.
 *
 * @throws CacheConfigError for an unsupported cache type
 */
export function setupCache(
  settings: CacheSettings,
  options: SetupCacheOptions = {}
): CacheBackend | undefined {
  const { logger } = options
  if (!settings.enabled) {
    logger?.verbose('Caching disabled')
    return undefined
  }

  const cache = createCache(
    { kind: settings.kind, location: settings.location, ttlSeconds: settings.ttlSeconds },
    logger
  )
  logger?.verbose(`Caching enabled: ${settings.kind} with TTL: ${settings.ttlSeconds}s`)

  if (options.clearCache) {
    logger?.log('Clearing cache...')
    if (cache.clear()) {
      logger?.success('Cache cleared')
    } else {
      logger?.error('Failed to clear cache')
    }
  }

  const stats = cache.getStatistics()
  logger?.verbose(
    `Cache statistics: ${stats.entries} entries, ${stats.hits} hits, ${stats.misses} misses`
  )

  return cache
}
