/**
 * Cache Factory
 *
 * Builds a configured backend from { kind, location, ttlSeconds }.
 * Misconfiguration fails here, at construction, never on first use.
 */

import type { Logger } from '../logger'
import { DiskCache, defaultCachePath } from './disk'
import { MemoryCache } from './memory'
import {
  CACHE_KINDS,
  type CacheBackend,
  type CacheKind,
  type CacheOptions,
  DEFAULT_CACHE_TTL_SECONDS
} from './types'

/**
 * Thrown for an unknown backend kind, a non-numeric TTL or an empty location.
 * The only error the cache lets escape.
 */
export class CacheConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CacheConfigError'
  }
}

export function isCacheKind(value: string): value is CacheKind {
  return CACHE_KINDS.some((kind) => kind === value)
}

/**
 * Resolve the disk cache file. An omitted location falls back to
 * ~/.taskspec/cache.db; an empty one is rejected.
 */
export function resolveCacheLocation(location: string | undefined): string {
  if (location === undefined) return defaultCachePath()
  if (location.trim() === '') {
    throw new CacheConfigError('Cache location must not be empty')
  }
  return location
}

/**
 * Create a cache backend.
 *
 * Location policy: `location` is optional for the disk backend and defaults
 * to ~/.taskspec/cache.db. It is ignored for the memory backend.
 *
 * @throws CacheConfigError on an unrecognized kind or invalid TTL
 *
 * @example
 * ```ts
 * const cache = createCache({ kind: 'disk', location: './cache.db', ttlSeconds: 3600 })
 * ```
 */
export function createCache(options: CacheOptions, logger?: Logger): CacheBackend {
  const { kind } = options
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS

  if (!isCacheKind(kind)) {
    throw new CacheConfigError(
      `Unsupported cache type: ${kind} (expected one of: ${CACHE_KINDS.join(', ')})`
    )
  }
  if (!Number.isFinite(ttlSeconds)) {
    throw new CacheConfigError(`Cache TTL must be a finite number of seconds, got ${ttlSeconds}`)
  }

  switch (kind) {
    case 'memory':
      return new MemoryCache(ttlSeconds, logger)
    case 'disk':
      return new DiskCache(resolveCacheLocation(options.location), ttlSeconds, logger)
  }
}
