/**
 * Cache Module
 *
 * Memoizes completion calls by a fingerprint of (content, model, temperature).
 */

export { BaseCache } from './base'
export { DiskCache, defaultCachePath } from './disk'
export { CacheConfigError, createCache, isCacheKind, resolveCacheLocation } from './factory'
export { generateCacheKey, isFresh } from './key'
export { MemoryCache } from './memory'
export { type SetupCacheOptions, setupCache } from './setup'
export {
  CACHE_KINDS,
  type CacheBackend,
  type CacheEntry,
  type CacheKind,
  type CacheOptions,
  type CacheStatistics,
  type CacheValue,
  DEFAULT_CACHE_TTL_SECONDS
} from './types'
