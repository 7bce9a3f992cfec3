/**
 * Base Cache
 *
 * Holds the TTL and the key/freshness helpers common to all backends.
 */

import type { Logger } from '../logger'
import { generateCacheKey, isFresh } from './key'
import type { CacheBackend, CacheStatistics, CacheValue } from './types'

export abstract class BaseCache implements CacheBackend {
  constructor(
    readonly ttlSeconds: number,
    protected readonly logger?: Logger | undefined
  ) {}

  abstract get(key: string): CacheValue | undefined
  abstract set(key: string, value: CacheValue): boolean
  abstract delete(key: string): boolean
  abstract clear(): boolean
  abstract getStatistics(): CacheStatistics

  isFresh(timestamp: number): boolean {
    return isFresh(timestamp, this.ttlSeconds)
  }

  generateKey(content: string, model: string, temperature: number): string {
    return generateCacheKey(content, model, temperature)
  }
}
