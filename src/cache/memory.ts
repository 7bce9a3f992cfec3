/**
 * In-Memory Response Cache
 *
 * Process-local cache backed by a Map. Fastest backend, gone when the
 * process exits.
 */

import type { Logger } from '../logger'
import { BaseCache } from './base'
import {
  type CacheEntry,
  type CacheStatistics,
  type CacheValue,
  DEFAULT_CACHE_TTL_SECONDS
} from './types'

export class MemoryCache extends BaseCache {
  private entries = new Map<string, CacheEntry>()
  private hits = 0
  private misses = 0

  constructor(ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS, logger?: Logger) {
    super(ttlSeconds, logger)
  }

  get(key: string): CacheValue | undefined {
    const entry = this.entries.get(key)

    if (!entry) {
      this.misses++
      return undefined
    }

    if (!this.isFresh(entry.timestamp)) {
      this.delete(key)
      this.logger?.verbose(`cache: expired ${key.slice(0, 12)}`)
      this.misses++
      return undefined
    }

    this.hits++
    return entry.value
  }

  set(key: string, value: CacheValue): boolean {
    this.entries.set(key, { key, value, timestamp: Date.now() })
    return true
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }

  clear(): boolean {
    this.entries = new Map()
    return true
  }

  getStatistics(): CacheStatistics {
    return { hits: this.hits, misses: this.misses, entries: this.entries.size }
  }
}
