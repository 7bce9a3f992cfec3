/**
 * LLM Response Caching Types
 *
 * Pluggable caching interface for memoizing completion calls.
 * Implementations: MemoryCache (process-local), DiskCache (SQLite file).
 */

/**
 * Any value that survives a JSON round trip.
 * `undefined` is never a cache value: it means "not found".
 * Numbers must be finite; DiskCache refuses NaN and Infinity.
 */
export type CacheValue =
  | string
  | number
  | boolean
  | null
  | readonly CacheValue[]
  | { readonly [key: string]: CacheValue }

/**
 * A stored entry. Timestamp is epoch milliseconds at write time.
 */
export interface CacheEntry {
  readonly key: string
  readonly value: CacheValue
  readonly timestamp: number
}

export interface CacheStatistics {
  readonly hits: number
  readonly misses: number
  /** Live count, computed at call time */
  readonly entries: number
}

/**
 * Capability set every cache backend implements.
 *
 * None of these throw: storage failures degrade to a miss or a `false`
 * result so a broken cache only ever makes the pipeline slower.
 */
export interface CacheBackend {
  /** Backend-wide time-to-live in seconds. Zero or negative never expires. */
  readonly ttlSeconds: number

  /**
   * Look up a value. Stale entries are removed and counted as a miss.
   * @returns The cached value, or undefined if absent or stale
   */
  get(key: string): CacheValue | undefined

  /**
   * Insert or replace an entry, stamped with the current time.
   * @returns false only when the storage layer failed
   */
  set(key: string, value: CacheValue): boolean

  /**
   * @returns Whether an entry existed and was removed
   */
  delete(key: string): boolean

  /** Remove all entries. Hit/miss counters are kept. */
  clear(): boolean

  getStatistics(): CacheStatistics

  isFresh(timestamp: number): boolean

  generateKey(content: string, model: string, temperature: number): string
}

export type CacheKind = 'memory' | 'disk'

export const CACHE_KINDS: readonly CacheKind[] = ['memory', 'disk']

/**
 * Factory input. `kind` is a plain string because it usually comes straight
 * from the environment; the factory validates it.
 */
export interface CacheOptions {
  readonly kind: string
  /** SQLite file path for the disk backend (default: ~/.taskspec/cache.db) */
  readonly location?: string | undefined
  /** Time-to-live in seconds (default: 24 hours) */
  readonly ttlSeconds?: number | undefined
}

/**
 * Default TTL for cached responses (24 hours)
 */
export const DEFAULT_CACHE_TTL_SECONDS = 24 * 60 * 60
