/**
 * Disk-based Response Cache
 *
 * Stores cached completions in a single SQLite file so they survive
 * process restarts. Hit/miss counters are persisted alongside the entries.
 *
 * Schema:
 * ```
 * cache(key TEXT PRIMARY KEY, value TEXT, timestamp INTEGER)  -- value is JSON
 * stats(name TEXT PRIMARY KEY, value INTEGER)                 -- 'hits', 'misses'
 * ```
 *
 * Every operation opens its own connection and runs as one transaction,
 * so several processes can share the file. Storage failures never escape:
 * they are logged and turned into a miss / false / 0.
 */

import { mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import Database from 'better-sqlite3'
import type { Logger } from '../logger'
import { BaseCache } from './base'
import { type CacheStatistics, type CacheValue, DEFAULT_CACHE_TTL_SECONDS } from './types'

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cache (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL,
    timestamp INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS cache_timestamp ON cache (timestamp);
  CREATE TABLE IF NOT EXISTS stats (
    name TEXT PRIMARY KEY,
    value INTEGER NOT NULL
  );
  INSERT OR IGNORE INTO stats (name, value) VALUES ('hits', 0), ('misses', 0);
`

interface CacheRow {
  value: string
  timestamp: number
}

interface StatRow {
  name: string
  value: number
}

interface CountRow {
  count: number
}

type StorageResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string }

type Lookup =
  | { readonly status: 'hit'; readonly value: CacheValue }
  | { readonly status: 'missing' | 'expired' | 'corrupt' }

const EMPTY_STATISTICS: CacheStatistics = { hits: 0, misses: 0, entries: 0 }

/**
 * Default cache file: ~/.taskspec/cache.db
 */
export function defaultCachePath(): string {
  return join(homedir(), '.taskspec', 'cache.db')
}

function parseValue(raw: string): StorageResult<CacheValue> {
  try {
    const value: CacheValue = JSON.parse(raw)
    return { ok: true, value }
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) }
  }
}

/**
 * Serialize a value for storage. JSON has no NaN or Infinity, so those are
 * rejected rather than written back as null.
 */
function encodeValue(value: CacheValue): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item === 'number' && !Number.isFinite(item)) {
      throw new TypeError(`Cannot store non-finite number ${item}`)
    }
    return item
  })
}

export class DiskCache extends BaseCache {
  readonly location: string

  constructor(
    location: string = defaultCachePath(),
    ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS,
    logger?: Logger
  ) {
    super(ttlSeconds, logger)
    this.location = location

    const init = this.withConnection((db) => db.exec(SCHEMA), true)
    if (!init.ok) this.report('init', init.error)
  }

  get(key: string): CacheValue | undefined {
    const result = this.withConnection((db) =>
      db.transaction((): Lookup => {
        const row = db
          .prepare<[string], CacheRow>('SELECT value, timestamp FROM cache WHERE key = ?')
          .get(key)
        const lookup = this.inspect(row)

        // Drop expired and unreadable rows
        if (lookup.status === 'expired' || lookup.status === 'corrupt') {
          db.prepare('DELETE FROM cache WHERE key = ?').run(key)
        }
        db.prepare('UPDATE stats SET value = value + 1 WHERE name = ?').run(
          lookup.status === 'hit' ? 'hits' : 'misses'
        )
        return lookup
      })()
    )

    if (!result.ok) {
      this.report('get', result.error)
      return undefined
    }
    const lookup = result.value
    if (lookup.status === 'hit') return lookup.value
    if (lookup.status !== 'missing') {
      this.logger?.verbose(`cache: ${lookup.status} ${key.slice(0, 12)}`)
    }
    return undefined
  }

  set(key: string, value: CacheValue): boolean {
    const result = this.withConnection((db) => {
      const payload = encodeValue(value)
      db.prepare(
        `INSERT INTO cache (key, value, timestamp) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, timestamp = excluded.timestamp`
      ).run(key, payload, Date.now())
    })
    if (!result.ok) this.report('set', result.error)
    return result.ok
  }

  delete(key: string): boolean {
    const result = this.withConnection(
      (db) => db.prepare('DELETE FROM cache WHERE key = ?').run(key).changes > 0
    )
    if (!result.ok) {
      this.report('delete', result.error)
      return false
    }
    return result.value
  }

  clear(): boolean {
    const result = this.withConnection((db) => {
      db.prepare('DELETE FROM cache').run()
    })
    if (!result.ok) this.report('clear', result.error)
    return result.ok
  }

  getStatistics(): CacheStatistics {
    const result = this.withConnection((db): CacheStatistics => {
      const counters = new Map(
        db
          .prepare<[], StatRow>('SELECT name, value FROM stats')
          .all()
          .map((row): [string, number] => [row.name, row.value])
      )
      const count = db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM cache').get()
      return {
        hits: counters.get('hits') ?? 0,
        misses: counters.get('misses') ?? 0,
        entries: count?.count ?? 0
      }
    })
    if (!result.ok) {
      this.report('stats', result.error)
      return EMPTY_STATISTICS
    }
    return result.value
  }

  /**
   * Remove every expired entry in one pass.
   * No-op when the TTL never expires entries.
   * @returns Number of entries removed
   */
  pruneExpired(): number {
    if (this.ttlSeconds <= 0) return 0

    const cutoff = Date.now() - this.ttlSeconds * 1000
    const result = this.withConnection(
      (db) => db.prepare('DELETE FROM cache WHERE timestamp <= ?').run(cutoff).changes
    )
    if (!result.ok) {
      this.report('prune', result.error)
      return 0
    }
    return result.value
  }

  private inspect(row: CacheRow | undefined): Lookup {
    if (!row) return { status: 'missing' }
    if (!this.isFresh(row.timestamp)) return { status: 'expired' }

    const parsed = parseValue(row.value)
    return parsed.ok ? { status: 'hit', value: parsed.value } : { status: 'corrupt' }
  }

  /**
   * Run `op` against a fresh connection, closing it afterwards.
   * Any thrown error is captured in the result.
   */
  private withConnection<T>(
    op: (db: Database.Database) => T,
    createDir = false
  ): StorageResult<T> {
    let db: Database.Database | undefined
    try {
      if (createDir) mkdirSync(dirname(this.location), { recursive: true })
      db = new Database(this.location)
      return { ok: true, value: op(db) }
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : String(error) }
    } finally {
      db?.close()
    }
  }

  private report(operation: string, error: string): void {
    this.logger?.verbose(`cache: ${operation} failed for ${this.location}: ${error}`)
  }
}
