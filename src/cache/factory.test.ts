import { existsSync, mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DiskCache } from './disk'
import { CacheConfigError, createCache, isCacheKind, resolveCacheLocation } from './factory'
import { MemoryCache } from './memory'
import { DEFAULT_CACHE_TTL_SECONDS } from './types'

// Redirect the user's home so the default location never touches the real one
const { homedirMock } = vi.hoisted(() => ({ homedirMock: vi.fn<() => string>() }))
vi.mock('node:os', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:os')>()
  return { ...actual, homedir: homedirMock }
})

describe('createCache', () => {
  let homeDir: string

  beforeEach(() => {
    homeDir = mkdtempSync(join(tmpdir(), 'taskspec-home-'))
    homedirMock.mockReturnValue(homeDir)
  })

  afterEach(() => {
    rmSync(homeDir, { recursive: true, force: true })
  })

  it('should create a memory cache', () => {
    const cache = createCache({ kind: 'memory', ttlSeconds: 60 })
    expect(cache).toBeInstanceOf(MemoryCache)
    expect(cache.ttlSeconds).toBe(60)
  })

  it('should create a disk cache at the given location', () => {
    const location = join(homeDir, 'custom', 'responses.db')
    const cache = createCache({ kind: 'disk', location, ttlSeconds: 60 })

    expect(cache).toBeInstanceOf(DiskCache)
    expect(cache instanceof DiskCache && cache.location).toBe(location)
    expect(existsSync(location)).toBe(true)
  })

  it('should fall back to ~/.taskspec/cache.db without a location', () => {
    const cache = createCache({ kind: 'disk' })
    const expected = join(homeDir, '.taskspec', 'cache.db')

    expect(cache instanceof DiskCache && cache.location).toBe(expected)
    expect(existsSync(expected)).toBe(true)
    expect(cache.set('abc', 'hello world')).toBe(true)
    expect(cache.get('abc')).toBe('hello world')
  })

  it('should default the TTL to 24 hours', () => {
    expect(createCache({ kind: 'memory' }).ttlSeconds).toBe(DEFAULT_CACHE_TTL_SECONDS)
    expect(DEFAULT_CACHE_TTL_SECONDS).toBe(86400)
  })

  it('should reject an unrecognized kind synchronously', () => {
    expect(() => createCache({ kind: 'redis' })).toThrow(CacheConfigError)
    expect(() => createCache({ kind: 'redis' })).toThrow(
      'Unsupported cache type: redis (expected one of: memory, disk)'
    )
  })

  it('should reject a non-finite TTL', () => {
    expect(() => createCache({ kind: 'memory', ttlSeconds: Number.NaN })).toThrow(
      CacheConfigError
    )
  })

  it('should reject an empty location', () => {
    expect(() => createCache({ kind: 'disk', location: '  ' })).toThrow(
      'Cache location must not be empty'
    )
  })

  it('should ignore the location for the memory cache', () => {
    expect(createCache({ kind: 'memory', location: '' })).toBeInstanceOf(MemoryCache)
  })
})

describe('resolveCacheLocation', () => {
  it('should keep an explicit location', () => {
    expect(resolveCacheLocation('/var/cache/taskspec.db')).toBe('/var/cache/taskspec.db')
  })
})

describe('isCacheKind', () => {
  it('should accept only memory and disk', () => {
    expect(isCacheKind('memory')).toBe(true)
    expect(isCacheKind('disk')).toBe(true)
    expect(isCacheKind('Disk')).toBe(false)
    expect(isCacheKind('')).toBe(false)
  })
})
