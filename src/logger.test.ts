import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest'
import { createLogger } from './logger'

describe('createLogger', () => {
  let logSpy: MockInstance<typeof console.log>
  let errorSpy: MockInstance<typeof console.error>

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints log, success and error by default', () => {
    const logger = createLogger(false, false)
    logger.log('Clearing cache...')
    logger.success('Done')
    logger.verbose('hidden')
    logger.error('Failed')

    expect(logSpy.mock.calls).toEqual([['Clearing cache...'], ['  ✓ Done']])
    expect(errorSpy.mock.calls).toEqual([['  ✗ Failed']])
  })

  it('prints debug lines when verbose', () => {
    createLogger(false, true).verbose('cache hit: abc')
    expect(logSpy).toHaveBeenCalledWith('  [debug] cache hit: abc')
  })

  it('keeps errors when quiet', () => {
    const logger = createLogger(true, false)
    logger.log('hidden')
    logger.success('hidden')
    logger.error('Failed')

    expect(logSpy).not.toHaveBeenCalled()
    expect(errorSpy).toHaveBeenCalledWith('  ✗ Failed')
  })
})
