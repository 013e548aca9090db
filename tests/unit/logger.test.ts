import { describe, it, expect, vi, afterEach } from 'vitest'
import { consoleLogger, getLogger, noopLogger, setLogger } from '../../src/utils/logger'
import { createSpyLogger } from '../factories'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('is silent by default', () => {
    expect(getLogger()).toBe(noopLogger)
  })

  it('can be replaced globally', () => {
    const spy = createSpyLogger()
    setLogger(spy)
    getLogger().info('hello')
    expect(spy.info).toHaveBeenCalledWith('hello')
  })

  it('prefixes console output with the level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})

    consoleLogger.info('grid ready', { precision: 4 })
    consoleLogger.error('failed')
    consoleLogger.error('failed', new Error('cause'))

    expect(info).toHaveBeenCalledWith('[INFO] grid ready', { precision: 4 })
    expect(error).toHaveBeenNthCalledWith(1, '[ERROR] failed')
    expect(error).toHaveBeenNthCalledWith(2, '[ERROR] failed', new Error('cause'))
  })
})
