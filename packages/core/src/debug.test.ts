import { afterEach, describe, expect, it, vi } from 'vitest'

import { createDebugLog, isDebugEnabled } from './debug.js'

describe('isDebugEnabled', () => {
  it('accepts 1, true and yes in any case', () => {
    expect(isDebugEnabled({ ZENV_DEBUG: '1' })).toBe(true)
    expect(isDebugEnabled({ ZENV_DEBUG: 'TRUE' })).toBe(true)
    expect(isDebugEnabled({ ZENV_DEBUG: 'yes' })).toBe(true)
  })

  it('is off when unset or set to anything else', () => {
    expect(isDebugEnabled({})).toBe(false)
    expect(isDebugEnabled({ ZENV_DEBUG: '0' })).toBe(false)
    expect(isDebugEnabled({ ZENV_DEBUG: '' })).toBe(false)
  })
})

describe('createDebugLog', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('writes scoped lines to stderr when enabled', () => {
    vi.stubEnv('ZENV_DEBUG', '1')
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    createDebugLog('registry')('loaded', 3)
    expect(spy).toHaveBeenCalledWith('[zenv registry]', 'loaded', 3)
  })

  it('stays silent when disabled', () => {
    vi.stubEnv('ZENV_DEBUG', '0')
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
    createDebugLog('registry')('loaded')
    expect(spy).not.toHaveBeenCalled()
  })
})
