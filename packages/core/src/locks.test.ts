/**
 * Tests for registry locking.
 *
 * WHY: Concurrent register/deregister calls from two shells must not
 * interleave their read-modify-write of registry.json.
 */

import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { LockTimeoutError } from './errors.js'
import { acquireLock, isLocked, withLock } from './locks.js'

describe('locks', () => {
  let dir: string
  let lockPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'zenv-lock-'))
    lockPath = join(dir, 'state', 'registry.lock')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates the lock target and reports it as locked while held', async () => {
    const handle = await acquireLock(lockPath)
    expect(handle.path).toBe(lockPath)
    expect(await isLocked(lockPath)).toBe(true)
    await handle.release()
    expect(await isLocked(lockPath)).toBe(false)
  })

  it('reports a missing file as unlocked', async () => {
    expect(await isLocked(join(dir, 'nope'))).toBe(false)
  })

  it('times out when the lock is already held', async () => {
    const handle = await acquireLock(lockPath)
    try {
      await expect(acquireLock(lockPath, { retries: 1 })).rejects.toBeInstanceOf(LockTimeoutError)
    } finally {
      await handle.release()
    }
  })

  it('withLock returns the callback result and releases afterwards', async () => {
    const result = await withLock(lockPath, async () => {
      expect(await isLocked(lockPath)).toBe(true)
      return 42
    })
    expect(result).toBe(42)
    expect(await isLocked(lockPath)).toBe(false)
  })

  it('withLock releases when the callback throws', async () => {
    await expect(
      withLock(lockPath, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')
    expect(await isLocked(lockPath)).toBe(false)
  })
})
