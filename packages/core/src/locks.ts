/**
 * Advisory file locking around registry mutations.
 *
 * Uses proper-lockfile, which creates a `<path>.lock` directory next to
 * the locked file and treats it as stale after `stale` milliseconds.
 */

import { access, mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import lockfile from 'proper-lockfile'

import { createDebugLog } from './debug.js'
import { LockError, LockTimeoutError } from './errors.js'

const debugLog = createDebugLog('lock')

export interface LockOptions {
  /** Stale lock threshold in milliseconds (default: 10000) */
  stale?: number
  /** Number of 100ms retries before giving up (default: 100) */
  retries?: number
}

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  stale: 10000,
  retries: 100,
}

const RETRY_INTERVAL_MS = 100

export interface LockHandle {
  release: () => Promise<void>
  path: string
}

async function ensureLockFile(lockPath: string): Promise<void> {
  await mkdir(dirname(lockPath), { recursive: true })
  try {
    await access(lockPath)
  } catch {
    await writeFile(lockPath, '')
  }
}

/**
 * Acquire a lock on a file, creating it if needed.
 *
 * @throws LockTimeoutError if another process keeps holding the lock
 * @throws LockError for other lock failures
 */
export async function acquireLock(lockPath: string, options: LockOptions = {}): Promise<LockHandle> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options }
  await ensureLockFile(lockPath)

  let release: () => Promise<void>
  try {
    release = await lockfile.lock(lockPath, {
      stale: opts.stale,
      retries: {
        retries: opts.retries,
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS,
        factor: 1,
      },
    })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    if (message.includes('ELOCKED') || message.includes('already being held')) {
      throw new LockTimeoutError(lockPath, opts.retries * RETRY_INTERVAL_MS)
    }
    throw new LockError(message, lockPath)
  }
  debugLog('acquired', lockPath)

  return {
    path: lockPath,
    release: async () => {
      try {
        await release()
        debugLog('released', lockPath)
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        if (!message.includes('not acquired') && !message.includes('already released')) {
          throw new LockError(`failed to release: ${message}`, lockPath)
        }
      }
    },
  }
}

export async function isLocked(lockPath: string): Promise<boolean> {
  try {
    await access(lockPath)
  } catch {
    return false
  }
  return lockfile.check(lockPath)
}

/**
 * Run `fn` while holding the lock on `lockPath`.
 */
export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const handle = await acquireLock(lockPath, options)
  try {
    return await fn()
  } finally {
    await handle.release()
  }
}
