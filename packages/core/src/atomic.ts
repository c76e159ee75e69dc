/**
 * Crash-safe file writes.
 *
 * Content goes to a sibling temp file which is fsynced and then renamed
 * over the target, so readers see either the old or the new file.
 */

import { randomBytes } from 'node:crypto'
import { mkdir, open, rename, unlink, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

export interface AtomicWriteOptions {
  /** File mode (default: 0o644) */
  mode?: number
  /** Whether to fsync before rename (default: true) */
  fsync?: boolean
}

const DEFAULT_OPTIONS: Required<AtomicWriteOptions> = {
  mode: 0o644,
  fsync: true,
}

function getTmpPath(targetPath: string): string {
  const rand = randomBytes(6).toString('hex')
  return join(dirname(targetPath), `.${basename(targetPath)}.${rand}.tmp`)
}

/**
 * Write content to a file atomically, creating parent directories.
 *
 * @throws the underlying fs error; the temp file is removed first
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const opts = { ...DEFAULT_OPTIONS, ...options }
  await mkdir(dirname(filePath), { recursive: true })

  const tmpPath = getTmpPath(filePath)
  try {
    await writeFile(tmpPath, content, { mode: opts.mode })
    if (opts.fsync) {
      const fd = await open(tmpPath, 'r')
      try {
        await fd.sync()
      } finally {
        await fd.close()
      }
    }
    await rename(tmpPath, filePath)
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined)
    throw err
  }
}

/**
 * Write pretty-printed JSON (two-space indent, trailing newline) atomically.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {}
): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(data, null, 2)}\n`, options)
}
