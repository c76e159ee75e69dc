/**
 * Shared CLI helper utilities.
 *
 * WHY: Every command resolves the project directory and the ZENV_DIR
 * paths the same way, and all errors leave through handleCliError so
 * messages and exit codes stay consistent.
 */

import { access } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'

import chalk from 'chalk'

import {
  CONFIG_FILENAME,
  ConfigNotFoundError,
  errorHint,
  exitCodeFor,
  isDebugEnabled,
  isZenvError,
  type RegistryEntry,
} from '@zenv/core'
import { PathResolver, loadRegistry } from '@zenv/store'

/**
 * Common CLI options that most commands accept.
 */
export interface CommonOptions {
  project?: string | undefined
  zenvDir?: string | undefined
  json?: boolean | undefined
}

/**
 * Find the project root by walking up looking for zenv.json.
 */
export async function findProjectRoot(startDir: string = process.cwd()): Promise<string | null> {
  let dir = resolve(startDir)

  while (true) {
    try {
      await access(join(dir, CONFIG_FILENAME))
      return dir
    } catch {
      // not here; try the parent
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}

/**
 * Project directory from --project, or the nearest directory holding zenv.json.
 *
 * @throws ConfigNotFoundError if neither is available
 */
export async function resolveProjectDir(options: CommonOptions): Promise<string> {
  if (options.project) {
    return resolve(options.project)
  }
  const root = await findProjectRoot()
  if (!root) {
    throw new ConfigNotFoundError(join(process.cwd(), CONFIG_FILENAME))
  }
  return root
}

export function getPaths(options: CommonOptions): PathResolver {
  return new PathResolver({ zenvHome: options.zenvDir })
}

/**
 * Look up a registered environment by name, ID, ID prefix or `.`.
 *
 * @throws IdentifierNotFoundError | AmbiguousIdentifierError
 */
export async function resolveEntry(identifier: string, options: CommonOptions): Promise<RegistryEntry> {
  const registry = await loadRegistry(getPaths(options))
  return registry.resolve(identifier, { cwd: process.cwd() })
}

/**
 * Print an error with its hint and return the exit code for it.
 * Unexpected errors always print their stack; zenv errors only under ZENV_DEBUG.
 */
export function handleCliError(error: unknown): number {
  const message = error instanceof Error ? error.message : String(error)
  console.error(chalk.red(`Error: ${message}`))

  if (isZenvError(error) && error.cause instanceof Error) {
    console.error(chalk.gray(`  Cause: ${error.cause.message}`))
  }

  const hint = errorHint(error)
  if (hint) {
    console.error(chalk.gray(hint))
  }

  if (error instanceof Error && error.stack && (!isZenvError(error) || isDebugEnabled())) {
    console.error(chalk.gray(error.stack))
  }
  return exitCodeFor(error)
}
