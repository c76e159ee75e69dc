/**
 * Path management for zenv state.
 *
 * WHY: The registry lives in one user-scoped directory (ZENV_DIR, default
 * ~/.zenv) so environments can be found from anywhere on the filesystem.
 *
 * ~/.zenv/
 * ├── registry.json   # All registered environments
 * └── registry.lock   # proper-lockfile target for registry mutations
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

export const DEFAULT_ZENV_HOME = join(homedir(), '.zenv')

export const REGISTRY_FILENAME = 'registry.json'

export const REGISTRY_LOCK_FILENAME = 'registry.lock'

/**
 * Uses ZENV_DIR if set and non-empty, otherwise ~/.zenv
 */
export function getZenvHome(env: NodeJS.ProcessEnv = process.env): string {
  const value = env['ZENV_DIR']
  return value ? value : DEFAULT_ZENV_HOME
}

export interface PathOptions {
  /** Override ZENV_DIR */
  zenvHome?: string | undefined
}

export class PathResolver {
  readonly zenvHome: string

  constructor(options: PathOptions = {}) {
    this.zenvHome = options.zenvHome ?? getZenvHome()
  }

  get registry(): string {
    return join(this.zenvHome, REGISTRY_FILENAME)
  }

  get registryLock(): string {
    return join(this.zenvHome, REGISTRY_LOCK_FILENAME)
  }
}
