/**
 * Environment registry: the durable catalog of environments across the
 * filesystem, stored as one JSON document under ZENV_DIR.
 *
 * A Registry is loaded once per command, mutated in memory and written
 * back whole with save(). Mutating commands should hold the registry lock
 * (see withRegistryLock) across load → mutate → save.
 */

import { createHash, randomBytes } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import { isAbsolute, join, resolve } from 'node:path'

import {
  DEFAULT_BASE_DIR,
  IdentifierNotFoundError,
  REGISTRY_FORMAT_VERSION,
  type RegistryEntry,
  type RegistryFile,
  type RegistryFileEntry,
  RegistryFormatError,
  RegistryIoError,
  atomicWriteJson,
  createDebugLog,
  validateRegistryFile,
  withLock,
} from '@zenv/core'

import type { PathResolver } from './paths.js'
import { type ResolveOptions, resolveIdentifier } from './resolve.js'

const debugLog = createDebugLog('registry')

/** Stored target string for an environment without target restrictions */
export const ANY_TARGET = 'any'

// ============================================================================
// Helpers
// ============================================================================

export interface IdSeed {
  name: string
  projectDir: string
  targetMachines: string
  /** Registration time */
  now: Date
  /** Random bytes mixed in so repeated registrations differ (default: 16 random bytes) */
  nonce?: string | undefined
}

/**
 * SHA-256 over project dir, name, targets, time and a nonce, as 64
 * lowercase hex characters.
 */
export function generateEnvironmentId(seed: IdSeed): string {
  const hash = createHash('sha256')
  hash.update(seed.projectDir)
  hash.update('\0')
  hash.update(seed.name)
  hash.update('\0')
  hash.update(seed.targetMachines)
  hash.update('\0')
  hash.update(seed.now.toISOString())
  hash.update('\0')
  hash.update(seed.nonce ?? randomBytes(16).toString('hex'))
  return hash.digest('hex')
}

/**
 * Join target patterns for storage; an empty list is stored as "any".
 */
export function joinTargetMachines(patterns: readonly string[]): string {
  return patterns.length > 0 ? patterns.join(',') : ANY_TARGET
}

export function splitTargetMachines(stored: string): string[] {
  return stored
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
}

/**
 * venv location: `baseDir/name` for an absolute base dir, otherwise
 * `projectDir/baseDir/name`.
 */
export function computeVenvPath(projectDir: string, baseDir: string, name: string): string {
  return isAbsolute(baseDir) ? join(baseDir, name) : join(projectDir, baseDir, name)
}

function fromFileEntry(raw: RegistryFileEntry): RegistryEntry {
  const projectDir = raw.project_dir
  const targetMachines = raw.target_machines ?? raw.target_machine ?? ANY_TARGET
  return {
    id:
      raw.id ??
      generateEnvironmentId({ name: raw.name, projectDir, targetMachines, now: new Date() }),
    name: raw.name,
    projectDir,
    venvPath: raw.venv_path ?? computeVenvPath(projectDir, DEFAULT_BASE_DIR, raw.name),
    targetMachines,
    description: raw.description ?? undefined,
    registeredAt: raw.registered_at,
  }
}

function toFileEntry(entry: RegistryEntry): RegistryFileEntry {
  const out: RegistryFileEntry = {
    id: entry.id,
    name: entry.name,
    project_dir: entry.projectDir,
    venv_path: entry.venvPath,
    target_machines: entry.targetMachines,
  }
  if (entry.description !== undefined) {
    out.description = entry.description
  }
  if (entry.registeredAt !== undefined) {
    out.registered_at = entry.registeredAt
  }
  return out
}

// ============================================================================
// Registry
// ============================================================================

export interface RegisterOptions {
  name: string
  projectDir: string
  /** Merged base_dir; relative values are resolved against projectDir */
  baseDir: string
  description?: string | undefined
  targetMachines: readonly string[]
  /** Registration time (default: now) */
  now?: Date | undefined
}

export interface RegisterResult {
  entry: RegistryEntry
  /** "updated" when an entry for the same name and project dir already existed */
  action: 'created' | 'updated'
}

export class Registry {
  readonly path: string
  private items: RegistryEntry[]

  private constructor(path: string, entries: RegistryEntry[]) {
    this.path = path
    this.items = entries
  }

  static empty(path: string): Registry {
    return new Registry(path, [])
  }

  /**
   * Parse registry.json content.
   *
   * @throws RegistryFormatError for invalid JSON, schema violations or duplicate IDs
   */
  static parse(content: string, path: string): Registry {
    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new RegistryFormatError(`invalid JSON (${message})`, path)
    }

    const result = validateRegistryFile(parsed)
    if (!result.valid) {
      const details = result.errors.map((e) => `${e.path} ${e.message}`).join('; ')
      throw new RegistryFormatError(details, path)
    }

    const entries = result.data.environments.map(fromFileEntry)
    const ids = new Set<string>()
    for (const entry of entries) {
      if (ids.has(entry.id)) {
        throw new RegistryFormatError(`duplicate environment id ${entry.id}`, path)
      }
      ids.add(entry.id)
    }
    return new Registry(path, entries)
  }

  /**
   * Load the registry; a missing file yields an empty registry.
   *
   * @throws RegistryFormatError if the file is malformed
   * @throws RegistryIoError if it exists but cannot be read
   */
  static async load(path: string): Promise<Registry> {
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        debugLog('no registry at', path)
        return Registry.empty(path)
      }
      throw new RegistryIoError('Failed to read registry', path, { cause: err })
    }
    const registry = Registry.parse(content, path)
    debugLog('loaded', registry.size, 'entries from', path)
    return registry
  }

  get entries(): readonly RegistryEntry[] {
    return this.items
  }

  get size(): number {
    return this.items.length
  }

  /**
   * Add an environment, or update the entry registered under the same
   * name and project directory (keeping its ID).
   */
  register(options: RegisterOptions): RegisterResult {
    const projectDir = resolve(options.projectDir)
    const venvPath = computeVenvPath(projectDir, options.baseDir, options.name)
    const targetMachines = joinTargetMachines(options.targetMachines)
    const now = options.now ?? new Date()

    const existing = this.items.find((e) => e.name === options.name && e.projectDir === projectDir)
    if (existing) {
      existing.venvPath = venvPath
      existing.targetMachines = targetMachines
      existing.description = options.description
      existing.registeredAt = now.toISOString()
      debugLog('updated', existing.id)
      return { entry: existing, action: 'updated' }
    }

    let id = generateEnvironmentId({ name: options.name, projectDir, targetMachines, now })
    while (this.items.some((e) => e.id === id)) {
      id = generateEnvironmentId({ name: options.name, projectDir, targetMachines, now })
    }

    const entry: RegistryEntry = {
      id,
      name: options.name,
      projectDir,
      venvPath,
      targetMachines,
      description: options.description,
      registeredAt: now.toISOString(),
    }
    this.items.push(entry)
    debugLog('created', id)
    return { entry, action: 'created' }
  }

  /**
   * Exact lookup by full ID or name; no prefix matching.
   */
  lookup(identifier: string): RegistryEntry | undefined {
    return this.items.find((e) => e.id === identifier) ?? this.items.find((e) => e.name === identifier)
  }

  /**
   * Resolve `identifier` as `zenv` commands do.
   *
   * @throws IdentifierNotFoundError | AmbiguousIdentifierError
   */
  resolve(identifier: string, options: ResolveOptions = {}): RegistryEntry {
    return resolveIdentifier(this.items, identifier, options)
  }

  /**
   * Remove an entry by ID, returning it.
   */
  remove(id: string): RegistryEntry | undefined {
    const index = this.items.findIndex((e) => e.id === id)
    if (index === -1) return undefined
    const [removed] = this.items.splice(index, 1)
    return removed
  }

  /**
   * Remove the entry `identifier` resolves to. The venv on disk is not touched.
   *
   * @returns false if nothing matches
   * @throws AmbiguousIdentifierError if several entries match
   */
  deregister(identifier: string, options: ResolveOptions = {}): boolean {
    let entry: RegistryEntry
    try {
      entry = this.resolve(identifier, options)
    } catch (err) {
      if (err instanceof IdentifierNotFoundError) {
        return false
      }
      throw err
    }
    return this.remove(entry.id) !== undefined
  }

  /** Entries registered for `projectDir` */
  forProject(projectDir: string): RegistryEntry[] {
    const dir = resolve(projectDir)
    return this.items.filter((e) => resolve(e.projectDir) === dir)
  }

  toFile(): RegistryFile {
    return {
      version: REGISTRY_FORMAT_VERSION,
      environments: this.items.map(toFileEntry),
    }
  }

  serialize(): string {
    return `${JSON.stringify(this.toFile(), null, 2)}\n`
  }

  /**
   * Write the whole registry atomically.
   *
   * @throws RegistryIoError if the write fails
   */
  async save(): Promise<void> {
    try {
      await atomicWriteJson(this.path, this.toFile())
    } catch (err) {
      throw new RegistryIoError('Failed to write registry', this.path, { cause: err })
    }
    debugLog('saved', this.size, 'entries to', this.path)
  }
}

/**
 * Load the registry for `paths`.
 */
export async function loadRegistry(paths: PathResolver): Promise<Registry> {
  return Registry.load(paths.registry)
}

/**
 * Run `fn` holding the registry lock. Load the registry inside `fn` so the
 * read-modify-write happens under the lock.
 */
export async function withRegistryLock<T>(paths: PathResolver, fn: () => Promise<T>): Promise<T> {
  return withLock(paths.registryLock, fn)
}
