/**
 * Registering and deregistering environments (register, deregister, rm).
 *
 * Each operation holds the registry lock across load, mutate and save.
 */

import { rm } from 'node:fs/promises'

import type { RegistryEntry } from '@zenv/core'
import {
  type PathResolver,
  type RegisterResult,
  type ResolveOptions,
  loadRegistry,
  withRegistryLock,
} from '@zenv/store'

import { type PreparedEnvironment, type PrepareOptions, prepareEnvironment } from './environment.js'

/**
 * Record an already prepared environment in the registry.
 */
export async function registerPrepared(
  prepared: PreparedEnvironment,
  paths: PathResolver
): Promise<RegisterResult> {
  const { settings } = prepared
  return withRegistryLock(paths, async () => {
    const registry = await loadRegistry(paths)
    const result = registry.register({
      name: settings.name,
      projectDir: prepared.projectDir,
      baseDir: settings.baseDir,
      description: settings.description,
      targetMachines: settings.targetMachines,
    })
    await registry.save()
    return result
  })
}

export interface RegisterEnvironmentOptions extends PrepareOptions {
  paths: PathResolver
}

export interface RegisterEnvironmentResult extends RegisterResult {
  prepared: PreparedEnvironment
}

/**
 * Validate an environment from zenv.json and register it without building.
 */
export async function registerEnvironment(
  options: RegisterEnvironmentOptions
): Promise<RegisterEnvironmentResult> {
  const prepared = await prepareEnvironment(options)
  const result = await registerPrepared(prepared, options.paths)
  return { ...result, prepared }
}

export interface DeregisterOptions extends ResolveOptions {
  paths: PathResolver
  /** Also delete the venv directory */
  removeVenv?: boolean | undefined
}

/**
 * Remove the entry `identifier` resolves to and save. Nothing is written
 * when resolution fails.
 *
 * @returns the removed entry
 * @throws IdentifierNotFoundError | AmbiguousIdentifierError
 */
export async function deregisterEnvironment(
  identifier: string,
  options: DeregisterOptions
): Promise<RegistryEntry> {
  const entry = await withRegistryLock(options.paths, async () => {
    const registry = await loadRegistry(options.paths)
    const target = registry.resolve(identifier, { cwd: options.cwd })
    registry.remove(target.id)
    await registry.save()
    return target
  })

  if (options.removeVenv) {
    await rm(entry.venvPath, { recursive: true, force: true })
  }
  return entry
}
