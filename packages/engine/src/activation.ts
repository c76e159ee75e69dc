/**
 * Using registered environments: activation paths, listing, setup logs
 * and running commands inside an environment.
 */

import { access, readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { EnvironmentNotReadyError, type RegistryEntry, matchesAnyPattern } from '@zenv/core'
import { type Registry, splitTargetMachines } from '@zenv/store'

import { type ExecResult, exec } from './exec.js'
import { ACTIVATE_SCRIPT_NAME, SETUP_LOG_NAME } from './scripts.js'

export function activateScriptPath(entry: RegistryEntry): string {
  return join(entry.venvPath, ACTIVATE_SCRIPT_NAME)
}

export function setupLogPath(entry: RegistryEntry): string {
  return join(entry.venvPath, SETUP_LOG_NAME)
}

async function requireFile(entry: RegistryEntry, path: string): Promise<string> {
  try {
    await access(path)
  } catch {
    throw new EnvironmentNotReadyError(entry.name, path)
  }
  return path
}

/**
 * Path of activate.sh, checked to exist.
 *
 * @throws EnvironmentNotReadyError if setup never completed
 */
export async function getActivationScript(entry: RegistryEntry): Promise<string> {
  return requireFile(entry, activateScriptPath(entry))
}

/**
 * @throws EnvironmentNotReadyError if there is no setup log
 */
export async function readSetupLog(entry: RegistryEntry): Promise<string> {
  return readFile(await requireFile(entry, setupLogPath(entry)), 'utf8')
}

export interface ListOptions {
  /** Hostname to filter by; ignored with `all` */
  hostname?: string | undefined
  all?: boolean | undefined
}

/**
 * Registry entries usable on `hostname`, or all of them.
 */
export function listEnvironments(registry: Registry, options: ListOptions = {}): RegistryEntry[] {
  const hostname = options.hostname
  if (options.all === true || hostname === undefined) {
    return [...registry.entries]
  }
  return registry.entries.filter((entry) =>
    matchesAnyPattern(hostname, splitTargetMachines(entry.targetMachines))
  )
}

/** Sources activate.sh ($1), then replaces itself with the command */
const RUN_WRAPPER = '. "$1" || exit 1; shift; exec "$@"'

/**
 * Run `command` inside the environment, attached to this terminal.
 *
 * @returns the command's exit code
 * @throws EnvironmentNotReadyError if setup never completed
 */
export async function runInEnvironment(
  entry: RegistryEntry,
  command: string,
  args: string[],
  run: typeof exec = exec
): Promise<ExecResult> {
  const script = await getActivationScript(entry)
  return run('/bin/sh', ['-c', RUN_WRAPPER, 'zenv-run', script, command, ...args], {
    inheritStdio: true,
  })
}
