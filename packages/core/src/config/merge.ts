/**
 * Merge the common section into a named environment.
 */

import { EnvironmentNotFoundError } from '../errors.js'
import { deriveClusterName } from '../hostname/cluster.js'
import {
  DEFAULT_PYTHON_EXECUTABLE,
  type EffectiveConfig,
  type TargetMachines,
  type ZenvConfig,
} from '../types/config.js'

export interface MergeOptions {
  /**
   * Current hostname. Used to derive a cluster target when the
   * environment does not declare target_machines.
   */
  hostname?: string | undefined
}

/**
 * Normalize target_machines to a fresh list.
 */
export function toPatternList(targets: TargetMachines | undefined): string[] {
  if (targets === undefined) return []
  return typeof targets === 'string' ? [targets] : [...targets]
}

/**
 * Build the effective configuration for `envName`.
 *
 * Scalars come from the environment, then common, then defaults. List
 * fields are common followed by environment, without deduplication.
 * Activation variables from the environment override common ones.
 *
 * @throws EnvironmentNotFoundError if `envName` is not a section of the config
 */
export function mergeEnvironment(
  config: ZenvConfig,
  envName: string,
  options: MergeOptions = {}
): EffectiveConfig {
  const env = Object.hasOwn(config.environments, envName) ? config.environments[envName] : undefined
  if (!env) {
    throw new EnvironmentNotFoundError(envName, Object.keys(config.environments))
  }
  const common = config.common

  const explicitTargets = env.target_machines !== undefined
  let targetMachines = toPatternList(env.target_machines)
  if (!explicitTargets && options.hostname) {
    targetMachines = [deriveClusterName(options.hostname)]
  }

  return {
    name: envName,
    baseDir: config.baseDir ?? common.base_dir ?? '',
    pythonExecutable: env.python_executable ?? common.python_executable ?? DEFAULT_PYTHON_EXECUTABLE,
    targetMachines,
    explicitTargets,
    description: env.description ?? common.description,
    dependencyFile: env.dependency_file !== undefined ? env.dependency_file : common.dependency_file,
    modules: [...(common.modules ?? []), ...(env.modules ?? [])],
    dependencies: [...(common.dependencies ?? []), ...(env.dependencies ?? [])],
    customActivateVars: { ...common.custom_activate_vars, ...env.custom_activate_vars },
    setupCommands: [...(common.setup_commands ?? []), ...(env.setup_commands ?? [])],
  }
}

/**
 * Environment names in file order.
 */
export function listEnvironmentNames(config: ZenvConfig): string[] {
  return Object.keys(config.environments)
}
