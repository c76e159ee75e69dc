/**
 * Environment selection: load zenv.json, pick the environment, merge it
 * and check it against the current host.
 *
 * WHY: setup, register and show all need the same validated view of one
 * environment; this keeps the hostname rules in one place.
 */

import { join, resolve } from 'node:path'

import {
  AmbiguousEnvironmentError,
  CONFIG_FILENAME,
  type EffectiveConfig,
  EnvironmentNotFoundError,
  type HostnameSourceOptions,
  MissingHostnameError,
  type ZenvConfig,
  assertEligible,
  createDebugLog,
  deriveClusterName,
  getHostname,
  isUniversalPattern,
  matchesPattern,
  mergeEnvironment,
  readZenvJson,
  toPatternList,
  validateEnvironment,
} from '@zenv/core'

const debugLog = createDebugLog('environment')

export interface ProjectConfig {
  projectDir: string
  configPath: string
  config: ZenvConfig
}

export async function loadProjectConfig(dir: string): Promise<ProjectConfig> {
  const projectDir = resolve(dir)
  const configPath = join(projectDir, CONFIG_FILENAME)
  const config = await readZenvJson(configPath)
  return { projectDir, configPath, config }
}

/**
 * Pick the environment meant for `hostname` when none was named.
 *
 * Candidates are environments whose declared, non-universal targets match
 * the host. With none, an environment named after the cluster is used.
 *
 * @throws AmbiguousEnvironmentError if several environments target the host
 * @throws EnvironmentNotFoundError if none does
 */
export function detectEnvironment(config: ZenvConfig, hostname: string): string {
  const candidates = Object.entries(config.environments)
    .filter(([, section]) => {
      const patterns = toPatternList(section.target_machines).filter((p) => !isUniversalPattern(p))
      return patterns.some((p) => matchesPattern(hostname, p))
    })
    .map(([name]) => name)

  const [only] = candidates
  if (only !== undefined && candidates.length === 1) {
    return only
  }
  if (candidates.length > 1) {
    throw new AmbiguousEnvironmentError(`Several environments target ${hostname}`, candidates)
  }

  const cluster = deriveClusterName(hostname)
  if (Object.hasOwn(config.environments, cluster)) {
    return cluster
  }
  throw new EnvironmentNotFoundError(cluster, Object.keys(config.environments))
}

export interface PrepareOptions {
  projectDir: string
  /** Environment to use; detected from the hostname when omitted */
  envName?: string | undefined
  /** Skip the target-machine check (`--no-host`) */
  skipHostnameCheck?: boolean | undefined
  hostnameSource?: HostnameSourceOptions | undefined
}

export interface PreparedEnvironment extends ProjectConfig {
  settings: EffectiveConfig
  /** Undefined only when the hostname check was skipped and no source worked */
  hostname: string | undefined
}

async function resolveHostname(options: PrepareOptions): Promise<string | undefined> {
  try {
    return await getHostname(options.hostnameSource)
  } catch (err) {
    if (err instanceof MissingHostnameError && options.skipHostnameCheck === true) {
      debugLog('no hostname; check skipped')
      return undefined
    }
    throw err
  }
}

/**
 * Load, select, merge, validate and check eligibility of one environment.
 *
 * @throws ConfigError | EnvironmentError subclasses
 */
export async function prepareEnvironment(options: PrepareOptions): Promise<PreparedEnvironment> {
  const project = await loadProjectConfig(options.projectDir)
  const hostname = await resolveHostname(options)

  let envName = options.envName
  if (envName === undefined) {
    if (hostname === undefined) {
      throw new MissingHostnameError()
    }
    envName = detectEnvironment(project.config, hostname)
    debugLog('detected', envName, 'for', hostname)
  }

  const settings = mergeEnvironment(project.config, envName, { hostname })
  validateEnvironment(settings, project.configPath)
  if (hostname !== undefined) {
    assertEligible(settings, { hostname, skipHostnameCheck: options.skipHostnameCheck })
  }

  return { ...project, settings, hostname }
}
