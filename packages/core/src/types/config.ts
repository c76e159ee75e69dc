/**
 * zenv.json configuration types.
 *
 * Field names follow the on-disk JSON (snake_case); the merged
 * EffectiveConfig is camelCase and owned by the caller.
 */

/** One pattern string, or an ordered list of them */
export type TargetMachines = string | string[]

/** Fields an environment section and the common section share */
export interface LayeredFields {
  description?: string
  /** Interpreter used to create the venv */
  python_executable?: string
  /** requirements.txt or pyproject.toml, relative to the project directory; null for none */
  dependency_file?: string | null
  /** HPC modules loaded before the venv is created and on activation */
  modules?: string[]
  /** pip requirement specifiers */
  dependencies?: string[]
  /** Exported by activate.sh */
  custom_activate_vars?: Record<string, string>
  /** Shell commands run after dependency installation */
  setup_commands?: string[]
}

/** The reserved `common` section */
export interface CommonSection extends LayeredFields {
  base_dir?: string
  dependency_file: string | null
}

/** A named environment section */
export interface EnvironmentSection extends LayeredFields {
  target_machines?: TargetMachines
}

/** Raw zenv.json document as validated by the schema */
export interface ZenvConfigFile {
  base_dir?: string
  common: CommonSection
  [envName: string]: EnvironmentSection | CommonSection | string | undefined
}

/** Parsed configuration with environments split out of the top level */
export interface ZenvConfig {
  /** Top-level base_dir override, if present */
  baseDir?: string | undefined
  common: CommonSection
  /** Environment sections in file order */
  environments: Record<string, EnvironmentSection>
}

/**
 * Fully merged settings for one environment.
 */
export interface EffectiveConfig {
  readonly name: string
  readonly baseDir: string
  readonly pythonExecutable: string
  /** Empty means any host */
  readonly targetMachines: readonly string[]
  /** True when target_machines came from the config rather than the hostname */
  readonly explicitTargets: boolean
  readonly description?: string | undefined
  readonly dependencyFile: string | null
  readonly modules: readonly string[]
  readonly dependencies: readonly string[]
  readonly customActivateVars: Readonly<Record<string, string>>
  readonly setupCommands: readonly string[]
}

/** Interpreter used when neither the environment nor common names one */
export const DEFAULT_PYTHON_EXECUTABLE = 'python3'

/** Reserved top-level keys that are not environment names */
export const RESERVED_SECTIONS = ['common', 'base_dir'] as const
