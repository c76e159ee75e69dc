/**
 * zenv.json parser
 */

import { readFile } from 'node:fs/promises'

import { ConfigNotFoundError, ConfigParseError, ConfigReadError, ConfigValidationError } from '../errors.js'
import { type ValidationError, validateZenvConfigFile } from '../schemas/index.js'
import type { CommonSection, EnvironmentSection, ZenvConfig, ZenvConfigFile } from '../types/config.js'

export const CONFIG_FILENAME = 'zenv.json'

/** Default base_dir written by `zenv init` */
export const DEFAULT_BASE_DIR = 'zenv'

function isEnvironmentSection(
  value: ZenvConfigFile[string]
): value is EnvironmentSection {
  return typeof value === 'object' && value !== null
}

/**
 * Checks the schema cannot express: a base_dir must come from the top
 * level or from common.
 */
function checkRequiredFields(file: ZenvConfigFile): ValidationError[] {
  const errors: ValidationError[] = []
  if (file.base_dir === undefined && file.common.base_dir === undefined) {
    errors.push({
      path: '/common',
      message: 'must have required property "base_dir" (or set a top-level "base_dir")',
      keyword: 'required',
      params: { missingProperty: 'base_dir' },
    })
  }
  return errors
}

/**
 * Parse zenv.json content into a validated ZenvConfig
 *
 * @param content - Raw JSON string
 * @param filePath - Path to the file (for error messages)
 * @throws ConfigParseError if the JSON is invalid
 * @throws ConfigValidationError if schema or required-field checks fail
 */
export function parseZenvJson(content: string, filePath?: string): ZenvConfig {
  const source = filePath ?? CONFIG_FILENAME

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Invalid JSON: ${message}`, source)
  }

  const result = validateZenvConfigFile(parsed)
  if (!result.valid) {
    throw new ConfigValidationError(`Invalid ${CONFIG_FILENAME}`, source, result.errors)
  }

  const file = result.data
  const requiredErrors = checkRequiredFields(file)
  if (requiredErrors.length > 0) {
    throw new ConfigValidationError(`Invalid ${CONFIG_FILENAME}`, source, requiredErrors)
  }

  const environments: Record<string, EnvironmentSection> = {}
  for (const [key, value] of Object.entries(file)) {
    if (key === 'common' || key === 'base_dir') continue
    if (isEnvironmentSection(value)) {
      environments[key] = value
    }
  }

  return { baseDir: file.base_dir, common: file.common, environments }
}

/**
 * Read and parse a zenv.json file from disk
 *
 * @throws ConfigNotFoundError if the file does not exist
 * @throws ConfigReadError if it cannot be read
 */
export async function readZenvJson(filePath: string): Promise<ZenvConfig> {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigNotFoundError(filePath)
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigReadError(`Failed to read file: ${message}`, filePath, { cause: err })
  }
  return parseZenvJson(content, filePath)
}

/**
 * Serialize a ZenvConfig back to the on-disk layout (base_dir, common, then
 * environments in insertion order).
 */
export function serializeZenvJson(config: ZenvConfig): string {
  const out: Record<string, unknown> = {}
  if (config.baseDir !== undefined) {
    out['base_dir'] = config.baseDir
  }
  out['common'] = config.common
  for (const [name, section] of Object.entries(config.environments)) {
    out[name] = section
  }
  return `${JSON.stringify(out, null, 2)}\n`
}

export interface InitConfigOptions {
  envName: string
  description?: string | undefined
  targetMachines: string[]
  /** requirements.txt / pyproject.toml found in the project, if any */
  dependencyFile: string | null
  pythonExecutable?: string | undefined
}

/**
 * Starter configuration written by `zenv init`.
 */
export function createInitialConfig(options: InitConfigOptions): ZenvConfig {
  const common: CommonSection = {
    base_dir: DEFAULT_BASE_DIR,
    python_executable: options.pythonExecutable ?? 'python3',
    dependency_file: options.dependencyFile,
    modules: [],
    dependencies: [],
    custom_activate_vars: {},
    setup_commands: [],
  }
  const env: EnvironmentSection = {
    target_machines: options.targetMachines,
    description: options.description ?? `Environment for ${options.envName}`,
    modules: [],
    dependencies: [],
  }
  return { common, environments: { [options.envName]: env } }
}
