/**
 * Environment setup orchestration (setup command).
 *
 * WHY: Orchestrates the full build of one environment:
 * - Select and validate the environment for this host
 * - Collect and filter dependencies
 * - Write requirements.txt and setup_env.sh into the venv directory
 * - Run the script (module loads, venv, pip, custom commands)
 * - Write activate.sh and register the environment
 */

import { mkdir, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import {
  ModuleLoadError,
  ProcessError,
  PythonToolchainError,
  SetupCommandError,
  type SkippedDependency,
  atomicWrite,
  collectDependencies,
  createDebugLog,
} from '@zenv/core'
import { type PathResolver, type RegisterResult, computeVenvPath } from '@zenv/store'

import { type PreparedEnvironment, type PrepareOptions, prepareEnvironment } from './environment.js'
import { type ExecResult, exec } from './exec.js'
import { registerPrepared } from './registration.js'
import {
  ACTIVATE_SCRIPT_NAME,
  REQUIREMENTS_NAME,
  SETUP_EXIT_CODES,
  SETUP_LOG_NAME,
  SETUP_COMMAND_FAILURE,
  SETUP_SCRIPT_NAME,
  type Installer,
  parseFailureMessage,
  parseModuleFailure,
  renderActivateScript,
  renderRequirements,
  renderSetupScript,
} from './scripts.js'

const debugLog = createDebugLog('setup')

/**
 * Runs a generated setup script, writing its output to `logFile`.
 */
export type ScriptRunner = (
  scriptPath: string,
  options: { cwd: string; logFile: string }
) => Promise<ExecResult>

export const shellScriptRunner: ScriptRunner = (scriptPath, options) =>
  exec('/bin/sh', [scriptPath], { cwd: options.cwd, logFile: options.logFile })

export type SetupStep = 'dependencies' | 'script' | 'activate' | 'register'

export interface SetupOptions extends PrepareOptions {
  paths: PathResolver
  /** Delete an existing venv directory first */
  recreate?: boolean | undefined
  /** Also `pip install -e` the project */
  editable?: boolean | undefined
  installer?: Installer | undefined
  /** Install requirements even when a loaded module provides them */
  forceDependencies?: boolean | undefined
  runner?: ScriptRunner | undefined
  onStep?: ((step: SetupStep) => void) | undefined
}

export interface SetupResult extends RegisterResult {
  prepared: PreparedEnvironment
  venvPath: string
  dependencies: string[]
  skippedDependencies: SkippedDependency[]
  activatePath: string
  logPath: string
}

/**
 * Map a failed script run to the error for the step that failed, using
 * the exit code and the script's last `zenv:` line on stderr.
 */
export function setupFailure(result: ExecResult, scriptPath: string, logPath?: string): ProcessError {
  const { exitCode, stderr } = result
  const script = `/bin/sh ${scriptPath}`
  const detail = parseFailureMessage(stderr)

  switch (exitCode) {
    case SETUP_EXIT_CODES.MODULE_LOAD:
      return new ModuleLoadError(parseModuleFailure(stderr) ?? 'unknown', exitCode, stderr, logPath)
    case SETUP_EXIT_CODES.VENV_CREATE:
    case SETUP_EXIT_CODES.PIP_INSTALL:
      return new PythonToolchainError(detail ?? script, exitCode, stderr, logPath)
    case SETUP_EXIT_CODES.SETUP_COMMAND: {
      const command = detail?.startsWith(SETUP_COMMAND_FAILURE)
        ? detail.slice(SETUP_COMMAND_FAILURE.length)
        : script
      return new SetupCommandError(command, exitCode, stderr, logPath)
    }
    default:
      return new ProcessError(
        `Setup script failed (exit ${exitCode}): ${detail ?? script}`,
        'SETUP_SCRIPT_ERROR',
        script,
        exitCode,
        stderr,
        logPath
      )
  }
}

/**
 * Build and register one environment.
 *
 * @throws ConfigError | EnvironmentError from selection
 * @throws ModuleLoadError | PythonToolchainError | SetupCommandError if the setup script fails
 */
export async function setupEnvironment(options: SetupOptions): Promise<SetupResult> {
  const runner = options.runner ?? shellScriptRunner
  const prepared = await prepareEnvironment(options)
  const { settings, projectDir } = prepared
  const venvPath = computeVenvPath(projectDir, settings.baseDir, settings.name)

  options.onStep?.('dependencies')
  const deps = await collectDependencies({
    projectDir,
    dependencies: settings.dependencies,
    dependencyFile: settings.dependencyFile,
  })

  if (options.recreate) {
    debugLog('removing', venvPath)
    await rm(venvPath, { recursive: true, force: true })
  }
  await mkdir(venvPath, { recursive: true })

  const requirementsPath = join(venvPath, REQUIREMENTS_NAME)
  await writeFile(requirementsPath, renderRequirements(deps.valid))

  const scriptPath = join(venvPath, SETUP_SCRIPT_NAME)
  const script = renderSetupScript({
    settings,
    projectDir,
    venvPath,
    requirementsPath,
    hasRequirements: deps.valid.length > 0,
    editable: options.editable,
    installer: options.installer,
    forceDependencies: options.forceDependencies,
  })
  await atomicWrite(scriptPath, script, { mode: 0o755 })

  options.onStep?.('script')
  const logPath = join(venvPath, SETUP_LOG_NAME)
  const result = await runner(scriptPath, { cwd: projectDir, logFile: logPath })
  if (result.exitCode !== 0) {
    throw setupFailure(result, scriptPath, logPath)
  }

  options.onStep?.('activate')
  const activatePath = join(venvPath, ACTIVATE_SCRIPT_NAME)
  await atomicWrite(activatePath, renderActivateScript(settings, venvPath), { mode: 0o755 })

  options.onStep?.('register')
  const registered = await registerPrepared(prepared, options.paths)

  return {
    ...registered,
    prepared,
    venvPath,
    dependencies: deps.valid,
    skippedDependencies: deps.skipped,
    activatePath,
    logPath,
  }
}
