/**
 * Shell script generation for environment setup and activation.
 *
 * setup_env.sh runs once under /bin/sh and exits with one of
 * SETUP_EXIT_CODES on failure, after printing a `zenv:` line to stderr.
 * activate.sh is sourced by the user's shell.
 */

import type { EffectiveConfig } from '@zenv/core'

export const SETUP_SCRIPT_NAME = 'setup_env.sh'
export const ACTIVATE_SCRIPT_NAME = 'activate.sh'
export const REQUIREMENTS_NAME = 'requirements.txt'
export const SETUP_LOG_NAME = 'zenv_setup.log'
/** `pip list --format=freeze` of the module-provided python */
export const MODULE_PACKAGES_NAME = 'module_packages.txt'
export const FILTERED_REQUIREMENTS_NAME = 'requirements.filtered.txt'

export const SETUP_EXIT_CODES = {
  MODULE_LOAD: 3,
  VENV_CREATE: 4,
  PIP_INSTALL: 5,
  SETUP_COMMAND: 6,
} as const

export const SETUP_COMMAND_FAILURE = 'setup command failed: '

const MODULE_FAILURE_PATTERN = /zenv: failed to load module '([^']+)'/
const FAILURE_LINE_PATTERN = /^zenv: (.+)$/gm

export type Installer = 'pip' | 'uv'

/**
 * Single-quote a value for POSIX sh.
 */
export function shellQuote(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`
}

/**
 * Module name from a setup script's module-load failure line, if any.
 */
export function parseModuleFailure(output: string): string | undefined {
  return MODULE_FAILURE_PATTERN.exec(output)?.[1]
}

/**
 * The last `zenv:` line of a failed setup script's stderr, without the prefix.
 */
export function parseFailureMessage(output: string): string | undefined {
  let last: string | undefined
  for (const match of output.matchAll(FAILURE_LINE_PATTERN)) {
    last = match[1]
  }
  return last
}

/** Non-interactive shells do not define `module`; source its init script when known */
const MODULE_INIT_LINES = [
  'if ! command -v module >/dev/null 2>&1; then',
  '  if [ -n "${LMOD_PKG:-}" ] && [ -f "$LMOD_PKG/init/sh" ]; then . "$LMOD_PKG/init/sh"',
  '  elif [ -n "${MODULESHOME:-}" ] && [ -f "$MODULESHOME/init/sh" ]; then . "$MODULESHOME/init/sh"',
  '  fi',
  'fi',
]

function moduleLoadLines(modules: readonly string[], onFailure: (mod: string) => string): string[] {
  if (modules.length === 0) return []
  return [
    'module purge',
    ...modules.map((mod) => `module load ${shellQuote(mod)} || ${onFailure(mod)}`),
  ]
}

export interface SetupScriptOptions {
  settings: EffectiveConfig
  projectDir: string
  venvPath: string
  requirementsPath: string
  /** Whether the requirements file has any entries */
  hasRequirements: boolean
  /** `pip install -e` the project directory */
  editable?: boolean | undefined
  /** Install with `uv pip` instead of pip (default: pip) */
  installer?: Installer | undefined
  /** Also install requirements the loaded modules already provide */
  forceDependencies?: boolean | undefined
}

/**
 * Lines that copy the requirements not provided by the loaded modules
 * (as listed in `modulePackages`) into `filteredPath`.
 */
function moduleFilterLines(requirementsPath: string, modulePackages: string, filteredPath: string): string[] {
  return [
    `: > ${shellQuote(filteredPath)}`,
    'while IFS= read -r zenv_req || [ -n "$zenv_req" ]; do',
    `  zenv_pkg=$(printf '%s\\n' "$zenv_req" | sed 's/[^A-Za-z0-9_.-].*//')`,
    `  if [ -n "$zenv_pkg" ] && grep -i -q -e "^$zenv_pkg==" -e "^$zenv_pkg @ " ${shellQuote(modulePackages)}; then`,
    '    echo "zenv: skipping $zenv_req (provided by loaded modules)"',
    '  else',
    `    printf '%s\\n' "$zenv_req" >> ${shellQuote(filteredPath)}`,
    '  fi',
    `done < ${shellQuote(requirementsPath)}`,
  ]
}

export function renderSetupScript(options: SetupScriptOptions): string {
  const { settings, projectDir, venvPath, requirementsPath } = options
  const codes = SETUP_EXIT_CODES
  const fail = (code: number, message: string) => `zenv_fail ${code} ${shellQuote(message)}`
  const installer = options.installer ?? 'pip'
  const install = installer === 'uv' ? 'uv pip install' : 'python -m pip install'
  const hasModules = settings.modules.length > 0
  const filterByModules = hasModules && options.hasRequirements && !options.forceDependencies
  const modulePackages = `${venvPath}/${MODULE_PACKAGES_NAME}`
  const filteredPath = `${venvPath}/${FILTERED_REQUIREMENTS_NAME}`

  const lines: string[] = [
    '#!/bin/sh',
    `# zenv setup for environment '${settings.name}'`,
    '',
    'zenv_fail() {',
    '  code="$1"',
    '  shift',
    '  echo "zenv: $*" >&2',
    '  exit "$code"',
    '}',
    '',
    `cd ${shellQuote(projectDir)} || ${fail(codes.VENV_CREATE, `cannot enter ${projectDir}`)}`,
  ]

  if (hasModules) {
    const first = settings.modules[0] ?? ''
    lines.push(
      '',
      '# HPC modules',
      ...MODULE_INIT_LINES,
      'if ! command -v module >/dev/null 2>&1; then',
      `  ${fail(codes.MODULE_LOAD, `failed to load module '${first}': module command not available`)}`,
      'fi',
      ...moduleLoadLines(settings.modules, (mod) =>
        fail(codes.MODULE_LOAD, `failed to load module '${mod}'`)
      )
    )
  }

  if (filterByModules) {
    const python = shellQuote(settings.pythonExecutable)
    lines.push(
      '',
      '# Packages the loaded modules already provide',
      `${python} -m pip list --format=freeze > ${shellQuote(modulePackages)} 2>/dev/null || : > ${shellQuote(modulePackages)}`
    )
  }

  // Module-provided packages stay importable inside the venv
  const venvFlags = hasModules ? ' --system-site-packages' : ''
  lines.push(
    '',
    '# Virtual environment',
    `echo ${shellQuote(`zenv: creating ${venvPath} with ${settings.pythonExecutable}`)}`,
    `${shellQuote(settings.pythonExecutable)} -m venv${venvFlags} ${shellQuote(venvPath)} || ${fail(codes.VENV_CREATE, `failed to create virtual environment with ${settings.pythonExecutable}`)}`,
    `. ${shellQuote(`${venvPath}/bin/activate`)} || ${fail(codes.VENV_CREATE, 'failed to activate the new virtual environment')}`
  )

  if (installer === 'uv') {
    lines.push(`command -v uv >/dev/null 2>&1 || ${fail(codes.PIP_INSTALL, 'uv not found on PATH')}`)
  } else {
    lines.push(`python -m pip install --upgrade pip || ${fail(codes.PIP_INSTALL, 'pip upgrade failed')}`)
  }

  const requirementsFailure = fail(codes.PIP_INSTALL, `${installer} install of requirements failed`)
  if (filterByModules) {
    lines.push(
      '',
      '# Requirements not provided by modules',
      ...moduleFilterLines(requirementsPath, modulePackages, filteredPath),
      `if [ -s ${shellQuote(filteredPath)} ]; then`,
      `  ${install} -r ${shellQuote(filteredPath)} || ${requirementsFailure}`,
      'fi'
    )
  } else if (options.hasRequirements) {
    lines.push(`${install} -r ${shellQuote(requirementsPath)} || ${requirementsFailure}`)
  }

  if (options.editable) {
    lines.push(
      `${install} -e ${shellQuote(projectDir)} || ${fail(codes.PIP_INSTALL, 'editable install of the project failed')}`
    )
  }

  if (settings.setupCommands.length > 0) {
    lines.push('', '# Custom setup commands')
    for (const command of settings.setupCommands) {
      lines.push(`${command} || ${fail(codes.SETUP_COMMAND, `${SETUP_COMMAND_FAILURE}${command}`)}`)
    }
  }

  lines.push('', `echo ${shellQuote(`zenv: environment '${settings.name}' is ready`)}`, '')
  return lines.join('\n')
}

/**
 * Script users source to enter the environment: loads modules, activates
 * the venv and exports ZENV_ENV_DIR, ZENV_ENV_NAME and custom variables.
 */
export function renderActivateScript(settings: EffectiveConfig, venvPath: string): string {
  const lines: string[] = [
    `# zenv environment '${settings.name}'`,
    `# Usage: source ${venvPath}/${ACTIVATE_SCRIPT_NAME}`,
  ]

  if (settings.modules.length > 0) {
    lines.push(
      '',
      'if command -v module >/dev/null 2>&1; then',
      ...moduleLoadLines(settings.modules, (mod) =>
        `echo ${shellQuote(`zenv: failed to load module '${mod}'`)} >&2`
      ).map((line) => `  ${line}`),
      'else',
      `  echo 'zenv: module command not available, skipping module loads' >&2`,
      'fi'
    )
  }

  lines.push(
    '',
    `. ${shellQuote(`${venvPath}/bin/activate`)}`,
    `export ZENV_ENV_DIR=${shellQuote(venvPath)}`,
    `export ZENV_ENV_NAME=${shellQuote(settings.name)}`
  )

  const vars = Object.entries(settings.customActivateVars)
  if (vars.length > 0) {
    lines.push('', '# Custom variables')
    for (const [key, value] of vars) {
      lines.push(`export ${key}=${shellQuote(value)}`)
    }
  }

  lines.push('')
  return lines.join('\n')
}

/**
 * requirements.txt content, one specifier per line.
 */
export function renderRequirements(dependencies: readonly string[]): string {
  return dependencies.length > 0 ? `${dependencies.join('\n')}\n` : ''
}
