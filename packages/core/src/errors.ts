/**
 * Typed error classes for zenv
 *
 * Error hierarchy:
 * - ZenvError (base)
 *   - ConfigError (zenv.json issues)
 *     - ConfigNotFoundError (no config file)
 *     - ConfigReadError (file exists but cannot be read)
 *     - ConfigParseError (invalid JSON)
 *     - ConfigValidationError (schema or required-field failures)
 *   - EnvironmentError (selecting an environment)
 *     - EnvironmentNotFoundError (name not in config)
 *     - AmbiguousEnvironmentError (auto-detection found several)
 *     - TargetMachineMismatchError (host not eligible)
 *     - MissingHostnameError (no hostname source worked)
 *     - EnvironmentNotReadyError (registered but never set up)
 *   - RegistryError (registry store)
 *     - IdentifierNotFoundError
 *     - AmbiguousIdentifierError
 *     - RegistryFormatError (malformed registry file)
 *     - RegistryIoError
 *   - ProcessError (external commands)
 *     - ModuleLoadError
 *     - PythonToolchainError
 *     - SetupCommandError
 *   - LockError (file locking)
 *     - LockTimeoutError
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all zenv errors */
export class ZenvError extends Error {
  readonly code: string

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ZenvError'
    this.code = code
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends ZenvError {
  readonly source: string

  constructor(message: string, code: string, source: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
    this.source = source
  }
}

export class ConfigNotFoundError extends ConfigError {
  constructor(source: string) {
    super(`Configuration file not found: ${source}`, 'CONFIG_NOT_FOUND', source)
    this.name = 'ConfigNotFoundError'
  }
}

export class ConfigReadError extends ConfigError {
  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, 'CONFIG_READ_ERROR', source, options)
    this.name = 'ConfigReadError'
  }
}

/** Error thrown when JSON/TOML parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Environment errors
// ============================================================================

export class EnvironmentError extends ZenvError {
  constructor(message: string, code: string) {
    super(message, code)
    this.name = 'EnvironmentError'
  }
}

/** Named environment is not a section of the config file */
export class EnvironmentNotFoundError extends EnvironmentError {
  readonly envName: string
  readonly available: string[]

  constructor(envName: string, available: string[]) {
    const list = available.length > 0 ? available.join(', ') : '(none)'
    super(
      `Environment "${envName}" not found in configuration. Available: ${list}`,
      'ENVIRONMENT_NOT_FOUND'
    )
    this.name = 'EnvironmentNotFoundError'
    this.envName = envName
    this.available = available
  }
}

export class AmbiguousEnvironmentError extends EnvironmentError {
  readonly candidates: string[]

  constructor(message: string, candidates: string[]) {
    super(`${message}: ${candidates.join(', ')}`, 'AMBIGUOUS_ENVIRONMENT')
    this.name = 'AmbiguousEnvironmentError'
    this.candidates = candidates
  }
}

export class TargetMachineMismatchError extends EnvironmentError {
  readonly envName: string
  readonly hostname: string
  readonly patterns: readonly string[]

  constructor(envName: string, hostname: string, patterns: readonly string[]) {
    super(
      `Environment "${envName}" targets [${patterns.join(', ')}], which does not match host "${hostname}"`,
      'TARGET_MACHINE_MISMATCH'
    )
    this.name = 'TargetMachineMismatchError'
    this.envName = envName
    this.hostname = hostname
    this.patterns = patterns
  }
}

export class MissingHostnameError extends EnvironmentError {
  constructor() {
    super(
      'Could not determine hostname from HOSTNAME, HOST or the hostname command',
      'MISSING_HOSTNAME'
    )
    this.name = 'MissingHostnameError'
  }
}

export class EnvironmentNotReadyError extends EnvironmentError {
  readonly envName: string
  readonly missingPath: string

  constructor(envName: string, missingPath: string) {
    super(`Environment "${envName}" has not been set up: ${missingPath} is missing`, 'ENVIRONMENT_NOT_READY')
    this.name = 'EnvironmentNotReadyError'
    this.envName = envName
    this.missingPath = missingPath
  }
}

// ============================================================================
// Registry errors
// ============================================================================

export class RegistryError extends ZenvError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'RegistryError'
  }
}

export class IdentifierNotFoundError extends RegistryError {
  readonly identifier: string

  constructor(identifier: string) {
    super(`No environment matches "${identifier}"`, 'IDENTIFIER_NOT_FOUND')
    this.name = 'IdentifierNotFoundError'
    this.identifier = identifier
  }
}

/** One registry entry that matched an ambiguous identifier */
export interface IdentifierCandidate {
  id: string
  name: string
  projectDir: string
}

export class AmbiguousIdentifierError extends RegistryError {
  readonly identifier: string
  readonly candidates: IdentifierCandidate[]

  constructor(identifier: string, candidates: IdentifierCandidate[]) {
    const lines = candidates.map((c) => `  ${c.name} (${c.id.slice(0, 7)}) ${c.projectDir}`)
    super(
      `Identifier "${identifier}" matches ${candidates.length} environments:\n${lines.join('\n')}`,
      'AMBIGUOUS_IDENTIFIER'
    )
    this.name = 'AmbiguousIdentifierError'
    this.identifier = identifier
    this.candidates = candidates
  }
}

export class RegistryFormatError extends RegistryError {
  readonly path: string

  constructor(message: string, path: string) {
    super(`Malformed registry ${path}: ${message}`, 'REGISTRY_FORMAT_ERROR')
    this.name = 'RegistryFormatError'
    this.path = path
  }
}

export class RegistryIoError extends RegistryError {
  readonly path: string

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(`${message}: ${path}`, 'REGISTRY_IO_ERROR', options)
    this.name = 'RegistryIoError'
    this.path = path
  }
}

// ============================================================================
// Process errors
// ============================================================================

/** Error thrown when an external command exits non-zero */
export class ProcessError extends ZenvError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string
  /** Where the full output of the command was written, if anywhere */
  readonly logPath: string | undefined

  constructor(
    message: string,
    code: string,
    command: string,
    exitCode: number,
    stderr: string,
    logPath?: string
  ) {
    super(message, code)
    this.name = 'ProcessError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
    this.logPath = logPath
  }
}

export class ModuleLoadError extends ProcessError {
  readonly moduleName: string

  constructor(moduleName: string, exitCode: number, stderr = '', logPath?: string) {
    super(`Failed to load module "${moduleName}"`, 'MODULE_LOAD_ERROR', 'module load', exitCode, stderr, logPath)
    this.name = 'ModuleLoadError'
    this.moduleName = moduleName
  }
}

/** venv creation or a pip/uv install failed; `step` says which */
export class PythonToolchainError extends ProcessError {
  readonly step: string

  constructor(step: string, exitCode: number, stderr = '', logPath?: string) {
    super(
      `Python toolchain step failed (exit ${exitCode}): ${step}`,
      'PYTHON_TOOLCHAIN_ERROR',
      step,
      exitCode,
      stderr,
      logPath
    )
    this.name = 'PythonToolchainError'
    this.step = step
  }
}

/** A custom `setup_commands` entry exited non-zero */
export class SetupCommandError extends ProcessError {
  constructor(command: string, exitCode: number, stderr = '', logPath?: string) {
    super(`Setup command failed (exit ${exitCode}): ${command}`, 'SETUP_COMMAND_ERROR', command, exitCode, stderr, logPath)
    this.name = 'SetupCommandError'
  }
}

// ============================================================================
// Lock errors
// ============================================================================

/** Error thrown when a lock operation fails */
export class LockError extends ZenvError {
  readonly lockPath: string

  constructor(message: string, lockPath: string) {
    super(`Lock error: ${message} (${lockPath})`, 'LOCK_ERROR')
    this.name = 'LockError'
    this.lockPath = lockPath
  }
}

export class LockTimeoutError extends LockError {
  constructor(lockPath: string, timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms waiting for lock`, lockPath)
    this.name = 'LockTimeoutError'
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isZenvError(error: unknown): error is ZenvError {
  return error instanceof ZenvError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isEnvironmentError(error: unknown): error is EnvironmentError {
  return error instanceof EnvironmentError
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError
}

export function isProcessError(error: unknown): error is ProcessError {
  return error instanceof ProcessError
}

export function isLockError(error: unknown): error is LockError {
  return error instanceof LockError
}

// ============================================================================
// Exit codes
// ============================================================================

export const EXIT_CODES = {
  UNEXPECTED: 1,
  CONFIG: 2,
  ENVIRONMENT: 3,
  REGISTRY: 4,
  PROCESS: 5,
  LOCK: 6,
} as const

/**
 * Map an error to the process exit status for its kind.
 * Anything outside the hierarchy is unexpected.
 */
export function exitCodeFor(error: unknown): number {
  if (isConfigError(error)) return EXIT_CODES.CONFIG
  if (isEnvironmentError(error)) return EXIT_CODES.ENVIRONMENT
  if (isRegistryError(error)) return EXIT_CODES.REGISTRY
  if (isProcessError(error)) return EXIT_CODES.PROCESS
  if (isLockError(error)) return EXIT_CODES.LOCK
  return EXIT_CODES.UNEXPECTED
}

/**
 * Next step to suggest alongside an error message, if any.
 */
export function errorHint(error: unknown): string | undefined {
  if (error instanceof ConfigNotFoundError) {
    return "Run 'zenv init' to create a zenv.json in this directory"
  }
  if (error instanceof ConfigParseError || error instanceof ConfigValidationError) {
    return "Run 'zenv validate' for the full list of problems"
  }
  if (error instanceof EnvironmentNotFoundError || error instanceof AmbiguousEnvironmentError) {
    return 'Pass the environment name explicitly'
  }
  if (error instanceof TargetMachineMismatchError) {
    return 'Use --no-host to skip the hostname check, or add this host to target_machines'
  }
  if (error instanceof MissingHostnameError) {
    return 'Set HOSTNAME, or use --no-host to skip the hostname check'
  }
  if (error instanceof EnvironmentNotReadyError) {
    return `Run 'zenv setup ${error.envName}' in the project directory first`
  }
  if (error instanceof IdentifierNotFoundError) {
    return "Use 'zenv list --all' to see all available environments"
  }
  if (error instanceof AmbiguousIdentifierError) {
    return 'Please use more characters to make the ID unique'
  }
  if (error instanceof RegistryFormatError) {
    return 'Fix or remove the registry file; it is rewritten on the next registration'
  }
  if (error instanceof ModuleLoadError) {
    const hint = "Check the module name with 'module avail'"
    return error.logPath ? `${hint}\nFull setup output: ${error.logPath}` : hint
  }
  if (error instanceof ProcessError && error.logPath) {
    return `Full setup output: ${error.logPath}`
  }
  if (error instanceof LockTimeoutError) {
    return 'Another zenv process holds the registry lock; retry when it finishes'
  }
  return undefined
}
