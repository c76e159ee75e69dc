/**
 * Environment validation: required fields and hostname eligibility.
 */

import { ConfigValidationError, TargetMachineMismatchError } from './errors.js'
import { matchesAnyPattern } from './hostname/match.js'
import type { ValidationError } from './schemas/index.js'
import type { EffectiveConfig } from './types/config.js'

function required(path: string, message: string): ValidationError {
  return { path, message, keyword: 'required', params: {} }
}

/**
 * Collect required-field problems in a merged environment.
 */
export function findEnvironmentProblems(settings: EffectiveConfig): ValidationError[] {
  const problems: ValidationError[] = []
  if (!settings.name.trim()) {
    problems.push(required('/name', 'environment name must not be empty'))
  }
  if (!settings.baseDir.trim()) {
    problems.push(required('/base_dir', 'base directory must not be empty'))
  }
  if (!settings.pythonExecutable.trim()) {
    problems.push(required(`/${settings.name}/python_executable`, 'python executable must not be empty'))
  }
  settings.modules.forEach((mod, i) => {
    if (!mod.trim()) {
      problems.push(required(`/${settings.name}/modules/${i}`, 'module name must not be empty'))
    }
  })
  settings.targetMachines.forEach((pattern, i) => {
    if (!pattern.trim()) {
      problems.push(required(`/${settings.name}/target_machines/${i}`, 'target pattern must not be empty'))
    }
  })
  return problems
}

/**
 * Check that a merged environment has every required field.
 *
 * @param source - Config file path for the error
 * @throws ConfigValidationError listing every problem found
 */
export function validateEnvironment(settings: EffectiveConfig, source = 'zenv.json'): void {
  const problems = findEnvironmentProblems(settings)
  if (problems.length > 0) {
    throw new ConfigValidationError(`Environment "${settings.name}" is incomplete`, source, problems)
  }
}

/**
 * Whether `hostname` may use this environment.
 */
export function isEligible(settings: Pick<EffectiveConfig, 'targetMachines'>, hostname: string): boolean {
  return matchesAnyPattern(hostname, settings.targetMachines)
}

export interface EligibilityOptions {
  hostname: string
  /** Explicit opt-out of the hostname check (`--no-host`) */
  skipHostnameCheck?: boolean | undefined
}

/**
 * @throws TargetMachineMismatchError unless the host is eligible or the check is skipped
 */
export function assertEligible(settings: EffectiveConfig, options: EligibilityOptions): void {
  if (options.skipHostnameCheck === true) {
    return
  }
  if (!isEligible(settings, options.hostname)) {
    throw new TargetMachineMismatchError(settings.name, options.hostname, settings.targetMachines)
  }
}
