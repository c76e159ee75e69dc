/**
 * Tests for environment validation.
 *
 * WHY: The hostname check is what stops a jureca environment from being
 * built on another cluster; its bypass must only happen on request.
 */

import { describe, expect, it } from 'vitest'

import { ConfigValidationError, TargetMachineMismatchError } from './errors.js'
import type { EffectiveConfig } from './types/config.js'
import { assertEligible, findEnvironmentProblems, isEligible, validateEnvironment } from './validate.js'

function makeSettings(overrides: Partial<EffectiveConfig> = {}): EffectiveConfig {
  return {
    name: 'gpu',
    baseDir: 'zenv',
    pythonExecutable: 'python3',
    targetMachines: ['jureca'],
    explicitTargets: true,
    dependencyFile: null,
    modules: ['GCC'],
    dependencies: [],
    customActivateVars: {},
    setupCommands: [],
    ...overrides,
  }
}

describe('validateEnvironment', () => {
  it('accepts a complete environment', () => {
    expect(() => validateEnvironment(makeSettings())).not.toThrow()
  })

  it('reports every missing field at once', () => {
    const problems = findEnvironmentProblems(makeSettings({ baseDir: '', pythonExecutable: ' ' }))
    expect(problems.map((p) => p.path)).toEqual(['/base_dir', '/gpu/python_executable'])
  })

  it('rejects blank module names and target patterns', () => {
    const problems = findEnvironmentProblems(makeSettings({ modules: ['GCC', ''], targetMachines: [''] }))
    expect(problems.map((p) => p.path)).toEqual(['/gpu/modules/1', '/gpu/target_machines/0'])
  })

  it('throws ConfigValidationError naming the source file', () => {
    try {
      validateEnvironment(makeSettings({ pythonExecutable: '' }), '/proj/zenv.json')
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigValidationError)
      if (err instanceof ConfigValidationError) {
        expect(err.source).toBe('/proj/zenv.json')
        expect(err.message).toBe(
          'Environment "gpu" is incomplete:\n  /gpu/python_executable: python executable must not be empty'
        )
      }
    }
  })
})

describe('isEligible', () => {
  const host = 'login03.jureca.fz-juelich.de'

  it('matches on a domain component', () => {
    expect(isEligible(makeSettings({ targetMachines: ['jureca'] }), host)).toBe(true)
  })

  it('rejects a non-matching glob', () => {
    expect(isEligible(makeSettings({ targetMachines: ['jrlogin*'] }), host)).toBe(false)
  })

  it('accepts any host when there are no targets', () => {
    expect(isEligible(makeSettings({ targetMachines: [] }), host)).toBe(true)
  })
})

describe('assertEligible', () => {
  it('throws TargetMachineMismatchError by default', () => {
    const settings = makeSettings({ targetMachines: ['juwels'] })
    expect(() => assertEligible(settings, { hostname: 'login01.jureca' })).toThrow(
      TargetMachineMismatchError
    )
  })

  it('skips the check only when asked', () => {
    const settings = makeSettings({ targetMachines: ['juwels'] })
    expect(() =>
      assertEligible(settings, { hostname: 'login01.jureca', skipHostnameCheck: true })
    ).not.toThrow()
    expect(() =>
      assertEligible(settings, { hostname: 'login01.jureca', skipHostnameCheck: false })
    ).toThrow(TargetMachineMismatchError)
  })

  it('passes for an eligible host', () => {
    expect(() => assertEligible(makeSettings(), { hostname: 'jrc0001.jureca' })).not.toThrow()
  })
})
