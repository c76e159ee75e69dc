/**
 * Tests for paths module.
 *
 * WHY: Every command finds the registry through these helpers; the
 * ZENV_DIR override is how users and tests relocate it.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'

import { DEFAULT_ZENV_HOME, PathResolver, getZenvHome } from './paths.js'

describe('getZenvHome', () => {
  it('defaults to ~/.zenv', () => {
    expect(getZenvHome({})).toBe(join(homedir(), '.zenv'))
    expect(DEFAULT_ZENV_HOME).toBe(join(homedir(), '.zenv'))
  })

  it('uses ZENV_DIR when set', () => {
    expect(getZenvHome({ ZENV_DIR: '/scratch/me/.zenv' })).toBe('/scratch/me/.zenv')
  })

  it('ignores an empty ZENV_DIR', () => {
    expect(getZenvHome({ ZENV_DIR: '' })).toBe(DEFAULT_ZENV_HOME)
  })
})

describe('PathResolver', () => {
  it('builds paths under the given home', () => {
    const paths = new PathResolver({ zenvHome: '/test/zenv' })
    expect(paths.registry).toBe('/test/zenv/registry.json')
    expect(paths.registryLock).toBe('/test/zenv/registry.lock')
  })
})
