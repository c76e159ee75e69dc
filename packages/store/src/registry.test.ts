/**
 * Tests for the environment registry.
 *
 * WHY: The registry is the only record of where environments live; it
 * must survive save/load unchanged and never lose entries silently.
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { AmbiguousIdentifierError, RegistryFormatError } from '@zenv/core'

import {
  computeVenvPath,
  generateEnvironmentId,
  joinTargetMachines,
  Registry,
  splitTargetMachines,
} from './registry.js'

const NOW = new Date('2024-05-01T12:00:00.000Z')

describe('generateEnvironmentId', () => {
  it('produces 64 lowercase hex characters', () => {
    const id = generateEnvironmentId({ name: 'gpu', projectDir: '/p', targetMachines: 'any', now: NOW })
    expect(id).toMatch(/^[0-9a-f]{64}$/)
  })

  it('is deterministic for a fixed nonce and differs otherwise', () => {
    const seed = { name: 'gpu', projectDir: '/p', targetMachines: 'any', now: NOW, nonce: 'n1' }
    expect(generateEnvironmentId(seed)).toBe(generateEnvironmentId(seed))
    expect(generateEnvironmentId({ ...seed, nonce: 'n2' })).not.toBe(generateEnvironmentId(seed))
  })
})

describe('target machine strings', () => {
  it('joins with commas and stores "any" for an empty list', () => {
    expect(joinTargetMachines(['jureca', 'jrlogin*'])).toBe('jureca,jrlogin*')
    expect(joinTargetMachines([])).toBe('any')
  })

  it('splits and trims stored strings', () => {
    expect(splitTargetMachines('jureca, jrlogin*')).toEqual(['jureca', 'jrlogin*'])
    expect(splitTargetMachines('')).toEqual([])
  })
})

describe('computeVenvPath', () => {
  it('nests a relative base dir under the project', () => {
    expect(computeVenvPath('/home/u/proj', 'zenv', 'gpu')).toBe('/home/u/proj/zenv/gpu')
  })

  it('uses an absolute base dir as is', () => {
    expect(computeVenvPath('/home/u/proj', '/scratch/envs', 'gpu')).toBe('/scratch/envs/gpu')
  })
})

describe('Registry', () => {
  let dir: string
  let registryPath: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'zenv-registry-'))
    registryPath = join(dir, 'registry.json')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('loads an empty registry when the file is missing', async () => {
    const registry = await Registry.load(registryPath)
    expect(registry.size).toBe(0)
    expect(registry.path).toBe(registryPath)
  })

  it('rejects a malformed file', async () => {
    await writeFile(registryPath, '{ not json')
    await expect(Registry.load(registryPath)).rejects.toBeInstanceOf(RegistryFormatError)
  })

  it('rejects a file that does not match the schema', async () => {
    await writeFile(registryPath, JSON.stringify({ environments: [{ name: 'gpu' }] }))
    await expect(Registry.load(registryPath)).rejects.toBeInstanceOf(RegistryFormatError)
  })

  it('rejects duplicate IDs', async () => {
    const entry = { id: 'abcdef0123', name: 'gpu', project_dir: '/p', venv_path: '/p/zenv/gpu' }
    await writeFile(registryPath, JSON.stringify({ environments: [entry, { ...entry, name: 'cpu' }] }))
    await expect(Registry.load(registryPath)).rejects.toBeInstanceOf(RegistryFormatError)
  })

  it('registers a new entry with a generated ID', () => {
    const registry = Registry.empty(registryPath)
    const { entry, action } = registry.register({
      name: 'gpu',
      projectDir: '/home/u/proj',
      baseDir: 'zenv',
      description: 'CUDA build',
      targetMachines: ['jureca', 'jrlogin*'],
      now: NOW,
    })
    expect(action).toBe('created')
    expect(entry.id).toMatch(/^[0-9a-f]{64}$/)
    expect(entry).toMatchObject({
      name: 'gpu',
      projectDir: '/home/u/proj',
      venvPath: '/home/u/proj/zenv/gpu',
      targetMachines: 'jureca,jrlogin*',
      description: 'CUDA build',
      registeredAt: '2024-05-01T12:00:00.000Z',
    })
  })

  it('updates in place for the same name and project dir, keeping the ID', () => {
    const registry = Registry.empty(registryPath)
    const first = registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: [] })
    const second = registry.register({
      name: 'gpu',
      projectDir: '/p',
      baseDir: '/scratch',
      targetMachines: ['jureca'],
    })
    expect(second.action).toBe('updated')
    expect(second.entry.id).toBe(first.entry.id)
    expect(registry.size).toBe(1)
    expect(registry.entries[0]?.venvPath).toBe('/scratch/gpu')
    expect(registry.entries[0]?.targetMachines).toBe('jureca')
  })

  it('clears a description that was removed from the config', () => {
    const registry = Registry.empty(registryPath)
    registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', description: 'old', targetMachines: [] })
    const { entry } = registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: [] })
    expect(entry.description).toBeUndefined()
  })

  it('keeps same-named environments from different projects apart', () => {
    const registry = Registry.empty(registryPath)
    const a = registry.register({ name: 'gpu', projectDir: '/a', baseDir: 'zenv', targetMachines: [] })
    const b = registry.register({ name: 'gpu', projectDir: '/b', baseDir: 'zenv', targetMachines: [] })
    expect(a.entry.id).not.toBe(b.entry.id)
    expect(registry.size).toBe(2)
  })

  it('looks up by exact ID or exact name only', () => {
    const registry = Registry.empty(registryPath)
    const { entry } = registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: [] })
    expect(registry.lookup(entry.id)).toBe(entry)
    expect(registry.lookup('gpu')).toBe(entry)
    expect(registry.lookup(entry.id.slice(0, 10))).toBeUndefined()
  })

  it('save then load then save is byte-identical', async () => {
    const registry = Registry.empty(registryPath)
    registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', description: 'd', targetMachines: ['jureca'] })
    registry.register({ name: 'cpu', projectDir: '/q', baseDir: 'zenv', targetMachines: [] })
    await registry.save()
    const first = await readFile(registryPath, 'utf8')

    const reloaded = await Registry.load(registryPath)
    expect(reloaded.entries).toEqual(registry.entries)
    await reloaded.save()
    expect(await readFile(registryPath, 'utf8')).toBe(first)
    expect(await readdir(dir)).toEqual(['registry.json'])
  })

  it('writes the documented on-disk layout', () => {
    const registry = Registry.empty(registryPath)
    const { entry } = registry.register({
      name: 'gpu',
      projectDir: '/p',
      baseDir: 'zenv',
      targetMachines: ['jureca'],
      now: NOW,
    })
    expect(registry.toFile()).toEqual({
      version: 1,
      environments: [
        {
          id: entry.id,
          name: 'gpu',
          project_dir: '/p',
          venv_path: '/p/zenv/gpu',
          target_machines: 'jureca',
          registered_at: '2024-05-01T12:00:00.000Z',
        },
      ],
    })
  })

  it('reads legacy entries without id, venv_path or version', async () => {
    await writeFile(
      registryPath,
      JSON.stringify({
        environments: [{ name: 'old', project_dir: '/legacy', target_machine: 'jureca', description: null }],
      })
    )
    const registry = await Registry.load(registryPath)
    const entry = registry.entries[0]
    expect(entry?.id).toMatch(/^[0-9a-f]{64}$/)
    expect(entry?.venvPath).toBe('/legacy/zenv/old')
    expect(entry?.targetMachines).toBe('jureca')
    expect(entry?.description).toBeUndefined()
  })

  it('deregisters through the resolver', () => {
    const registry = Registry.empty(registryPath)
    const { entry } = registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: [] })
    expect(registry.deregister(entry.id.slice(0, 8))).toBe(true)
    expect(registry.size).toBe(0)
  })

  it('returns false when deregistering an unknown identifier', () => {
    const registry = Registry.empty(registryPath)
    registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: [] })
    expect(registry.deregister('nope')).toBe(false)
    expect(registry.size).toBe(1)
  })

  it('propagates ambiguity from deregister', () => {
    const registry = Registry.empty(registryPath)
    registry.register({ name: 'gpu', projectDir: '/a', baseDir: 'zenv', targetMachines: [] })
    registry.register({ name: 'gpu', projectDir: '/b', baseDir: 'zenv', targetMachines: [] })
    expect(() => registry.deregister('gpu')).toThrow(AmbiguousIdentifierError)
    expect(registry.size).toBe(2)
  })

  it('lists entries for a project directory', () => {
    const registry = Registry.empty(registryPath)
    registry.register({ name: 'gpu', projectDir: '/a', baseDir: 'zenv', targetMachines: [] })
    registry.register({ name: 'cpu', projectDir: '/a', baseDir: 'zenv', targetMachines: [] })
    registry.register({ name: 'gpu', projectDir: '/b', baseDir: 'zenv', targetMachines: [] })
    expect(registry.forProject('/a').map((e) => e.name)).toEqual(['gpu', 'cpu'])
  })
})
