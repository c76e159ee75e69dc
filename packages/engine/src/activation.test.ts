/**
 * Tests for using registered environments.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { EnvironmentNotReadyError, type RegistryEntry } from '@zenv/core'
import { Registry } from '@zenv/store'

import {
  activateScriptPath,
  getActivationScript,
  listEnvironments,
  readSetupLog,
  runInEnvironment,
} from './activation.js'
import { type ExecOptions, exec } from './exec.js'

function makeRegistry(): Registry {
  const registry = Registry.empty('/unused/registry.json')
  registry.register({ name: 'gpu', projectDir: '/p', baseDir: 'zenv', targetMachines: ['jureca'] })
  registry.register({ name: 'booster', projectDir: '/p', baseDir: 'zenv', targetMachines: ['juwels*'] })
  registry.register({ name: 'anywhere', projectDir: '/q', baseDir: 'zenv', targetMachines: [] })
  return registry
}

describe('listEnvironments', () => {
  it('keeps environments usable on the host', () => {
    const names = listEnvironments(makeRegistry(), { hostname: 'jrlogin01.jureca' }).map((e) => e.name)
    expect(names).toEqual(['gpu', 'anywhere'])
  })

  it('lists everything with all', () => {
    const names = listEnvironments(makeRegistry(), { hostname: 'jrlogin01.jureca', all: true }).map(
      (e) => e.name
    )
    expect(names).toEqual(['gpu', 'booster', 'anywhere'])
  })

  it('lists everything without a hostname', () => {
    expect(listEnvironments(makeRegistry())).toHaveLength(3)
  })
})

describe('environment files', () => {
  let root: string
  let entry: RegistryEntry

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'zenv-act-'))
    const registry = Registry.empty(join(root, 'registry.json'))
    entry = registry.register({
      name: 'gpu',
      projectDir: root,
      baseDir: 'zenv',
      targetMachines: [],
    }).entry
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('reports an environment that was never set up', async () => {
    const error = await getActivationScript(entry).catch((err: unknown) => err)
    expect(error).toBeInstanceOf(EnvironmentNotReadyError)
    if (error instanceof EnvironmentNotReadyError) {
      expect(error.missingPath).toBe(join(root, 'zenv', 'gpu', 'activate.sh'))
    }
  })

  it('returns the activation script once it exists', async () => {
    await mkdir(entry.venvPath, { recursive: true })
    await writeFile(activateScriptPath(entry), '')
    expect(await getActivationScript(entry)).toBe(join(root, 'zenv', 'gpu', 'activate.sh'))
  })

  it('reads the setup log', async () => {
    await mkdir(entry.venvPath, { recursive: true })
    await writeFile(join(entry.venvPath, 'zenv_setup.log'), 'zenv: done\n')
    expect(await readSetupLog(entry)).toBe('zenv: done\n')
  })

  it('runs a command through the activation script', async () => {
    await mkdir(entry.venvPath, { recursive: true })
    await writeFile(activateScriptPath(entry), 'export ZENV_TEST_VALUE=from-activate\n')

    const captured = (command: string, args: string[], options?: ExecOptions) =>
      exec(command, args, { ...options, inheritStdio: false })
    const result = await runInEnvironment(
      entry,
      'sh',
      ['-c', 'echo "$ZENV_TEST_VALUE:$1"', 'inner', 'arg one'],
      captured
    )

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe('from-activate:arg one\n')
  })

  it('passes the command exit code through', async () => {
    await mkdir(entry.venvPath, { recursive: true })
    await writeFile(activateScriptPath(entry), '')

    const calls: string[][] = []
    const fake = async (command: string, args: string[]) => {
      calls.push([command, ...args])
      return { exitCode: 7, stdout: '', stderr: '' }
    }
    const result = await runInEnvironment(entry, 'python', ['train.py'], fake)

    expect(result.exitCode).toBe(7)
    expect(calls).toEqual([
      [
        '/bin/sh',
        '-c',
        '. "$1" || exit 1; shift; exec "$@"',
        'zenv-run',
        activateScriptPath(entry),
        'python',
        'train.py',
      ],
    ])
  })
})
