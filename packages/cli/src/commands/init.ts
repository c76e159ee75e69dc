/**
 * Init command - Create a starter zenv.json in the current directory.
 *
 * WHY: Gives users a valid config to edit instead of writing the
 * common/environment layout from scratch.
 */

import { access } from 'node:fs/promises'
import { join, resolve } from 'node:path'

import type { Command } from 'commander'

import {
  CONFIG_FILENAME,
  ConfigError,
  atomicWrite,
  createInitialConfig,
  serializeZenvJson,
} from '@zenv/core'

import { commandBlock, success } from '../ui.js'

export const DEFAULT_INIT_ENV_NAME = 'test'
export const DEFAULT_INIT_DESCRIPTION = 'Env config created by zenv'

/** Checked in order; the first one present becomes dependency_file */
const DEPENDENCY_FILE_CANDIDATES = ['requirements.txt', 'pyproject.toml']

interface InitOptions {
  project?: string | undefined
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export async function detectDependencyFile(projectDir: string): Promise<string | null> {
  for (const candidate of DEPENDENCY_FILE_CANDIDATES) {
    if (await exists(join(projectDir, candidate))) {
      return candidate
    }
  }
  return null
}

/**
 * Register the init command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a starter zenv.json')
    .argument('[name]', 'Name of the first environment', DEFAULT_INIT_ENV_NAME)
    .argument('[description]', 'Description of the first environment', DEFAULT_INIT_DESCRIPTION)
    .option('--project <path>', 'Directory to create zenv.json in (default: cwd)')
    .action(async (name: string, description: string, options: InitOptions) => {
      const projectDir = resolve(options.project ?? process.cwd())
      const configPath = join(projectDir, CONFIG_FILENAME)

      if (await exists(configPath)) {
        throw new ConfigError(
          `${CONFIG_FILENAME} already exists. Remove or rename it first`,
          'CONFIG_EXISTS',
          configPath
        )
      }

      const config = createInitialConfig({
        envName: name,
        description,
        targetMachines: ['*'],
        dependencyFile: await detectDependencyFile(projectDir),
      })
      await atomicWrite(configPath, serializeZenvJson(config))

      success(`Created ${configPath}`)
      commandBlock('next', `zenv setup ${name}`)
    })
}
