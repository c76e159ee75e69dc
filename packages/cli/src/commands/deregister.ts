/**
 * Deregister and rm commands - Remove environments from the registry.
 *
 * `deregister` keeps the virtual environment on disk; `rm` deletes it too.
 */

import type { Command } from 'commander'

import { deregisterEnvironment } from '@zenv/engine'

import { type CommonOptions, getPaths } from '../helpers.js'
import { formatPath, info, shortId, success } from '../ui.js'

/**
 * Register the deregister command.
 */
export function registerDeregisterCommand(program: Command): void {
  program
    .command('deregister')
    .description('Remove an environment from the registry, keeping its files')
    .argument('<id>', 'Environment name, ID or ID prefix (or . for this project)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (identifier: string, options: CommonOptions) => {
      const entry = await deregisterEnvironment(identifier, {
        paths: getPaths(options),
        cwd: process.cwd(),
      })
      success(`Deregistered '${entry.name}' (${shortId(entry.id)})`)
      info('kept', formatPath(entry.venvPath))
    })
}

/**
 * Register the rm command.
 */
export function registerRmCommand(program: Command): void {
  program
    .command('rm')
    .description('Remove an environment from the registry and delete its virtual environment')
    .argument('<id>', 'Environment name, ID or ID prefix (or . for this project)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (identifier: string, options: CommonOptions) => {
      const entry = await deregisterEnvironment(identifier, {
        paths: getPaths(options),
        cwd: process.cwd(),
        removeVenv: true,
      })
      success(`Removed '${entry.name}' (${shortId(entry.id)})`)
      info('deleted', formatPath(entry.venvPath))
    })
}
