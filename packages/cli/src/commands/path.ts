/**
 * Path commands - Print locations of a registered environment.
 *
 * WHY: Output is a bare path on stdout so shells can use it directly:
 *   source "$(zenv activate gpu)"
 *   cd "$(zenv cd gpu)"
 */

import type { Command } from 'commander'

import { getActivationScript, readSetupLog } from '@zenv/engine'

import { type CommonOptions, resolveEntry } from '../helpers.js'

/**
 * Register the activate, cd and log commands.
 */
export function registerPathCommands(program: Command): void {
  program
    .command('activate')
    .description('Print the path of the activation script')
    .argument('<id>', 'Environment name, ID or ID prefix (or . for this project)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (identifier: string, options: CommonOptions) => {
      const entry = await resolveEntry(identifier, options)
      console.log(await getActivationScript(entry))
    })

  program
    .command('cd')
    .description('Print the project directory of an environment')
    .argument('<id>', 'Environment name, ID or ID prefix')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (identifier: string, options: CommonOptions) => {
      const entry = await resolveEntry(identifier, options)
      console.log(entry.projectDir)
    })

  program
    .command('log')
    .description('Print the output of the last setup run')
    .argument('<id>', 'Environment name, ID or ID prefix (or . for this project)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (identifier: string, options: CommonOptions) => {
      const entry = await resolveEntry(identifier, options)
      process.stdout.write(await readSetupLog(entry))
    })
}
