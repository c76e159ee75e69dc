/**
 * Run command - Run a program inside an activated environment.
 *
 * WHY: Batch scripts and one-off commands need the modules, venv and
 * custom variables without an interactive `source`. The child's exit
 * code becomes zenv's.
 */

import { type Command, CommanderError } from 'commander'

import { runInEnvironment } from '@zenv/engine'

import { type CommonOptions, resolveEntry } from '../helpers.js'

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a command inside an environment')
    .argument('<id>', 'Environment name, ID or ID prefix (or . for this project)')
    .argument('<command>', 'Program to run')
    .argument('[args...]', 'Arguments for the program')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .passThroughOptions()
    .action(async (identifier: string, command: string, args: string[], options: CommonOptions) => {
      const entry = await resolveEntry(identifier, options)
      const result = await runInEnvironment(entry, command, args)
      if (result.exitCode !== 0) {
        throw new CommanderError(result.exitCode, 'zenv.run.exit', '')
      }
    })
}
