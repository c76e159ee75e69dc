/**
 * @zenv/cli - Command line interface for zenv.
 *
 * WHY: Provides a thin argument parsing layer that delegates
 * all core logic to the engine package. This keeps the CLI
 * focused on user interaction while engine handles orchestration.
 */

import { Command, CommanderError } from 'commander'

import { registerDeregisterCommand, registerRmCommand } from './commands/deregister.js'
import { registerInitCommand } from './commands/init.js'
import { registerListCommand } from './commands/list.js'
import { registerPathCommands } from './commands/path.js'
import { registerRegisterCommand } from './commands/register.js'
import { registerRunCommand } from './commands/run.js'
import { registerSetupCommand } from './commands/setup.js'
import { registerShowCommand } from './commands/show.js'
import { registerValidateCommand } from './commands/validate.js'
import { handleCliError } from './helpers.js'

export { findProjectRoot, handleCliError, resolveProjectDir } from './helpers.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 *
 * Commander exits are turned into CommanderError throws so run() decides
 * the exit code.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('zenv')
    .description('Python virtual environments for HPC clusters')
    .version(VERSION)
    .enablePositionalOptions()
    .exitOverride()

  registerInitCommand(program)
  registerSetupCommand(program)
  registerRegisterCommand(program)
  registerDeregisterCommand(program)
  registerRmCommand(program)
  registerPathCommands(program)
  registerListCommand(program)
  registerShowCommand(program)
  registerRunCommand(program)
  registerValidateCommand(program)

  return program
}

/**
 * Parse `argv` (node-style, with the executable and script first) and
 * run the command.
 *
 * @returns the process exit code
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = createProgram()
  try {
    await program.parseAsync([...argv])
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander already printed its own message (usage errors, --help)
      return error.exitCode
    }
    return handleCliError(error)
  }
}
