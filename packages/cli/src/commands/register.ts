/**
 * Register command - Record an environment from zenv.json without building it.
 */

import type { Command } from 'commander'

import { registerEnvironment } from '@zenv/engine'

import { type CommonOptions, getPaths, resolveProjectDir } from '../helpers.js'
import { formatPath, info, shortId, success } from '../ui.js'

interface RegisterOptions extends CommonOptions {
  /** False with --no-host */
  host: boolean
}

/**
 * Register the register command.
 */
export function registerRegisterCommand(program: Command): void {
  program
    .command('register')
    .description('Add an environment of this project to the registry')
    .argument('[name]', 'Environment name (default: detected from the hostname)')
    .option('--no-host', 'Skip the target machine check')
    .option('--project <path>', 'Project directory (default: auto-detect)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (name: string | undefined, options: RegisterOptions) => {
      const result = await registerEnvironment({
        projectDir: await resolveProjectDir(options),
        envName: name,
        skipHostnameCheck: !options.host,
        paths: getPaths(options),
      })

      const { entry } = result
      const verb = result.action === 'created' ? 'Registered' : 'Updated'
      success(`${verb} '${entry.name}' (${shortId(entry.id)})`)
      info('project', formatPath(entry.projectDir))
      info('targets', entry.targetMachines)
    })
}
