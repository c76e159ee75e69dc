/**
 * Show command - Print the merged configuration of one environment.
 *
 * WHY: Values come from two sections of zenv.json plus defaults; this is
 * what setup will actually use.
 */

import type { Command } from 'commander'

import { isEligible } from '@zenv/core'
import { prepareEnvironment } from '@zenv/engine'
import { computeVenvPath } from '@zenv/store'

import { type CommonOptions, resolveProjectDir } from '../helpers.js'
import { colors, formatPath, header, info } from '../ui.js'

function listOrNone(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : colors.muted('none')
}

/**
 * Register the show command.
 */
export function registerShowCommand(program: Command): void {
  program
    .command('show')
    .description('Show the effective configuration of an environment')
    .argument('[name]', 'Environment name (default: detected from the hostname)')
    .option('--json', 'Output as JSON')
    .option('--project <path>', 'Project directory (default: auto-detect)')
    .action(async (name: string | undefined, options: CommonOptions) => {
      const prepared = await prepareEnvironment({
        projectDir: await resolveProjectDir(options),
        envName: name,
        skipHostnameCheck: true,
      })
      const { settings, hostname } = prepared
      const venvPath = computeVenvPath(prepared.projectDir, settings.baseDir, settings.name)
      const eligible = hostname === undefined ? null : isEligible(settings, hostname)

      if (options.json) {
        console.log(
          JSON.stringify(
            { ...settings, projectDir: prepared.projectDir, venvPath, hostname: hostname ?? null, eligible },
            null,
            2
          )
        )
        return
      }

      header(`Environment '${settings.name}'`)
      if (settings.description) {
        info('description', settings.description)
      }
      info('project', formatPath(prepared.projectDir))
      info('venv', formatPath(venvPath))
      info('python', settings.pythonExecutable)
      info('targets', settings.targetMachines.length > 0 ? settings.targetMachines.join(', ') : 'any host')
      if (hostname !== undefined) {
        info('this host', `${hostname} (${eligible ? 'eligible' : colors.warn('not eligible')})`)
      }
      info('modules', listOrNone(settings.modules))
      info('dep file', settings.dependencyFile ?? colors.muted('none'))
      info('dependencies', listOrNone(settings.dependencies))
      info('setup', listOrNone(settings.setupCommands))
      for (const [key, value] of Object.entries(settings.customActivateVars)) {
        info('export', `${key}=${value}`)
      }
    })
}
