/**
 * Setup command - Build an environment from zenv.json and register it.
 *
 * WHY: The setup script can run for minutes (module loads, pip); the
 * spinner shows progress while its output goes to zenv_setup.log.
 */

import type { Command } from 'commander'

import { type SetupStep, setupEnvironment } from '@zenv/engine'

import { type CommonOptions, getPaths, resolveProjectDir } from '../helpers.js'
import { colors, commandBlock, createSpinner, formatPath, info, shortId, success, warning } from '../ui.js'

interface SetupOptions extends CommonOptions {
  /** False with --no-host */
  host: boolean
  force?: boolean | undefined
  forceDeps?: boolean | undefined
  uv?: boolean | undefined
  dev?: boolean | undefined
}

const STEP_TEXT: Record<SetupStep, string> = {
  dependencies: 'Collecting dependencies',
  script: 'Running setup script (modules, venv, packages)',
  activate: 'Writing activation script',
  register: 'Registering environment',
}

/**
 * Register the setup command.
 */
export function registerSetupCommand(program: Command): void {
  program
    .command('setup')
    .description('Create the virtual environment for an environment in zenv.json')
    .argument('[name]', 'Environment name (default: detected from the hostname)')
    .option('--no-host', 'Skip the target machine check')
    .option('--force', 'Delete and recreate an existing virtual environment')
    .option('--force-deps', 'Install requirements even when a loaded module provides them')
    .option('--uv', "Install packages with 'uv pip' instead of pip")
    .option('--dev', 'Also install the project itself in editable mode')
    .option('--project <path>', 'Project directory (default: auto-detect)')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (name: string | undefined, options: SetupOptions) => {
      const projectDir = await resolveProjectDir(options)
      const spinner = createSpinner('Preparing')

      try {
        const result = await setupEnvironment({
          projectDir,
          envName: name,
          skipHostnameCheck: !options.host,
          recreate: options.force,
          editable: options.dev,
          installer: options.uv ? 'uv' : 'pip',
          forceDependencies: options.forceDeps,
          paths: getPaths(options),
          onStep: (step) => {
            if (spinner.isSpinning) {
              spinner.text = colors.muted(STEP_TEXT[step])
            } else {
              spinner.start(colors.muted(STEP_TEXT[step]))
            }
          },
        })
        spinner.stop()

        for (const skipped of result.skippedDependencies) {
          warning(`Skipped dependency "${skipped.entry}" (${skipped.reason})`)
        }

        const verb = result.action === 'created' ? 'Created' : 'Rebuilt'
        success(`${verb} environment '${result.entry.name}' (${shortId(result.entry.id)})`)
        info('venv', formatPath(result.venvPath))
        info('packages', String(result.dependencies.length))
        info('log', formatPath(result.logPath))
        commandBlock('activate with', `source ${result.activatePath}`)
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail()
        }
        throw err
      }
    })
}
