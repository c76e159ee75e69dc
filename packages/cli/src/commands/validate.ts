/**
 * Validate command - Check a zenv.json without touching anything.
 *
 * Schema errors are all reported at once; each environment is then
 * merged and checked for required fields.
 */

import { join, resolve } from 'node:path'

import type { Command } from 'commander'

import {
  CONFIG_FILENAME,
  ConfigValidationError,
  type ValidationError,
  findEnvironmentProblems,
  listEnvironmentNames,
  mergeEnvironment,
  readZenvJson,
} from '@zenv/core'

import { type CommonOptions, resolveProjectDir } from '../helpers.js'
import { success } from '../ui.js'

/**
 * Register the validate command.
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate a zenv.json file')
    .argument('[file]', `Config file (default: ${CONFIG_FILENAME} of the project)`)
    .option('--project <path>', 'Project directory (default: auto-detect)')
    .action(async (file: string | undefined, options: CommonOptions) => {
      const configPath = file ? resolve(file) : join(await resolveProjectDir(options), CONFIG_FILENAME)
      const config = await readZenvJson(configPath)
      const names = listEnvironmentNames(config)

      const problems: ValidationError[] = []
      for (const name of names) {
        problems.push(...findEnvironmentProblems(mergeEnvironment(config, name)))
      }
      if (problems.length > 0) {
        throw new ConfigValidationError(`Invalid ${CONFIG_FILENAME}`, configPath, problems)
      }

      const summary = names.length > 0 ? names.join(', ') : 'none'
      success(`${configPath} is valid (environments: ${summary})`)
    })
}
