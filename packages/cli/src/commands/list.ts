/**
 * List command - Show registered environments usable on this machine.
 *
 * WHY: The registry spans every project on the filesystem; filtering by
 * the current hostname shows what can actually be activated here.
 */

import type { Command } from 'commander'

import { getHostname } from '@zenv/core'
import { listEnvironments } from '@zenv/engine'
import { loadRegistry } from '@zenv/store'

import { type CommonOptions, getPaths } from '../helpers.js'
import { colors, formatPath, formatTable, header, shortId } from '../ui.js'

interface ListOptions extends CommonOptions {
  all?: boolean | undefined
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List registered environments for this machine')
    .option('--all', 'Include environments for other machines')
    .option('--json', 'Output as JSON')
    .option('--zenv-dir <path>', 'ZENV_DIR override')
    .action(async (options: ListOptions) => {
      const registry = await loadRegistry(getPaths(options))
      const all = options.all === true
      const hostname = all ? undefined : await getHostname()
      const entries = listEnvironments(registry, { hostname, all })

      if (options.json) {
        console.log(JSON.stringify({ hostname: hostname ?? null, environments: entries }, null, 2))
        return
      }

      if (entries.length === 0) {
        console.log(
          colors.muted(all ? 'No environments registered' : `No environments registered for ${hostname}`)
        )
        return
      }

      header(all ? 'All environments:' : `Environments for ${hostname}:`)
      const rows = entries.map((entry) => [
        entry.name,
        shortId(entry.id),
        entry.targetMachines,
        formatPath(entry.projectDir),
      ])
      for (const line of formatTable([['NAME', 'ID', 'TARGETS', 'PROJECT'], ...rows])) {
        console.log(`  ${line}`)
      }
    })
}
