/**
 * Hostname discovery.
 *
 * Sources are tried in order (HOSTNAME, HOST, the `hostname` command);
 * an unset or blank value falls through to the next one.
 */

import { execFile } from 'node:child_process'
import { promisify } from 'node:util'

import { createDebugLog } from '../debug.js'
import { MissingHostnameError } from '../errors.js'

const execFileAsync = promisify(execFile)
const debugLog = createDebugLog('hostname')

export const HOSTNAME_ENV_VARS = ['HOSTNAME', 'HOST'] as const

export type HostnameCommand = () => Promise<string>

export interface HostnameSourceOptions {
  env?: NodeJS.ProcessEnv | undefined
  /** Replaces the `hostname` command (tests) */
  command?: HostnameCommand | undefined
}

async function runHostnameCommand(): Promise<string> {
  const { stdout } = await execFileAsync('hostname', [], { timeout: 5000 })
  return stdout
}

/**
 * Resolve the current machine's hostname.
 *
 * @throws MissingHostnameError when every source is empty or fails
 */
export async function getHostname(options: HostnameSourceOptions = {}): Promise<string> {
  const env = options.env ?? process.env

  for (const name of HOSTNAME_ENV_VARS) {
    const value = env[name]?.trim()
    if (value) {
      debugLog(`from ${name}`, value)
      return value
    }
  }

  const command = options.command ?? runHostnameCommand
  try {
    const value = (await command()).trim()
    if (value) {
      debugLog('from hostname command', value)
      return value
    }
  } catch (err) {
    debugLog('hostname command failed', err instanceof Error ? err.message : String(err))
  }

  throw new MissingHostnameError()
}
