/**
 * External command execution using argv arrays (no shell interpolation).
 *
 * Output is collected in memory and, when `logFile` is given, streamed
 * to that file as well.
 */

import { spawn } from 'node:child_process'
import { type WriteStream, createWriteStream } from 'node:fs'

import { ProcessError, createDebugLog } from '@zenv/core'

const debugLog = createDebugLog('exec')

export interface ExecResult {
  exitCode: number
  stdout: string
  stderr: string
}

export interface ExecOptions {
  cwd?: string | undefined
  /** Added to the inherited environment */
  env?: Record<string, string> | undefined
  /** Milliseconds before the process is killed (default: none) */
  timeout?: number | undefined
  /** Append stdout and stderr to this file (truncated first) */
  logFile?: string | undefined
  /** Attach the child to this process's terminal; nothing is captured */
  inheritStdio?: boolean | undefined
}

function logFileError(logFile: string, display: string, err: Error): ProcessError {
  return new ProcessError(`Cannot write log file ${logFile}: ${err.message}`, 'PROCESS_LOG_ERROR', display, -1, '')
}

/**
 * Open `logFile` for writing, truncating it.
 */
function openLog(logFile: string, display: string): Promise<WriteStream> {
  return new Promise((resolve, reject) => {
    const stream = createWriteStream(logFile, { flags: 'w' })
    stream.once('open', () => resolve(stream))
    stream.once('error', (err) => reject(logFileError(logFile, display, err)))
  })
}

/**
 * Run `command` with `args` and wait for it to exit.
 *
 * Non-zero exits are returned, not thrown; callers map them to their own
 * error types.
 *
 * @throws ProcessError if the process cannot be started, times out or
 * its log file cannot be written
 */
export async function exec(command: string, args: string[], options: ExecOptions = {}): Promise<ExecResult> {
  const display = [command, ...args].join(' ')
  debugLog('spawn', display, options.cwd ?? '')

  const logFile = options.logFile
  const log = logFile ? await openLog(logFile, display) : undefined
  const logState: { error?: Error | undefined } = {}
  log?.on('error', (err) => {
    logState.error = err
  })

  const result = await new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: options.inheritStdio ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    child.stdout?.on('data', (chunk: Buffer) => {
      stdout += chunk.toString()
      log?.write(chunk)
    })
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString()
      log?.write(chunk)
    })

    let timer: NodeJS.Timeout | undefined
    if (options.timeout !== undefined) {
      timer = setTimeout(() => {
        child.kill('SIGTERM')
        reject(new ProcessError(`Timeout exceeded (${options.timeout}ms)`, 'PROCESS_TIMEOUT', display, -1, stderr))
      }, options.timeout)
    }

    child.on('error', (err) => {
      if (timer) clearTimeout(timer)
      reject(new ProcessError(`Failed to start ${command}: ${err.message}`, 'PROCESS_SPAWN_ERROR', display, -1, ''))
    })

    child.on('close', (code, signal) => {
      if (timer) clearTimeout(timer)
      resolve({ exitCode: code ?? (signal ? 128 : 1), stdout, stderr })
    })
  }).finally(async () => {
    if (log && !log.destroyed) {
      await new Promise<void>((done) => log.end(done))
    }
  })

  if (logFile && logState.error) {
    throw logFileError(logFile, display, logState.error)
  }

  debugLog('exit', result.exitCode, display)
  return result
}
