/**
 * Debug logging gated on ZENV_DEBUG.
 */

const ENABLED_VALUES = new Set(['1', 'true', 'yes'])

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env['ZENV_DEBUG']
  return value !== undefined && ENABLED_VALUES.has(value.toLowerCase())
}

/**
 * Create a logger that writes `[zenv <scope>]`-prefixed lines to stderr
 * when ZENV_DEBUG is set. The flag is read on every call.
 */
export function createDebugLog(scope: string): (...args: unknown[]) => void {
  return (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.error(`[zenv ${scope}]`, ...args)
    }
  }
}
