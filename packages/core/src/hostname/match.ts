/**
 * Hostname pattern matching.
 *
 * A target pattern is either universal (`*`, `any`, `localhost`), a glob
 * with `*` / `?` anchored at both ends, or a literal that matches the whole
 * hostname, one of its dot-separated components, or a domain suffix.
 */

const UNIVERSAL_PATTERNS = new Set(['*', 'any', 'localhost'])

const LOCAL_SUFFIX = '.local'

/**
 * Strip a trailing `.local` (mDNS) suffix.
 */
export function normalizeHostname(hostname: string): string {
  if (hostname.endsWith(LOCAL_SUFFIX)) {
    return hostname.slice(0, -LOCAL_SUFFIX.length)
  }
  return hostname
}

export function isUniversalPattern(pattern: string): boolean {
  return UNIVERSAL_PATTERNS.has(pattern)
}

export function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?')
}

/**
 * Anchored glob match: `*` matches zero or more characters, `?` exactly one.
 */
export function globMatch(text: string, pattern: string): boolean {
  const firstStar = pattern.indexOf('*')
  const lastStar = pattern.lastIndexOf('*')
  const hasQuestion = pattern.includes('?')

  if (!hasQuestion && firstStar !== -1 && firstStar === lastStar) {
    if (firstStar === pattern.length - 1) {
      return text.startsWith(pattern.slice(0, -1))
    }
    if (firstStar === 0) {
      return text.endsWith(pattern.slice(1))
    }
  }

  return matchFrom(text, 0, pattern, 0)
}

function matchFrom(text: string, ti: number, pattern: string, pi: number): boolean {
  if (pi === pattern.length) {
    return ti === text.length
  }

  const p = pattern[pi]
  if (p === '*') {
    // Collapse runs of stars; each run behaves like one
    let next = pi
    while (pattern[next] === '*') next++
    for (let i = ti; i <= text.length; i++) {
      if (matchFrom(text, i, pattern, next)) return true
    }
    return false
  }

  if (ti === text.length) {
    return false
  }
  if (p === '?' || p === text[ti]) {
    return matchFrom(text, ti + 1, pattern, pi + 1)
  }
  return false
}

/**
 * Decide whether `hostname` satisfies a single target pattern.
 */
export function matchesPattern(hostname: string, pattern: string): boolean {
  if (isUniversalPattern(pattern)) {
    return true
  }
  // `local` is what deriveClusterName yields for `<name>.local`
  if (pattern === 'local' && hostname.endsWith(LOCAL_SUFFIX)) {
    return true
  }

  const host = normalizeHostname(hostname)

  if (hasWildcard(pattern)) {
    return globMatch(host, pattern)
  }

  if (host === pattern) {
    return true
  }
  if (host.split('.').includes(pattern)) {
    return true
  }
  if (pattern.startsWith('.') && host.endsWith(pattern)) {
    return true
  }
  return host.endsWith(`.${pattern}`)
}

/**
 * True if any pattern matches. An empty list places no restriction.
 */
export function matchesAnyPattern(hostname: string, patterns: readonly string[]): boolean {
  if (patterns.length === 0) {
    return true
  }
  return patterns.some((pattern) => matchesPattern(hostname, pattern))
}
