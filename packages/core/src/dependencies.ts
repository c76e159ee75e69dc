/**
 * Dependency list collection and cleanup.
 *
 * Sources: the merged `dependencies` list plus an optional requirements.txt
 * or pyproject.toml. The combined list is filtered down to plain
 * requirement specifiers, first occurrence per package winning.
 */

import { readFile } from 'node:fs/promises'
import { isAbsolute, join } from 'node:path'
import TOML from '@iarna/toml'

import { createDebugLog } from './debug.js'
import { ConfigParseError, ConfigReadError } from './errors.js'

const debugLog = createDebugLog('deps')

/** Package name, optional extras, then whatever follows */
const REQUIREMENT_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(\[[^\]]*\])?\s*(.*)$/

/** What may follow the name: a version clause, markers or a direct URL */
const REMAINDER_PATTERN = /^(?:$|[=<>!~;@,(])/

export type SkipReason = 'empty' | 'path' | 'invalid' | 'duplicate'

export interface SkippedDependency {
  entry: string
  reason: SkipReason
}

export interface DependencyValidationResult {
  valid: string[]
  skipped: SkippedDependency[]
}

/**
 * Normalized package name used for duplicate detection (PEP 503).
 */
export function packageKey(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-')
}

function looksLikePath(entry: string): boolean {
  return (
    entry.startsWith('.') ||
    entry.startsWith('/') ||
    entry.startsWith('~') ||
    (entry.includes('/') && !entry.includes('@'))
  )
}

/**
 * Filter a raw dependency list.
 *
 * Drops blank entries, filesystem paths, entries that are not requirement
 * specifiers, and later duplicates of a package (names compared
 * case-insensitively).
 */
export function validateDependencies(entries: readonly string[]): DependencyValidationResult {
  const valid: string[] = []
  const skipped: SkippedDependency[] = []
  const seen = new Set<string>()

  for (const raw of entries) {
    const entry = raw.trim()
    if (!entry) {
      skipped.push({ entry: raw, reason: 'empty' })
      continue
    }
    if (looksLikePath(entry)) {
      skipped.push({ entry, reason: 'path' })
      continue
    }
    const match = REQUIREMENT_PATTERN.exec(entry)
    const name = match?.[1]
    const remainder = match?.[3] ?? ''
    if (!name || !REMAINDER_PATTERN.test(remainder)) {
      skipped.push({ entry, reason: 'invalid' })
      continue
    }
    const key = packageKey(name)
    if (seen.has(key)) {
      skipped.push({ entry, reason: 'duplicate' })
      continue
    }
    seen.add(key)
    valid.push(entry)
  }

  if (skipped.length > 0) {
    debugLog('skipped', skipped)
  }
  return { valid, skipped }
}

/**
 * Requirement lines from a requirements.txt. Comments, blank lines and
 * pip options (`-r`, `--index-url`, ...) are left out.
 */
export function parseRequirementsTxt(content: string): string[] {
  const out: string[] = []
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, '').trim()
    if (!line || line.startsWith('-')) continue
    out.push(line)
  }
  return out
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * `[project].dependencies` from a pyproject.toml.
 *
 * @throws ConfigParseError if the TOML is invalid or dependencies is not a string list
 */
export function parsePyprojectDependencies(content: string, filePath = 'pyproject.toml'): string[] {
  let parsed: unknown
  try {
    parsed = TOML.parse(content)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigParseError(`Failed to parse TOML: ${message}`, filePath)
  }

  const project = isRecord(parsed) ? parsed['project'] : undefined
  if (!isRecord(project) || project['dependencies'] === undefined) {
    return []
  }
  const deps = project['dependencies']
  if (!Array.isArray(deps) || !deps.every((d): d is string => typeof d === 'string')) {
    throw new ConfigParseError('[project].dependencies must be a list of strings', filePath)
  }
  return deps
}

/**
 * Read dependencies from a requirements.txt or pyproject.toml.
 *
 * @param projectDir - Base for a relative `dependencyFile`
 * @throws ConfigReadError if the file is missing or unreadable
 */
export async function readDependencyFile(projectDir: string, dependencyFile: string): Promise<string[]> {
  const path = isAbsolute(dependencyFile) ? dependencyFile : join(projectDir, dependencyFile)
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigReadError('Dependency file not found', path, { cause: err })
    }
    const message = err instanceof Error ? err.message : String(err)
    throw new ConfigReadError(`Failed to read dependency file: ${message}`, path, { cause: err })
  }

  if (path.endsWith('.toml')) {
    return parsePyprojectDependencies(content, path)
  }
  return parseRequirementsTxt(content)
}

export interface CollectDependenciesOptions {
  projectDir: string
  /** Merged `dependencies` list */
  dependencies: readonly string[]
  dependencyFile: string | null
}

/**
 * Config dependencies followed by those from the dependency file, filtered.
 */
export async function collectDependencies(
  options: CollectDependenciesOptions
): Promise<DependencyValidationResult> {
  const fromFile = options.dependencyFile
    ? await readDependencyFile(options.projectDir, options.dependencyFile)
    : []
  return validateDependencies([...options.dependencies, ...fromFile])
}
