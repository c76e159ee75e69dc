/**
 * Identifier resolution: name, full ID, unique ID prefix or `.`.
 *
 * Order: `.` (entries registered for the working directory), exact name,
 * exact ID, then an ID prefix of at least MIN_PARTIAL_ID_LENGTH characters.
 * Shorter identifiers only ever match by name.
 */

import { resolve } from 'node:path'

import { AmbiguousIdentifierError, IdentifierNotFoundError, type RegistryEntry } from '@zenv/core'

export const MIN_PARTIAL_ID_LENGTH = 7

export const CURRENT_DIRECTORY_IDENTIFIER = '.'

export interface ResolveOptions {
  /** Working directory for `.` and for picking among same-named entries */
  cwd?: string | undefined
}

function candidatesOf(entries: readonly RegistryEntry[]) {
  return entries.map((e) => ({ id: e.id, name: e.name, projectDir: e.projectDir }))
}

function single(identifier: string, matches: readonly RegistryEntry[]): RegistryEntry {
  const [first] = matches
  if (!first) {
    throw new IdentifierNotFoundError(identifier)
  }
  if (matches.length > 1) {
    throw new AmbiguousIdentifierError(identifier, candidatesOf(matches))
  }
  return first
}

/**
 * Resolve `identifier` to exactly one registry entry.
 *
 * @throws IdentifierNotFoundError when nothing matches
 * @throws AmbiguousIdentifierError when several entries match at the deciding step
 */
export function resolveIdentifier(
  entries: readonly RegistryEntry[],
  identifier: string,
  options: ResolveOptions = {}
): RegistryEntry {
  const query = identifier.trim()
  if (!query) {
    throw new IdentifierNotFoundError(identifier)
  }

  if (query === CURRENT_DIRECTORY_IDENTIFIER) {
    const cwd = resolve(options.cwd ?? process.cwd())
    return single(query, entries.filter((e) => resolve(e.projectDir) === cwd))
  }

  const byName = entries.filter((e) => e.name === query)
  if (byName.length > 1 && options.cwd !== undefined) {
    const cwd = resolve(options.cwd)
    const local = byName.filter((e) => resolve(e.projectDir) === cwd)
    if (local.length === 1) {
      return single(query, local)
    }
  }
  if (byName.length > 0) {
    return single(query, byName)
  }

  const idQuery = query.toLowerCase()
  const byId = entries.find((e) => e.id === idQuery)
  if (byId) {
    return byId
  }

  if (idQuery.length >= MIN_PARTIAL_ID_LENGTH) {
    return single(
      query,
      entries.filter((e) => idQuery.length < e.id.length && e.id.startsWith(idQuery))
    )
  }

  throw new IdentifierNotFoundError(query)
}
