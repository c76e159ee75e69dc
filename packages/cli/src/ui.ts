/**
 * Terminal UI utilities for the zenv CLI.
 *
 * Design: quiet output that still pastes well into a shell
 * - Paths and IDs stand on their own lines
 * - Unicode symbols for status
 * - Sparse color
 */

import chalk from 'chalk'
import figures from 'figures'
import ora, { type Ora } from 'ora'

// ═══════════════════════════════════════════════════════════════════════════
// Color Palette
// ═══════════════════════════════════════════════════════════════════════════

export const colors = {
  success: chalk.hex('#10b981'), // emerald
  warn: chalk.hex('#f59e0b'), // amber
  muted: chalk.hex('#6b7280'), // gray-500
  emphasis: chalk.bold,
  // Commands the user can copy
  code: chalk.hex('#a78bfa'), // violet-400
}

// ═══════════════════════════════════════════════════════════════════════════
// Symbols
// ═══════════════════════════════════════════════════════════════════════════

export const symbols = {
  success: colors.success(figures.tick),
  warning: colors.warn(figures.warning),
}

// ═══════════════════════════════════════════════════════════════════════════
// Spinner
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Spinner on stderr, so stdout stays clean for `$(zenv ...)`.
 */
export function createSpinner(text: string): Ora {
  return ora({
    text: colors.muted(text),
    spinner: 'dots',
    color: 'gray',
    stream: process.stderr,
  })
}

// ═══════════════════════════════════════════════════════════════════════════
// Layout Components
// ═══════════════════════════════════════════════════════════════════════════

export function header(text: string): void {
  console.log(colors.emphasis(text))
}

export function success(text: string): void {
  console.log(`${symbols.success} ${text}`)
}

export function warning(text: string): void {
  console.error(`${symbols.warning} ${colors.warn(text)}`)
}

/**
 * Print an indented `label value` line
 */
export function info(label: string, value: string): void {
  console.log(`  ${colors.muted(label.padEnd(12))} ${value}`)
}

/**
 * Print a copyable command under a label
 */
export function commandBlock(label: string, command: string): void {
  console.log()
  console.log(`  ${colors.muted(`${label}:`)}`)
  console.log(`    ${colors.code(command)}`)
}

// ═══════════════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a file path for display (shorten home dir)
 */
export function formatPath(filePath: string, home = process.env['HOME'] ?? ''): string {
  if (home && (filePath === home || filePath.startsWith(`${home}/`))) {
    return `~${filePath.slice(home.length)}`
  }
  return filePath
}

/**
 * Short form of a registry ID for tables and messages.
 */
export function shortId(id: string): string {
  return id.slice(0, 7)
}

/**
 * Pad columns to their widest cell, two spaces apart.
 */
export function formatTable(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = []
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length)
    })
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
  )
}
