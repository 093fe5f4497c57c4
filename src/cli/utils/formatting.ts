/**
 * CLI output formatting utilities
 */

/**
 * Format rows as an aligned plain-text table.
 *
 * @param headers - Column header names (in order)
 * @param rows    - Row objects, values indexed by key
 * @param keys    - Object keys to read from each row (in column order)
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => {
      const val = row[key] ?? ''
      return Math.max(max, val.length)
    }, 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')

  const dataRows = rows.map((row) =>
    keys.map((key, i) => {
      const val = row[key] ?? ''
      return val.padEnd(widths[i] ?? val.length)
    }).join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/**
 * Wrapper for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Package version string */
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}
