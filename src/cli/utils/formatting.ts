/**
 * CLI output formatting utilities: aligned tables and the JSON envelope.
 */

/**
 * Format a table from an array of row objects.
 *
 * Column widths come from headers and data; columns are separated by ` | `
 * with a dashed separator under the header.
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[],
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')
  const dataRows = rows.map((row) =>
    keys.map((key, i) => (row[key] ?? '').padEnd(widths[i] ?? 0)).join(' | ').trimEnd(),
  )

  return [headerRow.trimEnd(), separator, ...dataRows].join('\n')
}

/**
 * Envelope for machine-readable (`--output-format json`) responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  /** Waypoint version string */
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

/** Write a JSON envelope to stdout */
export function writeJsonOutput<T>(command: string, data: T, version: string): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version), null, 2) + '\n')
}

export type OutputFormat = 'human' | 'json'

export function parseOutputFormat(raw: string | undefined): OutputFormat {
  return raw === 'json' ? 'json' : 'human'
}
