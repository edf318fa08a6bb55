/**
 * Console output for the router CLI. Replies and tables go to stdout;
 * warnings, errors and verbose progress go to stderr so a piped
 * session only carries the conversation.
 */

export type TableColumn = string | { key: string; label?: string }
export type TableRow = Record<string, unknown>

export interface OutputFormatter {
  data(text: string): void
  /** Write without a trailing newline (prompts) */
  write(text: string): void
  table(rows: TableRow[], columns?: TableColumn[]): void
  warn(text: string): void
  error(text: string): void
  progress(label: string): void
}

export interface OutputFormatterConfig {
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
  verbose?: boolean
  quiet?: boolean
}

const valueToCell = (value: unknown): string => {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return JSON.stringify(value)
}

const normalizeColumns = (
  columns: TableColumn[] | undefined,
  rows: TableRow[]
): { key: string; label: string }[] => {
  if (columns && columns.length > 0) {
    return columns.map((column) =>
      typeof column === 'string'
        ? { key: column, label: column }
        : { key: column.key, label: column.label ?? column.key }
    )
  }
  const [firstRow] = rows
  if (!firstRow) return []
  return Object.keys(firstRow).map((key) => ({ key, label: key }))
}

/**
 * Left-aligned columns separated by two spaces. Trailing padding is kept
 * off the last column.
 */
export const renderTable = (
  rows: TableRow[],
  columns?: TableColumn[]
): string[] => {
  const normalized = normalizeColumns(columns, rows)
  if (normalized.length === 0) return []

  const widths = normalized.map((column) => column.label.length)
  for (const row of rows) {
    normalized.forEach((column, index) => {
      const cell = valueToCell(row[column.key])
      widths[index] = Math.max(widths[index] ?? 0, cell.length)
    })
  }

  const renderLine = (cells: string[]): string =>
    cells
      .map((cell, index) =>
        index === cells.length - 1 ? cell : cell.padEnd(widths[index] ?? 0)
      )
      .join('  ')

  return [
    renderLine(normalized.map((column) => column.label)),
    ...rows.map((row) =>
      renderLine(normalized.map((column) => valueToCell(row[column.key])))
    ),
  ]
}

export class TextFormatter implements OutputFormatter {
  private stdout: NodeJS.WritableStream
  private stderr: NodeJS.WritableStream
  private verbose: boolean
  private quiet: boolean

  constructor(config: OutputFormatterConfig) {
    this.stdout = config.stdout
    this.stderr = config.stderr
    this.verbose = config.verbose ?? false
    this.quiet = config.quiet ?? false
  }

  data(text: string): void {
    this.stdout.write(`${text}\n`)
  }

  write(text: string): void {
    this.stdout.write(text)
  }

  table(rows: TableRow[], columns?: TableColumn[]): void {
    for (const line of renderTable(rows, columns)) {
      this.data(line)
    }
  }

  warn(text: string): void {
    if (!this.quiet) this.stderr.write(`WARN: ${text}\n`)
  }

  error(text: string): void {
    this.stderr.write(`ERROR: ${text}\n`)
  }

  progress(label: string): void {
    if (this.verbose && !this.quiet) this.stderr.write(`${label}\n`)
  }
}

export const createOutputFormatter = (
  config: OutputFormatterConfig
): OutputFormatter => new TextFormatter(config)
