/**
 * CSV text codec
 * @module io/csv
 */

import Papa from 'papaparse'
import type { RawRow } from '../types/tables'

const BYTE_ORDER_MARK = '\uFEFF'

/**
 * Parsed CSV file: its header in file order and one text row per data line.
 */
export interface CsvTable {
  header: string[]
  rows: RawRow[]
}

export interface CsvFormatOptions {
  /** Prefix the text with a UTF-8 byte order mark */
  bom?: boolean
}

/**
 * Parses CSV text with a header row.
 *
 * A leading byte order mark is dropped, header names are trimmed and blank
 * lines skipped. Every row carries every header column; missing cells are
 * empty strings and cells beyond the header are ignored.
 *
 * @example
 * ```typescript
 * parseCsv('\uFEFFnoc,country\nFRA,France\n')
 * // { header: ['noc', 'country'], rows: [{ noc: 'FRA', country: 'France' }] }
 * ```
 */
export function parseCsv(text: string): CsvTable {
  const input = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text
  const parsed = Papa.parse<Record<string, unknown>>(input, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: (name) => name.trim(),
  })

  const header = (parsed.meta.fields ?? []).filter((name) => name !== '')
  const rows = parsed.data.map((cells) => {
    const row: RawRow = {}
    for (const column of header) {
      const value = cells[column]
      row[column] = typeof value === 'string' ? value : ''
    }
    return row
  })

  return { header, rows }
}

/**
 * Formats rows as CSV text in the given column order, one line per row and a
 * trailing newline. Columns a row lacks are written empty.
 *
 * @example
 * ```typescript
 * formatCsv(['noc', 'country'], [{ noc: 'KOR', country: 'Korea, South' }])
 * // 'noc,country\nKOR,"Korea, South"\n'
 * ```
 */
export function formatCsv(
  header: readonly string[],
  rows: readonly RawRow[],
  options: CsvFormatOptions = {}
): string {
  const text = Papa.unparse(
    {
      fields: [...header],
      data: rows.map((row) => header.map((column) => row[column] ?? '')),
    },
    { newline: '\n' }
  )
  // unparse ends a header-only table with a newline but not one with rows
  const body = text.endsWith('\n') ? text : `${text}\n`
  return `${options.bom ? BYTE_ORDER_MARK : ''}${body}`
}
