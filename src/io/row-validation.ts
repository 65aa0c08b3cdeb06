import type { z } from 'zod'
import type { IssueSource } from '../types/issues'
import type { RawRow } from '../types/tables'
import type { IssueLog } from '../core/issue-log'
import { SchemaError } from '../utils/errors'
import type { CsvTable } from './csv'

/**
 * Column contract of one input table.
 */
export interface TableSchema<S extends z.ZodTypeAny> {
  source: IssueSource
  /** Columns that must appear in the header */
  requiredColumns: readonly string[]
  row: S
}

/**
 * Row that passed its schema, with its parsed values and the raw text row.
 */
export interface ValidRow<T> {
  rowNumber: number
  data: T
  raw: RawRow
}

/**
 * Throws a {@link SchemaError} when the header lacks a required column.
 */
export function requireColumns(
  source: IssueSource,
  header: readonly string[],
  requiredColumns: readonly string[]
): void {
  const present = new Set(header)
  const missing = requiredColumns.filter((column) => !present.has(column))
  if (missing.length > 0) {
    throw new SchemaError(source, `Missing required columns: ${missing.join(', ')}`, missing)
  }
}

/**
 * Validates every row of a table against its schema. Rows that fail are
 * recorded as `invalid-row` issues and skipped.
 *
 * @throws {SchemaError} If a required column is missing
 */
export function validateRows<S extends z.ZodTypeAny>(
  table: CsvTable,
  schema: TableSchema<S>,
  issues: IssueLog
): ValidRow<z.output<S>>[] {
  requireColumns(schema.source, table.header, schema.requiredColumns)

  const valid: ValidRow<z.output<S>>[] = []
  table.rows.forEach((raw, index) => {
    const rowNumber = index + 1
    const parsed = schema.row.safeParse(raw)
    if (parsed.success) {
      valid.push({ rowNumber, data: parsed.data, raw })
      return
    }
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    issues.record('invalid-row', schema.source, message, { rowNumber })
  })
  return valid
}

/**
 * Cells of a row outside the given columns.
 */
export function extraColumns(raw: RawRow, known: readonly string[]): RawRow {
  const extra: RawRow = {}
  for (const [column, value] of Object.entries(raw)) {
    if (!known.includes(column)) extra[column] = value
  }
  return extra
}
