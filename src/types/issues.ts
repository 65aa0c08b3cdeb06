import type { TableName } from './tables'

/**
 * Per-row data-quality problems. None of them aborts a run.
 *
 * - `malformed-date`: date could not be parsed, field set to unknown, row kept
 * - `missing-natural-key`: identity cannot be reconciled, row rejected
 * - `referential-gap`: foreign key has no target after merge, row excluded
 * - `invalid-row`: row failed its table schema, row skipped
 * - `unknown-medal`: medal label not recognised, treated as none
 * - `duplicate-row`: second occurrence of a primary key, merged into the first
 * - `unknown-athlete-code`: bundle row names an athlete missing from the bundle
 */
export type IssueKind =
  | 'malformed-date'
  | 'missing-natural-key'
  | 'referential-gap'
  | 'invalid-row'
  | 'unknown-medal'
  | 'duplicate-row'
  | 'unknown-athlete-code'

/**
 * Source of an issue: one of the dataset tables or a bundle table.
 */
export type IssueSource =
  | TableName
  | 'bundle.athletes'
  | 'bundle.events'
  | 'bundle.nocs'
  | 'bundle.teams'
  | 'bundle.medallists'

export interface IntegrationIssue {
  kind: IssueKind
  source: IssueSource
  /** 1-based data row number in the source file, when known */
  rowNumber?: number
  message: string
  context?: Record<string, unknown>
}
