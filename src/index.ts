// Main entry point
export { OlympiadMerge, IntegrationBuilder } from './builder/integration-builder'

// Pipeline
export {
  IntegrationPipeline,
  type IntegrationResult,
  type IntegrationStats,
  type ResolutionStats,
} from './pipeline/integration-pipeline'
export {
  runIntegration,
  DEFAULT_INPUT_FILES,
  type InputFileNames,
  type RunIntegrationOptions,
} from './pipeline/integration-runner'

// Configuration
export {
  PARIS_2024_EDITION,
  DEFAULT_COUNTRY_ALIASES,
  DEFAULT_TALLY_OPTIONS,
  DEFAULT_OUTPUT_OPTIONS,
  DEFAULT_INTEGRATION_CONFIG,
  resolveConfig,
  type IntegrationConfigInput,
} from './config/defaults'

// Normalizers
export {
  registerNormalizer,
  getNormalizer,
  listNormalizers,
  applyNormalizer,
  composeNormalizers,
} from './core/normalizers/registry'
export type { NormalizerFunction } from './core/normalizers/types'
export {
  trim,
  lowercase,
  uppercase,
  normalizeWhitespace,
  foldDiacritics,
  unifyPunctuation,
} from './core/normalizers/basic'
export {
  normalizeDate,
  formatCanonicalDate,
  parseCanonicalDate,
  compareCalendarDates,
  isValidDate,
  canonicalDate,
  type CalendarDate,
  type NormalizedDate,
  type UnknownDateReason,
  type DateNormalizerOptions,
} from './core/normalizers/date'
export {
  normalizeDateRange,
  formatDateRange,
  type DateRangeOptions,
} from './core/normalizers/date-range'
export {
  displayName,
  reverseSurnameFirst,
  personNameKey,
  countryNameKey,
} from './core/normalizers/name'
export { parseListField } from './core/normalizers/list-field'
export { parseMedal, medalPosition } from './core/normalizers/medal'

// Reconciliation
export * from './core/reconciliation'

// Merge and derived tables
export * from './core/merge'
export * from './core/derive'
export { IssueLog } from './core/issue-log'

// Incoming edition
export {
  assembleEditionBundle,
  bundleAthleteName,
  type BundleCsvTables,
  type AssembleOptions,
} from './incoming/edition-bundle'

// Tabular I/O
export { parseCsv, formatCsv, type CsvTable, type CsvFormatOptions } from './io/csv'
export {
  readBaseTables,
  readAthletes,
  readCountries,
  readGames,
  readResults,
  type BaseCsvTables,
} from './io/table-schemas'
export {
  renderOutputs,
  DEFAULT_OUTPUT_FILES,
  type OutputFileNames,
} from './io/output-writer'
export {
  createFileTableStore,
  createMemoryTableStore,
  type TableStore,
  type TableFile,
  type MemoryTableStore,
} from './io/table-store'

// Types
export type * from './types/tables'
export type * from './types/incoming'
export type * from './types/issues'
export type * from './types/reconciliation'
export type * from './types/integration-config'
export { ATHLETE_STRATEGY_NAMES } from './types/integration-config'

// Errors
export {
  OlympiadMergeError,
  MissingParameterError,
  InvalidParameterError,
  ConfigurationError,
  SchemaError,
  DuplicateIdentifierCollisionError,
  isOlympiadMergeError,
} from './utils/errors'

// Logging
export {
  type Logger,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from './utils/logger'
