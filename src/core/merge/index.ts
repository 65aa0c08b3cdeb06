export { KeyedTable } from './keyed-table'
export type {
  CountryMergeResult,
  AthleteMergeResult,
  ResultMergeContext,
} from './table-merger'
export {
  mergeCountries,
  rewriteAthleteCountries,
  fillAthleteGaps,
  mergeAthletes,
  upsertGames,
  resultKey,
  mergeResultRows,
  mergeResults,
} from './table-merger'
export type { ReferenceTables } from './referential-check'
export { missingReferences, enforceReferentialIntegrity } from './referential-check'
