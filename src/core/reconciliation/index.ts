export { composeKey, compareIdentifiers, NaturalKeyIndex } from './natural-key-index'
export type { MatchStrategy } from './strategy'
export type { IdentifierMinter } from './identifier-minter'
export { SequentialIdMinter, CountryCodeMinter } from './identifier-minter'
export type { ReconcilerConfig } from './reconciler'
export { Reconciler, indexIdentity } from './reconciler'
export { CountryAliasTable } from './alias-table'
export type { AthleteIdentity, AthleteReconcilerOptions } from './athlete-reconciler'
export {
  athleteStrategies,
  athleteNaturalKey,
  existingAthleteIdentity,
  incomingAthleteIdentity,
  createAthleteReconciler,
} from './athlete-reconciler'
export type { CountryIdentity, CountryReconcilerOptions } from './country-reconciler'
export {
  countryStrategies,
  countryNaturalKey,
  createCountryReconciler,
} from './country-reconciler'
