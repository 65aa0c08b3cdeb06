import type { CanonicalDateText, MedalType } from './tables'

/**
 * Athlete as described by an edition bundle, before reconciliation.
 */
export interface IncomingAthlete {
  /** Athlete code used inside the bundle (not a dataset identifier) */
  sourceCode: string
  /** Display name */
  name: string
  sex: string
  born: CanonicalDateText
  height: string
  weight: string
  /** NOC code of the athlete's nationality */
  nationalityCode: string
  /** NOC code of the delegation the athlete competes for */
  countryCode: string
  /** Display name of the delegation */
  country: string
  rowNumber: number
}

/**
 * Country (NOC) as described by an edition bundle.
 */
export interface IncomingCountry {
  code: string
  name: string
  rowNumber: number
}

/**
 * One athlete's participation in one event of the incoming edition.
 */
export interface IncomingResult {
  athleteCode: string
  sport: string
  event: string
  countryCode: string
  medal: MedalType
  pos: string
  isTeamSport: boolean
  /** Where the row came from: an athlete's event list, or a medallist record with no entry */
  origin: 'entry' | 'medallist'
  rowNumber: number
}

/**
 * Incoming edition rows, ready for reconciliation.
 */
export interface EditionBundle {
  athletes: IncomingAthlete[]
  countries: IncomingCountry[]
  results: IncomingResult[]
}
