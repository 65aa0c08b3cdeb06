/**
 * Canonical table records.
 *
 * Every record carries `extra`: the columns of its source file that the engine
 * does not interpret, written back unchanged.
 */

/**
 * Raw text row as read from a CSV file.
 */
export type RawRow = Record<string, string>

/**
 * Medal won in an event result.
 */
export type MedalType = 'gold' | 'silver' | 'bronze' | 'none'

/**
 * Date in canonical `dd-Mon-yyyy` form, or null when unknown.
 */
export type CanonicalDateText = string | null

export interface AthleteRecord {
  athleteId: string
  name: string
  sex: string
  born: CanonicalDateText
  height: string
  weight: string
  /** Display name of the country the athlete represents */
  country: string
  countryNoc: string
  extra: RawRow
}

export interface CountryRecord {
  noc: string
  country: string
  extra: RawRow
}

/**
 * Inclusive competition date range.
 */
export interface DateRange {
  start: string
  end: string
}

export interface GamesRecord {
  edition: string
  editionId: string
  editionUrl: string
  year: number | null
  city: string
  countryFlagUrl: string
  countryNoc: string
  startDate: CanonicalDateText
  endDate: CanonicalDateText
  competitionDate: DateRange | null
  isHeld: string
  extra: RawRow
}

export interface EventResultRecord {
  edition: string
  editionId: string
  countryNoc: string
  sport: string
  event: string
  resultId: string
  athlete: string
  athleteId: string
  pos: string
  medal: MedalType
  isTeamSport: boolean
  /** Age in whole years at the start of the games, null when unknown */
  age: number | null
  extra: RawRow
}

/**
 * Derived medal summary for one country in one edition.
 */
export interface MedalTallyRecord {
  edition: string
  editionId: string
  country: string
  noc: string
  /** Distinct athletes with at least one result row */
  athleteCount: number
  /** Distinct athletes with at least one medal */
  medalAthleteCount: number
  gold: number
  silver: number
  bronze: number
  total: number
}

/**
 * The four source-of-truth tables of the historical dataset.
 */
export interface BaseTables {
  athletes: AthleteRecord[]
  countries: CountryRecord[]
  games: GamesRecord[]
  results: EventResultRecord[]
  /** Column order of each source file, preserved in the output */
  headers: TableHeaders
}

export interface TableHeaders {
  athletes: string[]
  countries: string[]
  games: string[]
  results: string[]
}

export type TableName = 'athletes' | 'countries' | 'games' | 'results' | 'tally'
