import type {
  AthleteRecord,
  CountryRecord,
  EventResultRecord,
  GamesRecord,
} from '../../src/types/tables'
import type { IncomingAthlete, IncomingCountry, IncomingResult } from '../../src/types/incoming'

/**
 * Creates an athlete row with blank defaults for testing.
 *
 * @example
 * ```typescript
 * const athlete = createAthlete({ athleteId: '10', name: 'Leon Marchand', countryNoc: 'FRA' })
 * ```
 */
export function createAthlete(
  data: Partial<AthleteRecord> & Pick<AthleteRecord, 'athleteId' | 'name'>
): AthleteRecord {
  return {
    sex: '',
    born: null,
    height: '',
    weight: '',
    country: '',
    countryNoc: '',
    extra: {},
    ...data,
  }
}

export function createCountry(noc: string, country: string): CountryRecord {
  return { noc, country, extra: {} }
}

export function createGames(
  data: Partial<GamesRecord> & Pick<GamesRecord, 'editionId' | 'edition'>
): GamesRecord {
  return {
    editionUrl: '',
    year: null,
    city: '',
    countryFlagUrl: '',
    countryNoc: '',
    startDate: null,
    endDate: null,
    competitionDate: null,
    isHeld: '',
    extra: {},
    ...data,
  }
}

export function createResult(
  data: Partial<EventResultRecord> &
    Pick<EventResultRecord, 'editionId' | 'resultId' | 'athleteId'>
): EventResultRecord {
  return {
    edition: '',
    countryNoc: '',
    sport: '',
    event: '',
    athlete: '',
    pos: '',
    medal: 'none',
    isTeamSport: false,
    age: null,
    extra: {},
    ...data,
  }
}

/**
 * Creates an incoming bundle athlete with blank defaults for testing.
 */
export function createIncomingAthlete(
  data: Partial<IncomingAthlete> & Pick<IncomingAthlete, 'name'>
): IncomingAthlete {
  return {
    sourceCode: '1',
    sex: '',
    born: null,
    height: '',
    weight: '',
    nationalityCode: '',
    countryCode: '',
    country: '',
    rowNumber: 1,
    ...data,
  }
}

export function createIncomingCountry(code: string, name: string, rowNumber = 1): IncomingCountry {
  return { code, name, rowNumber }
}

export function createIncomingResult(
  data: Partial<IncomingResult> & Pick<IncomingResult, 'athleteCode' | 'sport' | 'event'>
): IncomingResult {
  return {
    countryCode: '',
    medal: 'none',
    pos: '',
    isTeamSport: false,
    origin: 'entry',
    rowNumber: 1,
    ...data,
  }
}
