import type {
  AthleteRecord,
  CountryRecord,
  EventResultRecord,
  GamesRecord,
} from '../../types/tables'
import type { IssueLog } from '../issue-log'

export interface ReferenceTables {
  athletes: readonly AthleteRecord[]
  countries: readonly CountryRecord[]
  games: readonly GamesRecord[]
}

/**
 * Foreign keys of a result row with no target row.
 *
 * @returns Names of the unresolved columns, empty when the row is complete
 */
export function missingReferences(
  result: EventResultRecord,
  keys: { athleteIds: ReadonlySet<string>; countryCodes: ReadonlySet<string>; editionIds: ReadonlySet<string> }
): string[] {
  const missing: string[] = []
  if (!keys.athleteIds.has(result.athleteId)) missing.push('athlete_id')
  if (!keys.countryCodes.has(result.countryNoc)) missing.push('country_noc')
  if (!keys.editionIds.has(result.editionId)) missing.push('edition_id')
  return missing
}

/**
 * Keeps the result rows whose athlete, country and edition all exist, and
 * records a referential gap for every other row.
 */
export function enforceReferentialIntegrity(
  results: readonly EventResultRecord[],
  tables: ReferenceTables,
  issues: IssueLog
): EventResultRecord[] {
  const keys = {
    athleteIds: new Set(tables.athletes.map((athlete) => athlete.athleteId)),
    countryCodes: new Set(tables.countries.map((country) => country.noc)),
    editionIds: new Set(tables.games.map((games) => games.editionId)),
  }

  return results.filter((result) => {
    const missing = missingReferences(result, keys)
    if (missing.length === 0) return true

    issues.record('referential-gap', 'results', `Result row references missing ${missing.join(', ')}`, {
      context: {
        editionId: result.editionId,
        resultId: result.resultId,
        athleteId: result.athleteId,
        countryNoc: result.countryNoc,
        missing,
      },
    })
    return false
  })
}
