/**
 * Athlete age at competition time
 * @module core/derive/age-calculator
 */

import type { AthleteRecord, EventResultRecord, GamesRecord } from '../../types/tables'
import { parseCanonicalDate } from '../normalizers/date'

/**
 * Age in whole years on a given date.
 *
 * @param born - Canonical birth date
 * @param onDate - Canonical reference date
 * @returns The age, or null when either date is unknown or the birth date
 *   falls after the reference date
 *
 * @example
 * ```typescript
 * calculateAge('01-Jan-2000', '01-Aug-2024') // 24
 * calculateAge('02-Aug-2000', '01-Aug-2024') // 23
 * calculateAge(null, '01-Aug-2024')          // null
 * ```
 */
export function calculateAge(born: string | null, onDate: string | null): number | null {
  const birth = parseCanonicalDate(born)
  const reference = parseCanonicalDate(onDate)
  if (!birth || !reference) return null

  let age = reference.year - birth.year
  if (
    reference.month < birth.month ||
    (reference.month === birth.month && reference.day < birth.day)
  ) {
    age--
  }
  return age >= 0 ? age : null
}

/**
 * Start date of a games edition: its start date, or the first day of
 * competition when the start date is unknown.
 */
export function gamesStartDate(games: GamesRecord): string | null {
  return games.startDate ?? games.competitionDate?.start ?? null
}

/**
 * Sets the age of every result row from its athlete's birth date and its
 * edition's start date.
 */
export function annotateAges(
  results: readonly EventResultRecord[],
  athletes: readonly AthleteRecord[],
  games: readonly GamesRecord[]
): EventResultRecord[] {
  const births = new Map(athletes.map((athlete) => [athlete.athleteId, athlete.born]))
  const starts = new Map(games.map((edition) => [edition.editionId, gamesStartDate(edition)]))

  return results.map((result) => ({
    ...result,
    age: calculateAge(births.get(result.athleteId) ?? null, starts.get(result.editionId) ?? null),
  }))
}
