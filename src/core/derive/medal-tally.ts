/**
 * Medal tally per country and edition
 * @module core/derive/medal-tally
 */

import type {
  CountryRecord,
  EventResultRecord,
  GamesRecord,
  MedalTallyRecord,
} from '../../types/tables'
import type { TallyOptions } from '../../types/integration-config'
import { parseCanonicalDate } from '../normalizers/date'
import { compareIdentifiers } from '../reconciliation/natural-key-index'
import { gamesStartDate } from './age-calculator'

interface TallyAccumulator {
  editionId: string
  edition: string
  noc: string
  athletes: Set<string>
  medalAthletes: Set<string>
  /** Medals already counted, when team medals count once */
  countedMedals: Set<string>
  gold: number
  silver: number
  bronze: number
}

/**
 * Position of an edition in chronological order: start date, then year.
 * Editions with no start date sort first within their year.
 */
function editionOrder(games: GamesRecord | undefined): [number, number, number, number] {
  const start = games ? parseCanonicalDate(gamesStartDate(games)) : null
  const year = games?.year ?? start?.year ?? Number.POSITIVE_INFINITY
  return start ? [start.year, start.month, start.day, year] : [year, 0, 0, year]
}

function compareTuples(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1
  }
  return 0
}

/**
 * Derives the medal tally from the final results table.
 *
 * Every participating (country, edition) pair gets a row, including pairs
 * without medals. Each medal-bearing row counts one medal unless
 * `countTeamMedalsOnce` is set, in which case one medal is counted per
 * (sport, event, medal) of a country.
 *
 * Rows are ordered by edition (start date, year, edition id), then total
 * medals descending, then NOC code.
 *
 * @example
 * ```typescript
 * const tally = buildMedalTally(results, countries, games)
 * // [{ edition: '2024 Summer Olympics', noc: 'FRA', gold: 2, silver: 1, bronze: 0, total: 3, ... }]
 * ```
 */
export function buildMedalTally(
  results: readonly EventResultRecord[],
  countries: readonly CountryRecord[],
  games: readonly GamesRecord[],
  options: TallyOptions = { countTeamMedalsOnce: false }
): MedalTallyRecord[] {
  const countryNames = new Map(countries.map((country) => [country.noc, country.country]))
  const editions = new Map(games.map((edition) => [edition.editionId, edition]))
  const groups = new Map<string, TallyAccumulator>()

  for (const result of results) {
    const key = `${result.editionId}\u001f${result.countryNoc}`
    let group = groups.get(key)
    if (!group) {
      group = {
        editionId: result.editionId,
        edition: editions.get(result.editionId)?.edition ?? result.edition,
        noc: result.countryNoc,
        athletes: new Set(),
        medalAthletes: new Set(),
        countedMedals: new Set(),
        gold: 0,
        silver: 0,
        bronze: 0,
      }
      groups.set(key, group)
    }

    group.athletes.add(result.athleteId)
    if (result.medal === 'none') continue

    group.medalAthletes.add(result.athleteId)
    if (options.countTeamMedalsOnce) {
      const medalKey = `${result.sport}\u001f${result.event}\u001f${result.medal}`
      if (group.countedMedals.has(medalKey)) continue
      group.countedMedals.add(medalKey)
    }
    group[result.medal]++
  }

  const tally: MedalTallyRecord[] = Array.from(groups.values()).map((group) => ({
    edition: group.edition,
    editionId: group.editionId,
    country: countryNames.get(group.noc) ?? '',
    noc: group.noc,
    athleteCount: group.athletes.size,
    medalAthleteCount: group.medalAthletes.size,
    gold: group.gold,
    silver: group.silver,
    bronze: group.bronze,
    total: group.gold + group.silver + group.bronze,
  }))

  return tally.sort(
    (a, b) =>
      compareTuples(editionOrder(editions.get(a.editionId)), editionOrder(editions.get(b.editionId))) ||
      compareIdentifiers(a.editionId, b.editionId) ||
      b.total - a.total ||
      (a.noc < b.noc ? -1 : a.noc > b.noc ? 1 : 0)
  )
}
