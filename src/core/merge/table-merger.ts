/**
 * Appends reconciled incoming rows to the base tables
 * @module core/merge/table-merger
 */

import type {
  AthleteRecord,
  CountryRecord,
  EventResultRecord,
  GamesRecord,
} from '../../types/tables'
import type { IncomingAthlete, IncomingCountry, IncomingResult } from '../../types/incoming'
import type { EditionConfig } from '../../types/integration-config'
import type { ResolvedRow } from '../../types/reconciliation'
import { normalizeWhitespace } from '../normalizers/basic'
import { medalPosition } from '../normalizers/medal'
import { composeKey, compareIdentifiers } from '../reconciliation/natural-key-index'
import { SequentialIdMinter } from '../reconciliation/identifier-minter'
import type { IssueLog } from '../issue-log'
import { KeyedTable } from './keyed-table'

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function upperCode(code: string): string {
  return code.trim().toUpperCase()
}

export interface CountryMergeResult {
  /** Merged countries, ordered by display name then code */
  countries: CountryRecord[]
  /** Incoming NOC code to reconciled code */
  codeMap: Map<string, string>
}

/**
 * Merges reconciled incoming countries. Matched countries keep their stored
 * display name; minted ones are appended.
 */
export function mergeCountries(
  base: readonly CountryRecord[],
  resolved: ReadonlyArray<ResolvedRow<IncomingCountry>>,
  issues: IssueLog
): CountryMergeResult {
  const table = new KeyedTable((country: CountryRecord) => country.noc)
  for (const country of base) {
    table.upsert(country, (existing) => existing)
  }

  const codeMap = new Map<string, string>()
  for (const { row, resolution } of resolved) {
    if (resolution.status === 'rejected') {
      issues.record('missing-natural-key', 'bundle.nocs', 'Country has neither name nor code', {
        rowNumber: row.rowNumber,
      })
      continue
    }

    const code = upperCode(row.code)
    if (code) codeMap.set(code, resolution.id)

    if (resolution.status === 'minted' && !table.has(resolution.id)) {
      table.upsert({
        noc: resolution.id,
        country: normalizeWhitespace(row.name) ?? resolution.id,
        extra: {},
      })
    }
  }

  const countries = table
    .values()
    .sort((a, b) => compareText(a.country, b.country) || compareText(a.noc, b.noc))
  return { countries, codeMap }
}

/**
 * Rewrites the delegation and nationality codes of incoming athletes to
 * reconciled country codes. Codes not in the map are kept, uppercased.
 */
export function rewriteAthleteCountries(
  athletes: readonly IncomingAthlete[],
  codeMap: ReadonlyMap<string, string>
): IncomingAthlete[] {
  const rewrite = (code: string) => {
    const upper = upperCode(code)
    return codeMap.get(upper) ?? upper
  }
  return athletes.map((athlete) => ({
    ...athlete,
    countryCode: rewrite(athlete.countryCode),
    nationalityCode: rewrite(athlete.nationalityCode),
  }))
}

/**
 * Fills the unknown or blank fields of a stored athlete from an incoming row.
 */
export function fillAthleteGaps(existing: AthleteRecord, incoming: AthleteRecord): AthleteRecord {
  return {
    ...existing,
    born: existing.born ?? incoming.born,
    sex: existing.sex || incoming.sex,
    height: existing.height || incoming.height,
    weight: existing.weight || incoming.weight,
    country: existing.country || incoming.country,
    countryNoc: existing.countryNoc || incoming.countryNoc,
  }
}

export interface AthleteMergeResult {
  athletes: AthleteRecord[]
  /** Bundle athlete code to reconciled athlete identifier */
  idMap: Map<string, string>
}

/**
 * Merges reconciled incoming athletes. Matched athletes keep their stored row
 * with gaps filled; minted athletes are appended.
 */
export function mergeAthletes(
  base: readonly AthleteRecord[],
  resolved: ReadonlyArray<ResolvedRow<IncomingAthlete>>,
  countries: readonly CountryRecord[],
  issues: IssueLog
): AthleteMergeResult {
  const countryNames = new Map(countries.map((country) => [country.noc, country.country]))
  const table = new KeyedTable((athlete: AthleteRecord) => athlete.athleteId)
  for (const athlete of base) {
    if (table.upsert(athlete, fillAthleteGaps) === 'updated') {
      issues.record('duplicate-row', 'athletes', `Duplicate athlete id ${athlete.athleteId}`, {
        context: { athleteId: athlete.athleteId },
      })
    }
  }

  const idMap = new Map<string, string>()
  for (const { row, resolution } of resolved) {
    if (resolution.status === 'rejected') {
      issues.record('missing-natural-key', 'bundle.athletes', 'Athlete has no name', {
        rowNumber: row.rowNumber,
        context: { code: row.sourceCode },
      })
      continue
    }

    idMap.set(row.sourceCode, resolution.id)
    table.upsert(
      {
        athleteId: resolution.id,
        name: row.name,
        sex: row.sex,
        born: row.born,
        height: row.height,
        weight: row.weight,
        country: countryNames.get(row.countryCode) ?? row.country,
        countryNoc: row.countryCode,
        extra: {},
      },
      fillAthleteGaps
    )
  }

  return { athletes: table.values(), idMap }
}

/**
 * Inserts or replaces the games row of the incoming edition. A replaced row
 * keeps its position, its extra columns and its `isHeld` value.
 */
export function upsertGames(base: readonly GamesRecord[], edition: EditionConfig): GamesRecord[] {
  const table = new KeyedTable((games: GamesRecord) => games.editionId)
  for (const games of base) {
    table.upsert(games, (existing) => existing)
  }

  const existing = table.get(edition.editionId)
  table.upsert({
    edition: edition.edition,
    editionId: edition.editionId,
    editionUrl: edition.editionUrl ?? existing?.editionUrl ?? '',
    year: edition.year,
    city: edition.city,
    countryFlagUrl: edition.countryFlagUrl ?? existing?.countryFlagUrl ?? '',
    countryNoc: upperCode(edition.hostNoc),
    startDate: edition.startDate,
    endDate: edition.endDate,
    competitionDate: edition.competitionDate ?? {
      start: edition.startDate,
      end: edition.endDate,
    },
    isHeld: existing?.isHeld ?? '',
    extra: existing?.extra ?? {},
  })

  return table.values()
}

/**
 * Primary key of a result row: edition, result id and athlete, with sport
 * and event standing in for a missing result id.
 */
export function resultKey(result: EventResultRecord): string {
  const instance = result.resultId ? [result.resultId] : ['', result.sport, result.event]
  return [result.editionId, ...instance, result.athleteId].join('\u001f')
}

function eventInstanceKey(editionId: string, sport: string, event: string): string | null {
  return composeKey([editionId, sport.trim(), event.trim()])
}

/**
 * Combines two rows with the same primary key. The later row's values win,
 * except that a medal or position is never replaced by a blank one.
 */
export function mergeResultRows(
  existing: EventResultRecord,
  incoming: EventResultRecord
): EventResultRecord {
  return {
    ...existing,
    countryNoc: incoming.countryNoc || existing.countryNoc,
    athlete: incoming.athlete || existing.athlete,
    medal: incoming.medal !== 'none' ? incoming.medal : existing.medal,
    pos: incoming.pos || existing.pos,
    isTeamSport: incoming.isTeamSport,
  }
}

export interface ResultMergeContext {
  edition: EditionConfig
  /** Bundle athlete code to reconciled athlete identifier */
  athleteIds: ReadonlyMap<string, string>
  /** Incoming NOC code to reconciled code */
  countryCodes: ReadonlyMap<string, string>
  athletes: readonly AthleteRecord[]
  issues: IssueLog
}

/**
 * Merges incoming result rows into the base results.
 *
 * Foreign keys are rewritten to reconciled identifiers. Every athlete row of
 * one event instance (edition, sport, event) shares the instance's existing
 * `result_id`, or one minted above the highest existing id. Rows with an
 * existing primary key update that row.
 */
export function mergeResults(
  base: readonly EventResultRecord[],
  incoming: readonly IncomingResult[],
  context: ResultMergeContext
): EventResultRecord[] {
  const { edition, athleteIds, countryCodes, issues } = context
  const athleteNames = new Map(context.athletes.map((athlete) => [athlete.athleteId, athlete.name]))

  const table = new KeyedTable(resultKey)
  const instances = new Map<string, string>()
  for (const result of base) {
    if (table.upsert(result, mergeResultRows) === 'updated') {
      issues.record('duplicate-row', 'results', 'Duplicate result row merged', {
        context: { editionId: result.editionId, resultId: result.resultId, athleteId: result.athleteId },
      })
    }
    const instance = eventInstanceKey(result.editionId, result.sport, result.event)
    if (instance && result.resultId) {
      const known = instances.get(instance)
      if (known === undefined || compareIdentifiers(result.resultId, known) < 0) {
        instances.set(instance, result.resultId)
      }
    }
  }

  const minter = new SequentialIdMinter(
    'results',
    base.map((result) => result.resultId).filter(Boolean)
  )
  const newInstances = new Set<string>()
  for (const row of incoming) {
    const instance = eventInstanceKey(edition.editionId, row.sport, row.event)
    if (instance && !instances.has(instance)) newInstances.add(instance)
  }
  for (const instance of Array.from(newInstances).sort(compareText)) {
    instances.set(instance, minter.mint())
  }

  const inserted = new Set<string>()
  for (const row of incoming) {
    const source = row.origin === 'medallist' ? 'bundle.medallists' : 'bundle.athletes'
    const athleteId = athleteIds.get(row.athleteCode)
    if (athleteId === undefined) {
      issues.record('referential-gap', source, `Result names unresolved athlete ${row.athleteCode}`, {
        rowNumber: row.rowNumber,
        context: { athleteCode: row.athleteCode, sport: row.sport, event: row.event },
      })
      continue
    }
    const instance = eventInstanceKey(edition.editionId, row.sport, row.event)
    if (instance === null) {
      issues.record('missing-natural-key', source, 'Result has no sport or event', {
        rowNumber: row.rowNumber,
        context: { athleteCode: row.athleteCode },
      })
      continue
    }

    const countryCode = upperCode(row.countryCode)
    const record: EventResultRecord = {
      edition: edition.edition,
      editionId: edition.editionId,
      countryNoc: countryCodes.get(countryCode) ?? countryCode,
      sport: row.sport.trim(),
      event: row.event.trim(),
      resultId: instances.get(instance) ?? '',
      athlete: athleteNames.get(athleteId) ?? '',
      athleteId,
      pos: row.pos || medalPosition(row.medal),
      medal: row.medal,
      isTeamSport: row.isTeamSport,
      age: null,
      extra: {},
    }

    const key = resultKey(record)
    if (inserted.has(key)) {
      issues.record('duplicate-row', source, 'Duplicate incoming result merged', {
        rowNumber: row.rowNumber,
        context: { athleteId, sport: record.sport, event: record.event },
      })
    }
    table.upsert(record, mergeResultRows)
    inserted.add(key)
  }

  return table.values()
}
