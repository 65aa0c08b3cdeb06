/**
 * Assembles the raw tables of a new edition into incoming rows
 * @module incoming/edition-bundle
 */

import type { EditionBundle, IncomingAthlete, IncomingCountry, IncomingResult } from '../types/incoming'
import type { MedalType } from '../types/tables'
import type { IssueLog } from '../core/issue-log'
import { displayName, reverseSurnameFirst } from '../core/normalizers/name'
import { parseListField } from '../core/normalizers/list-field'
import { parseMedal } from '../core/normalizers/medal'
import type { CsvTable } from '../io/csv'
import { validateRows } from '../io/row-validation'
import { readDateCell } from '../io/table-schemas'
import {
  bundleAthleteSchema,
  bundleEventSchema,
  bundleMedallistSchema,
  bundleNocSchema,
  bundleTeamSchema,
} from './bundle-schemas'

/**
 * Raw tables of an edition bundle.
 */
export interface BundleCsvTables {
  athletes: CsvTable
  events: CsvTable
  nocs: CsvTable
  teams: CsvTable
  medallists: CsvTable
}

const participationKey = (athleteCode: string, sport: string, event: string) =>
  `${athleteCode}\u001f${sport}\u001f${event}`

const eventKey = (sport: string, event: string) => `${sport}\u001f${event}`

/**
 * Display name of a bundle athlete: the TV name when present, otherwise the
 * surname-first name reordered. Both are title-cased.
 *
 * @example
 * ```typescript
 * bundleAthleteName('LEON MARCHAND', 'MARCHAND Leon') // 'Leon Marchand'
 * bundleAthleteName('', 'BOERS Isayah')               // 'Isayah Boers'
 * ```
 */
export function bundleAthleteName(nameTv: string, name: string): string {
  const source = nameTv.trim() || reverseSurnameFirst(name)
  return displayName(source) ?? ''
}

/**
 * Height or weight cell; a zero measurement means not measured.
 */
function measurement(raw: string): string {
  return raw !== '' && Number(raw) === 0 ? '' : raw
}

interface MedalRecord {
  medal: MedalType
  rowNumber: number
  athleteCode: string
  sport: string
  event: string
}

function readMedallists(table: CsvTable, issues: IssueLog): Map<string, MedalRecord> {
  const medals = new Map<string, MedalRecord>()
  for (const { rowNumber, data } of validateRows(table, bundleMedallistSchema, issues)) {
    let medal = parseMedal(data.medal_type)
    if (medal === null) {
      issues.record('unknown-medal', 'bundle.medallists', `Unknown medal '${data.medal_type}' read as none`, {
        rowNumber,
        context: { medal: data.medal_type },
      })
      medal = 'none'
    }
    const key = participationKey(data.code_athlete, data.discipline, data.event)
    if (medals.has(key)) {
      issues.record('duplicate-row', 'bundle.medallists', 'Duplicate medallist record ignored', {
        rowNumber,
        context: { athleteCode: data.code_athlete, sport: data.discipline, event: data.event },
      })
      continue
    }
    medals.set(key, {
      medal,
      rowNumber,
      athleteCode: data.code_athlete,
      sport: data.discipline,
      event: data.event,
    })
  }
  return medals
}

function readTeamMemberships(table: CsvTable, issues: IssueLog): Set<string> {
  const memberships = new Set<string>()
  for (const { data } of validateRows(table, bundleTeamSchema, issues)) {
    for (const athleteCode of parseListField(data.athletes_codes)) {
      memberships.add(participationKey(athleteCode.trim(), data.discipline, data.events))
    }
  }
  return memberships
}

export interface AssembleOptions {
  issues: IssueLog
}

/**
 * Turns the raw bundle tables into incoming athletes, countries and results.
 *
 * Each athlete takes part in every (discipline, event) pair of its list
 * fields that the events table names. Medals come from the medallist
 * records; a medallist record without a matching participation becomes a
 * result row of its own, and one naming an athlete missing from the bundle
 * is reported and skipped.
 *
 * @throws {SchemaError} If a bundle table lacks a required column
 */
export function assembleEditionBundle(
  tables: BundleCsvTables,
  { issues }: AssembleOptions
): EditionBundle {
  const countries: IncomingCountry[] = validateRows(tables.nocs, bundleNocSchema, issues).map(
    ({ rowNumber, data }) => ({ code: data.code, name: data.country_long, rowNumber })
  )

  const events = new Set(
    validateRows(tables.events, bundleEventSchema, issues).map(({ data }) =>
      eventKey(data.sport, data.event)
    )
  )
  const teams = readTeamMemberships(tables.teams, issues)
  const medals = readMedallists(tables.medallists, issues)

  const athletes: IncomingAthlete[] = []
  const athletesByCode = new Map<string, IncomingAthlete>()
  const results: IncomingResult[] = []
  const participations = new Set<string>()

  for (const { rowNumber, data } of validateRows(tables.athletes, bundleAthleteSchema, issues)) {
    if (athletesByCode.has(data.code)) {
      issues.record('duplicate-row', 'bundle.athletes', `Duplicate athlete code ${data.code} ignored`, {
        rowNumber,
        context: { code: data.code },
      })
      continue
    }

    const athlete: IncomingAthlete = {
      sourceCode: data.code,
      name: bundleAthleteName(data.name_tv, data.name),
      sex: data.gender,
      born: readDateCell(data.birth_date, 'birth_date', 'bundle.athletes', rowNumber, issues),
      height: measurement(data.height),
      weight: measurement(data.weight),
      nationalityCode: data.nationality_code,
      countryCode: data.country_code,
      country: data.country_long,
      rowNumber,
    }
    athletes.push(athlete)
    athletesByCode.set(athlete.sourceCode, athlete)

    for (const sport of parseListField(data.disciplines)) {
      for (const event of parseListField(data.events)) {
        if (!events.has(eventKey(sport, event))) continue

        const key = participationKey(athlete.sourceCode, sport, event)
        if (participations.has(key)) continue
        participations.add(key)

        results.push({
          athleteCode: athlete.sourceCode,
          sport,
          event,
          countryCode: athlete.countryCode,
          medal: medals.get(key)?.medal ?? 'none',
          pos: '',
          isTeamSport: teams.has(key),
          origin: 'entry',
          rowNumber,
        })
      }
    }
  }

  for (const [key, record] of medals) {
    if (participations.has(key)) continue

    const athlete = athletesByCode.get(record.athleteCode)
    if (!athlete) {
      issues.record(
        'unknown-athlete-code',
        'bundle.medallists',
        `Medallist record names unknown athlete ${record.athleteCode}`,
        { rowNumber: record.rowNumber, context: { athleteCode: record.athleteCode } }
      )
      continue
    }

    results.push({
      athleteCode: athlete.sourceCode,
      sport: record.sport,
      event: record.event,
      countryCode: athlete.countryCode,
      medal: record.medal,
      pos: '',
      isTeamSport: teams.has(key),
      origin: 'medallist',
      rowNumber: record.rowNumber,
    })
  }

  return { athletes, countries, results }
}
