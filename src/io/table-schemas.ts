/**
 * Row schemas of the dataset tables, and conversion between text rows and
 * typed records
 * @module io/table-schemas
 */

import { z } from 'zod'
import type {
  AthleteRecord,
  BaseTables,
  CountryRecord,
  EventResultRecord,
  GamesRecord,
  MedalTallyRecord,
  RawRow,
} from '../types/tables'
import type { IssueSource } from '../types/issues'
import type { OutputOptions } from '../types/integration-config'
import type { IssueLog } from '../core/issue-log'
import { normalizeDate } from '../core/normalizers/date'
import { formatDateRange, normalizeDateRange } from '../core/normalizers/date-range'
import { parseMedal } from '../core/normalizers/medal'
import type { CsvTable } from './csv'
import { extraColumns, validateRows } from './row-validation'
import type { TableSchema } from './row-validation'

const key = (column: string) => z.string().trim().min(1, `${column} is empty`)
const text = () => z.string().default('')

export const ATHLETE_COLUMNS = [
  'athlete_id',
  'name',
  'sex',
  'born',
  'height',
  'weight',
  'country',
  'country_noc',
] as const

export const COUNTRY_COLUMNS = ['noc', 'country'] as const

export const GAMES_COLUMNS = [
  'edition',
  'edition_id',
  'edition_url',
  'year',
  'city',
  'country_flag_url',
  'country_noc',
  'start_date',
  'end_date',
  'competition_date',
  'isHeld',
] as const

export const RESULT_COLUMNS = [
  'edition',
  'edition_id',
  'country_noc',
  'sport',
  'event',
  'result_id',
  'athlete',
  'athlete_id',
  'pos',
  'medal',
  'isTeamSport',
] as const

/** Derived column appended to the results table */
export const AGE_COLUMN = 'age'

export const TALLY_COLUMNS = [
  'edition',
  'edition_id',
  'Country',
  'NOC',
  'number_of_athletes',
  'number_of_medal_athletes',
  'gold_medal_count',
  'silver_medal_count',
  'bronze_medal_count',
  'total_medals',
] as const

export const athleteSchema = {
  source: 'athletes',
  requiredColumns: ['athlete_id', 'name', 'born', 'country_noc'],
  row: z.object({
    athlete_id: key('athlete_id'),
    name: z.string().trim(),
    sex: text(),
    born: text(),
    height: text(),
    weight: text(),
    country: text(),
    country_noc: z.string().trim().toUpperCase().default(''),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const countrySchema = {
  source: 'countries',
  requiredColumns: COUNTRY_COLUMNS,
  row: z.object({
    noc: key('noc').toUpperCase(),
    country: z.string().trim(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const gamesSchema = {
  source: 'games',
  requiredColumns: ['edition', 'edition_id', 'year', 'start_date'],
  row: z.object({
    edition: z.string().trim(),
    edition_id: key('edition_id'),
    edition_url: text(),
    year: z
      .string()
      .trim()
      .regex(/^(\d{4})?$/, 'year is not a four-digit year'),
    city: text(),
    country_flag_url: text(),
    country_noc: z.string().trim().toUpperCase().default(''),
    start_date: text(),
    end_date: text(),
    competition_date: text(),
    isHeld: text(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

export const resultSchema = {
  source: 'results',
  requiredColumns: ['edition_id', 'country_noc', 'sport', 'event', 'athlete_id', 'medal'],
  row: z.object({
    edition: text(),
    edition_id: key('edition_id'),
    country_noc: z.string().trim().toUpperCase(),
    sport: z.string().trim(),
    event: z.string().trim(),
    result_id: z.string().trim().default(''),
    athlete: text(),
    athlete_id: key('athlete_id'),
    pos: z.string().trim().default(''),
    medal: z.string(),
    isTeamSport: text(),
  }),
} satisfies TableSchema<z.ZodTypeAny>

/**
 * Normalizes a date cell, recording a `malformed-date` issue for non-empty
 * text that is not a complete date.
 */
export function readDateCell(
  raw: string,
  column: string,
  source: IssueSource,
  rowNumber: number,
  issues: IssueLog,
  defaultYear?: number
): string | null {
  const result = normalizeDate(raw, { defaultYear })
  if (result.status === 'canonical') return result.value
  if (result.reason !== 'empty') {
    issues.record('malformed-date', source, `Unusable ${column} '${raw}' (${result.reason})`, {
      rowNumber,
      context: { column, raw, reason: result.reason },
    })
  }
  return null
}

function readBoolean(raw: string): boolean {
  return /^(true|yes|1)$/i.test(raw.trim())
}

export function readAthletes(table: CsvTable, issues: IssueLog): AthleteRecord[] {
  return validateRows(table, athleteSchema, issues).map(({ rowNumber, data, raw }) => ({
    athleteId: data.athlete_id,
    name: data.name,
    sex: data.sex,
    born: readDateCell(data.born, 'born', 'athletes', rowNumber, issues),
    height: data.height,
    weight: data.weight,
    country: data.country,
    countryNoc: data.country_noc,
    extra: extraColumns(raw, ATHLETE_COLUMNS),
  }))
}

export function readCountries(table: CsvTable, issues: IssueLog): CountryRecord[] {
  return validateRows(table, countrySchema, issues).map(({ data, raw }) => ({
    noc: data.noc,
    country: data.country,
    extra: extraColumns(raw, COUNTRY_COLUMNS),
  }))
}

export function readGames(table: CsvTable, issues: IssueLog): GamesRecord[] {
  return validateRows(table, gamesSchema, issues).map(({ rowNumber, data, raw }) => {
    const year = data.year ? parseInt(data.year, 10) : null
    const defaultYear = year ?? undefined
    const competitionDate = normalizeDateRange(data.competition_date, { defaultYear })
    if (competitionDate === null && !/^[\s\-\u2010-\u2015\u2212]*$/.test(data.competition_date)) {
      issues.record(
        'malformed-date',
        'games',
        `Unusable competition_date '${data.competition_date}'`,
        { rowNumber, context: { column: 'competition_date', raw: data.competition_date } }
      )
    }

    return {
      edition: data.edition,
      editionId: data.edition_id,
      editionUrl: data.edition_url,
      year,
      city: data.city,
      countryFlagUrl: data.country_flag_url,
      countryNoc: data.country_noc,
      startDate: readDateCell(data.start_date, 'start_date', 'games', rowNumber, issues, defaultYear),
      endDate: readDateCell(data.end_date, 'end_date', 'games', rowNumber, issues, defaultYear),
      competitionDate,
      isHeld: data.isHeld,
      extra: extraColumns(raw, GAMES_COLUMNS),
    }
  })
}

export function readResults(table: CsvTable, issues: IssueLog): EventResultRecord[] {
  return validateRows(table, resultSchema, issues).map(({ rowNumber, data, raw }) => {
    let medal = parseMedal(data.medal)
    if (medal === null) {
      issues.record('unknown-medal', 'results', `Unknown medal '${data.medal}' read as none`, {
        rowNumber,
        context: { medal: data.medal },
      })
      medal = 'none'
    }

    return {
      edition: data.edition,
      editionId: data.edition_id,
      countryNoc: data.country_noc,
      sport: data.sport,
      event: data.event,
      resultId: data.result_id,
      athlete: data.athlete,
      athleteId: data.athlete_id,
      pos: data.pos,
      medal,
      isTeamSport: readBoolean(data.isTeamSport),
      age: null,
      extra: extraColumns(raw, [...RESULT_COLUMNS, AGE_COLUMN]),
    }
  })
}

/**
 * Raw base tables as read from their files.
 */
export interface BaseCsvTables {
  athletes: CsvTable
  countries: CsvTable
  games: CsvTable
  results: CsvTable
}

/**
 * Reads and validates the four base tables.
 *
 * @throws {SchemaError} If a table lacks a required column
 */
export function readBaseTables(tables: BaseCsvTables, issues: IssueLog): BaseTables {
  return {
    athletes: readAthletes(tables.athletes, issues),
    countries: readCountries(tables.countries, issues),
    games: readGames(tables.games, issues),
    results: readResults(tables.results, issues),
    headers: {
      athletes: tables.athletes.header,
      countries: tables.countries.header,
      games: tables.games.header,
      results: tables.results.header,
    },
  }
}

/**
 * Output column order: the source header followed by any known column it
 * lacked.
 */
export function outputHeader(
  sourceHeader: readonly string[],
  columns: readonly string[]
): string[] {
  const header = [...sourceHeader]
  for (const column of columns) {
    if (!header.includes(column)) header.push(column)
  }
  return header
}

export function athleteRow(athlete: AthleteRecord, output: OutputOptions): RawRow {
  return {
    ...athlete.extra,
    athlete_id: athlete.athleteId,
    name: athlete.name,
    sex: athlete.sex,
    born: athlete.born ?? output.unknownText,
    height: athlete.height,
    weight: athlete.weight,
    country: athlete.country,
    country_noc: athlete.countryNoc,
  }
}

export function countryRow(country: CountryRecord): RawRow {
  return { ...country.extra, noc: country.noc, country: country.country }
}

export function gamesRow(games: GamesRecord, output: OutputOptions): RawRow {
  return {
    ...games.extra,
    edition: games.edition,
    edition_id: games.editionId,
    edition_url: games.editionUrl,
    year: games.year === null ? output.unknownText : String(games.year),
    city: games.city,
    country_flag_url: games.countryFlagUrl,
    country_noc: games.countryNoc,
    start_date: games.startDate ?? output.unknownText,
    end_date: games.endDate ?? output.unknownText,
    competition_date: games.competitionDate
      ? formatDateRange(games.competitionDate)
      : output.unknownText,
    isHeld: games.isHeld,
  }
}

export function resultRow(result: EventResultRecord, output: OutputOptions): RawRow {
  return {
    ...result.extra,
    edition: result.edition,
    edition_id: result.editionId,
    country_noc: result.countryNoc,
    sport: result.sport,
    event: result.event,
    result_id: result.resultId,
    athlete: result.athlete,
    athlete_id: result.athleteId,
    pos: result.pos,
    medal: output.medalLabels[result.medal],
    isTeamSport: result.isTeamSport ? output.teamSportLabels.yes : output.teamSportLabels.no,
    [AGE_COLUMN]: result.age === null ? output.unknownText : String(result.age),
  }
}

export function tallyRow(tally: MedalTallyRecord): RawRow {
  return {
    edition: tally.edition,
    edition_id: tally.editionId,
    Country: tally.country,
    NOC: tally.noc,
    number_of_athletes: String(tally.athleteCount),
    number_of_medal_athletes: String(tally.medalAthleteCount),
    gold_medal_count: String(tally.gold),
    silver_medal_count: String(tally.silver),
    bronze_medal_count: String(tally.bronze),
    total_medals: String(tally.total),
  }
}
