import type { OutputOptions } from '../types/integration-config'
import type { IntegrationResult } from '../pipeline/integration-pipeline'
import { formatCsv } from './csv'
import type { TableFile } from './table-store'
import {
  AGE_COLUMN,
  ATHLETE_COLUMNS,
  COUNTRY_COLUMNS,
  GAMES_COLUMNS,
  RESULT_COLUMNS,
  TALLY_COLUMNS,
  athleteRow,
  countryRow,
  gamesRow,
  outputHeader,
  resultRow,
  tallyRow,
} from './table-schemas'

export interface OutputFileNames {
  athletes: string
  results: string
  countries: string
  games: string
  tally: string
}

export const DEFAULT_OUTPUT_FILES: OutputFileNames = {
  athletes: 'new_olympic_athlete_bio.csv',
  results: 'new_olympic_athlete_event_results.csv',
  countries: 'new_olympics_country.csv',
  games: 'new_olympics_games.csv',
  tally: 'new_medal_tally.csv',
}

/**
 * Renders the five output tables as CSV files. The four dataset tables keep
 * the column order of their base files; results gain the `age` column.
 */
export function renderOutputs(
  result: IntegrationResult,
  output: OutputOptions,
  names: OutputFileNames = DEFAULT_OUTPUT_FILES
): TableFile[] {
  const csv = (header: readonly string[], rows: Parameters<typeof formatCsv>[1]) =>
    formatCsv(header, rows, { bom: output.bom })

  return [
    {
      name: names.athletes,
      content: csv(
        outputHeader(result.headers.athletes, ATHLETE_COLUMNS),
        result.athletes.map((athlete) => athleteRow(athlete, output))
      ),
    },
    {
      name: names.results,
      content: csv(
        outputHeader(result.headers.results, [...RESULT_COLUMNS, AGE_COLUMN]),
        result.results.map((row) => resultRow(row, output))
      ),
    },
    {
      name: names.countries,
      content: csv(
        outputHeader(result.headers.countries, COUNTRY_COLUMNS),
        result.countries.map(countryRow)
      ),
    },
    {
      name: names.games,
      content: csv(
        outputHeader(result.headers.games, GAMES_COLUMNS),
        result.games.map((games) => gamesRow(games, output))
      ),
    },
    {
      name: names.tally,
      content: csv(TALLY_COLUMNS, result.tally.map(tallyRow)),
    },
  ]
}
