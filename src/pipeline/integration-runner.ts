/**
 * Reads the input tables from a store, runs the pipeline and writes the outputs
 * @module pipeline/integration-runner
 */

import { IssueLog } from '../core/issue-log'
import { assembleEditionBundle } from '../incoming/edition-bundle'
import { parseCsv } from '../io/csv'
import type { CsvTable } from '../io/csv'
import { readBaseTables } from '../io/table-schemas'
import { renderOutputs, DEFAULT_OUTPUT_FILES } from '../io/output-writer'
import type { OutputFileNames } from '../io/output-writer'
import type { TableStore } from '../io/table-store'
import { OlympiadMerge } from '../builder/integration-builder'
import { SchemaError } from '../utils/errors'
import { createPrefixedLogger } from '../utils/logger'
import type { IntegrationPipeline, IntegrationResult } from './integration-pipeline'

export interface InputFileNames {
  athletes: string
  results: string
  countries: string
  games: string
  bundleAthletes: string
  bundleEvents: string
  bundleNocs: string
  bundleTeams: string
  bundleMedallists: string
}

export const DEFAULT_INPUT_FILES: InputFileNames = {
  athletes: 'olympic_athlete_bio.csv',
  results: 'olympic_athlete_event_results.csv',
  countries: 'olympics_country.csv',
  games: 'olympics_games.csv',
  bundleAthletes: 'paris/athletes.csv',
  bundleEvents: 'paris/events.csv',
  bundleNocs: 'paris/nocs.csv',
  bundleTeams: 'paris/teams.csv',
  bundleMedallists: 'paris/medallists.csv',
}

export interface RunIntegrationOptions {
  /** Defaults to a pipeline with every option at its default */
  pipeline?: IntegrationPipeline
  inputs?: Partial<InputFileNames>
  outputs?: Partial<OutputFileNames>
}

/**
 * Runs one integration against a table store.
 *
 * All nine inputs are checked for presence before any is parsed. The five
 * outputs are written together, only after the whole pipeline succeeded.
 *
 * @throws {SchemaError} If an input file or a required column is missing
 * @throws {DuplicateIdentifierCollisionError} If a minted identifier is taken
 *
 * @example
 * ```typescript
 * const result = await runIntegration(createFileTableStore('./data'), {
 *   pipeline: OlympiadMerge.create().logger(defaultLogger).build(),
 * })
 * console.log(result.stats)
 * ```
 */
export async function runIntegration(
  store: TableStore,
  options: RunIntegrationOptions = {}
): Promise<IntegrationResult> {
  const pipeline = options.pipeline ?? OlympiadMerge.create().build()
  const inputs: InputFileNames = { ...DEFAULT_INPUT_FILES, ...options.inputs }
  const outputs: OutputFileNames = { ...DEFAULT_OUTPUT_FILES, ...options.outputs }
  const logger = createPrefixedLogger('runner', pipeline.config.logger)

  const missing: string[] = []
  for (const name of Object.values(inputs)) {
    if (!(await store.exists(name))) missing.push(name)
  }
  if (missing.length > 0) {
    throw new SchemaError('inputs', `Missing input files: ${missing.join(', ')}`, [], {
      files: missing,
    })
  }

  const read = async (name: string): Promise<CsvTable> => parseCsv(await store.read(name))
  const issues = new IssueLog(pipeline.config.logger)

  const base = readBaseTables(
    {
      athletes: await read(inputs.athletes),
      countries: await read(inputs.countries),
      games: await read(inputs.games),
      results: await read(inputs.results),
    },
    issues
  )
  const bundle = assembleEditionBundle(
    {
      athletes: await read(inputs.bundleAthletes),
      events: await read(inputs.bundleEvents),
      nocs: await read(inputs.bundleNocs),
      teams: await read(inputs.bundleTeams),
      medallists: await read(inputs.bundleMedallists),
    },
    { issues }
  )
  logger.info('Inputs read', {
    athletes: base.athletes.length,
    results: base.results.length,
    incomingAthletes: bundle.athletes.length,
    incomingResults: bundle.results.length,
  })

  const result = pipeline.run(base, bundle, issues)

  const files = renderOutputs(result, pipeline.config.output, outputs)
  await store.writeAll(files)
  logger.info('Outputs written', { files: files.map((file) => file.name) })

  return result
}
