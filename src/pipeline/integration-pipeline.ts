/**
 * One integration run over in-memory tables
 * @module pipeline/integration-pipeline
 */

import type {
  AthleteRecord,
  BaseTables,
  CountryRecord,
  EventResultRecord,
  GamesRecord,
  MedalTallyRecord,
  TableHeaders,
} from '../types/tables'
import type { EditionBundle, IncomingAthlete, IncomingCountry } from '../types/incoming'
import type { IntegrationConfig } from '../types/integration-config'
import type { IntegrationIssue } from '../types/issues'
import type { ResolvedRow } from '../types/reconciliation'
import { IssueLog } from '../core/issue-log'
import { createAthleteReconciler } from '../core/reconciliation/athlete-reconciler'
import { createCountryReconciler } from '../core/reconciliation/country-reconciler'
import {
  mergeAthletes,
  mergeCountries,
  mergeResults,
  rewriteAthleteCountries,
  upsertGames,
} from '../core/merge/table-merger'
import { enforceReferentialIntegrity } from '../core/merge/referential-check'
import { annotateAges } from '../core/derive/age-calculator'
import { buildMedalTally } from '../core/derive/medal-tally'
import { createPrefixedLogger } from '../utils/logger'

/**
 * Resolution counts of one entity type.
 */
export interface ResolutionStats {
  matched: number
  minted: number
  rejected: number
}

export interface IntegrationStats {
  countries: ResolutionStats
  athletes: ResolutionStats
  results: {
    /** Result rows in the base table */
    base: number
    /** Incoming result rows */
    incoming: number
    /** Rows dropped by the referential check */
    excluded: number
    /** Rows in the final table */
    final: number
  }
}

/**
 * Final state of one run. Every table and row is frozen.
 */
export interface IntegrationResult {
  athletes: ReadonlyArray<Readonly<AthleteRecord>>
  countries: ReadonlyArray<Readonly<CountryRecord>>
  games: ReadonlyArray<Readonly<GamesRecord>>
  results: ReadonlyArray<Readonly<EventResultRecord>>
  tally: ReadonlyArray<Readonly<MedalTallyRecord>>
  /** Column order of the base files */
  headers: TableHeaders
  resolutions: {
    countries: ReadonlyArray<ResolvedRow<IncomingCountry>>
    athletes: ReadonlyArray<ResolvedRow<IncomingAthlete>>
  }
  issues: readonly IntegrationIssue[]
  stats: IntegrationStats
}

function countResolutions<T>(resolved: ReadonlyArray<ResolvedRow<T>>): ResolutionStats {
  const stats: ResolutionStats = { matched: 0, minted: 0, rejected: 0 }
  for (const { resolution } of resolved) {
    stats[resolution.status]++
  }
  return stats
}

function freezeRows<T extends object>(rows: readonly T[]): ReadonlyArray<Readonly<T>> {
  return Object.freeze(rows.map((row) => Object.freeze({ ...row })))
}

/**
 * Merges an edition bundle into the base tables and derives ages and the
 * medal tally.
 *
 * Stages run in a fixed order: countries are reconciled first so athlete and
 * result rows can be rewritten to reconciled codes, then athletes, games and
 * results are merged, results with unresolved foreign keys are dropped, and
 * ages and the tally are derived from what remains.
 *
 * @example
 * ```typescript
 * const pipeline = OlympiadMerge.create()
 *   .countryAliases([['United Kingdom', 'Great Britain']])
 *   .build()
 *
 * const result = pipeline.run(base, bundle)
 * result.stats.athletes // { matched: 2, minted: 1, rejected: 0 }
 * ```
 */
export class IntegrationPipeline {
  constructor(readonly config: IntegrationConfig) {}

  /**
   * Runs one integration.
   *
   * @param base - Base tables, left unmodified
   * @param bundle - Incoming rows of the new edition
   * @param issues - Log that already holds issues found while reading the inputs
   * @throws {DuplicateIdentifierCollisionError} If a minted identifier is taken
   */
  run(
    base: BaseTables,
    bundle: EditionBundle,
    issues: IssueLog = new IssueLog(this.config.logger)
  ): IntegrationResult {
    const logger = createPrefixedLogger('integration', this.config.logger)
    const { edition } = this.config

    try {
      const countryResolutions = createCountryReconciler(base.countries, {
        aliases: this.config.countryAliases,
      }).reconcileAll(bundle.countries)
      const { countries, codeMap } = mergeCountries(base.countries, countryResolutions, issues)
      logger.info('Countries reconciled', { ...countResolutions(countryResolutions), total: countries.length })

      const incomingAthletes = rewriteAthleteCountries(bundle.athletes, codeMap)
      const athleteResolutions = createAthleteReconciler(base.athletes, {
        strategies: this.config.athleteStrategies,
      }).reconcileAll(incomingAthletes)
      const { athletes, idMap } = mergeAthletes(base.athletes, athleteResolutions, countries, issues)
      logger.info('Athletes reconciled', { ...countResolutions(athleteResolutions), total: athletes.length })

      const games = upsertGames(base.games, edition)

      const merged = mergeResults(base.results, bundle.results, {
        edition,
        athleteIds: idMap,
        countryCodes: codeMap,
        athletes,
        issues,
      })
      const complete = enforceReferentialIntegrity(merged, { athletes, countries, games }, issues)
      const results = annotateAges(complete, athletes, games)
      logger.info('Results merged', {
        total: results.length,
        excluded: merged.length - complete.length,
      })

      const tally = buildMedalTally(results, countries, games, this.config.tally)
      logger.info('Medal tally derived', { rows: tally.length, issues: issues.summary() })

      return Object.freeze({
        athletes: freezeRows(athletes),
        countries: freezeRows(countries),
        games: freezeRows(games),
        results: freezeRows(results),
        tally: freezeRows(tally),
        headers: base.headers,
        resolutions: {
          countries: Object.freeze(countryResolutions),
          athletes: Object.freeze(athleteResolutions),
        },
        issues: Object.freeze(issues.toArray()),
        stats: {
          countries: countResolutions(countryResolutions),
          athletes: countResolutions(athleteResolutions),
          results: {
            base: base.results.length,
            incoming: bundle.results.length,
            excluded: merged.length - complete.length,
            final: results.length,
          },
        },
      })
    } catch (error) {
      logger.error('Integration failed', {
        error: error instanceof Error ? error.message : String(error),
      })
      throw error
    }
  }
}
