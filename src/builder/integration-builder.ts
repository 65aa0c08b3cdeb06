import type {
  AthleteStrategyName,
  EditionConfig,
  OutputOptions,
  TallyOptions,
} from '../types/integration-config'
import { ATHLETE_STRATEGY_NAMES } from '../types/integration-config'
import { resolveConfig } from '../config/defaults'
import type { IntegrationConfigInput } from '../config/defaults'
import { parseCanonicalDate, compareCalendarDates } from '../core/normalizers/date'
import { IntegrationPipeline } from '../pipeline/integration-pipeline'
import type { Logger } from '../utils/logger'
import {
  ConfigurationError,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireNonNull,
  requireOneOf,
} from '../utils/errors'

/**
 * Fluent builder for configuring and creating an {@link IntegrationPipeline}.
 *
 * Every option has a default; `OlympiadMerge.create().build()` integrates the
 * 2024 Paris edition with the bundled country aliases.
 *
 * @example
 * ```typescript
 * const pipeline = OlympiadMerge.create()
 *   .edition(PARIS_2024_EDITION)
 *   .countryAliases([['United Kingdom', 'Great Britain']])
 *   .athleteStrategies(['name-birth-nationality', 'name-nationality'])
 *   .tally({ countTeamMedalsOnce: true })
 *   .logger(defaultLogger)
 *   .build()
 * ```
 */
export class IntegrationBuilder {
  private readonly input: IntegrationConfigInput = {}

  /**
   * Set the edition being integrated.
   *
   * @throws {InvalidParameterError} If the id or name is blank
   * @throws {ConfigurationError} If a date is not canonical or the start is after the end
   */
  edition(config: EditionConfig): this {
    requireNonEmptyString(config.editionId, 'edition.editionId')
    requireNonEmptyString(config.edition, 'edition.edition')

    const start = parseCanonicalDate(config.startDate)
    const end = parseCanonicalDate(config.endDate)
    if (!start || !end) {
      throw new ConfigurationError(
        'Edition start and end dates must be canonical dd-Mon-yyyy dates',
        'edition',
        { startDate: config.startDate, endDate: config.endDate }
      )
    }
    if (compareCalendarDates(start, end) > 0) {
      throw new ConfigurationError('Edition starts after it ends', 'edition', {
        startDate: config.startDate,
        endDate: config.endDate,
      })
    }
    if (
      config.competitionDate &&
      (!parseCanonicalDate(config.competitionDate.start) ||
        !parseCanonicalDate(config.competitionDate.end))
    ) {
      throw new ConfigurationError(
        'Competition dates must be canonical dd-Mon-yyyy dates',
        'edition.competitionDate'
      )
    }

    this.input.edition = config
    return this
  }

  /**
   * Replace the groups of interchangeable country names.
   */
  countryAliases(groups: string[][]): this {
    this.input.countryAliases = groups.map((group) => [...group])
    return this
  }

  /**
   * Set which athlete matching tiers run, in order.
   *
   * @throws {InvalidParameterError} If the list is empty or a name is unknown
   * @throws {ConfigurationError} If a name repeats
   */
  athleteStrategies(names: AthleteStrategyName[]): this {
    requireNonEmptyArray(names, 'athleteStrategies')
    for (const name of names) {
      requireOneOf(name, ATHLETE_STRATEGY_NAMES, 'athleteStrategies')
    }
    if (new Set(names).size !== names.length) {
      throw new ConfigurationError('Athlete strategies must not repeat', 'athleteStrategies')
    }
    this.input.athleteStrategies = [...names]
    return this
  }

  tally(options: Partial<TallyOptions>): this {
    this.input.tally = { ...this.input.tally, ...options }
    return this
  }

  output(options: Partial<OutputOptions>): this {
    this.input.output = { ...this.input.output, ...options }
    return this
  }

  logger(logger: Logger): this {
    this.input.logger = requireNonNull(logger, 'logger')
    return this
  }

  /**
   * Build and return the configured pipeline.
   */
  build(): IntegrationPipeline {
    return new IntegrationPipeline(resolveConfig(this.input))
  }
}

/**
 * Main entry point for creating a pipeline using the fluent builder API.
 */
export const OlympiadMerge = {
  /**
   * Create a new integration builder.
   */
  create(): IntegrationBuilder {
    return new IntegrationBuilder()
  },
}
