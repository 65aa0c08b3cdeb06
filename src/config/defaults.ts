import countryAliasGroups from '../../data/country-aliases.json'
import type {
  IntegrationConfig,
  EditionConfig,
  OutputOptions,
  TallyOptions,
} from '../types/integration-config'
import { ATHLETE_STRATEGY_NAMES } from '../types/integration-config'
import { createSilentLogger } from '../utils/logger'

/**
 * The 2024 Summer Olympics in Paris.
 *
 * Official dates are 26 July to 11 August; preliminary football and rugby
 * matches started on 24 July.
 */
export const PARIS_2024_EDITION: EditionConfig = {
  editionId: '63',
  edition: '2024 Summer Olympics',
  year: 2024,
  city: 'Paris',
  hostNoc: 'FRA',
  startDate: '26-Jul-2024',
  endDate: '11-Aug-2024',
  competitionDate: { start: '24-Jul-2024', end: '11-Aug-2024' },
  editionUrl: '/editions/63',
}

export const DEFAULT_COUNTRY_ALIASES: string[][] = countryAliasGroups

export const DEFAULT_TALLY_OPTIONS: TallyOptions = {
  countTeamMedalsOnce: false,
}

export const DEFAULT_OUTPUT_OPTIONS: OutputOptions = {
  unknownText: '',
  medalLabels: {
    gold: 'Gold',
    silver: 'Silver',
    bronze: 'Bronze',
    none: 'None',
  },
  teamSportLabels: { yes: 'TRUE', no: 'FALSE' },
  bom: false,
}

export const DEFAULT_INTEGRATION_CONFIG: IntegrationConfig = {
  edition: PARIS_2024_EDITION,
  countryAliases: DEFAULT_COUNTRY_ALIASES,
  athleteStrategies: [...ATHLETE_STRATEGY_NAMES],
  tally: DEFAULT_TALLY_OPTIONS,
  output: DEFAULT_OUTPUT_OPTIONS,
  logger: createSilentLogger(),
}

/**
 * Options accepted by {@link resolveConfig}. Nested option groups may be partial.
 */
export interface IntegrationConfigInput {
  edition?: EditionConfig
  countryAliases?: string[][]
  athleteStrategies?: IntegrationConfig['athleteStrategies']
  tally?: Partial<TallyOptions>
  output?: Partial<OutputOptions>
  logger?: IntegrationConfig['logger']
}

/**
 * Fills in defaults for every option not given.
 */
export function resolveConfig(input: IntegrationConfigInput = {}): IntegrationConfig {
  return {
    edition: input.edition ?? DEFAULT_INTEGRATION_CONFIG.edition,
    countryAliases: input.countryAliases ?? DEFAULT_INTEGRATION_CONFIG.countryAliases,
    athleteStrategies:
      input.athleteStrategies ?? DEFAULT_INTEGRATION_CONFIG.athleteStrategies,
    tally: { ...DEFAULT_TALLY_OPTIONS, ...input.tally },
    output: {
      ...DEFAULT_OUTPUT_OPTIONS,
      ...input.output,
      medalLabels: {
        ...DEFAULT_OUTPUT_OPTIONS.medalLabels,
        ...input.output?.medalLabels,
      },
    },
    logger: input.logger ?? DEFAULT_INTEGRATION_CONFIG.logger,
  }
}
