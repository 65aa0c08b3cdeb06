import type { Logger } from '../utils/logger'
import type { DateRange, MedalType } from './tables'

/**
 * Games edition being integrated. Upserted into the games table by `editionId`.
 */
export interface EditionConfig {
  editionId: string
  /** Display name, e.g. '2024 Summer Olympics' */
  edition: string
  year: number
  city: string
  /** NOC code of the host country */
  hostNoc: string
  /** Canonical `dd-Mon-yyyy` */
  startDate: string
  /** Canonical `dd-Mon-yyyy` */
  endDate: string
  competitionDate?: DateRange
  editionUrl?: string
  countryFlagUrl?: string
}

/**
 * Athlete matching tiers, tried in the configured order.
 */
export type AthleteStrategyName =
  | 'name-birth-nationality'
  | 'name-birth-representing'
  | 'name-nationality'
  | 'name-representing'

export const ATHLETE_STRATEGY_NAMES: readonly AthleteStrategyName[] = [
  'name-birth-nationality',
  'name-birth-representing',
  'name-nationality',
  'name-representing',
]

export interface TallyOptions {
  /**
   * Count one medal per (edition, sport, event, country, medal) instead of one
   * per medal-bearing row, so a team gold counts once.
   */
  countTeamMedalsOnce: boolean
}

export interface OutputOptions {
  /** Text written for unknown values (dates, ages) */
  unknownText: string
  medalLabels: Record<MedalType, string>
  teamSportLabels: { yes: string; no: string }
  /** Prefix each file with a UTF-8 byte order mark */
  bom: boolean
}

export interface IntegrationConfig {
  edition: EditionConfig
  /** Groups of interchangeable country display names */
  countryAliases: string[][]
  athleteStrategies: AthleteStrategyName[]
  tally: TallyOptions
  output: OutputOptions
  logger: Logger
}
