/**
 * Athlete identity reconciliation.
 *
 * @module core/reconciliation/athlete-reconciler
 */

import type { AthleteRecord } from '../../types/tables'
import type { IncomingAthlete } from '../../types/incoming'
import type { AthleteStrategyName } from '../../types/integration-config'
import { ATHLETE_STRATEGY_NAMES } from '../../types/integration-config'
import { applyNormalizer } from '../normalizers/registry'
import '../normalizers/name'
import { composeKey, NaturalKeyIndex } from './natural-key-index'
import { SequentialIdMinter } from './identifier-minter'
import { Reconciler, indexIdentity } from './reconciler'
import type { MatchStrategy } from './strategy'

/**
 * Natural-key fields of an athlete, normalized for matching.
 */
export interface AthleteIdentity {
  nameKey: string | null
  born: string | null
  /** NOC code of nationality */
  nationality: string | null
  /** NOC code of the delegation competed for */
  representing: string | null
}

function code(value: string | null | undefined): string | null {
  const trimmed = (value ?? '').trim().toUpperCase()
  return trimmed || null
}

/**
 * Identity of an athlete already in the dataset. Nationality and delegation
 * are the same column there.
 */
export function existingAthleteIdentity(athlete: AthleteRecord): AthleteIdentity {
  return {
    nameKey: applyNormalizer(athlete.name, 'personNameKey'),
    born: athlete.born,
    nationality: code(athlete.countryNoc),
    representing: code(athlete.countryNoc),
  }
}

/**
 * Identity of an incoming athlete. Delegation codes are expected to be
 * reconciled already; nationality falls back to the delegation.
 */
export function incomingAthleteIdentity(athlete: IncomingAthlete): AthleteIdentity {
  return {
    nameKey: applyNormalizer(athlete.name, 'personNameKey'),
    born: athlete.born,
    nationality: code(athlete.nationalityCode) ?? code(athlete.countryCode),
    representing: code(athlete.countryCode),
  }
}

const ATHLETE_STRATEGIES: Record<AthleteStrategyName, MatchStrategy<AthleteIdentity>> = {
  'name-birth-nationality': {
    name: 'name-birth-nationality',
    confidence: 'high',
    keyOf: (identity) =>
      composeKey([identity.nameKey, identity.born, identity.nationality]),
  },
  'name-birth-representing': {
    name: 'name-birth-representing',
    confidence: 'high',
    keyOf: (identity) =>
      composeKey([identity.nameKey, identity.born, identity.representing]),
  },
  'name-nationality': {
    name: 'name-nationality',
    confidence: 'low',
    keyOf: (identity) => composeKey([identity.nameKey, identity.nationality]),
    appliesTo: (identity) => identity.born === null,
  },
  'name-representing': {
    name: 'name-representing',
    confidence: 'low',
    keyOf: (identity) => composeKey([identity.nameKey, identity.representing]),
    appliesTo: (identity) => identity.born === null,
  },
}

/**
 * Strategy tiers in the given order.
 */
export function athleteStrategies(
  order: readonly AthleteStrategyName[] = ATHLETE_STRATEGY_NAMES
): MatchStrategy<AthleteIdentity>[] {
  return order.map((name) => ATHLETE_STRATEGIES[name])
}

/**
 * Full natural key of an athlete. Rows without a name cannot be reconciled.
 * Unknown birth dates sort after known ones, so during minting an athlete
 * with a birth date is created before same-named rows that lack one.
 */
export function athleteNaturalKey(identity: AthleteIdentity): string | null {
  if (!identity.nameKey) return null
  return [identity.nameKey, identity.nationality ?? '', identity.born ?? '?'].join('\u001f')
}

export interface AthleteReconcilerOptions {
  strategies?: readonly AthleteStrategyName[]
}

/**
 * Builds the athlete index of a run from the existing athletes and returns a
 * reconciler that owns it.
 */
export function createAthleteReconciler(
  existing: readonly AthleteRecord[],
  options: AthleteReconcilerOptions = {}
): Reconciler<IncomingAthlete, AthleteIdentity> {
  const strategies = athleteStrategies(options.strategies)
  const index = new NaturalKeyIndex()
  for (const athlete of existing) {
    indexIdentity(index, strategies, existingAthleteIdentity(athlete), athlete.athleteId)
  }

  return new Reconciler({
    table: 'athletes',
    strategies,
    identify: incomingAthleteIdentity,
    naturalKey: athleteNaturalKey,
    minter: new SequentialIdMinter(
      'athletes',
      existing.map((athlete) => athlete.athleteId)
    ),
    index,
  })
}
