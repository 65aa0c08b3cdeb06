/**
 * Country (NOC) identity reconciliation.
 *
 * @module core/reconciliation/country-reconciler
 */

import type { CountryRecord } from '../../types/tables'
import type { IncomingCountry } from '../../types/incoming'
import { applyNormalizer } from '../normalizers/registry'
import '../normalizers/name'
import { NaturalKeyIndex } from './natural-key-index'
import { CountryCodeMinter } from './identifier-minter'
import { Reconciler, indexIdentity } from './reconciler'
import type { MatchStrategy } from './strategy'
import { CountryAliasTable } from './alias-table'

export interface CountryIdentity {
  nameKey: string | null
  /** Alias group of the name, when one is registered */
  aliasGroup: string | null
  code: string | null
}

function countryIdentity(
  name: string,
  code: string,
  aliases: CountryAliasTable
): CountryIdentity {
  const nameKey = applyNormalizer(name, 'countryNameKey')
  return {
    nameKey,
    aliasGroup: aliases.groupOf(nameKey),
    code: code.trim().toUpperCase() || null,
  }
}

/**
 * Country strategy tiers: display name, alias group, then NOC code.
 */
export function countryStrategies(): MatchStrategy<CountryIdentity>[] {
  return [
    { name: 'display-name', confidence: 'high', keyOf: (identity) => identity.nameKey },
    { name: 'alias', confidence: 'high', keyOf: (identity) => identity.aliasGroup },
    { name: 'code', confidence: 'medium', keyOf: (identity) => identity.code },
  ]
}

/**
 * Natural key of a country: its name in matching form, or its code when the
 * name is blank.
 */
export function countryNaturalKey(identity: CountryIdentity): string | null {
  return identity.nameKey ?? identity.code
}

export interface CountryReconcilerOptions {
  /** Groups of interchangeable display names */
  aliases?: ReadonlyArray<ReadonlyArray<string>>
}

/**
 * Builds the country index of a run from the existing countries and returns
 * a reconciler that owns it. New countries keep their incoming code when it
 * is free. When a tier finds several countries, the one carrying the incoming
 * code is preferred.
 *
 * @example
 * ```typescript
 * const reconciler = createCountryReconciler(
 *   [{ noc: 'GBR', country: 'United Kingdom', extra: {} }],
 *   { aliases: [['United Kingdom', 'Great Britain']] }
 * )
 * reconciler.resolve({ code: 'GBR', name: 'Great Britain', rowNumber: 1 })
 * // { status: 'matched', id: 'GBR', strategy: 'alias', confidence: 'high', candidates: 1 }
 * ```
 */
export function createCountryReconciler(
  existing: readonly CountryRecord[],
  options: CountryReconcilerOptions = {}
): Reconciler<IncomingCountry, CountryIdentity> {
  const aliases = new CountryAliasTable(options.aliases ?? [])
  const strategies = countryStrategies()
  const index = new NaturalKeyIndex()
  for (const country of existing) {
    indexIdentity(
      index,
      strategies,
      countryIdentity(country.country, country.noc, aliases),
      country.noc
    )
  }

  return new Reconciler({
    table: 'countries',
    strategies,
    identify: (row) => countryIdentity(row.name, row.code, aliases),
    naturalKey: countryNaturalKey,
    preferredId: (row) => row.code,
    preferredCandidate: (identity) => identity.code,
    minter: new CountryCodeMinter(existing.map((country) => country.noc)),
    index,
  })
}
