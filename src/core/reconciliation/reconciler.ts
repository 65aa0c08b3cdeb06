/**
 * Ranked natural-key reconciliation of incoming rows against existing identifiers.
 *
 * @module core/reconciliation/reconciler
 */

import type { Resolution, ResolvedRow } from '../../types/reconciliation'
import type { IdentifierMinter } from './identifier-minter'
import type { MatchStrategy } from './strategy'
import type { NaturalKeyIndex } from './natural-key-index'

/**
 * Row type specific behavior of a reconciler.
 *
 * @typeParam TRow - Incoming row type
 * @typeParam TIdentity - Normalized natural-key fields
 */
export interface ReconcilerConfig<TRow, TIdentity> {
  /** Table the identifiers belong to, used in errors */
  table: string
  /** Strategy tiers, tried in order */
  strategies: ReadonlyArray<MatchStrategy<TIdentity>>
  /** Reduces an incoming row to its identity */
  identify(row: TRow): TIdentity
  /**
   * Full natural key of an identity, used to group rows that must share a
   * minted identifier and to order minting. Null rejects the row.
   */
  naturalKey(identity: TIdentity): string | null
  /** Identifier the incoming row already carries, offered to the minter */
  preferredId?(row: TRow): string | undefined
  /**
   * Candidate to pick when a tier returns several identifiers. The lowest
   * identifier wins when this yields none of them.
   */
  preferredCandidate?(identity: TIdentity): string | null
  minter: IdentifierMinter
  /** Index of the run, already holding the existing identifiers */
  index: NaturalKeyIndex
}

/**
 * Indexes an existing identity under every tier that yields a key for it.
 */
export function indexIdentity<TIdentity>(
  index: NaturalKeyIndex,
  strategies: ReadonlyArray<MatchStrategy<TIdentity>>,
  identity: TIdentity,
  id: string
): void {
  for (const strategy of strategies) {
    const key = strategy.keyOf(identity)
    if (key !== null) {
      index.add(strategy.name, key, id)
    }
  }
}

/**
 * Resolves incoming rows to identifiers by trying each strategy tier in order,
 * minting an identifier when none matches.
 *
 * @example
 * ```typescript
 * const reconciler = new Reconciler({
 *   table: 'countries',
 *   strategies: countryStrategies(aliases),
 *   identify: countryIdentity,
 *   naturalKey: (identity) => identity.nameKey ?? identity.code,
 *   minter: new CountryCodeMinter(existingCodes),
 *   index,
 * })
 *
 * const resolved = reconciler.reconcileAll(incomingCountries)
 * ```
 */
export class Reconciler<TRow, TIdentity> {
  private readonly config: ReconcilerConfig<TRow, TIdentity>
  private readonly minted = new Map<string, string>()

  constructor(config: ReconcilerConfig<TRow, TIdentity>) {
    this.config = config
  }

  /**
   * Resolves one row. Mints and indexes a new identifier when nothing matches,
   * so rows resolved later can match it.
   */
  resolve(row: TRow): Resolution {
    const identity = this.config.identify(row)
    const naturalKey = this.config.naturalKey(identity)
    if (naturalKey === null) {
      return { status: 'rejected', reason: 'natural key is empty' }
    }

    const mintedId = this.minted.get(naturalKey)
    if (mintedId !== undefined) {
      return { status: 'minted', id: mintedId, naturalKey }
    }

    const match = this.match(identity)
    if (match) return match

    const id = this.config.minter.mint(this.config.preferredId?.(row))
    this.minted.set(naturalKey, id)
    indexIdentity(this.config.index, this.config.strategies, identity, id)
    return { status: 'minted', id, naturalKey }
  }

  /**
   * Resolves a batch of rows independently of their order.
   *
   * Matches against existing identifiers are found first. Rows left unmatched
   * are then resolved in ascending natural-key order, so minted identifiers
   * and matches between new rows depend only on the set of rows.
   *
   * @returns One resolution per row, in input order
   */
  reconcileAll(rows: readonly TRow[]): ResolvedRow<TRow>[] {
    const resolutions: Resolution[] = new Array(rows.length)
    const pending: Array<{ position: number; sortKey: string }> = []

    rows.forEach((row, position) => {
      const identity = this.config.identify(row)
      const naturalKey = this.config.naturalKey(identity)
      if (naturalKey === null) {
        resolutions[position] = { status: 'rejected', reason: 'natural key is empty' }
        return
      }
      const match = this.minted.has(naturalKey) ? null : this.match(identity)
      if (match) {
        resolutions[position] = match
      } else {
        pending.push({ position, sortKey: naturalKey })
      }
    })

    pending.sort((a, b) =>
      a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0
    )
    for (const { position } of pending) {
      resolutions[position] = this.resolve(rows[position])
    }

    return rows.map((row, position) => ({ row, resolution: resolutions[position] }))
  }

  private match(identity: TIdentity): Resolution | null {
    for (const strategy of this.config.strategies) {
      if (strategy.appliesTo && !strategy.appliesTo(identity)) continue

      const key = strategy.keyOf(identity)
      if (key === null) continue

      const ids = this.config.index.lookup(strategy.name, key)
      if (ids.length > 0) {
        const preferred = this.config.preferredCandidate?.(identity) ?? null
        return {
          status: 'matched',
          id: preferred !== null && ids.includes(preferred) ? preferred : ids[0],
          strategy: strategy.name,
          confidence: strategy.confidence,
          candidates: ids.length,
        }
      }
    }
    return null
  }
}
