import type { MatchConfidence } from '../../types/reconciliation'

/**
 * One tier of a ranked natural-key matching strategy list.
 *
 * Existing and incoming rows are first reduced to a common identity shape, so
 * the same key function indexes existing rows and probes incoming ones.
 *
 * @typeParam TIdentity - Normalized natural-key fields of a row
 */
export interface MatchStrategy<TIdentity> {
  /** Tier name, recorded on every resolution it produces */
  readonly name: string
  readonly confidence: MatchConfidence
  /** Key of an identity in this tier, or null when the identity has none */
  keyOf(identity: TIdentity): string | null
  /**
   * Whether this tier may be used to match the given incoming identity.
   * Defaults to true. Indexing ignores it.
   */
  appliesTo?(identity: TIdentity): boolean
}
