/**
 * Natural-key index for one merge run.
 *
 * Maps (tier, natural key) to the identifiers indexed under it. An index is
 * built from the base tables at the start of a run, updated as identifiers are
 * minted, and discarded when the run ends.
 *
 * @module core/reconciliation/natural-key-index
 */

const KEY_SEPARATOR = '\u001f'

/**
 * Joins natural-key parts into one key.
 *
 * @returns The key, or null when any part is missing
 *
 * @example
 * ```typescript
 * composeKey(['leon marchand', '17-May-2002', 'FRA']) // 'leon marchand\u001f17-May-2002\u001fFRA'
 * composeKey(['leon marchand', null, 'FRA'])          // null
 * ```
 */
export function composeKey(parts: ReadonlyArray<string | null | undefined>): string | null {
  if (parts.some((part) => part === null || part === undefined || part === '')) {
    return null
  }
  return parts.join(KEY_SEPARATOR)
}

/**
 * Orders identifiers numerically when both are integers, textually otherwise.
 */
export function compareIdentifiers(a: string, b: string): number {
  const numeric = /^\d+$/
  if (numeric.test(a) && numeric.test(b)) {
    const diff = Number(a) - Number(b)
    if (diff !== 0) return diff
  }
  return a < b ? -1 : a > b ? 1 : 0
}

export class NaturalKeyIndex {
  private readonly tiers = new Map<string, Map<string, Set<string>>>()

  /**
   * Indexes an identifier under a tier's natural key.
   */
  add(tier: string, key: string, id: string): void {
    let entries = this.tiers.get(tier)
    if (!entries) {
      entries = new Map()
      this.tiers.set(tier, entries)
    }
    let ids = entries.get(key)
    if (!ids) {
      ids = new Set()
      entries.set(key, ids)
    }
    ids.add(id)
  }

  /**
   * Identifiers indexed under a tier's natural key, lowest first.
   */
  lookup(tier: string, key: string): string[] {
    const ids = this.tiers.get(tier)?.get(key)
    return ids ? Array.from(ids).sort(compareIdentifiers) : []
  }

  /**
   * Number of distinct keys in a tier.
   */
  keyCount(tier: string): number {
    return this.tiers.get(tier)?.size ?? 0
  }
}
