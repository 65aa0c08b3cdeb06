import { applyNormalizer } from '../normalizers/registry'
import '../normalizers/name'

/**
 * Groups of interchangeable country display names, looked up by their
 * matching form.
 *
 * @example
 * ```typescript
 * const aliases = new CountryAliasTable([['United Kingdom', 'Great Britain']])
 * aliases.groupOf('great britain') === aliases.groupOf('united kingdom') // true
 * aliases.groupOf('france')                                             // null
 * ```
 */
export class CountryAliasTable {
  private readonly groups = new Map<string, string>()

  constructor(groups: ReadonlyArray<ReadonlyArray<string>>) {
    groups.forEach((names, position) => {
      for (const name of names) {
        const key = applyNormalizer(name, 'countryNameKey')
        // A name listed in two groups belongs to the first
        if (key && !this.groups.has(key)) {
          this.groups.set(key, `group-${position}`)
        }
      }
    })
  }

  /**
   * Group of a country name already in matching form, or null when the name
   * has no registered aliases.
   */
  groupOf(nameKey: string | null): string | null {
    if (!nameKey) return null
    return this.groups.get(nameKey) ?? null
  }

  get size(): number {
    return this.groups.size
  }
}
