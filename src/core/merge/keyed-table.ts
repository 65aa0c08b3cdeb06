/**
 * Rows of one table indexed by primary key, in insertion order.
 *
 * @typeParam T - Row type
 *
 * @example
 * ```typescript
 * const table = new KeyedTable((row: CountryRecord) => row.noc)
 * table.upsert({ noc: 'FRA', country: 'France', extra: {} })
 * table.upsert({ noc: 'FRA', country: 'France', extra: {} }, (existing) => existing)
 * table.size // 1
 * ```
 */
export class KeyedTable<T> {
  private readonly rows = new Map<string, T>()

  constructor(private readonly keyOf: (row: T) => string) {}

  has(key: string): boolean {
    return this.rows.has(key)
  }

  get(key: string): T | undefined {
    return this.rows.get(key)
  }

  /**
   * Inserts a row, or replaces the row with the same key by the result of
   * `merge`. Without `merge` the incoming row wins. A replaced row keeps its
   * position.
   */
  upsert(row: T, merge?: (existing: T, incoming: T) => T): 'inserted' | 'updated' {
    const key = this.keyOf(row)
    const existing = this.rows.get(key)
    if (existing === undefined) {
      this.rows.set(key, row)
      return 'inserted'
    }
    this.rows.set(key, merge ? merge(existing, row) : row)
    return 'updated'
  }

  values(): T[] {
    return Array.from(this.rows.values())
  }

  get size(): number {
    return this.rows.size
  }
}
