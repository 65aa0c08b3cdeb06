import { DuplicateIdentifierCollisionError } from '../../utils/errors'

/**
 * Creates identifiers for rows that match nothing in the base dataset.
 */
export interface IdentifierMinter {
  /**
   * Mints a new identifier.
   *
   * @param preferred - Identifier the incoming row already carries, used when free
   * @throws {DuplicateIdentifierCollisionError} If the minted identifier is taken
   */
  mint(preferred?: string): string
}

/**
 * Mints integer identifiers above the highest existing numeric identifier.
 *
 * @example
 * ```typescript
 * const minter = new SequentialIdMinter('athletes', ['7', '12', 'x9'])
 * minter.mint() // '13'
 * minter.mint() // '14'
 * ```
 */
export class SequentialIdMinter implements IdentifierMinter {
  private readonly taken: Set<string>
  private next: number

  constructor(
    private readonly table: string,
    existingIds: Iterable<string>
  ) {
    this.taken = new Set(existingIds)
    let max = 0
    for (const id of this.taken) {
      if (/^\d+$/.test(id)) {
        max = Math.max(max, Number(id))
      }
    }
    this.next = max + 1
  }

  mint(): string {
    const id = String(this.next++)
    if (this.taken.has(id)) {
      throw new DuplicateIdentifierCollisionError(this.table, id)
    }
    this.taken.add(id)
    return id
  }
}

/**
 * Mints country codes. A free code carried by the incoming row is kept;
 * otherwise a namespaced code (`X01`, `X02`, ...) is generated.
 */
export class CountryCodeMinter implements IdentifierMinter {
  private readonly taken: Set<string>
  private sequence = 0

  constructor(
    existingCodes: Iterable<string>,
    private readonly prefix = 'X'
  ) {
    this.taken = new Set(existingCodes)
  }

  mint(preferred?: string): string {
    const code = preferred?.trim().toUpperCase()
    if (code) {
      if (this.taken.has(code)) {
        throw new DuplicateIdentifierCollisionError('countries', code)
      }
      this.taken.add(code)
      return code
    }

    let candidate: string
    do {
      this.sequence++
      candidate = `${this.prefix}${String(this.sequence).padStart(2, '0')}`
    } while (this.taken.has(candidate))
    this.taken.add(candidate)
    return candidate
  }
}
