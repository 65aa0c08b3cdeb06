import type { MedalType } from '../../types/tables'

const MEDAL_WORDS: Record<string, MedalType> = {
  gold: 'gold',
  g: 'gold',
  silver: 'silver',
  s: 'silver',
  bronze: 'bronze',
  b: 'bronze',
  none: 'none',
  na: 'none',
  'n/a': 'none',
  '-': 'none',
}

const MEDAL_POSITIONS: Record<MedalType, string> = {
  gold: '1',
  silver: '2',
  bronze: '3',
  none: '',
}

/**
 * Reads a medal label. Only the first word counts, so 'Gold Medal' is gold.
 *
 * @returns The medal, 'none' for a blank label, or null for an unrecognised one
 *
 * @example
 * ```typescript
 * parseMedal('Gold Medal') // 'gold'
 * parseMedal('bronze')     // 'bronze'
 * parseMedal('')           // 'none'
 * parseMedal('Platinum')   // null
 * ```
 */
export function parseMedal(value: string | null | undefined): MedalType | null {
  const word = (value ?? '').trim().split(/\s+/)[0].toLowerCase()
  if (!word) return 'none'
  return MEDAL_WORDS[word] ?? null
}

/**
 * Finishing position implied by a medal ('1', '2', '3'), empty for none.
 */
export function medalPosition(medal: MedalType): string {
  return MEDAL_POSITIONS[medal]
}
