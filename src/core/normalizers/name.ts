import { registerNormalizer } from './registry'
import { foldDiacritics, normalizeWhitespace } from './basic'
import type { NormalizerFunction } from './types'

/**
 * Particles that should remain lowercase in names (unless at start).
 */
const LOWERCASE_PARTICLES = [
  'von',
  'van',
  'der',
  'den',
  'de',
  'del',
  'della',
  'di',
  'da',
  'dos',
  'le',
  'la',
]

/**
 * Applies title case to a word with special handling for certain patterns.
 */
function toTitleCase(word: string): string {
  if (!word) return word

  // Mc prefix (e.g., McDonald, McBride)
  if (/^mc/i.test(word) && word.length > 2) {
    return 'Mc' + word.charAt(2).toUpperCase() + word.slice(3).toLowerCase()
  }

  // O' prefix (e.g., O'Brien, O'Connor)
  if (/^o'/i.test(word) && word.length > 2) {
    return "O'" + word.charAt(2).toUpperCase() + word.slice(3).toLowerCase()
  }

  // Hyphenated names (e.g., Jean-Claude)
  if (word.includes('-')) {
    return word.split('-').map(toTitleCase).join('-')
  }

  // Default: capitalize first letter, lowercase rest
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
}

/**
 * Display form of a person's name: whitespace collapsed, title case.
 *
 * @example
 * ```typescript
 * displayName('  LÉON   MARCHAND ')  // 'Léon Marchand'
 * displayName('sifan hassan')        // 'Sifan Hassan'
 * displayName('anna VAN DER berg')   // 'Anna van der Berg'
 * ```
 */
export const displayName: NormalizerFunction = (value: unknown): string | null => {
  const str = normalizeWhitespace(value)
  if (!str) return null

  return str
    .split(' ')
    .map((word, idx) =>
      idx > 0 && LOWERCASE_PARTICLES.includes(word.toLowerCase())
        ? word.toLowerCase()
        : toTitleCase(word)
    )
    .join(' ')
}

/**
 * Reorders a surname-first name ('MARCHAND Leon') to given-name-first order.
 *
 * The leading run of fully uppercase words is taken as the surname; when no
 * word is uppercase the first word is.
 *
 * @example
 * ```typescript
 * reverseSurnameFirst('BOERS Isayah')          // 'Isayah BOERS'
 * reverseSurnameFirst('VAN DER BERG Anna')     // 'Anna VAN DER BERG'
 * reverseSurnameFirst('Hassan Sifan')          // 'Sifan Hassan'
 * reverseSurnameFirst('MARCHAND')              // 'MARCHAND'
 * ```
 */
export function reverseSurnameFirst(name: string): string {
  const words = (normalizeWhitespace(name) ?? '').split(' ').filter(Boolean)
  if (words.length < 2) return words.join(' ')

  const isUpper = (word: string) =>
    word === word.toUpperCase() && word !== word.toLowerCase()

  let surnameLength = 0
  while (surnameLength < words.length - 1 && isUpper(words[surnameLength])) {
    surnameLength++
  }
  if (surnameLength === 0) surnameLength = 1

  return [...words.slice(surnameLength), ...words.slice(0, surnameLength)].join(' ')
}

/**
 * Matching form of a person's name: diacritics folded, lowercase, hyphens as
 * spaces, other punctuation removed, whitespace collapsed.
 *
 * @example
 * ```typescript
 * personNameKey('Léon  Marchand')   // 'leon marchand'
 * personNameKey("Jean-Luc O'Brien") // 'jean luc obrien'
 * ```
 */
export const personNameKey: NormalizerFunction = (value: unknown): string | null => {
  const folded = foldDiacritics(value)
  if (folded === null) return null

  return (
    normalizeWhitespace(
      folded
        .toLowerCase()
        .replace(/-/g, ' ')
        .replace(/[^\p{L}\p{N}\s]/gu, '')
    ) || null
  )
}

/**
 * Matching form of a country name: diacritics folded, lowercase, '&' read as
 * 'and', a leading 'the' dropped, punctuation removed, whitespace collapsed.
 *
 * @example
 * ```typescript
 * countryNameKey('Côte d’Ivoire')        // 'cote divoire'
 * countryNameKey('Trinidad & Tobago')    // 'trinidad and tobago'
 * countryNameKey('The Bahamas')          // 'bahamas'
 * ```
 */
export const countryNameKey: NormalizerFunction = (value: unknown): string | null => {
  const folded = foldDiacritics(value)
  if (folded === null) return null

  return (
    normalizeWhitespace(
      folded
        .toLowerCase()
        .replace(/&/g, ' and ')
        .replace(/[-,.()/]/g, ' ')
        .replace(/[^\p{L}\p{N}\s]/gu, '')
        .replace(/^\s*the\s+/, '')
    ) || null
  )
}

// Auto-register the name normalizers
registerNormalizer('displayName', displayName)
registerNormalizer('personNameKey', personNameKey)
registerNormalizer('countryNameKey', countryNameKey)
