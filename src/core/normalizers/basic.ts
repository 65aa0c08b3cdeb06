import { registerNormalizer } from './registry'
import type { NormalizerFunction } from './types'

/**
 * Trims whitespace from both ends of a string.
 *
 * @example
 * ```typescript
 * trim('  hello  ') // 'hello'
 * trim(null) // null
 * ```
 */
export const trim: NormalizerFunction = (value: unknown): string | null => {
  if (value == null) return null
  return String(value).trim()
}

/**
 * Converts a string to lowercase.
 */
export const lowercase: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).toLowerCase()
}

/**
 * Converts a string to uppercase.
 */
export const uppercase: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).toUpperCase()
}

/**
 * Normalizes whitespace by collapsing multiple consecutive spaces into a single space
 * and trimming leading/trailing whitespace.
 *
 * @example
 * ```typescript
 * normalizeWhitespace('hello    world') // 'hello world'
 * normalizeWhitespace('hello\n\nworld') // 'hello world'
 * ```
 */
export const normalizeWhitespace: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).trim().replace(/\s+/g, ' ')
}

/**
 * Strips combining accents after canonical decomposition.
 *
 * @example
 * ```typescript
 * foldDiacritics('Bénédicte Müller') // 'Benedicte Muller'
 * ```
 */
export const foldDiacritics: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value).normalize('NFD').replace(/[\u0300-\u036f]/g, '')
}

/**
 * Replaces typographic dashes (en dash, em dash, hyphen, minus) with '-'
 * and removes straight or curly quotes around the value.
 *
 * @example
 * ```typescript
 * unifyPunctuation('"24 July – 8 August"') // '24 July - 8 August'
 * ```
 */
export const unifyPunctuation: NormalizerFunction = (
  value: unknown
): string | null => {
  if (value == null) return null
  return String(value)
    .trim()
    .replace(/[\u2010-\u2015\u2212]/g, '-')
    .replace(/^["\u201c\u201d']+|["\u201c\u201d']+$/g, '')
    .trim()
}

// Auto-register basic normalizers
registerNormalizer('trim', trim)
registerNormalizer('lowercase', lowercase)
registerNormalizer('uppercase', uppercase)
registerNormalizer('normalizeWhitespace', normalizeWhitespace)
registerNormalizer('foldDiacritics', foldDiacritics)
registerNormalizer('unifyPunctuation', unifyPunctuation)
