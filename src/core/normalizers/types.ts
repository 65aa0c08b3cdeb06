/**
 * Normalizer function signature.
 * Accepts a raw value, returns the normalized text or null when the value
 * cannot be normalized.
 *
 * @example
 * ```typescript
 * const trimNormalizer: NormalizerFunction = (value) => {
 *   if (value == null) return null
 *   return String(value).trim()
 * }
 * ```
 */
export type NormalizerFunction = (value: unknown) => string | null

