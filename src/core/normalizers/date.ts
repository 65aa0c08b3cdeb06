import { registerNormalizer } from './registry'
import { unifyPunctuation, normalizeWhitespace } from './basic'
import type { NormalizerFunction } from './types'

/**
 * A complete calendar date.
 */
export interface CalendarDate {
  /** Year (4 digits) */
  year: number
  /** Month (1-12) */
  month: number
  /** Day (1-31) */
  day: number
}

/**
 * Why a date could not be brought to canonical form.
 */
export type UnknownDateReason =
  | 'empty'
  | 'malformed'
  | 'partial'
  | 'two-digit-year'
  | 'invalid-calendar-date'

/**
 * Result of date normalization: a canonical `dd-Mon-yyyy` date, or an
 * explicit unknown marker with the reason.
 */
export type NormalizedDate =
  | { status: 'canonical'; value: string; components: CalendarDate }
  | {
      status: 'unknown'
      reason: UnknownDateReason
      raw: string
      /** Year recovered from a partial date, kept for reporting */
      year?: number
    }

/**
 * Options for date normalization.
 */
export interface DateNormalizerOptions {
  /** Year used to complete day-and-month dates such as '6 April' */
  defaultYear?: number
}

/**
 * Month name mappings (case-insensitive).
 */
const MONTH_NAMES: Record<string, number> = {
  january: 1,
  february: 2,
  march: 3,
  april: 4,
  may: 5,
  june: 6,
  july: 7,
  august: 8,
  september: 9,
  october: 10,
  november: 11,
  december: 12,
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
}

const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
]

/**
 * Looks up a month by full or abbreviated English name.
 *
 * @returns Month number (1-12), or undefined for an unknown name
 */
export function monthFromName(name: string): number | undefined {
  return MONTH_NAMES[name.toLowerCase().replace(/\.$/, '')]
}

/**
 * Validates if a date is valid (checks month/day ranges and leap years).
 *
 * @example
 * ```typescript
 * isValidDate(2024, 2, 29)  // true (leap year)
 * isValidDate(2023, 2, 29)  // false (not leap year)
 * isValidDate(2024, 13, 1)  // false (month out of range)
 * ```
 */
export function isValidDate(year: number, month: number, day: number): boolean {
  // Check month range
  if (month < 1 || month > 12) {
    return false
  }

  // Days in each month (non-leap year)
  const daysInMonth = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

  // Check for leap year
  const isLeapYear = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
  if (isLeapYear && month === 2) {
    daysInMonth[1] = 29
  }

  // Check day range
  if (day < 1 || day > daysInMonth[month - 1]) {
    return false
  }

  return true
}

/**
 * Pads a number with leading zeros.
 */
function pad(num: number, length: number): string {
  return String(num).padStart(length, '0')
}

/**
 * Formats a calendar date as `dd-Mon-yyyy`.
 *
 * @example
 * ```typescript
 * formatCanonicalDate({ year: 1949, month: 4, day: 4 }) // '04-Apr-1949'
 * ```
 */
export function formatCanonicalDate(date: CalendarDate): string {
  return `${pad(date.day, 2)}-${MONTH_ABBREVIATIONS[date.month - 1]}-${pad(date.year, 4)}`
}

/**
 * Parses a date already in canonical `dd-Mon-yyyy` form.
 *
 * @returns The calendar date, or null when the text is not canonical
 */
export function parseCanonicalDate(text: string | null | undefined): CalendarDate | null {
  if (!text) return null
  const match = text.match(/^(\d{2})-([A-Z][a-z]{2})-(\d{4})$/)
  if (!match) return null

  const month = MONTH_ABBREVIATIONS.indexOf(match[2]) + 1
  const day = parseInt(match[1], 10)
  const year = parseInt(match[3], 10)
  if (month === 0 || !isValidDate(year, month, day)) {
    return null
  }
  return { year, month, day }
}

/**
 * Orders two calendar dates chronologically.
 */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day
}

function canonical(year: number, month: number, day: number, raw: string): NormalizedDate {
  if (!isValidDate(year, month, day)) {
    return { status: 'unknown', reason: 'invalid-calendar-date', raw, year }
  }
  const components = { year, month, day }
  return { status: 'canonical', value: formatCanonicalDate(components), components }
}

function unknown(reason: UnknownDateReason, raw: string, year?: number): NormalizedDate {
  return year === undefined
    ? { status: 'unknown', reason, raw }
    : { status: 'unknown', reason, raw, year }
}

/**
 * Resolves a year token. Two-digit years are ambiguous and never guessed.
 */
function yearToken(token: string): number | 'two-digit' | null {
  if (/^\d{4}$/.test(token)) return parseInt(token, 10)
  if (/^\d{2}$/.test(token)) return 'two-digit'
  return null
}

/**
 * Normalizes a raw date string to canonical `dd-Mon-yyyy`.
 *
 * Dates are read day-first. Partial dates (year only, month and year) and
 * two-digit years are reported as unknown rather than completed or guessed.
 *
 * @example
 * ```typescript
 * normalizeDate('1991-10-21')        // canonical '21-Oct-1991'
 * normalizeDate('24 November 1873')  // canonical '24-Nov-1873'
 * normalizeDate('04/05/1990')        // canonical '04-May-1990'
 * normalizeDate('6 April', { defaultYear: 1896 }) // canonical '06-Apr-1896'
 * normalizeDate('July 1882')         // unknown, reason 'partial', year 1882
 * normalizeDate('04-Apr-49')         // unknown, reason 'two-digit-year'
 * normalizeDate('')                  // unknown, reason 'empty'
 * ```
 */
export function normalizeDate(
  value: unknown,
  options: DateNormalizerOptions = {}
): NormalizedDate {
  const raw = value == null ? '' : String(value)
  const str = normalizeWhitespace(unifyPunctuation(raw)) ?? ''
  if (!str) return unknown('empty', raw)

  // ISO: yyyy-mm-dd, optionally followed by a time
  const isoMatch = str.match(/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/)
  if (isoMatch) {
    return canonical(
      parseInt(isoMatch[1], 10),
      parseInt(isoMatch[2], 10),
      parseInt(isoMatch[3], 10),
      raw
    )
  }

  // Day first with month name: 04-Apr-1949, 24 November 1873, 04-Apr-49
  const dayMonthYear = str.match(/^(\d{1,2})[\s-]+([a-z]+\.?)[\s-]+(\d+)$/i)
  if (dayMonthYear) {
    const month = monthFromName(dayMonthYear[2])
    const year = yearToken(dayMonthYear[3])
    if (month !== undefined) {
      if (year === 'two-digit') return unknown('two-digit-year', raw)
      if (year === null) return unknown('malformed', raw)
      return canonical(year, month, parseInt(dayMonthYear[1], 10), raw)
    }
  }

  // Month name first: January 30, 1990
  const monthDayYear = str.match(/^([a-z]+\.?)\s+(\d{1,2}),?\s+(\d+)$/i)
  if (monthDayYear) {
    const month = monthFromName(monthDayYear[1])
    const year = yearToken(monthDayYear[3])
    if (month !== undefined) {
      if (year === 'two-digit') return unknown('two-digit-year', raw)
      if (year === null) return unknown('malformed', raw)
      return canonical(year, month, parseInt(monthDayYear[2], 10), raw)
    }
  }

  // Numeric day first: dd/mm/yyyy, dd.mm.yyyy or dd-mm-yyyy
  const numeric = str.match(/^(\d{1,2})[/.-](\d{1,2})[/.-](\d+)$/)
  if (numeric) {
    const year = yearToken(numeric[3])
    if (year === 'two-digit') return unknown('two-digit-year', raw)
    if (year === null) return unknown('malformed', raw)
    return canonical(year, parseInt(numeric[2], 10), parseInt(numeric[1], 10), raw)
  }

  // Day and month only: 6 April
  const dayMonth = str.match(/^(\d{1,2})[\s-]+([a-z]+\.?)$/i)
  if (dayMonth) {
    const month = monthFromName(dayMonth[2])
    if (month !== undefined) {
      if (options.defaultYear === undefined) return unknown('partial', raw)
      return canonical(options.defaultYear, month, parseInt(dayMonth[1], 10), raw)
    }
  }

  // Month and year only: July 1882, Dec-1967, Dec-67
  const monthYear = str.match(/^([a-z]+\.?)[\s-]+(\d+)$/i)
  if (monthYear) {
    const month = monthFromName(monthYear[1])
    const year = yearToken(monthYear[2])
    if (month !== undefined) {
      if (year === 'two-digit') return unknown('two-digit-year', raw)
      if (year !== null) return unknown('partial', raw, year)
    }
  }

  // Free text with a four-digit year: 1879, (1926 or 1927), c. 1900
  const yearInText = str.match(/(?<!\d)(\d{4})(?!\d)/)
  if (yearInText) {
    return unknown('partial', raw, parseInt(yearInText[1], 10))
  }

  return unknown('malformed', raw)
}

/**
 * Registry adapter: canonical text or null.
 */
export const canonicalDate: NormalizerFunction = (value: unknown): string | null => {
  const result = normalizeDate(value)
  return result.status === 'canonical' ? result.value : null
}

// Auto-register the date normalizer
registerNormalizer('date', canonicalDate)
