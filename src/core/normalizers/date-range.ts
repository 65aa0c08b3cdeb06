import { normalizeWhitespace, unifyPunctuation } from './basic'
import {
  compareCalendarDates,
  formatCanonicalDate,
  normalizeDate,
  type CalendarDate,
} from './date'
import type { DateRange } from '../../types/tables'

/**
 * Options for date range normalization.
 */
export interface DateRangeOptions {
  /** Year used when neither end of the range names one */
  defaultYear?: number
}

const RANGE_SEPARATOR = /\s+to\s+|\s+-\s+/i

function toCalendar(text: string, year: number | undefined): CalendarDate | null {
  const result = normalizeDate(year === undefined ? text : `${text} ${year}`)
  return result.status === 'canonical' ? result.components : null
}

/**
 * Normalizes a competition date range to canonical start and end dates.
 *
 * Accepted shapes:
 * - `24-Jul-2024 to 11-Aug-2024`
 * - `21 July – 8 August 2021` (year on the end only)
 * - `6 – 13 April` or `6–13 April` (month on the end only, year from options)
 * - `14 May – 28 October` (year from options)
 *
 * A start that would fall after its end without an explicit year is moved to
 * the previous year (`29 December – 3 January 1999`).
 *
 * @returns The range, or null for empty, placeholder ('—') or unreadable text
 */
export function normalizeDateRange(
  value: unknown,
  options: DateRangeOptions = {}
): DateRange | null {
  const str = normalizeWhitespace(unifyPunctuation(value)) ?? ''
  if (!str || /^-+$/.test(str)) return null

  // Fold '6-13 April' into '6 - 13 April'
  const spaced = str.replace(/^(\d{1,2})\s*-\s*(\d{1,2}\s+[a-z])/i, '$1 - $2')

  const parts = spaced.split(RANGE_SEPARATOR)
  if (parts.length !== 2) return null
  const [startText, endText] = parts

  const endTokens = endText.split(' ')
  const explicitEndYear =
    endTokens.length === 3 && /^\d{4}$/.test(endTokens[2])
      ? parseInt(endTokens[2], 10)
      : undefined

  // A canonical or otherwise complete end date carries its own year
  const end = explicitEndYear === undefined
    ? toCalendar(endText, undefined) ?? toCalendar(endText, options.defaultYear)
    : toCalendar(endTokens.slice(0, 2).join(' '), explicitEndYear)
  if (!end) return null

  const completeStart = toCalendar(startText, undefined)
  if (completeStart) {
    return { start: formatCanonicalDate(completeStart), end: formatCanonicalDate(end) }
  }

  // Day only: borrow the end's month
  const startText2 = /^\d{1,2}$/.test(startText)
    ? `${startText} ${endTokens[1]}`
    : startText
  let start = toCalendar(startText2, end.year)
  if (!start) return null

  if (compareCalendarDates(start, end) > 0) {
    start = toCalendar(startText2, end.year - 1)
    if (!start) return null
  }

  return { start: formatCanonicalDate(start), end: formatCanonicalDate(end) }
}

/**
 * Formats a range as `dd-Mon-yyyy to dd-Mon-yyyy`.
 */
export function formatDateRange(range: DateRange): string {
  return `${range.start} to ${range.end}`
}
