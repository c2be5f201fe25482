/**
 * Year
 *
 * A proleptic ISO year as a branded integer. Year 0 is 1 BCE and is a leap
 * year; arithmetic past MIN_YEAR or MAX_YEAR throws instead of wrapping.
 */

import { ArithmeticOverflowError, FieldRangeError, NullInputError, requireSafeInteger } from './errors'
import { checkFieldValue, MIN_YEAR, MAX_YEAR } from './fields'
import { isLeapYear, daysInYear } from './iso-chronology'
import type { LocalDate } from './internal/date-record'

export { MIN_YEAR, MAX_YEAR } from './fields'

// ============================================================================
// Branded Type
// ============================================================================

declare const __year: unique symbol

/** ISO proleptic year in MIN_YEAR..MAX_YEAR */
export type Year = number & { readonly [__year]: true }

export const Era = {
  BCE: 'BCE',
  CE: 'CE',
} as const

export type Era = (typeof Era)[keyof typeof Era]

// ============================================================================
// Construction
// ============================================================================

export function isoYear(value: number): Year {
  return checkFieldValue('year', value) as Year
}

/**
 * Year from an era and a year-of-era. BCE 1 is ISO year 0, BCE 2 is -1.
 */
export function yearFromEra(era: Era, yearOfEra: number): Year {
  if (era == null) throw new NullInputError('era')
  if (!Number.isInteger(yearOfEra) || yearOfEra < 1) {
    throw new FieldRangeError('year', yearOfEra, 1, MAX_YEAR)
  }
  return era === Era.CE ? isoYear(yearOfEra) : isoYear(1 - yearOfEra)
}

// ============================================================================
// Leap Years
// ============================================================================

export function isLeap(year: Year): boolean {
  return isLeapYear(year)
}

export function lengthOfYear(year: Year): number {
  return daysInYear(year)
}

// ============================================================================
// Arithmetic
// ============================================================================

function checkedYear(value: number, operation: string): Year {
  if (value < MIN_YEAR || value > MAX_YEAR) {
    throw new ArithmeticOverflowError(`${operation} leaves the supported year range: ${value}`)
  }
  return value as Year
}

export function plusYears(year: Year, years: number): Year {
  requireSafeInteger(years, 'years')
  if (years === 0) return year
  return checkedYear(year + years, `Adding ${years} years to ${year}`)
}

export function minusYears(year: Year, years: number): Year {
  requireSafeInteger(years, 'years')
  if (years === 0) return year
  return checkedYear(year - years, `Subtracting ${years} years from ${year}`)
}

export function nextYear(year: Year): Year {
  if (year === MAX_YEAR) throw new ArithmeticOverflowError('Year is already at the maximum value')
  return (year + 1) as Year
}

export function previousYear(year: Year): Year {
  if (year === MIN_YEAR) throw new ArithmeticOverflowError('Year is already at the minimum value')
  return (year - 1) as Year
}

export function nextLeapYear(year: Year): Year {
  let candidate = nextYear(year)
  while (!isLeap(candidate)) {
    candidate = nextYear(candidate)
  }
  return candidate
}

export function previousLeapYear(year: Year): Year {
  let candidate = previousYear(year)
  while (!isLeap(candidate)) {
    candidate = previousYear(candidate)
  }
  return candidate
}

// ============================================================================
// Comparison
// ============================================================================

export function compareYears(a: Year, b: Year): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function isYearAfter(a: Year, b: Year): boolean {
  return a > b
}

export function isYearBefore(a: Year, b: Year): boolean {
  return a < b
}

/** True when `date` falls in `year`. */
export function yearMatchesDate(year: Year, date: LocalDate | null | undefined): boolean {
  if (date == null) throw new NullInputError('date')
  return date.year === year
}

// ============================================================================
// Era Fields
// ============================================================================

export function eraOf(year: Year): Era {
  return year > 0 ? Era.CE : Era.BCE
}

export function yearOfEra(year: Year): number {
  return year > 0 ? year : 1 - year
}

export function centuryOfEra(year: Year): number {
  return Math.floor(yearOfEra(year) / 100)
}

export function millenniumOfEra(year: Year): number {
  return Math.floor(yearOfEra(year) / 1000)
}

export function decadeOfCentury(year: Year): number {
  return Math.floor((yearOfEra(year) % 100) / 10)
}

// ============================================================================
// Formatting
// ============================================================================

/** At least four digits; years outside 0..9999 carry a '-' or '+' sign. */
export function formatYear(year: Year): string {
  const digits = String(Math.abs(year)).padStart(4, '0')
  if (year < 0) return '-' + digits
  return year > 9999 ? '+' + digits : digits
}
