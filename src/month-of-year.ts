/**
 * Month of Year
 *
 * The twelve ISO months as an integer-backed enumeration. Per-month data lives
 * in a lookup table; every operation is a pure function over the month number.
 */

import { FieldRangeError, requireSafeInteger } from './errors'
import { FIELD_RANGES } from './fields'
import { isLeapYear } from './iso-chronology'
import type { Year } from './year'

export const MonthOfYear = {
  JANUARY: 1,
  FEBRUARY: 2,
  MARCH: 3,
  APRIL: 4,
  MAY: 5,
  JUNE: 6,
  JULY: 7,
  AUGUST: 8,
  SEPTEMBER: 9,
  OCTOBER: 10,
  NOVEMBER: 11,
  DECEMBER: 12,
} as const

export type MonthOfYear = (typeof MonthOfYear)[keyof typeof MonthOfYear]

type MonthInfo = {
  name: string
  shortName: string
  /** Length in a non-leap year */
  length: number
}

const MONTHS: readonly MonthInfo[] = [
  { name: 'January', shortName: 'Jan', length: 31 },
  { name: 'February', shortName: 'Feb', length: 28 },
  { name: 'March', shortName: 'Mar', length: 31 },
  { name: 'April', shortName: 'Apr', length: 30 },
  { name: 'May', shortName: 'May', length: 31 },
  { name: 'June', shortName: 'Jun', length: 30 },
  { name: 'July', shortName: 'Jul', length: 31 },
  { name: 'August', shortName: 'Aug', length: 31 },
  { name: 'September', shortName: 'Sep', length: 30 },
  { name: 'October', shortName: 'Oct', length: 31 },
  { name: 'November', shortName: 'Nov', length: 30 },
  { name: 'December', shortName: 'Dec', length: 31 },
]

function infoOf(month: MonthOfYear): MonthInfo {
  return MONTHS[month - 1]!
}

export function isMonthOfYear(value: number): value is MonthOfYear {
  return Number.isInteger(value) && value >= 1 && value <= 12
}

// ============================================================================
// Construction
// ============================================================================

export function monthOfYear(value: number): MonthOfYear {
  if (!isMonthOfYear(value)) {
    const { min, max } = FIELD_RANGES.monthOfYear
    throw new FieldRangeError('monthOfYear', value, min, max)
  }
  return value
}

// ============================================================================
// Lengths
// ============================================================================

export function lengthInDays(month: MonthOfYear, year: Year): number {
  if (month === MonthOfYear.FEBRUARY) return isLeapYear(year) ? 29 : 28
  return infoOf(month).length
}

export function minLengthInDays(month: MonthOfYear): number {
  return infoOf(month).length
}

export function maxLengthInDays(month: MonthOfYear): number {
  return month === MonthOfYear.FEBRUARY ? 29 : infoOf(month).length
}

/** Day-of-year of the first day of `month`. */
export function firstDayOfYear(month: MonthOfYear, leapYear: boolean): number {
  let day = 1
  for (let m = 0; m < month - 1; m++) {
    day += MONTHS[m]!.length
  }
  return leapYear && month > MonthOfYear.FEBRUARY ? day + 1 : day
}

export function quarterOfYear(month: MonthOfYear): 1 | 2 | 3 | 4 {
  if (month <= 3) return 1
  if (month <= 6) return 2
  if (month <= 9) return 3
  return 4
}

// ============================================================================
// Cyclic Arithmetic
// ============================================================================

/** Moves `months` steps around the year; December + 1 is January. */
export function rollMonths(month: MonthOfYear, months: number): MonthOfYear {
  requireSafeInteger(months, 'months')
  return monthOfYear((((month - 1 + (months % 12)) % 12) + 12) % 12 + 1)
}

export function nextMonth(month: MonthOfYear): MonthOfYear {
  return rollMonths(month, 1)
}

export function previousMonth(month: MonthOfYear): MonthOfYear {
  return rollMonths(month, -1)
}

// ============================================================================
// Names
// ============================================================================

export function monthName(month: MonthOfYear): string {
  return infoOf(month).name
}

export function monthShortName(month: MonthOfYear): string {
  return infoOf(month).shortName
}
