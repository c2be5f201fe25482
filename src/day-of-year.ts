/**
 * Day of Year
 *
 * Branded 1..366, derived from a date by summing the preceding month lengths.
 * Day 366 exists only in leap years.
 */

import { InvalidFieldError } from './errors'
import { checkFieldValue } from './fields'
import { daysBeforeMonth, daysInYear, monthDayOfYear } from './iso-chronology'
import { monthOfYear } from './month-of-year'
import { dayOfMonth } from './day-of-month'
import { formatYear, type Year } from './year'
import { makeDateRecord, type LocalDate } from './internal/date-record'

declare const __dayOfYear: unique symbol

/** Day of year in 1..366 */
export type DayOfYear = number & { readonly [__dayOfYear]: true }

export function dayOfYear(value: number): DayOfYear {
  return checkFieldValue('dayOfYear', value) as DayOfYear
}

export function isValidDayOfYear(day: DayOfYear, year: Year): boolean {
  return day <= daysInYear(year)
}

export function dayOfYearOf(date: LocalDate): DayOfYear {
  return (daysBeforeMonth(date.year, date.month) + date.day) as DayOfYear
}

/** The date on day `day` of `year`; day 366 of a non-leap year is rejected. */
export function dateOfDayOfYear(year: Year, day: DayOfYear): LocalDate {
  if (!isValidDayOfYear(day, year)) {
    throw new InvalidFieldError('dayOfYear', day, `Day 366 is not valid for non-leap year ${formatYear(year)}`)
  }
  const parts = monthDayOfYear(year, day)
  return makeDateRecord(year, monthOfYear(parts.month), dayOfMonth(parts.day))
}
