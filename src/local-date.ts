/**
 * Local Date
 *
 * An ISO calendar date as a frozen {year, month, day} record. Construction
 * validates the triple; arithmetic returns new records. Day-of-week and
 * day-of-year are always derived, never stored.
 *
 * Day arithmetic takes a same-month or next-month fast path and falls back to
 * epoch-day conversion for larger offsets. Month and year arithmetic hand the
 * possibly-missing day to a DateResolver (PreviousValid unless one is given).
 */

import {
  ArithmeticOverflowError,
  CalendarError,
  InvalidArgumentError,
  InvalidFieldError,
  NullInputError,
  requireSafeInteger,
} from './errors'
import { type Result, Ok, Err } from './result'
import {
  fromEpochDay,
  toEpochDay,
  MIN_EPOCH_DAY,
  MAX_EPOCH_DAY,
} from './iso-chronology'
import {
  isoYear,
  isLeap,
  formatYear,
  nextYear,
  plusYears as plusYearsToYear,
  compareYears,
  type Year,
} from './year'
import { monthOfYear, lengthInDays, nextMonth, MonthOfYear } from './month-of-year'
import { dayOfMonth, checkValidDayOfMonth, type DayOfMonth } from './day-of-month'
import { dayOfYear, dayOfYearOf, dateOfDayOfYear, isValidDayOfYear } from './day-of-year'
import { dayOfWeek, dayOfWeekOf } from './day-of-week'
import { DateResolvers, requireResolver, type DateResolver } from './date-resolver'
import { makeDateRecord, type LocalDate } from './internal/date-record'

export type { LocalDate } from './internal/date-record'

// ============================================================================
// Construction
// ============================================================================

export function dateOf(year: Year, month: MonthOfYear, day: DayOfMonth): LocalDate {
  if (year == null) throw new NullInputError('year')
  if (month == null) throw new NullInputError('month')
  if (day == null) throw new NullInputError('day')
  checkValidDayOfMonth(year, month, day)
  return makeDateRecord(year, month, day)
}

export function date(year: number, month: number, day: number): LocalDate {
  return dateOf(isoYear(year), monthOfYear(month), dayOfMonth(day))
}

/** Non-throwing form of `date`; calendar errors come back as the error value. */
export function tryDate(year: number, month: number, day: number): Result<LocalDate, CalendarError> {
  try {
    return Ok(date(year, month, day))
  } catch (err) {
    if (err instanceof CalendarError) return Err(err)
    throw err
  }
}

export function ofYearDay(year: number, day: number): LocalDate {
  return dateOfDayOfYear(isoYear(year), dayOfYear(day))
}

export function ofEpochDay(epochDay: number): LocalDate {
  if (!Number.isInteger(epochDay)) {
    throw new InvalidArgumentError(`epochDay must be an integer, got ${epochDay}`)
  }
  if (epochDay < MIN_EPOCH_DAY || epochDay > MAX_EPOCH_DAY) {
    throw new ArithmeticOverflowError(`Epoch day ${epochDay} is outside the supported date range`)
  }
  const { year, month, day } = fromEpochDay(epochDay)
  return makeDateRecord(isoYear(year), monthOfYear(month), dayOfMonth(day))
}

export function dateToEpochDay(date: LocalDate): number {
  return toEpochDay(date.year, date.month, date.day)
}

// ============================================================================
// Derived Fields
// ============================================================================

export function isLeapYearDate(date: LocalDate): boolean {
  return isLeap(date.year)
}

export function lengthOfMonthOf(date: LocalDate): number {
  return lengthInDays(date.month, date.year)
}

// ============================================================================
// Adjusters
// ============================================================================

export function withYear(
  date: LocalDate,
  year: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  const resolve = requireResolver(resolver)
  if (date.year === year) return date
  return resolve(isoYear(year), date.month, date.day)
}

export function withMonthOfYear(
  date: LocalDate,
  month: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  const resolve = requireResolver(resolver)
  if (date.month === month) return date
  return resolve(date.year, monthOfYear(month), date.day)
}

export function withDayOfMonth(date: LocalDate, day: number): LocalDate {
  if (date.day === day) return date
  return dateOf(date.year, date.month, dayOfMonth(day))
}

export function withLastDayOfMonth(date: LocalDate): LocalDate {
  return withDayOfMonth(date, lengthInDays(date.month, date.year))
}

export function withLastDayOfYear(date: LocalDate): LocalDate {
  return makeDateRecord(date.year, MonthOfYear.DECEMBER, dayOfMonth(31))
}

export function withDayOfYear(date: LocalDate, day: number): LocalDate {
  const target = dayOfYear(day)
  if (!isValidDayOfYear(target, date.year)) {
    throw new InvalidFieldError('dayOfYear', day, `Day 366 is not valid for non-leap year ${formatYear(date.year)}`)
  }
  return plusDays(date, target - dayOfYearOf(date))
}

/** Moves within the Monday-to-Sunday week containing `date`. */
export function withDayOfWeek(date: LocalDate, day: number): LocalDate {
  return plusDays(date, dayOfWeek(day) - dayOfWeekOf(date))
}

// ============================================================================
// Day Arithmetic
// ============================================================================

export function plusDays(date: LocalDate, days: number): LocalDate {
  requireSafeInteger(days, 'days')
  if (days === 0) return date

  const monthLength = lengthInDays(date.month, date.year)
  const candidate = date.day + days
  if (candidate >= 1) {
    if (candidate <= monthLength) {
      return makeDateRecord(date.year, date.month, dayOfMonth(candidate))
    }
    const december = date.month === MonthOfYear.DECEMBER
    const followingYear = december ? nextYear(date.year) : date.year
    const followingMonth = nextMonth(date.month)
    const followingLength = lengthInDays(followingMonth, followingYear)
    if (candidate <= monthLength + followingLength) {
      return makeDateRecord(followingYear, followingMonth, dayOfMonth(candidate - monthLength))
    }
  }

  return ofEpochDay(dateToEpochDay(date) + days)
}

export function minusDays(date: LocalDate, days: number): LocalDate {
  requireSafeInteger(days, 'days')
  return plusDays(date, -days)
}

export function plusWeeks(date: LocalDate, weeks: number): LocalDate {
  requireSafeInteger(weeks, 'weeks')
  const days = 7 * weeks
  if (!Number.isSafeInteger(days)) {
    throw new ArithmeticOverflowError(`${weeks} weeks is too large a day count`)
  }
  return plusDays(date, days)
}

export function minusWeeks(date: LocalDate, weeks: number): LocalDate {
  requireSafeInteger(weeks, 'weeks')
  return plusWeeks(date, -weeks)
}

// ============================================================================
// Month & Year Arithmetic
// ============================================================================

export function plusMonths(
  date: LocalDate,
  months: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  const resolve = requireResolver(resolver)
  requireSafeInteger(months, 'months')
  if (months === 0) return date

  const monthIndex = date.year * 12 + (date.month - 1) + months
  if (!Number.isSafeInteger(monthIndex)) {
    throw new ArithmeticOverflowError(`Adding ${months} months leaves the supported year range`)
  }
  const targetYear = Math.floor(monthIndex / 12)
  const targetMonth = monthIndex - targetYear * 12 + 1
  const year = plusYearsToYear(date.year, targetYear - date.year)
  return resolve(year, monthOfYear(targetMonth), date.day)
}

export function minusMonths(
  date: LocalDate,
  months: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  requireSafeInteger(months, 'months')
  return plusMonths(date, -months, resolver)
}

export function plusYears(
  date: LocalDate,
  years: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  const resolve = requireResolver(resolver)
  requireSafeInteger(years, 'years')
  if (years === 0) return date
  return resolve(plusYearsToYear(date.year, years), date.month, date.day)
}

export function minusYears(
  date: LocalDate,
  years: number,
  resolver: DateResolver = DateResolvers.previousValid
): LocalDate {
  requireSafeInteger(years, 'years')
  return plusYears(date, -years, resolver)
}

/** Month and year operations that resolve a missing day with `resolver`. */
export type ResolvingDateOps = {
  plusMonths(date: LocalDate, months: number): LocalDate
  minusMonths(date: LocalDate, months: number): LocalDate
  plusYears(date: LocalDate, years: number): LocalDate
  minusYears(date: LocalDate, years: number): LocalDate
  withYear(date: LocalDate, year: number): LocalDate
  withMonthOfYear(date: LocalDate, month: number): LocalDate
}

export function withResolver(resolver: DateResolver): ResolvingDateOps {
  const resolve = requireResolver(resolver)
  return {
    plusMonths: (d, months) => plusMonths(d, months, resolve),
    minusMonths: (d, months) => minusMonths(d, months, resolve),
    plusYears: (d, years) => plusYears(d, years, resolve),
    minusYears: (d, years) => minusYears(d, years, resolve),
    withYear: (d, year) => withYear(d, year, resolve),
    withMonthOfYear: (d, month) => withMonthOfYear(d, month, resolve),
  }
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  const byYear = compareYears(a.year, b.year)
  if (byYear !== 0) return byYear
  if (a.month !== b.month) return a.month < b.month ? -1 : 1
  if (a.day !== b.day) return a.day < b.day ? -1 : 1
  return 0
}

export function dateEquals(a: LocalDate, b: LocalDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day
}

export function isDateBefore(a: LocalDate, b: LocalDate): boolean {
  return compareDates(a, b) < 0
}

export function isDateAfter(a: LocalDate, b: LocalDate): boolean {
  return compareDates(a, b) > 0
}

export function minDate(a: LocalDate, b: LocalDate): LocalDate {
  return compareDates(a, b) <= 0 ? a : b
}

export function maxDate(a: LocalDate, b: LocalDate): LocalDate {
  return compareDates(a, b) >= 0 ? a : b
}

/** 32-bit hash; equal dates hash equally. */
export function hashDate(date: LocalDate): number {
  const y = date.year | 0
  return (y & 0xfffff800) ^ ((y << 11) + (date.month << 6) + date.day)
}

/** Signed number of days from `a` to `b`. */
export function daysBetweenDates(a: LocalDate, b: LocalDate): number {
  return dateToEpochDay(b) - dateToEpochDay(a)
}

// ============================================================================
// Formatting
// ============================================================================

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** Canonical form YYYY-MM-DD; years outside 0..9999 are signed and may be longer. */
export function formatDate(date: LocalDate): string {
  return `${formatYear(date.year)}-${pad2(date.month)}-${pad2(date.day)}`
}
