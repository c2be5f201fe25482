/**
 * ISO Chronology
 *
 * Leap-year rule, month lengths and epoch-day conversion for the proleptic
 * Gregorian calendar. Everything here works on plain integers so the value
 * types built on top can share one definition of the calendar.
 */

import { MIN_YEAR, MAX_YEAR } from './fields'

// ============================================================================
// Constants
// ============================================================================

/** Days in one 400-year Gregorian cycle. */
export const DAYS_PER_CYCLE = 146097

/** Days from 0000-01-01 to 1970-01-01. */
export const DAYS_0000_TO_1970 = 719528

const MONTH_LENGTHS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

// ============================================================================
// Leap Years & Month Lengths
// ============================================================================

export function isLeapYear(year: number): boolean {
  return year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0)
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month]!
}

export function daysInYear(year: number): number {
  return isLeapYear(year) ? 366 : 365
}

/** Total length of the months before `month` in `year`. */
export function daysBeforeMonth(year: number, month: number): number {
  let total = 0
  for (let m = 1; m < month; m++) {
    total += daysInMonth(year, m)
  }
  return total
}

/**
 * Days from 0000-01-01 to January 1st of `year`.
 *
 * The floor-based leap count is exact for negative years too: it counts the
 * leap years in [year, 0) negatively.
 */
function daysBeforeYear(year: number): number {
  const leaps =
    Math.floor((year + 3) / 4) - Math.floor((year + 99) / 100) + Math.floor((year + 399) / 400)
  return 365 * year + leaps
}

// ============================================================================
// Day-of-Year
// ============================================================================

/** Splits a 1-based day-of-year into month and day by walking month lengths. */
export function monthDayOfYear(year: number, dayOfYear: number): { month: number; day: number } {
  let remaining = dayOfYear
  let month = 1
  while (month < 12) {
    const length = daysInMonth(year, month)
    if (remaining <= length) break
    remaining -= length
    month++
  }
  return { month, day: remaining }
}

// ============================================================================
// Epoch Day (1970-01-01 = 0)
// ============================================================================

export function toEpochDay(year: number, month: number, day: number): number {
  return daysBeforeYear(year) + daysBeforeMonth(year, month) + day - 1 - DAYS_0000_TO_1970
}

export function fromEpochDay(epochDay: number): { year: number; month: number; day: number } {
  const zeroDay = epochDay + DAYS_0000_TO_1970
  const cycles = Math.floor(zeroDay / DAYS_PER_CYCLE)
  const dayOfCycle = zeroDay - cycles * DAYS_PER_CYCLE

  // The estimate is off by at most one year either way
  let yearOfCycle = Math.floor((400 * dayOfCycle) / DAYS_PER_CYCLE)
  while (daysBeforeYear(yearOfCycle) > dayOfCycle) yearOfCycle--
  while (daysBeforeYear(yearOfCycle + 1) <= dayOfCycle) yearOfCycle++

  const year = cycles * 400 + yearOfCycle
  const dayOfYear = dayOfCycle - daysBeforeYear(yearOfCycle) + 1
  const { month, day } = monthDayOfYear(year, dayOfYear)
  return { year, month, day }
}

/** Epoch day of MIN_YEAR-01-01. */
export const MIN_EPOCH_DAY = toEpochDay(MIN_YEAR, 1, 1)

/** Epoch day of MAX_YEAR-12-31. */
export const MAX_EPOCH_DAY = toEpochDay(MAX_YEAR, 12, 31)
