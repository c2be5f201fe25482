/**
 * Day of Week
 *
 * The seven ISO weekdays, Monday = 1. Weekday arithmetic is cyclic and needs
 * no date; `dayOfWeekOf` derives the weekday of a date from its epoch day.
 */

import { FieldRangeError, NullInputError, requireSafeInteger } from './errors'
import { FIELD_RANGES } from './fields'
import { toEpochDay } from './iso-chronology'
import type { LocalDate } from './internal/date-record'

export const DayOfWeek = {
  MONDAY: 1,
  TUESDAY: 2,
  WEDNESDAY: 3,
  THURSDAY: 4,
  FRIDAY: 5,
  SATURDAY: 6,
  SUNDAY: 7,
} as const

export type DayOfWeek = (typeof DayOfWeek)[keyof typeof DayOfWeek]

const NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']

export function isDayOfWeek(value: number): value is DayOfWeek {
  return Number.isInteger(value) && value >= 1 && value <= 7
}

export function dayOfWeek(value: number): DayOfWeek {
  if (!isDayOfWeek(value)) {
    const { min, max } = FIELD_RANGES.dayOfWeek
    throw new FieldRangeError('dayOfWeek', value, min, max)
  }
  return value
}

// ============================================================================
// Derivation
// ============================================================================

export function dayOfWeekOf(date: LocalDate): DayOfWeek {
  // 1970-01-01 was a Thursday
  const epochDay = toEpochDay(date.year, date.month, date.day)
  return dayOfWeek((((epochDay + 3) % 7) + 7) % 7 + 1)
}

// ============================================================================
// Cyclic Arithmetic
// ============================================================================

export function plusDaysOfWeek(day: DayOfWeek, days: number): DayOfWeek {
  requireSafeInteger(days, 'days')
  return dayOfWeek((((day - 1 + (days % 7)) % 7) + 7) % 7 + 1)
}

export function minusDaysOfWeek(day: DayOfWeek, days: number): DayOfWeek {
  return plusDaysOfWeek(day, -days)
}

export function nextDayOfWeek(day: DayOfWeek): DayOfWeek {
  return plusDaysOfWeek(day, 1)
}

export function previousDayOfWeek(day: DayOfWeek): DayOfWeek {
  return plusDaysOfWeek(day, -1)
}

export function isWeekend(day: DayOfWeek): boolean {
  return day === DayOfWeek.SATURDAY || day === DayOfWeek.SUNDAY
}

export function dayOfWeekMatchesDate(day: DayOfWeek, date: LocalDate | null | undefined): boolean {
  if (date == null) throw new NullInputError('date')
  return dayOfWeekOf(date) === day
}

// ============================================================================
// Names
// ============================================================================

export function dayOfWeekName(day: DayOfWeek): string {
  return NAMES[day - 1]!
}

export function dayOfWeekShortName(day: DayOfWeek): string {
  return dayOfWeekName(day).substring(0, 3)
}
