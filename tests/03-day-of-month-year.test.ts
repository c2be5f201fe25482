/**
 * Segment 03: Day of Month & Day of Year Tests
 */

import { describe, it, expect } from 'vitest'
import { dayOfMonth, isValidDayOfMonth, checkValidDayOfMonth } from '../src/day-of-month'
import { dayOfYear, isValidDayOfYear, dayOfYearOf, dateOfDayOfYear } from '../src/day-of-year'
import { MonthOfYear } from '../src/month-of-year'
import { isoYear } from '../src/year'
import { date, formatDate } from '../src/local-date'
import { FieldRangeError, InvalidFieldError } from '../src/errors'

// ============================================================================
// Day of Month
// ============================================================================

describe('dayOfMonth', () => {
  it('accepts 1..31 without calendar context', () => {
    expect(dayOfMonth(1)).toBe(1)
    expect(dayOfMonth(31)).toBe(31)
  })

  it('rejects 0 and 32', () => {
    expect(() => dayOfMonth(0)).toThrow(FieldRangeError)
    expect(() => dayOfMonth(32)).toThrow(FieldRangeError)
  })
})

describe('checkValidDayOfMonth', () => {
  it('passes a day that exists in the month', () => {
    expect(checkValidDayOfMonth(isoYear(2008), MonthOfYear.FEBRUARY, dayOfMonth(29))).toBe(29)
  })

  it('rejects February 29 in a common year, naming the field', () => {
    try {
      checkValidDayOfMonth(isoYear(2007), MonthOfYear.FEBRUARY, dayOfMonth(29))
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidFieldError)
      if (err instanceof InvalidFieldError) {
        expect(err.field).toBe('dayOfMonth')
        expect(err.value).toBe(29)
        expect(err.message).toBe('Day 29 is not valid for February 2007')
      }
    }
  })

  it('reports validity as a boolean', () => {
    expect(isValidDayOfMonth(isoYear(2007), MonthOfYear.APRIL, 30)).toBe(true)
    expect(isValidDayOfMonth(isoYear(2007), MonthOfYear.APRIL, 31)).toBe(false)
  })
})

// ============================================================================
// Day of Year
// ============================================================================

describe('dayOfYear', () => {
  it('accepts 1..366', () => {
    expect(dayOfYear(366)).toBe(366)
  })

  it('rejects 0 and 367', () => {
    expect(() => dayOfYear(0)).toThrow(FieldRangeError)
    expect(() => dayOfYear(367)).toThrow(FieldRangeError)
  })

  it('allows 366 only in leap years', () => {
    expect(isValidDayOfYear(dayOfYear(366), isoYear(2008))).toBe(true)
    expect(isValidDayOfYear(dayOfYear(366), isoYear(2007))).toBe(false)
  })
})

describe('dayOfYearOf', () => {
  it('sums preceding month lengths', () => {
    expect(dayOfYearOf(date(2007, 1, 1))).toBe(1)
    expect(dayOfYearOf(date(2007, 3, 1))).toBe(60)
    expect(dayOfYearOf(date(2008, 3, 1))).toBe(61)
    expect(dayOfYearOf(date(2007, 12, 31))).toBe(365)
    expect(dayOfYearOf(date(2008, 12, 31))).toBe(366)
  })
})

describe('dateOfDayOfYear', () => {
  it('walks month lengths back to a date', () => {
    expect(formatDate(dateOfDayOfYear(isoYear(2008), dayOfYear(60)))).toBe('2008-02-29')
    expect(formatDate(dateOfDayOfYear(isoYear(2007), dayOfYear(60)))).toBe('2007-03-01')
    expect(formatDate(dateOfDayOfYear(isoYear(2007), dayOfYear(365)))).toBe('2007-12-31')
    expect(formatDate(dateOfDayOfYear(isoYear(0), dayOfYear(366)))).toBe('0000-12-31')
  })

  it('rejects day 366 of a common year', () => {
    expect(() => dateOfDayOfYear(isoYear(2007), dayOfYear(366))).toThrow(InvalidFieldError)
  })
})
