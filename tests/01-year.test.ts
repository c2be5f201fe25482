/**
 * Segment 01: Year Tests
 *
 * Construction, leap-year rule, overflow-checked arithmetic and era fields.
 */

import { describe, it, expect } from 'vitest'
import {
  MIN_YEAR,
  MAX_YEAR,
  Era,
  isoYear,
  yearFromEra,
  isLeap,
  lengthOfYear,
  plusYears,
  minusYears,
  nextYear,
  previousYear,
  nextLeapYear,
  previousLeapYear,
  compareYears,
  isYearAfter,
  isYearBefore,
  yearMatchesDate,
  eraOf,
  yearOfEra,
  centuryOfEra,
  millenniumOfEra,
  decadeOfCentury,
  formatYear,
} from '../src/year'
import { ArithmeticOverflowError, FieldRangeError, InvalidArgumentError, NullInputError } from '../src/errors'
import { date } from '../src/local-date'

// ============================================================================
// 1. CONSTRUCTION
// ============================================================================

describe('isoYear', () => {
  it('accepts values across the range', () => {
    for (let i = -4; i <= 2104; i++) {
      expect(isoYear(i)).toBe(i)
    }
  })

  it('accepts both bounds', () => {
    expect(isoYear(MIN_YEAR)).toBe(-2147483646)
    expect(isoYear(MAX_YEAR)).toBe(2147483647)
  })

  it('rejects a value below MIN_YEAR', () => {
    expect(() => isoYear(MIN_YEAR - 1)).toThrow(FieldRangeError)
  })

  it('rejects a value above MAX_YEAR', () => {
    expect(() => isoYear(MAX_YEAR + 1)).toThrow(FieldRangeError)
  })

  it('rejects a fractional year', () => {
    expect(() => isoYear(2007.5)).toThrow(FieldRangeError)
  })

  it('reports the field and bounds', () => {
    try {
      isoYear(MAX_YEAR + 1)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(FieldRangeError)
      if (err instanceof FieldRangeError) {
        expect(err.field).toBe('year')
        expect(err.min).toBe(MIN_YEAR)
        expect(err.max).toBe(MAX_YEAR)
      }
    }
  })
})

describe('yearFromEra', () => {
  it('maps CE years directly', () => {
    expect(yearFromEra(Era.CE, 2008)).toBe(2008)
  })

  it('maps BCE 1 to year 0', () => {
    expect(yearFromEra(Era.BCE, 1)).toBe(0)
    expect(yearFromEra(Era.BCE, 2)).toBe(-1)
  })

  it('rejects year-of-era below 1', () => {
    expect(() => yearFromEra(Era.CE, 0)).toThrow(FieldRangeError)
  })
})

// ============================================================================
// 2. LEAP YEARS
// ============================================================================

describe('isLeap', () => {
  const cases: Array<[number, boolean]> = [
    [1999, false], [2000, true], [2001, false], [2007, false], [2008, true],
    [2012, true], [2096, true], [2100, false], [2104, true], [1900, false],
    [-500, false], [-400, true], [-300, false], [-100, false], [-4, true], [-1, false],
    [0, true], [100, false], [400, true],
  ]

  for (const [value, leap] of cases) {
    it(`${value} is ${leap ? '' : 'not '}leap`, () => {
      expect(isLeap(isoYear(value))).toBe(leap)
    })
  }

  it('gives year length 366 in leap years', () => {
    expect(lengthOfYear(isoYear(2008))).toBe(366)
    expect(lengthOfYear(isoYear(2007))).toBe(365)
  })
})

// ============================================================================
// 3. NEXT / PREVIOUS
// ============================================================================

describe('nextYear / previousYear', () => {
  it('steps by one', () => {
    expect(nextYear(isoYear(2007))).toBe(2008)
    expect(previousYear(isoYear(2007))).toBe(2006)
  })

  it('fails at MAX_YEAR', () => {
    expect(() => nextYear(isoYear(MAX_YEAR))).toThrow(ArithmeticOverflowError)
  })

  it('fails at MIN_YEAR', () => {
    expect(() => previousYear(isoYear(MIN_YEAR))).toThrow(ArithmeticOverflowError)
  })
})

describe('nextLeapYear / previousLeapYear', () => {
  it('finds the next leap year', () => {
    expect(nextLeapYear(isoYear(2007))).toBe(2008)
    expect(nextLeapYear(isoYear(2008))).toBe(2012)
    expect(nextLeapYear(isoYear(2096))).toBe(2104)
    expect(nextLeapYear(isoYear(2100))).toBe(2104)
  })

  it('finds the previous leap year', () => {
    expect(previousLeapYear(isoYear(2013))).toBe(2012)
    expect(previousLeapYear(isoYear(2008))).toBe(2004)
    expect(previousLeapYear(isoYear(2104))).toBe(2096)
    expect(previousLeapYear(isoYear(2101))).toBe(2096)
  })

  it('propagates the upper boundary failure', () => {
    expect(() => nextLeapYear(isoYear(MAX_YEAR - 1))).toThrow(ArithmeticOverflowError)
  })

  it('propagates the lower boundary failure', () => {
    expect(() => previousLeapYear(isoYear(MIN_YEAR + 1))).toThrow(ArithmeticOverflowError)
  })
})

// ============================================================================
// 4. ARITHMETIC
// ============================================================================

describe('plusYears / minusYears', () => {
  it('adds signed amounts', () => {
    expect(plusYears(isoYear(2007), -1)).toBe(2006)
    expect(plusYears(isoYear(2007), 0)).toBe(2007)
    expect(plusYears(isoYear(2007), 2)).toBe(2009)
    expect(minusYears(isoYear(2007), -1)).toBe(2008)
    expect(minusYears(isoYear(2007), 7)).toBe(2000)
  })

  it('reaches the bounds exactly', () => {
    expect(plusYears(isoYear(MAX_YEAR - 1), 1)).toBe(MAX_YEAR)
    expect(plusYears(isoYear(MIN_YEAR + 1), -1)).toBe(MIN_YEAR)
    expect(minusYears(isoYear(MIN_YEAR + 1), 1)).toBe(MIN_YEAR)
  })

  it('fails past MAX_YEAR instead of wrapping', () => {
    expect(() => plusYears(isoYear(MAX_YEAR), 1)).toThrow(ArithmeticOverflowError)
    expect(() => plusYears(isoYear(0), Number.MAX_SAFE_INTEGER)).toThrow(ArithmeticOverflowError)
  })

  it('fails past MIN_YEAR instead of wrapping', () => {
    expect(() => plusYears(isoYear(MIN_YEAR), -1)).toThrow(ArithmeticOverflowError)
    expect(() => minusYears(isoYear(MIN_YEAR), 1)).toThrow(ArithmeticOverflowError)
  })

  it('rejects a fractional amount', () => {
    expect(() => plusYears(isoYear(2007), 0.5)).toThrow(InvalidArgumentError)
  })
})

// ============================================================================
// 5. COMPARISON
// ============================================================================

describe('comparison', () => {
  it('orders years numerically', () => {
    expect(compareYears(isoYear(-1), isoYear(0))).toBe(-1)
    expect(compareYears(isoYear(2007), isoYear(2007))).toBe(0)
    expect(compareYears(isoYear(2008), isoYear(2007))).toBe(1)
    expect(isYearAfter(isoYear(2008), isoYear(2007))).toBe(true)
    expect(isYearBefore(isoYear(2008), isoYear(2007))).toBe(false)
  })

  it('matches dates in the same year only', () => {
    expect(yearMatchesDate(isoYear(2007), date(2007, 12, 31))).toBe(true)
    expect(yearMatchesDate(isoYear(2007), date(2008, 1, 1))).toBe(false)
    expect(yearMatchesDate(isoYear(-1), date(-1, 6, 15))).toBe(true)
  })

  it('rejects a null date when matching', () => {
    expect(() => yearMatchesDate(isoYear(2007), null)).toThrow(NullInputError)
  })
})

// ============================================================================
// 6. ERA FIELDS & FORMATTING
// ============================================================================

describe('era fields', () => {
  it('splits years into eras', () => {
    expect(eraOf(isoYear(1))).toBe('CE')
    expect(eraOf(isoYear(0))).toBe('BCE')
    expect(yearOfEra(isoYear(2008))).toBe(2008)
    expect(yearOfEra(isoYear(0))).toBe(1)
    expect(yearOfEra(isoYear(-1))).toBe(2)
  })

  it('derives century, millennium and decade from year-of-era', () => {
    expect(centuryOfEra(isoYear(2008))).toBe(20)
    expect(millenniumOfEra(isoYear(2008))).toBe(2)
    expect(decadeOfCentury(isoYear(1987))).toBe(8)
    expect(centuryOfEra(isoYear(-199))).toBe(2)
  })
})

describe('formatYear', () => {
  it('pads to four digits', () => {
    expect(formatYear(isoYear(5))).toBe('0005')
    expect(formatYear(isoYear(0))).toBe('0000')
    expect(formatYear(isoYear(2007))).toBe('2007')
  })

  it('prefixes negative years with a minus sign', () => {
    expect(formatYear(isoYear(-5))).toBe('-0005')
    expect(formatYear(isoYear(-12345))).toBe('-12345')
  })

  it('prefixes years above 9999 with a plus sign', () => {
    expect(formatYear(isoYear(9999))).toBe('9999')
    expect(formatYear(isoYear(10000))).toBe('+10000')
    expect(formatYear(isoYear(12345))).toBe('+12345')
  })
})
