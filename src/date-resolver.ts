/**
 * Date Resolvers
 *
 * Policies for a year/month/day triple whose day does not exist in that month,
 * such as the 31st reached by adding a month to January 31st. Every resolver
 * returns a valid triple unchanged.
 */

import { InvalidFieldError, NullInputError } from './errors'
import { lengthInDays, monthName, nextMonth, MonthOfYear } from './month-of-year'
import { dayOfMonth, type DayOfMonth } from './day-of-month'
import { formatYear, nextYear, type Year } from './year'
import { makeDateRecord, type LocalDate } from './internal/date-record'

export type DateResolver = (year: Year, month: MonthOfYear, day: DayOfMonth) => LocalDate

/** Clamps to the last day of the month. */
function previousValid(year: Year, month: MonthOfYear, day: DayOfMonth): LocalDate {
  const length = lengthInDays(month, year)
  if (day > length) {
    return makeDateRecord(year, month, dayOfMonth(length))
  }
  return makeDateRecord(year, month, day)
}

/** Moves to the first day of the following month. */
function nextValid(year: Year, month: MonthOfYear, day: DayOfMonth): LocalDate {
  if (day > lengthInDays(month, year)) {
    if (month === MonthOfYear.DECEMBER) {
      return makeDateRecord(nextYear(year), MonthOfYear.JANUARY, dayOfMonth(1))
    }
    return makeDateRecord(year, nextMonth(month), dayOfMonth(1))
  }
  return makeDateRecord(year, month, day)
}

/** Rejects a day past the end of the month. */
function strict(year: Year, month: MonthOfYear, day: DayOfMonth): LocalDate {
  if (day > lengthInDays(month, year)) {
    throw new InvalidFieldError(
      'dayOfMonth',
      day,
      `Day ${day} is not valid for ${monthName(month)} ${formatYear(year)}`
    )
  }
  return makeDateRecord(year, month, day)
}

export const DateResolvers = {
  previousValid,
  nextValid,
  strict,
} as const satisfies Record<string, DateResolver>

export function requireResolver(resolver: DateResolver | null | undefined): DateResolver {
  if (resolver == null) throw new NullInputError('resolver')
  return resolver
}

export function resolveDate(
  resolver: DateResolver | null | undefined,
  year: Year,
  month: MonthOfYear,
  day: DayOfMonth
): LocalDate {
  return requireResolver(resolver)(year, month, day)
}
