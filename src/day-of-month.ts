/**
 * Day of Month
 *
 * Branded 1..31. The static range is checked at construction; whether the day
 * exists in a given month is checked when a date is assembled.
 */

import { InvalidFieldError } from './errors'
import { checkFieldValue } from './fields'
import { lengthInDays, monthName, type MonthOfYear } from './month-of-year'
import { formatYear, type Year } from './year'

declare const __dayOfMonth: unique symbol

/** Day of month in 1..31 */
export type DayOfMonth = number & { readonly [__dayOfMonth]: true }

export function dayOfMonth(value: number): DayOfMonth {
  return checkFieldValue('dayOfMonth', value) as DayOfMonth
}

export function isValidDayOfMonth(year: Year, month: MonthOfYear, day: number): boolean {
  return Number.isInteger(day) && day >= 1 && day <= lengthInDays(month, year)
}

/** Throws InvalidFieldError when `day` does not exist in `month` of `year`. */
export function checkValidDayOfMonth(year: Year, month: MonthOfYear, day: DayOfMonth): DayOfMonth {
  if (!isValidDayOfMonth(year, month, day)) {
    throw new InvalidFieldError(
      'dayOfMonth',
      day,
      `Day ${day} is not valid for ${monthName(month)} ${formatYear(year)}`
    )
  }
  return day
}
