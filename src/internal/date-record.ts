/**
 * LocalDate record
 *
 * The frozen {year, month, day} shape shared by the resolver and LocalDate
 * modules. `makeDateRecord` does not validate: callers guarantee the day
 * exists in that month.
 */

import type { Year } from '../year'
import type { MonthOfYear } from '../month-of-year'
import type { DayOfMonth } from '../day-of-month'

export type LocalDate = {
  readonly year: Year
  readonly month: MonthOfYear
  readonly day: DayOfMonth
}

export function makeDateRecord(year: Year, month: MonthOfYear, day: DayOfMonth): LocalDate {
  return Object.freeze({ year, month, day })
}
