/**
 * iso-calendar-core
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  CalendarError, CalendarErrorCode,
  FieldRangeError, InvalidFieldError,
  ArithmeticOverflowError, InvalidArgumentError,
  NullInputError,
} from './errors'
export type { CalendarErrorCode as CalendarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Fields
export type { CalendarField, FieldRange } from './fields'
export { FIELD_RANGES, isValidFieldValue, checkFieldValue } from './fields'

// ISO chronology (plain-integer calendar rules)
export {
  isLeapYear, daysInMonth, daysInYear, daysBeforeMonth, monthDayOfYear,
  toEpochDay, fromEpochDay,
  DAYS_PER_CYCLE, DAYS_0000_TO_1970, MIN_EPOCH_DAY, MAX_EPOCH_DAY,
} from './iso-chronology'

// Year
export type { Year } from './year'
export {
  MIN_YEAR, MAX_YEAR, Era,
  isoYear, yearFromEra,
  isLeap, lengthOfYear,
  plusYears as yearPlusYears, minusYears as yearMinusYears,
  nextYear, previousYear, nextLeapYear, previousLeapYear,
  compareYears, isYearAfter, isYearBefore, yearMatchesDate,
  eraOf, yearOfEra, centuryOfEra, millenniumOfEra, decadeOfCentury,
  formatYear,
} from './year'

// Month of year
export {
  MonthOfYear,
  monthOfYear, isMonthOfYear,
  lengthInDays, minLengthInDays, maxLengthInDays, firstDayOfYear, quarterOfYear,
  rollMonths, nextMonth, previousMonth,
  monthName, monthShortName,
} from './month-of-year'

// Day of month / day of year / day of week
export type { DayOfMonth } from './day-of-month'
export { dayOfMonth, isValidDayOfMonth, checkValidDayOfMonth } from './day-of-month'
export type { DayOfYear } from './day-of-year'
export { dayOfYear, isValidDayOfYear, dayOfYearOf, dateOfDayOfYear } from './day-of-year'
export {
  DayOfWeek,
  dayOfWeek, isDayOfWeek, dayOfWeekOf,
  plusDaysOfWeek, minusDaysOfWeek, nextDayOfWeek, previousDayOfWeek,
  isWeekend, dayOfWeekMatchesDate, dayOfWeekName, dayOfWeekShortName,
} from './day-of-week'

// Resolvers
export type { DateResolver } from './date-resolver'
export { DateResolvers, requireResolver, resolveDate } from './date-resolver'

// Local date
export type { LocalDate, ResolvingDateOps } from './local-date'
export {
  date, dateOf, tryDate, ofYearDay, ofEpochDay, dateToEpochDay,
  isLeapYearDate, lengthOfMonthOf,
  withYear, withMonthOfYear, withDayOfMonth, withLastDayOfMonth, withLastDayOfYear,
  withDayOfYear, withDayOfWeek,
  plusDays, minusDays, plusWeeks, minusWeeks,
  plusMonths, minusMonths, plusYears, minusYears,
  withResolver,
  compareDates, dateEquals, isDateBefore, isDateAfter, minDate, maxDate, hashDate,
  daysBetweenDates,
  formatDate,
} from './local-date'
