/**
 * Calendar Fields
 *
 * The named calendrical quantities and their static value ranges. A value
 * outside its static range is rejected before any date is assembled; whether
 * an in-range value fits a particular year and month is checked elsewhere.
 */

import { FieldRangeError } from './errors'

export type CalendarField = 'year' | 'monthOfYear' | 'dayOfMonth' | 'dayOfWeek' | 'dayOfYear'

/** Lowest supported ISO year; two values below the 32-bit minimum are kept free. */
export const MIN_YEAR = -2147483646

/** Highest supported ISO year. */
export const MAX_YEAR = 2147483647

export type FieldRange = { readonly min: number; readonly max: number }

export const FIELD_RANGES: Readonly<Record<CalendarField, FieldRange>> = {
  year: { min: MIN_YEAR, max: MAX_YEAR },
  monthOfYear: { min: 1, max: 12 },
  dayOfMonth: { min: 1, max: 31 },
  dayOfWeek: { min: 1, max: 7 },
  dayOfYear: { min: 1, max: 366 },
}

export function isValidFieldValue(field: CalendarField, value: number): boolean {
  const { min, max } = FIELD_RANGES[field]
  return Number.isInteger(value) && value >= min && value <= max
}

export function checkFieldValue(field: CalendarField, value: number): number {
  if (!isValidFieldValue(field, value)) {
    const { min, max } = FIELD_RANGES[field]
    throw new FieldRangeError(field, value, min, max)
  }
  return value
}
