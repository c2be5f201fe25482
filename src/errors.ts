/**
 * Consolidated error system for the calendar core.
 *
 * All error classes extend CalendarError, which carries a typed error code.
 * Nothing here is logged: errors propagate to the caller, which branches on `code`.
 */

import type { CalendarField } from './fields'

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Raw value outside the static range of its field
  FIELD_RANGE: 'FIELD_RANGE',

  // Value in range on its own, invalid in combination with other fields
  INVALID_FIELD: 'INVALID_FIELD',

  // Year or epoch-day arithmetic past the representable bounds
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',

  // Missing collaborator at the API boundary
  NULL_INPUT: 'NULL_INPUT',

  // Amount that is not a safe integer
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode

  constructor(code: CalendarErrorCode, message: string) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
  }
}

// ============================================================================
// Field Errors
// ============================================================================

export class FieldRangeError extends CalendarError {
  readonly field: CalendarField
  readonly value: number
  readonly min: number
  readonly max: number

  constructor(field: CalendarField, value: number, min: number, max: number) {
    super(CalendarErrorCode.FIELD_RANGE, `Value ${value} for ${field} is outside ${min}..${max}`)
    this.name = 'FieldRangeError'
    this.field = field
    this.value = value
    this.min = min
    this.max = max
  }
}

export class InvalidFieldError extends CalendarError {
  readonly field: CalendarField
  readonly value: number

  constructor(field: CalendarField, value: number, message: string) {
    super(CalendarErrorCode.INVALID_FIELD, message)
    this.name = 'InvalidFieldError'
    this.field = field
    this.value = value
  }
}

// ============================================================================
// Arithmetic Errors
// ============================================================================

export class ArithmeticOverflowError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.ARITHMETIC_OVERFLOW, message)
    this.name = 'ArithmeticOverflowError'
  }
}

export class InvalidArgumentError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.INVALID_ARGUMENT, message)
    this.name = 'InvalidArgumentError'
  }
}

// ============================================================================
// Boundary Errors
// ============================================================================

export class NullInputError extends CalendarError {
  readonly parameter: string

  constructor(parameter: string) {
    super(CalendarErrorCode.NULL_INPUT, `${parameter} must not be null`)
    this.name = 'NullInputError'
    this.parameter = parameter
  }
}

/** Throws InvalidArgumentError unless `amount` is a safe integer. */
export function requireSafeInteger(amount: number, what: string): number {
  if (!Number.isSafeInteger(amount)) {
    throw new InvalidArgumentError(`${what} must be a safe integer, got ${amount}`)
  }
  return amount
}
