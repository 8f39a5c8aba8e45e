/**
 * Integer Helpers
 *
 * Strict decimal parsing for input tokens, and the exactness check used
 * before integer counts take part in floating-point averages.
 */

import { IntegerParseError, NumericConversionError } from "../errors"

const DIGITS = /^\+?[0-9]+$/

/**
 * Parse a non-negative decimal integer.
 * An optional leading `+`, then digits only; values above
 * `Number.MAX_SAFE_INTEGER` overflow.
 * @throws IntegerParseError
 */
export function parseUnsigned(token: string): number {
  if (token.length === 0) {
    throw new IntegerParseError(token, "empty")
  }
  if (!DIGITS.test(token)) {
    throw new IntegerParseError(token, "invalid-digit")
  }

  const value = Number(token)
  if (!Number.isSafeInteger(value)) {
    throw new IntegerParseError(token, "overflow")
  }
  return value
}

/**
 * Return `value` as a float, refusing integers a double cannot hold exactly.
 * @throws NumericConversionError
 */
export function toFloat(value: number): number {
  if (!Number.isSafeInteger(value)) {
    throw new NumericConversionError(value)
  }
  return value
}
