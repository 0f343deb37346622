/**
 * Number utilities
 *
 * Strict checks that never coerce their argument, so values parsed from
 * the environment or typed by an operator can be tested as-is.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 *
 * @param value - Value to check
 * @returns true if value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 *
 * @param value - Value to check
 * @returns true if value is an integer
 */
export function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Parse a strictly positive integer from user input
 *
 * Accepts numbers and numeric strings ("180", " 6 "). Anything else,
 * including "1.5", "0" and "12abc", yields null.
 *
 * @param value - Raw value
 * @returns The integer, or null when the value is not a positive integer
 */
export function parsePositiveInteger(value: unknown): number | null {
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string' && /^\s*\+?\d+\s*$/.test(value)) {
    parsed = Number(value.trim());
  } else {
    return null;
  }
  return isInteger(parsed) && parsed > 0 ? parsed : null;
}
