/**
 * Validation helper functions
 */

import { isInteger } from '@utils/number';
import type { ConfigField, IntegerRange, IssueCollector, ValidationIssue } from './types';

/**
 * Collect errors and warnings in the order they are found
 * @returns Collector; `result()` is valid when no error was added
 */
export function createIssueCollector(): IssueCollector {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  return {
    error(field, message) {
      errors.push({ field, message });
    },
    warning(field, message) {
      warnings.push({ field, message });
    },
    result() {
      return { valid: errors.length === 0, errors: errors.slice(), warnings: warnings.slice() };
    },
  };
}

/**
 * Check an integer setting against its hard limits and recommended band
 *
 * A value outside the hard limits is an error and is not also warned
 * about. NaN (an unparsable environment value) fails the integer check.
 *
 * @param issues - Collector to report to
 * @param field - Setting name
 * @param value - Setting value
 * @param range - Hard limits and optional recommended band
 */
export function checkIntegerRange(
  issues: IssueCollector,
  field: ConfigField,
  value: number,
  range: IntegerRange
): void {
  if (!isInteger(value)) {
    issues.error(field, `${field} must be an integer (got ${value})`);
    return;
  }
  if (value < range.min || value > range.max) {
    issues.error(field, `${field} must be between ${range.min} and ${range.max} (got ${value})`);
    return;
  }

  const band = range.recommended;
  if (band !== undefined && (value < band.min || value > band.max)) {
    issues.warning(field, `${field} is outside recommended range ${band.min}-${band.max} (got ${value})`);
  }
}

export function checkLogLevel(issues: IssueCollector, field: ConfigField, value: number): void {
  if (!isInteger(value) || value < 0 || value > 3) {
    issues.error(field, `${field} must be a log level between 0 and 3 (got ${value})`);
  }
}
