/**
 * Unit tests for validation helper functions
 */

import { checkIntegerRange, checkLogLevel, createIssueCollector } from './helpers';
import type { IntegerRange, IssueCollector } from './types';

const POLL_RANGE: IntegerRange = { min: 50, max: 60000, recommended: { min: 200, max: 5000 } };

describe('Validation Helpers', () => {
  let issues: IssueCollector;

  beforeEach(() => {
    issues = createIssueCollector();
  });

  // ═══════════════════════════════════════════════════════════════
  // createIssueCollector()
  // ═══════════════════════════════════════════════════════════════

  describe('createIssueCollector', () => {
    it('should be valid while only warnings were added', () => {
      issues.warning('PARAMETER_TIMEOUT_SEC', 'Waits forever');

      expect(issues.result()).toEqual({
        valid: true,
        errors: [],
        warnings: [{ field: 'PARAMETER_TIMEOUT_SEC', message: 'Waits forever' }],
      });
    });

    it('should keep errors in the order they were found', () => {
      issues.error('TEMP_POLL_INTERVAL_MS', 'Error 1');
      issues.error('AIN_POLL_INTERVAL_MS', 'Error 2');

      const result = issues.result();
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.field)).toEqual(['TEMP_POLL_INTERVAL_MS', 'AIN_POLL_INTERVAL_MS']);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // checkIntegerRange()
  // ═══════════════════════════════════════════════════════════════

  describe('checkIntegerRange', () => {
    it('should accept both hard limits', () => {
      checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', 50, { min: 50, max: 60000 });
      checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', 60000, { min: 50, max: 60000 });

      expect(issues.result()).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should error below the hard minimum', () => {
      checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', 49, POLL_RANGE);

      expect(issues.result().errors).toEqual([
        { field: 'TEMP_POLL_INTERVAL_MS', message: 'TEMP_POLL_INTERVAL_MS must be between 50 and 60000 (got 49)' },
      ]);
    });

    it('should not warn when the hard limits already failed', () => {
      checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', 70000, POLL_RANGE);

      const result = issues.result();
      expect(result.errors).toHaveLength(1);
      expect(result.warnings).toHaveLength(0);
    });

    it('should warn outside the recommended band', () => {
      checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', 100, POLL_RANGE);

      expect(issues.result()).toEqual({
        valid: true,
        errors: [],
        warnings: [
          { field: 'TEMP_POLL_INTERVAL_MS', message: 'TEMP_POLL_INTERVAL_MS is outside recommended range 200-5000 (got 100)' },
        ],
      });
    });

    it('should reject fractional values before checking the range', () => {
      checkIntegerRange(issues, 'DEFAULT_LOOP_COUNT', 2.5, { min: 1, max: 10000 });

      expect(issues.result().errors).toEqual([
        { field: 'DEFAULT_LOOP_COUNT', message: 'DEFAULT_LOOP_COUNT must be an integer (got 2.5)' },
      ]);
    });

    it('should reject a value that did not parse', () => {
      checkIntegerRange(issues, 'AIN_POLL_INTERVAL_MS', NaN, POLL_RANGE);

      expect(issues.result().errors[0].message).toBe('AIN_POLL_INTERVAL_MS must be an integer (got NaN)');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // checkLogLevel()
  // ═══════════════════════════════════════════════════════════════

  describe('checkLogLevel', () => {
    it('should accept levels 0 through 3', () => {
      for (const level of [0, 1, 2, 3]) {
        checkLogLevel(issues, 'GLOBAL_LOG_LEVEL', level);
      }

      expect(issues.result().valid).toBe(true);
    });

    it('should reject out-of-range levels', () => {
      checkLogLevel(issues, 'GLOBAL_LOG_LEVEL', 4);

      expect(issues.result().errors[0].message).toBe('GLOBAL_LOG_LEVEL must be a log level between 0 and 3 (got 4)');
    });
  });
});
