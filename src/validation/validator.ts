/**
 * Configuration validator
 *
 * Checks the operator-tunable settings before anything touches the device.
 * Critical range violations are errors (initialization stops); values outside
 * the recommended range are warnings.
 */

import type { LabUserConfig } from '$types';
import type { IntegerRange, ValidationResult } from './types';
import { checkIntegerRange, checkLogLevel, createIssueCollector } from './helpers';

const POLL_INTERVAL_RANGE: IntegerRange = { min: 50, max: 60000, recommended: { min: 200, max: 5000 } };

export function validateConfig(config: LabUserConfig): ValidationResult {
  const issues = createIssueCollector();

  // Polling
  checkIntegerRange(issues, 'TEMP_POLL_INTERVAL_MS', config.TEMP_POLL_INTERVAL_MS, POLL_INTERVAL_RANGE);
  checkIntegerRange(issues, 'AIN_POLL_INTERVAL_MS', config.AIN_POLL_INTERVAL_MS, POLL_INTERVAL_RANGE);

  // Parameter gate
  checkIntegerRange(issues, 'PARAMETER_TIMEOUT_SEC', config.PARAMETER_TIMEOUT_SEC, { min: 0, max: 86400 });
  if (config.PARAMETER_TIMEOUT_SEC === 0) {
    issues.warning('PARAMETER_TIMEOUT_SEC', 'PARAMETER_TIMEOUT_SEC is 0: parameter prompts wait indefinitely');
  }

  if (config.DEFAULT_SAMPLE_NAME.indexOf(',') !== -1) {
    issues.error('DEFAULT_SAMPLE_NAME', 'DEFAULT_SAMPLE_NAME must not contain a comma');
  }
  checkIntegerRange(issues, 'DEFAULT_STEP_INTERVAL_SEC', config.DEFAULT_STEP_INTERVAL_SEC, { min: 1, max: 86400 });
  checkIntegerRange(issues, 'DEFAULT_LOOP_COUNT', config.DEFAULT_LOOP_COUNT, { min: 1, max: 10000 });

  // Calibration
  if (config.CALIBRATION_PATH !== null && config.CALIBRATION_PATH.trim() === '') {
    issues.error('CALIBRATION_PATH', 'CALIBRATION_PATH must be null or a non-empty path');
  }

  // Logging
  checkLogLevel(issues, 'CONSOLE_LOG_LEVEL', config.CONSOLE_LOG_LEVEL);
  checkLogLevel(issues, 'GLOBAL_LOG_LEVEL', config.GLOBAL_LOG_LEVEL);
  checkIntegerRange(issues, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, { min: 0, max: 720 });

  if (!config.CONSOLE_ENABLED) {
    issues.warning('CONSOLE_ENABLED', 'Console logging is disabled: application log output goes nowhere');
  }

  return issues.result();
}
