/**
 * Logging helper functions
 */

import type { Reading } from '$types/common';
import type { LogLevel, LogLevels, FilterContext } from './types';
import { TIME_CONSTANTS } from '@utils/constants';

/**
 * Format a sensor reading with unit for human-readable output
 * @param value - Reading (null when unavailable)
 * @param unit - Unit suffix, e.g. "V" or "°C"
 * @param decimals - Number of decimal places
 * @returns Formatted reading, or "--" when unavailable
 */
export function fmtReading(value: Reading, unit: string, decimals: number): string {
  if (value === null) return "--";

  return value.toFixed(decimals) + " " + unit;
}

/**
 * Get the level tag for a log level
 * @param level - Log level
 * @param logLevels - Log level constants object
 * @returns Fixed-width tag, e.g. "[WARNING]  "
 */
export function levelTag(level: LogLevel, logLevels: LogLevels): string {
  if (level === logLevels.INFO) return "[INFO]     ";
  if (level === logLevels.WARNING) return "[WARNING]  ";
  if (level === logLevels.CRITICAL) return "[CRITICAL] ";
  return "[DEBUG]    ";
}

/**
 * Format log message with level tag
 *
 * Adds a fixed-width prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "[INFO]     "
 * - WARNING: "[WARNING]  "
 * - CRITICAL: "[CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  return levelTag(level, logLevels) + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Basic level filtering: message level must be >= current level
 * 2. Auto-demotion: INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * TIME_CONSTANTS.SECONDS_PER_HOUR) {
      return false;
    }
  }

  return true;
}
