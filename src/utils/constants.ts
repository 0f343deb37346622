/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_HOUR: 3600,
  // Longer setTimeout delays fire immediately
  MAX_TIMER_DELAY_MS: 2147483647,
} as const;
