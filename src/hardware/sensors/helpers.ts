/**
 * Sensor helper functions
 */

import type { Reading } from '$types/common';
import { isFiniteNumber } from '@utils/number';
import { APP_CONSTANTS } from '@boot/config';

/**
 * Validate sensor reading
 * @param value - Sensor value to validate
 * @returns True if value is a usable number
 */
export function isValidReading(value: Reading | undefined): value is number {
  return isFiniteNumber(value);
}

/**
 * Convert the device's internal temperature to Celsius
 * @param kelvin - Temperature in Kelvin
 * @returns Temperature in °C
 */
export function kelvinToCelsius(kelvin: number): number {
  return kelvin - APP_CONSTANTS.KELVIN_OFFSET;
}

/**
 * Differential voltage between the two analog inputs (AIN1 − AIN0)
 * @param ain0 - AIN0 reading
 * @param ain1 - AIN1 reading
 * @returns Difference, or null when either input is unavailable
 */
export function computeVoltageDiff(ain0: Reading, ain1: Reading): Reading {
  if (!isValidReading(ain0) || !isValidReading(ain1)) {
    return null;
  }
  return ain1 - ain0;
}
