/**
 * Sensor types
 */

import type { Reading } from '$types/common';

export interface AnalogReadings {
  ain0: Reading;
  ain1: Reading;
}

/** Analog inputs plus the values derived from them */
export interface AnalogSample extends AnalogReadings {
  voltageDiff: Reading;
  pressure: Reading;
}
