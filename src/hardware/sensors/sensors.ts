/**
 * Sensor reading functions
 * Reads temperature and analog inputs, degrading to null on failure
 */

import type { DeviceInterface } from '$types/device';
import type { Reading } from '$types/common';
import type { AnalogReadings } from './types';
import { APP_CONSTANTS } from '@boot/config';
import { isValidReading, kelvinToCelsius } from './helpers';

/**
 * Read the device temperature in °C
 * @param device - Device interface
 * @returns Temperature, or null when the read fails or is not a number
 */
export async function readTemperature(device: DeviceInterface): Promise<Reading> {
  try {
    const kelvin = await device.readTemperature();
    return isValidReading(kelvin) ? kelvinToCelsius(kelvin) : null;
  } catch {
    return null;
  }
}

async function readAnalogChannel(device: DeviceInterface, channel: number): Promise<Reading> {
  try {
    const volts = await device.readAnalog(channel);
    return isValidReading(volts) ? volts : null;
  } catch {
    return null;
  }
}

/**
 * Read AIN0 and AIN1
 *
 * Each input degrades independently: a failure on one channel does not
 * discard the other.
 *
 * @param device - Device interface
 * @returns Both readings in volts (null where unavailable)
 */
export async function readAnalogInputs(device: DeviceInterface): Promise<AnalogReadings> {
  const ain0 = await readAnalogChannel(device, APP_CONSTANTS.AIN0_CHANNEL);
  const ain1 = await readAnalogChannel(device, APP_CONSTANTS.AIN1_CHANNEL);
  return { ain0, ain1 };
}
