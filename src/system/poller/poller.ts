/**
 * Device poller
 * Two independent periodic reads that keep the status store fresh
 */

import type { DeviceInterface } from '$types/device';
import type { Calibration } from '@core/calibration';
import type { StatusStore } from '@system/state';
import { readAnalogInputs, readTemperature, computeVoltageDiff } from '@hardware/sensors';
import { createPeriodicTask } from './periodic';
import type { DevicePoller, DevicePollerConfig, DevicePollerDependencies } from './types';

/**
 * Read the temperature once and publish it
 *
 * Only the temperature field is touched; a failed read publishes null.
 */
export async function pollTemperature(device: DeviceInterface, store: StatusStore): Promise<void> {
  store.setTemperature(await readTemperature(device));
}

/**
 * Read both analog inputs once and publish the analog group
 *
 * Pressure is derived from the voltage differential whenever the
 * differential is available, including a differential of exactly 0 V.
 */
export async function pollAnalogInputs(
  device: DeviceInterface,
  store: StatusStore,
  calibration: Calibration
): Promise<void> {
  const { ain0, ain1 } = await readAnalogInputs(device);
  const voltageDiff = computeVoltageDiff(ain0, ain1);
  const pressure = voltageDiff === null ? null : calibration.pressure(voltageDiff);
  store.setAnalog({ ain0, ain1, voltageDiff, pressure });
}

/**
 * Create the device poller
 *
 * @param deps - Device, status store, calibration and logger
 * @param config - Cadence of each task
 * @returns Poller controlling both tasks
 *
 * @example
 * ```typescript
 * const poller = createDevicePoller(
 *   { device, store, calibration, logger },
 *   { temperatureIntervalMs: 500, analogIntervalMs: 500 }
 * );
 * poller.start();
 * // ...
 * await poller.stop();
 * ```
 */
export function createDevicePoller(deps: DevicePollerDependencies, config: DevicePollerConfig): DevicePoller {
  const { device, store, calibration, logger } = deps;

  const temperatureTask = createPeriodicTask({
    name: 'temperature poller',
    intervalMs: config.temperatureIntervalMs,
    tick: () => pollTemperature(device, store),
    logger,
  });

  const analogTask = createPeriodicTask({
    name: 'analog poller',
    intervalMs: config.analogIntervalMs,
    tick: () => pollAnalogInputs(device, store, calibration),
    logger,
  });

  return {
    start() {
      temperatureTask.start();
      analogTask.start();
    },

    async stop() {
      await Promise.all([temperatureTask.stop(), analogTask.stop()]);
    },

    isRunning() {
      return temperatureTask.isRunning() || analogTask.isRunning();
    },
  };
}
