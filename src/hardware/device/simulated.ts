/**
 * Simulated device
 * In-memory stand-in for the data-acquisition unit, used for bench
 * development without hardware and throughout the tests
 */

import type { DeviceInfo, DeviceInterface, DigitalLevel } from '$types/device';
import type { SimulatedDeviceOptions } from './types';

const DEFAULT_INFO: DeviceInfo = {
  name: 'U3-HV',
  serialNumber: 320048582,
  firmwareVersion: '1.46',
};

const DIGITAL_CHANNEL_COUNT = 8;

/**
 * Create a simulated device
 *
 * - Analog inputs read uniformly between 0 and 5 V
 * - Temperature reads uniformly between 295 and 305 K
 * - Every digital channel starts high (valves closed)
 * - Channel I/O fails until open() has succeeded
 *
 * @param options - Connection flag, random source and reported info
 * @returns Device implementing the full interface
 */
export function createSimulatedDevice(options: SimulatedDeviceOptions): DeviceInterface {
  const random = options.random ?? Math.random;
  const info = options.info ?? DEFAULT_INFO;
  const levels: DigitalLevel[] = [];
  for (let i = 0; i < DIGITAL_CHANNEL_COUNT; i++) {
    levels.push(1);
  }
  let isOpen = false;

  function assertOpen(): void {
    if (!isOpen) {
      throw new Error('Simulated device is not open');
    }
  }

  function assertChannel(channel: number): void {
    if (!Number.isInteger(channel) || channel < 0 || channel >= DIGITAL_CHANNEL_COUNT) {
      throw new Error('Invalid digital channel ' + channel);
    }
  }

  return {
    async open() {
      if (!options.connected) {
        throw new Error('No device found');
      }
      isOpen = true;
    },

    async close() {
      isOpen = false;
    },

    async getPortState(channel) {
      assertOpen();
      assertChannel(channel);
      return levels[channel];
    },

    async setPortState(channel, level) {
      assertOpen();
      assertChannel(channel);
      levels[channel] = level;
    },

    async readAnalog() {
      assertOpen();
      return random() * 5.0;
    },

    async readTemperature() {
      assertOpen();
      return 295.0 + random() * 10.0;
    },

    async getDeviceInfo() {
      assertOpen();
      return { ...info };
    },
  };
}
