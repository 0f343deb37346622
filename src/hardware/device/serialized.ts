/**
 * Serializing device wrapper
 * Queues every device call behind the previous one so the engine, manual
 * toggles and both pollers never interleave at the driver boundary
 */

import type { DeviceInterface } from '$types/device';
import { DeviceUnavailableError } from '$types/errors';

/**
 * Wrap a device so that at most one call is in flight at any time
 *
 * Calls run in the order they were issued. A failing call rejects with
 * DeviceUnavailableError (naming the operation) and does not block the queue.
 *
 * @param device - Raw device driver
 * @returns Device with the same contract whose calls are serialized
 *
 * @example
 * const device = createSerializedDevice(createSimulatedDevice({ connected: true }));
 * await device.open();
 */
export function createSerializedDevice(device: DeviceInterface): DeviceInterface {
  let tail: Promise<unknown> = Promise.resolve();

  function enqueue<T>(operation: string, call: () => Promise<T>): Promise<T> {
    const result = tail.then(call).catch((err: unknown) => {
      if (err instanceof DeviceUnavailableError) throw err;
      throw new DeviceUnavailableError(operation, err);
    });
    // Keep the chain alive after a rejection; the caller still sees it
    tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  return {
    open: () => enqueue('open', () => device.open()),
    close: () => enqueue('close', () => device.close()),
    getPortState: (channel) => enqueue('getPortState', () => device.getPortState(channel)),
    setPortState: (channel, level) => enqueue('setPortState', () => device.setPortState(channel, level)),
    readAnalog: (channel) => enqueue('readAnalog', () => device.readAnalog(channel)),
    readTemperature: () => enqueue('readTemperature', () => device.readTemperature()),
    getDeviceInfo: () => enqueue('getDeviceInfo', () => device.getDeviceInfo()),
  };
}
