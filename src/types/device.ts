/**
 * Device interface contract
 *
 * The core never talks to a concrete driver. Anything that can open a
 * connection, drive digital channels and read analog/temperature values
 * can be plugged in (USB driver binding, network bridge, simulator).
 */

/**
 * Digital output level as reported by the device (0 = low, 1 = high)
 */
export type DigitalLevel = 0 | 1;

/**
 * Static information reported by the device after connecting
 */
export interface DeviceInfo {
  name: string;
  serialNumber: number | string;
  firmwareVersion: string;
}

/**
 * Narrow device-interface used by pollers, valves and the sequence engine.
 * Every method may reject when the device is unavailable.
 */
export interface DeviceInterface {
  open(): Promise<void>;
  close(): Promise<void>;
  /** Read the level of a digital channel */
  getPortState(channel: number): Promise<DigitalLevel>;
  /** Drive a digital channel to the given level */
  setPortState(channel: number, level: DigitalLevel): Promise<void>;
  /** Read an analog input channel in volts */
  readAnalog(channel: number): Promise<number>;
  /** Read the internal temperature sensor in Kelvin */
  readTemperature(): Promise<number>;
  getDeviceInfo(): Promise<DeviceInfo>;
}
