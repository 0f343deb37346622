/**
 * Operator control helper functions
 */

import type { DeviceInfo } from '$types/device';

/**
 * One-line description of a connected device
 * @example formatDeviceInfo(info); // "U3-HV (serial 320048582, firmware 1.46)"
 */
export function formatDeviceInfo(info: DeviceInfo): string {
  return info.name + ' (serial ' + info.serialNumber + ', firmware ' + info.firmwareVersion + ')';
}
