/**
 * Device layer types
 */

import type { DeviceInfo } from '$types/device';

/** Source of uniformly distributed numbers in [0, 1) */
export type RandomSource = () => number;

export interface SimulatedDeviceOptions {
  /** When false, open() fails as if no device were plugged in */
  connected: boolean;
  /** Injected for deterministic tests; defaults to Math.random */
  random?: RandomSource;
  /** Reported by getDeviceInfo() */
  info?: DeviceInfo;
}
