/**
 * Device poller types
 */

import type { DeviceInterface } from '$types/device';
import type { Logger } from '@logging';
import type { Calibration } from '@core/calibration';
import type { StatusStore } from '@system/state';

export interface PeriodicTaskOptions {
  /** Used in log messages */
  name: string;
  /** Delay between the end of one tick and the start of the next */
  intervalMs: number;
  tick: () => Promise<void>;
  logger: Logger;
}

export interface PeriodicTask {
  /** Run the first tick now and keep rescheduling until stopped */
  start(): void;
  /** Cancel the next tick and wait for the one in flight */
  stop(): Promise<void>;
  isRunning(): boolean;
}

export interface DevicePollerDependencies {
  device: DeviceInterface;
  store: StatusStore;
  calibration: Calibration;
  logger: Logger;
}

export interface DevicePollerConfig {
  temperatureIntervalMs: number;
  analogIntervalMs: number;
}

export interface DevicePoller {
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
}
