export { createDevicePoller, pollTemperature, pollAnalogInputs } from './poller';
export { createPeriodicTask } from './periodic';
export type {
  DevicePoller,
  DevicePollerConfig,
  DevicePollerDependencies,
  PeriodicTask,
  PeriodicTaskOptions,
} from './types';
