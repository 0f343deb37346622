export { createSerializedDevice } from './serialized';
export { createSimulatedDevice } from './simulated';
export type { RandomSource, SimulatedDeviceOptions } from './types';
