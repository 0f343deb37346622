export { createStatusStore } from './state';
export type { StatusStore, StatusSnapshot, AnalogStatus } from './types';
