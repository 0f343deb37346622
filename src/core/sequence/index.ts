export { buildSequence, createLoopOpener, MAX_STEP_INTERVAL_SEC } from './sequence';
export type { ActuationStep, WaitStep, SetValveStep, LogOnlyStep } from './types';
