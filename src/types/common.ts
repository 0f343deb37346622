/**
 * Common type definitions used throughout the project
 */

/**
 * Sensor reading - null is the "unavailable" marker used when a device read fails
 */
export type Reading = number | null;

/**
 * Valve port identifier (front panel numbering)
 */
export type ValvePortId = 1 | 2 | 3 | 4;

/**
 * Binary valve state
 */
export type ValveState = 'open' | 'closed';

/**
 * Valve state per port - null when the state is unknown (device offline or read failed)
 */
export type ValveStates = Record<ValvePortId, ValveState | null>;

/**
 * All valve ports in front panel order
 */
export const VALVE_PORTS: readonly ValvePortId[] = [1, 2, 3, 4];

/**
 * Run parameter requested from the operator before a run, in request order
 */
export type ParameterKind = 'logPath' | 'sampleName' | 'stepInterval' | 'loopCount';

/**
 * Sequence engine state
 */
export type EngineState =
  | 'idle'
  | 'checking_preconditions'
  | 'awaiting_config'
  | 'running'
  | 'completed'
  | 'cancelled'
  | 'aborted';
