/**
 * Sequence engine helper functions
 * Pure functions for precondition checks and operator messages
 */

import type { ParameterKind, ValvePortId, ValveState, ValveStates } from '$types/common';
import { VALVE_PORTS } from '$types/common';
import { formatValveState, valveLabel } from '@hardware/valves';

/**
 * Log line for a run given up because a parameter is missing
 */
export const MISSING_PARAMETER_MESSAGES: Readonly<Record<ParameterKind, string>> = {
  logPath: 'no output file specified. not starting',
  sampleName: 'no sample name specified. not starting',
  stepInterval: 'no time step interval specified. not starting',
  loopCount: 'no loop count specified. not starting',
};

export const PRECONDITION_MISMATCH_MESSAGE = 'valve states do not match required initial state';
export const FINISHED_MESSAGE = 'finished';
export const STOPPED_MESSAGE = 'stopped';

/**
 * Check live valve states against the required ones
 *
 * An unknown state never matches.
 *
 * @param valves - Live valve states
 * @param required - Required state per port
 * @returns True when every port is in its required state
 */
export function matchesRequiredState(
  valves: ValveStates,
  required: Readonly<Record<ValvePortId, ValveState>>
): boolean {
  return VALVE_PORTS.every((port) => valves[port] === required[port]);
}

/**
 * Build the alert shown when the initial state does not match
 *
 * @example
 * ```
 * Required initial state:
 *
 *   Valve 1 : Closed
 *   Valve 2 : Closed
 *   ...
 * ```
 */
export function formatRequiredStateAlert(required: Readonly<Record<ValvePortId, ValveState>>): string {
  const lines = VALVE_PORTS.map(
    (port) => '  ' + valveLabel(port) + ' : ' + formatValveState(required[port])
  );
  return 'Required initial state:\n\n' + lines.join('\n');
}

export function formatLoopStart(loop: number, loopCount: number): string {
  return 'starting sequence loop ' + loop + ' of ' + loopCount;
}
