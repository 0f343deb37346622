/**
 * Sequence type definitions
 */

import type { ValvePortId, ValveState } from '$types/common';

interface StepBase {
  /** Human-readable line emitted when the step runs */
  message: string;
  /** Log a status snapshot before the step's side effect */
  snapshotBeforeChange: boolean;
}

export interface WaitStep extends StepBase {
  kind: 'wait';
  durationSec: number;
}

export interface SetValveStep extends StepBase {
  kind: 'set-valve';
  port: ValvePortId;
  state: ValveState;
}

export interface LogOnlyStep extends StepBase {
  kind: 'log-only';
}

/**
 * One entry of the actuation sequence
 */
export type ActuationStep = WaitStep | SetValveStep | LogOnlyStep;
