/**
 * Actuation sequence construction
 * Every loop starts and ends with all four valves closed
 */

import type { ValvePortId, ValveState } from '$types/common';
import { SequenceValidationError } from '$types/errors';
import { TIME_CONSTANTS } from '@utils/constants';
import { isInteger } from '@utils/number';
import type { ActuationStep, LogOnlyStep, SetValveStep, WaitStep } from './types';

function valve(port: ValvePortId, state: ValveState, snapshotBeforeChange: boolean): SetValveStep {
  const verb = state === 'open' ? 'opening' : 'closing';
  return {
    kind: 'set-valve',
    port,
    state,
    message: verb + ' valve ' + port,
    snapshotBeforeChange,
  };
}

function wait(durationSec: number): WaitStep {
  return {
    kind: 'wait',
    durationSec,
    message: 'waiting for ' + durationSec + ' seconds',
    snapshotBeforeChange: false,
  };
}

/**
 * Longest wait step a single timer can hold
 */
export const MAX_STEP_INTERVAL_SEC = Math.floor(TIME_CONSTANTS.MAX_TIMER_DELAY_MS / TIME_CONSTANTS.MS_PER_SECOND);

/**
 * Build the fixed 17-step list for one loop
 *
 * Five steps are flagged to log a snapshot before they act. The list is
 * built fresh for every run and never shared between runs.
 *
 * @param stepIntervalSec - Duration of every wait step
 * @returns 17 steps in execution order
 * @throws {SequenceValidationError} When the interval is not a positive integer or exceeds MAX_STEP_INTERVAL_SEC
 */
export function buildSequence(stepIntervalSec: number): ActuationStep[] {
  if (!isInteger(stepIntervalSec) || stepIntervalSec <= 0) {
    throw new SequenceValidationError(
      'Step interval must be a positive integer number of seconds (got ' + stepIntervalSec + ')'
    );
  }
  if (stepIntervalSec > MAX_STEP_INTERVAL_SEC) {
    throw new SequenceValidationError(
      'Step interval must be at most ' + MAX_STEP_INTERVAL_SEC + ' seconds (got ' + stepIntervalSec + ')'
    );
  }

  return [
    valve(2, 'open', false),
    valve(3, 'open', false),
    valve(4, 'open', false),
    wait(stepIntervalSec),
    valve(2, 'closed', true),
    valve(4, 'closed', false),
    valve(1, 'open', false),
    wait(stepIntervalSec),
    valve(1, 'closed', true),
    wait(stepIntervalSec),
    valve(2, 'open', true),
    wait(stepIntervalSec),
    valve(4, 'open', true),
    wait(stepIntervalSec),
    valve(2, 'closed', true),
    valve(3, 'closed', false),
    valve(4, 'closed', false),
  ];
}

/**
 * Step that opens every loop: logs the state before any valve moves
 */
export function createLoopOpener(): LogOnlyStep {
  return {
    kind: 'log-only',
    message: 'sequence starting ...',
    snapshotBeforeChange: true,
  };
}
