/**
 * Sequence engine types
 */

import type { EngineState } from '$types/common';
import type { DeviceInterface } from '$types/device';
import type { OperatorChannel } from '@events';
import type { Logger } from '@logging';
import type { EventLog } from '@system/event-log';
import type { ParameterGate } from '@system/gate';
import type { StatusStore } from '@system/state';

/**
 * Run parameters collected through the gate, fixed for the whole run
 */
export interface SequenceConfig {
  readonly logPath: string;
  readonly sampleName: string;
  readonly stepIntervalSec: number;
  readonly loopCount: number;
}

export type TerminalState = Extract<EngineState, 'completed' | 'cancelled' | 'aborted'>;

/**
 * How the last run ended
 */
export interface SequenceOutcome {
  state: TerminalState;
  /** Loops that ran every step */
  loopsCompleted: number;
  /** Executed entries of the fixed step list (loop openers not counted) */
  stepsExecuted: number;
  /** Records successfully appended to the event log */
  snapshotsWritten: number;
  /** Closing log message for cancelled and aborted runs */
  reason: string | null;
}

export interface SequenceEngineDependencies {
  /** Serialized device */
  device: DeviceInterface;
  store: StatusStore;
  gate: ParameterGate;
  channel: OperatorChannel;
  logger: Logger;
  /** Opens the event log chosen for a run */
  openEventLog: (filePath: string) => EventLog;
  sleep: (ms: number) => Promise<void>;
  /** Wall clock for step timestamps */
  clock: () => Date;
}

export interface SequenceEngine {
  /**
   * Run one full sequence
   * @returns Outcome, or null when a run is already in progress
   */
  run(): Promise<SequenceOutcome | null>;
  /**
   * Request cancellation; the step in flight finishes first
   * @returns false when nothing is running
   */
  stop(): boolean;
  /**
   * Compare live valve states with the required initial state, alerting on mismatch
   */
  checkInitialState(): boolean;
  getState(): EngineState;
  isRunning(): boolean;
  getLastOutcome(): SequenceOutcome | null;
}
