/**
 * Operator control type definitions
 */

import type { ParameterKind, ValvePortId } from '$types/common';
import type { DeviceInterface } from '$types/device';
import type { OperatorChannel } from '@events';
import type { Logger } from '@logging';
import type { SequenceEngine, SequenceOutcome } from '@system/engine';
import type { ParameterGate } from '@system/gate';
import type { DevicePoller } from '@system/poller';
import type { StatusStore } from '@system/state';

export interface OperatorControlsDependencies {
  /** Serialized device shared with the engine and pollers */
  device: DeviceInterface;
  store: StatusStore;
  engine: SequenceEngine;
  gate: ParameterGate;
  poller: DevicePoller;
  channel: OperatorChannel;
  logger: Logger;
}

/**
 * Commands available to the operator-facing front end
 */
export interface OperatorControls {
  /**
   * Open the device, publish its identity and read the valve states
   * @returns false when the device could not be reached
   */
  connect(): Promise<boolean>;
  /** Stop any run, close the device and forget the valve states */
  disconnect(): Promise<void>;
  isConnected(): boolean;
  /**
   * Stop the running sequence, or start one
   * @returns The run when starting, null when stopping or while a valve toggle is in flight
   */
  toggleRun(): Promise<SequenceOutcome | null> | null;
  /**
   * Flip one valve by hand
   * @returns false when refused or when the device failed
   */
  toggleValve(port: ValvePortId): Promise<boolean>;
  answerParameter(kind: ParameterKind, value: string | number): boolean;
  cancelParameter(kind: ParameterKind): boolean;
  /** Stop the engine and pollers and close the device */
  shutdown(): Promise<void>;
}
