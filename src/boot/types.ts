/**
 * Boot type definitions
 */

import type { ValvePortId } from '$types/common';
import type { LabConfig } from '$types/config';
import type { DeviceInterface } from '$types/device';
import type { Calibration } from '@core/calibration';
import type { OperatorChannel } from '@events';
import type { ConsoleAPI, Logger } from '@logging';
import type { OperatorControls } from '@system/control';
import type { SequenceEngine } from '@system/engine';
import type { ParameterGate } from '@system/gate';
import type { DevicePoller } from '@system/poller';
import type { StatusStore } from '@system/state';

export interface InitOptions {
  /** Directory holding the default calibration file */
  baseDir: string;
  /** Raw device driver; a simulated device when omitted */
  device?: DeviceInterface;
  consoleApi: ConsoleAPI;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

/**
 * Everything wired together by initialize()
 */
export interface Application {
  config: LabConfig;
  logger: Logger;
  /** Serialized device shared by every component */
  device: DeviceInterface;
  calibration: Calibration;
  store: StatusStore;
  channel: OperatorChannel;
  gate: ParameterGate;
  engine: SequenceEngine;
  poller: DevicePoller;
  controls: OperatorControls;
}

/**
 * Line typed at the terminal front end
 */
export type TerminalCommand =
  | { kind: 'run' }
  | { kind: 'stop' }
  | { kind: 'valve'; port: ValvePortId }
  | { kind: 'connect' }
  | { kind: 'disconnect' }
  | { kind: 'status' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'unknown'; text: string };
