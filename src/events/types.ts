/**
 * Operator channel event types
 *
 * Everything the operator-facing front end needs to render: run log
 * lines, alerts, parameter prompts, engine state and device identity.
 */

import type { DeviceInfo } from '$types/device';
import type { EngineState, ParameterKind } from '$types/common';

/**
 * One line of the run log, as shown to the operator
 */
export interface LogLineEvent {
  /** `YYYY-MM-DD HH:MM:SS : <message>` */
  line: string;
  timestamp: string;
  message: string;
}

/**
 * Something the operator must acknowledge
 */
export interface AlertEvent {
  message: string;
}

/**
 * The engine is waiting for a run parameter
 */
export interface ParameterRequestEvent {
  kind: ParameterKind;
  prompt: string;
  /** Last accepted answer for this kind, or the configured default */
  defaultValue: string;
}

export interface RunStateEvent {
  state: EngineState;
  previous: EngineState;
}

/**
 * Device identity after connecting; null after disconnecting
 */
export interface DeviceInfoEvent {
  info: DeviceInfo | null;
}

export interface OperatorEventMap {
  log_line: LogLineEvent;
  alert: AlertEvent;
  parameter_request: ParameterRequestEvent;
  run_state: RunStateEvent;
  device_info: DeviceInfoEvent;
}

export type OperatorEventName = keyof OperatorEventMap;

export type OperatorListener<K extends OperatorEventName> = (event: OperatorEventMap[K]) => void;

export interface OperatorChannel {
  emit<K extends OperatorEventName>(name: K, event: OperatorEventMap[K]): void;
  /**
   * Listen for one event kind
   * @returns Function that removes the listener
   */
  subscribe<K extends OperatorEventName>(name: K, listener: OperatorListener<K>): () => void;
  /** Build and emit a `log_line` event */
  logLine(timestamp: string, message: string): void;
  alert(message: string): void;
}

/**
 * Event names on the operator channel
 */
export const EVENT_NAMES = {
  LOG_LINE: 'log_line',
  ALERT: 'alert',
  PARAMETER_REQUEST: 'parameter_request',
  RUN_STATE: 'run_state',
  DEVICE_INFO: 'device_info',
} as const satisfies Record<string, OperatorEventName>;
