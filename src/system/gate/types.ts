/**
 * Parameter gate types
 */

import type { ParameterKind } from '$types/common';
import type { OperatorChannel } from '@events';

/**
 * Value type of each run parameter once accepted
 */
export interface ParameterValueMap {
  logPath: string;
  sampleName: string;
  stepInterval: number;
  loopCount: number;
}

/**
 * How a parameter request ended
 * - answered: the operator supplied a valid value
 * - cancelled: the operator cancelled, or answered empty or invalid
 * - timeout: nobody answered within the configured timeout
 * - aborted: the caller's AbortSignal fired (run stopped)
 */
export type GateResult<K extends ParameterKind> =
  | { status: 'answered'; kind: K; value: ParameterValueMap[K] }
  | { status: 'cancelled'; kind: K }
  | { status: 'timeout'; kind: K }
  | { status: 'aborted'; kind: K };

export type GateOutcome = GateResult<ParameterKind>['status'];

export interface ParameterGateOptions {
  channel: OperatorChannel;
  /** Per-request timeout in milliseconds; 0 waits indefinitely */
  timeoutMs: number;
  /** Offered with the first request of each kind */
  defaults: { [K in ParameterKind]: string };
}

export interface ParameterGate {
  /**
   * Ask the operator for one parameter and wait for the outcome
   * @throws {Error} When another request is still pending
   */
  request<K extends ParameterKind>(kind: K, signal?: AbortSignal): Promise<GateResult<K>>;
  /**
   * Supply the value for the pending request
   * @returns false when no request of this kind is pending
   */
  answer(kind: ParameterKind, value: string | number): boolean;
  /**
   * Cancel the pending request
   * @returns false when no request of this kind is pending
   */
  cancel(kind: ParameterKind): boolean;
  /** Kind of the pending request, or null */
  pending(): ParameterKind | null;
}
