/**
 * Valve helper functions
 * Port ⇄ channel and level ⇄ state mapping
 */

import type { DigitalLevel } from '$types/device';
import type { ValvePortId, ValveState } from '$types/common';
import { APP_CONSTANTS } from '@boot/config';

/**
 * Digital channel wired to a valve port (1-4 ⇒ 4-7)
 * @param port - Valve port
 * @returns Digital channel number
 */
export function portToChannel(port: ValvePortId): number {
  return APP_CONSTANTS.VALVE_CHANNELS[port];
}

/**
 * @param level - Level read from the device
 * @returns Valve state; high is closed
 */
export function levelToState(level: DigitalLevel): ValveState {
  return level === APP_CONSTANTS.CLOSED_LEVEL ? 'closed' : 'open';
}

/**
 * @param state - Desired valve state
 * @returns Level to drive onto the channel
 */
export function stateToLevel(state: ValveState): DigitalLevel {
  if (state === 'closed') return APP_CONSTANTS.CLOSED_LEVEL;
  return APP_CONSTANTS.CLOSED_LEVEL === 1 ? 0 : 1;
}

export function toggledState(state: ValveState): ValveState {
  return state === 'open' ? 'closed' : 'open';
}

/**
 * Human-readable valve state, as written to the event log
 * @param state - Known state, or null when unknown
 * @returns "Open", "Closed" or the unavailable marker
 */
export function formatValveState(state: ValveState | null): string {
  if (state === null) return APP_CONSTANTS.UNAVAILABLE_MARKER;
  return state === 'open' ? 'Open' : 'Closed';
}

export function valveLabel(port: ValvePortId): string {
  return 'Valve ' + port;
}
