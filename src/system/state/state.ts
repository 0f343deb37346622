/**
 * Status store
 * Single shared record of live readings, valve states and the run flag
 */

import type { ValveStates } from '$types/common';
import type { StatusSnapshot, StatusStore } from './types';

export * from './types';

function unknownValves(): ValveStates {
  return { 1: null, 2: null, 3: null, 4: null };
}

/**
 * Create the status store
 *
 * Created once at startup. The pollers write the temperature and analog
 * groups, the engine and manual toggles write valve states, the engine
 * owns the run flag.
 *
 * Every method runs to completion on the event loop, so a group write is
 * never observed half-done and getSnapshot() always returns a consistent
 * copy that later writes cannot change.
 *
 * @returns Store with every reading unavailable, every valve unknown and the run flag clear
 *
 * @example
 * ```typescript
 * const store = createStatusStore();
 * store.setAnalog({ ain0: 1.2, ain1: 3.4, voltageDiff: 2.2, pressure: -12.99 });
 * store.getSnapshot().pressure; // -12.99
 * ```
 */
export function createStatusStore(): StatusStore {
  const status: StatusSnapshot = {
    temperature: null,
    ain0: null,
    ain1: null,
    voltageDiff: null,
    pressure: null,
    valves: unknownValves(),
    runFlag: false,
  };

  return {
    getSnapshot() {
      return { ...status, valves: { ...status.valves } };
    },

    setTemperature(value) {
      status.temperature = value;
    },

    setAnalog(analog) {
      status.ain0 = analog.ain0;
      status.ain1 = analog.ain1;
      status.voltageDiff = analog.voltageDiff;
      status.pressure = analog.pressure;
    },

    getValveState(port) {
      return status.valves[port];
    },

    setValveState(port, state) {
      status.valves[port] = state;
    },

    setValveStates(states) {
      status.valves = { ...states };
    },

    clearValveStates() {
      status.valves = unknownValves();
    },

    setRunFlag(running) {
      status.runFlag = running;
    },

    isRunFlagSet() {
      return status.runFlag;
    },
  };
}
