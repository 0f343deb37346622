import type { Reading, ValvePortId, ValveState, ValveStates } from '$types/common';

/**
 * Consistent copy of the live status
 */
export interface StatusSnapshot {
    // ═══════════════════════════════════════════════════════════════
    // TEMPERATURE TASK
    // ═══════════════════════════════════════════════════════════════
    /** Device temperature in °C */
    temperature: Reading;

    // ═══════════════════════════════════════════════════════════════
    // ANALOG TASK (written together)
    // ═══════════════════════════════════════════════════════════════
    ain0: Reading;
    ain1: Reading;
    /** AIN1 − AIN0 in volts */
    voltageDiff: Reading;
    /** Calibrated pressure for voltageDiff */
    pressure: Reading;

    // ═══════════════════════════════════════════════════════════════
    // VALVES
    // ═══════════════════════════════════════════════════════════════
    valves: ValveStates;

    // ═══════════════════════════════════════════════════════════════
    // RUN
    // ═══════════════════════════════════════════════════════════════
    runFlag: boolean;
}

export interface AnalogStatus {
    ain0: Reading;
    ain1: Reading;
    voltageDiff: Reading;
    pressure: Reading;
}

export interface StatusStore {
    getSnapshot(): StatusSnapshot;
    setTemperature(value: Reading): void;
    /** Replace all four analog fields at once */
    setAnalog(analog: AnalogStatus): void;
    getValveState(port: ValvePortId): ValveState | null;
    setValveState(port: ValvePortId, state: ValveState | null): void;
    setValveStates(states: ValveStates): void;
    /** Mark every valve unknown (device disconnected) */
    clearValveStates(): void;
    setRunFlag(running: boolean): void;
    isRunFlagSet(): boolean;
}
