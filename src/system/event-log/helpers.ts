/**
 * Event log helper functions
 */

import type { Reading } from '$types/common';
import { VALVE_PORTS } from '$types/common';
import { formatValveState } from '@hardware/valves';
import type { StatusSnapshot } from '@system/state';

/**
 * Render a reading for the CSV file
 *
 * Numbers use their shortest round-trip form (`String(2.5)` is `2.5`).
 *
 * @param value - Reading
 * @param unavailableMarker - Text for null readings
 * @returns Field text
 */
export function formatField(value: Reading, unavailableMarker: string): string {
  return value === null ? unavailableMarker : String(value);
}

/**
 * Build one data line (without line terminator)
 *
 * Field order: date, sample_name, pressure, ain0, ain1, voltage_diff,
 * valve 1, valve 2, valve 3, valve 4.
 *
 * @param timestamp - Step timestamp
 * @param sampleName - Run sample name
 * @param snapshot - Status at the moment of logging
 * @param unavailableMarker - Text for missing values
 * @returns Ten comma-separated fields
 */
export function formatRecord(
  timestamp: string,
  sampleName: string,
  snapshot: StatusSnapshot,
  unavailableMarker: string
): string {
  const fields = [
    timestamp,
    sampleName,
    formatField(snapshot.pressure, unavailableMarker),
    formatField(snapshot.ain0, unavailableMarker),
    formatField(snapshot.ain1, unavailableMarker),
    formatField(snapshot.voltageDiff, unavailableMarker),
  ];
  for (const port of VALVE_PORTS) {
    const state = snapshot.valves[port];
    fields.push(state === null ? unavailableMarker : formatValveState(state));
  }
  return fields.join(',');
}

/**
 * @param err - Error thrown by a filesystem call
 * @returns True when the error means "no such file"
 */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
