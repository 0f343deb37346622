/**
 * Type definition for valve sequencer configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { DigitalLevel } from './device';
import type { ValvePortId, ValveState } from './common';

/**
 * User-configurable settings
 * Everything an operator might reasonably tune for polling, run defaults and observability
 */
export interface LabUserConfig {
  // ───────── POLLING ─────────
  readonly TEMP_POLL_INTERVAL_MS: number;
  readonly AIN_POLL_INTERVAL_MS: number;

  // ───────── PARAMETER GATE ─────────
  readonly PARAMETER_TIMEOUT_SEC: number;
  readonly DEFAULT_SAMPLE_NAME: string;
  readonly DEFAULT_STEP_INTERVAL_SEC: number;
  readonly DEFAULT_LOOP_COUNT: number;

  // ───────── CALIBRATION ─────────
  readonly CALIBRATION_PATH: string | null;

  // ───────── DEVICE ─────────
  readonly DEVICE_CONNECTED: boolean;

  // ───────── LOGGING ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_COLORS: boolean;
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface LabAppConstants {
  readonly LOG_LEVELS: LogLevels;

  // ───────── HARDWARE ─────────
  readonly VALVE_CHANNELS: Readonly<Record<ValvePortId, number>>;
  readonly CLOSED_LEVEL: DigitalLevel;
  readonly AIN0_CHANNEL: number;
  readonly AIN1_CHANNEL: number;
  readonly KELVIN_OFFSET: number;

  // ───────── SEQUENCE ─────────
  readonly REQUIRED_INITIAL_STATE: Readonly<Record<ValvePortId, ValveState>>;

  // ───────── CALIBRATION ─────────
  readonly DEFAULT_CALIBRATION_FORMULA: string;
  readonly CALIBRATION_FILE_NAME: string;

  // ───────── EVENT LOG ─────────
  readonly EVENT_LOG_HEADER: string;
  readonly UNAVAILABLE_MARKER: string;
}

/**
 * Complete configuration (user + app constants)
 */
export type LabConfig = LabUserConfig & LabAppConstants;
