import type { LogLevel } from '@logging';
import type { LabUserConfig, LabAppConstants, LabConfig } from '$types';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything an operator might reasonably tune for polling,
//   run defaults, calibration and observability.
//   Each value can be overridden from the environment (.env).
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<LabUserConfig> = {
  // TEMP_POLL_INTERVAL_MS
  //   Role: Cadence of the temperature polling task.
  //   Critical: 50–60000 ms (error outside this range).
  //   Recommended: 500 ms; the internal sensor changes slowly.
  TEMP_POLL_INTERVAL_MS: 500,

  // AIN_POLL_INTERVAL_MS
  //   Role: Cadence of the analog-input polling task (AIN0, AIN1, pressure).
  //   Critical: 50–60000 ms (error outside this range).
  //   Recommended: 500 ms; fast enough for the live pressure readout.
  AIN_POLL_INTERVAL_MS: 500,

  // PARAMETER_TIMEOUT_SEC
  //   Role: How long a run waits for each operator-supplied parameter.
  //   Critical: 0–86400 s; 0 waits indefinitely.
  //   Recommended: 300 s so an abandoned prompt does not hold the engine forever.
  PARAMETER_TIMEOUT_SEC: 300,

  // DEFAULT_SAMPLE_NAME
  //   Role: Pre-filled sample name offered with the first sample-name prompt.
  //   Critical: Must not contain a comma (it is written into a CSV field).
  //   Recommended: Placeholder that is obviously not a real sample.
  DEFAULT_SAMPLE_NAME: 'sample_name',

  // DEFAULT_STEP_INTERVAL_SEC
  //   Role: Pre-filled step interval offered with the first interval prompt.
  //   Critical: Integer ≥ 1.
  //   Recommended: 180 s.
  DEFAULT_STEP_INTERVAL_SEC: 180,

  // DEFAULT_LOOP_COUNT
  //   Role: Pre-filled loop count offered with the first loop-count prompt.
  //   Critical: Integer ≥ 1.
  //   Recommended: 6.
  DEFAULT_LOOP_COUNT: 6,

  // CALIBRATION_PATH
  //   Role: Location of the pressure calibration file ("p = <expression>").
  //   Critical: null means "calibration.txt beside the entry script".
  //   Recommended: Leave null unless the file lives elsewhere.
  CALIBRATION_PATH: null,

  // DEVICE_CONNECTED
  //   Role: Whether the bundled simulated device accepts connections.
  //   Critical: Boolean only; only affects the simulator.
  //   Recommended: true; set false to exercise connection-failure handling.
  DEVICE_CONNECTED: true,

  // CONSOLE_ENABLED
  //   Role: Master switch for console logging.
  //   Critical: Boolean only.
  //   Recommended: true.
  CONSOLE_ENABLED: true,

  // CONSOLE_LOG_LEVEL
  //   Role: Minimum log severity sent to the console (0=DEBUG..3=CRITICAL).
  //   Critical: Must be one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO).
  CONSOLE_LOG_LEVEL: 1,

  // CONSOLE_COLORS
  //   Role: Colour level tags on the console.
  //   Critical: Boolean only.
  //   Recommended: true on a terminal, false when output is captured to a file.
  CONSOLE_COLORS: true,

  // GLOBAL_LOG_LEVEL
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Critical: Must match one of the LOG_LEVELS values.
  //   Recommended: 1 (INFO) for normal operation, 0 (DEBUG) while commissioning.
  GLOBAL_LOG_LEVEL: 1,

  // GLOBAL_LOG_AUTO_DEMOTE_HOURS
  //   Role: Hours of uptime after which INFO logs are suppressed (0 disables).
  //   Critical: 0–720 h.
  //   Recommended: 0 for bench use; 24 for unattended long runs.
  GLOBAL_LOG_AUTO_DEMOTE_HOURS: 0,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal constants that should rarely change,
//   unless porting to different hardware.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<LabAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  //   Recommended: DEBUG=0, INFO=1, WARNING=2, CRITICAL=3.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // ═══════════════════════════════════════════════════════════════
  // HARDWARE CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // VALVE_CHANNELS
  //   Role: Digital channel driving each valve port.
  //   Critical: Must match the wiring; channels 4–7 are the flexible I/O lines in use.
  //   Recommended: Do not change unless the valves are rewired.
  VALVE_CHANNELS: {
    1: 4,
    2: 5,
    3: 6,
    4: 7,
  },

  // CLOSED_LEVEL
  //   Role: Digital level that corresponds to a closed valve.
  //   Critical: The valves are normally-closed with an inverted driver: high = closed.
  //   Recommended: Do not change.
  CLOSED_LEVEL: 1,

  // AIN0_CHANNEL / AIN1_CHANNEL
  //   Role: Analog inputs whose difference feeds the pressure calibration.
  //   Critical: voltageDiff = AIN1 − AIN0.
  //   Recommended: Do not change.
  AIN0_CHANNEL: 0,
  AIN1_CHANNEL: 1,

  // KELVIN_OFFSET
  //   Role: Conversion from the device's Kelvin temperature to °C.
  KELVIN_OFFSET: 273.15,

  // ═══════════════════════════════════════════════════════════════
  // SEQUENCE CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // REQUIRED_INITIAL_STATE
  //   Role: Valve configuration that must hold before a run may start.
  //   Critical: All valves closed.
  REQUIRED_INITIAL_STATE: {
    1: 'closed',
    2: 'closed',
    3: 'closed',
    4: 'closed',
  },

  // ═══════════════════════════════════════════════════════════════
  // CALIBRATION CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // DEFAULT_CALIBRATION_FORMULA
  //   Role: Pressure (psig) from voltage differential v when no valid override exists.
  //   Critical: Must parse with the calibration expression grammar.
  DEFAULT_CALIBRATION_FORMULA: '(5.0221 * v) - 24.036',

  // CALIBRATION_FILE_NAME
  //   Role: File name looked up beside the entry script when CALIBRATION_PATH is null.
  CALIBRATION_FILE_NAME: 'calibration.txt',

  // ═══════════════════════════════════════════════════════════════
  // EVENT LOG CONSTANTS
  // ═══════════════════════════════════════════════════════════════

  // EVENT_LOG_HEADER
  //   Role: First line of every new CSV event log.
  //   Critical: Kept byte-identical to logs written by the previous tool, including the
  //   missing separator between voltage_diff and valve_state_1, so appends stay consistent.
  EVENT_LOG_HEADER: 'date,sample_name,pressure,voltage_0,voltage_1,voltage_diffvalve_state_1,valve_state_2,valve_state_3,valve_state_4',

  // UNAVAILABLE_MARKER
  //   Role: Text written in place of an unavailable reading or unknown valve state.
  UNAVAILABLE_MARKER: 'None',
};

// ─────────────────────────────────────────────────────────────
// ENVIRONMENT OVERRIDES
// ─────────────────────────────────────────────────────────────

const LOG_LEVEL_NAMES: Readonly<Record<string, LogLevel>> = {
  debug: 0,
  info: 1,
  warning: 2,
  warn: 2,
  critical: 3,
};

function intFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  // NaN is left for validateConfig to report
  return Number(value.trim());
}

function boolFromEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return fallback;
}

function levelFromEnv(value: string | undefined, fallback: LogLevel): LogLevel {
  if (value === undefined) return fallback;
  const level = LOG_LEVEL_NAMES[value.trim().toLowerCase()];
  return level === undefined ? fallback : level;
}

/**
 * Build the effective configuration from defaults and environment variables
 *
 * Recognised variables: TEMP_POLL_INTERVAL_MS, AIN_POLL_INTERVAL_MS,
 * PARAMETER_TIMEOUT_SEC, DEFAULT_SAMPLE_NAME, DEFAULT_STEP_INTERVAL_SEC,
 * DEFAULT_LOOP_COUNT, CALIBRATION_PATH, DEVICE_CONNECTED, CONSOLE_COLORS
 * and LOG_LEVEL (debug | info | warning | critical).
 *
 * @param env - Environment (usually process.env after dotenv has run)
 * @returns Complete configuration; values are not validated here
 */
export function loadConfig(env: NodeJS.ProcessEnv): LabConfig {
  const logLevel = levelFromEnv(env.LOG_LEVEL, USER_CONFIG.GLOBAL_LOG_LEVEL);
  const calibrationPath = env.CALIBRATION_PATH !== undefined && env.CALIBRATION_PATH.trim() !== ''
    ? env.CALIBRATION_PATH.trim()
    : USER_CONFIG.CALIBRATION_PATH;

  const user: LabUserConfig = {
    ...USER_CONFIG,
    TEMP_POLL_INTERVAL_MS: intFromEnv(env.TEMP_POLL_INTERVAL_MS, USER_CONFIG.TEMP_POLL_INTERVAL_MS),
    AIN_POLL_INTERVAL_MS: intFromEnv(env.AIN_POLL_INTERVAL_MS, USER_CONFIG.AIN_POLL_INTERVAL_MS),
    PARAMETER_TIMEOUT_SEC: intFromEnv(env.PARAMETER_TIMEOUT_SEC, USER_CONFIG.PARAMETER_TIMEOUT_SEC),
    DEFAULT_SAMPLE_NAME: env.DEFAULT_SAMPLE_NAME ?? USER_CONFIG.DEFAULT_SAMPLE_NAME,
    DEFAULT_STEP_INTERVAL_SEC: intFromEnv(env.DEFAULT_STEP_INTERVAL_SEC, USER_CONFIG.DEFAULT_STEP_INTERVAL_SEC),
    DEFAULT_LOOP_COUNT: intFromEnv(env.DEFAULT_LOOP_COUNT, USER_CONFIG.DEFAULT_LOOP_COUNT),
    CALIBRATION_PATH: calibrationPath,
    DEVICE_CONNECTED: boolFromEnv(env.DEVICE_CONNECTED, USER_CONFIG.DEVICE_CONNECTED),
    CONSOLE_COLORS: boolFromEnv(env.CONSOLE_COLORS, USER_CONFIG.CONSOLE_COLORS),
    CONSOLE_LOG_LEVEL: logLevel,
    GLOBAL_LOG_LEVEL: logLevel,
  };

  return { ...APP_CONSTANTS, ...user };
}

// ─────────────────────────────────────────────────────────────
// COMBINED CONFIG (DEFAULT EXPORT)
//   Defaults only; the entry point uses loadConfig(process.env)
// ─────────────────────────────────────────────────────────────

const CONFIG: LabConfig = { ...APP_CONSTANTS, ...USER_CONFIG };

export default CONFIG;
