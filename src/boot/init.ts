/**
 * Application initialization
 */

import { join } from 'node:path';

import type { LabConfig } from '$types/config';
import { loadCalibration } from '@core/calibration';
import { createOperatorChannel } from '@events';
import { createSerializedDevice, createSimulatedDevice } from '@hardware/device';
import { createConsoleSink, createLogger } from '@logging';
import type { SinkWithLevel } from '@logging';
import { createOperatorControls } from '@system/control';
import { createSequenceEngine } from '@system/engine';
import { createEventLog } from '@system/event-log';
import { createParameterGate } from '@system/gate';
import { createDevicePoller } from '@system/poller';
import { createStatusStore } from '@system/state';
import { TIME_CONSTANTS } from '@utils/constants';
import { errorMessage } from '@utils/error';
import { now, sleep } from '@utils/time';
import { validateConfig } from '@validation';

import type { Application, InitOptions } from './types';

/**
 * Calibration file location: CALIBRATION_PATH, or calibration.txt in baseDir
 */
export function resolveCalibrationPath(config: LabConfig, baseDir: string): string {
  return config.CALIBRATION_PATH ?? join(baseDir, config.CALIBRATION_FILE_NAME);
}

/**
 * Validate the configuration and wire every component
 *
 * Nothing is started: the caller connects the device and starts the
 * pollers.
 *
 * @param config - Configuration, usually loadConfig(process.env)
 * @param options - Base directory, console and optional device / time sources
 * @returns Application, or null when the configuration is invalid
 */
export async function initialize(config: LabConfig, options: InitOptions): Promise<Application | null> {
  const consoleApi = options.consoleApi;

  const validation = validateConfig(config);
  if (!validation.valid) {
    consoleApi.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(err) {
      consoleApi.error('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }
  validation.warnings.forEach(function(warn) {
    consoleApi.warn('  [' + warn.field + ']: ' + warn.message);
  });

  // Logging
  const sinks: SinkWithLevel[] = [];
  if (config.CONSOLE_ENABLED) {
    sinks.push({
      sink: createConsoleSink(consoleApi, { colors: config.CONSOLE_COLORS }, config.LOG_LEVELS),
      minLevel: config.CONSOLE_LOG_LEVEL,
    });
  }
  const logger = createLogger(
    { level: config.GLOBAL_LOG_LEVEL, demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS },
    { timeSource: now, sinks: sinks },
    config.LOG_LEVELS
  );

  logger.info('Valve sequencer starting');

  // Calibration
  const calibrationPath = resolveCalibrationPath(config, options.baseDir);
  const calibration = await loadCalibration(
    calibrationPath,
    config.DEFAULT_CALIBRATION_FORMULA,
    function(reason, detail) {
      logger.warning('Calibration fallback (' + reason + '): ' + detail);
    }
  );
  logger.info('Pressure formula: p = ' + calibration.getFormula());

  // Device and shared state
  const device = createSerializedDevice(
    options.device ?? createSimulatedDevice({ connected: config.DEVICE_CONNECTED })
  );
  const store = createStatusStore();
  const channel = createOperatorChannel(function(err) {
    logger.warning('Operator listener failed: ' + errorMessage(err));
  });

  const gate = createParameterGate({
    channel,
    timeoutMs: config.PARAMETER_TIMEOUT_SEC * TIME_CONSTANTS.MS_PER_SECOND,
    defaults: {
      logPath: '',
      sampleName: config.DEFAULT_SAMPLE_NAME,
      stepInterval: String(config.DEFAULT_STEP_INTERVAL_SEC),
      loopCount: String(config.DEFAULT_LOOP_COUNT),
    },
  });

  const eventLogOptions = { header: config.EVENT_LOG_HEADER, unavailableMarker: config.UNAVAILABLE_MARKER };
  const engine = createSequenceEngine({
    device,
    store,
    gate,
    channel,
    logger,
    openEventLog: (filePath) => createEventLog(filePath, store, eventLogOptions),
    sleep: options.sleep ?? sleep,
    clock: options.clock ?? (() => new Date()),
  });

  const poller = createDevicePoller(
    { device, store, calibration, logger },
    { temperatureIntervalMs: config.TEMP_POLL_INTERVAL_MS, analogIntervalMs: config.AIN_POLL_INTERVAL_MS }
  );

  const controls = createOperatorControls({ device, store, engine, gate, poller, channel, logger });

  return { config, logger, device, calibration, store, channel, gate, engine, poller, controls };
}
