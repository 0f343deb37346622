/**
 * Operator controls
 * Command surface used by the operator-facing front end
 */

import type { ValvePortId } from '$types/common';
import { EVENT_NAMES } from '@events';
import { readAllValves, readValveState, setValveState, toggledState, valveLabel } from '@hardware/valves';
import { errorMessage } from '@utils/error';
import { formatDeviceInfo } from './helpers';
import type { OperatorControls, OperatorControlsDependencies } from './types';

export const CONNECT_FAILED_ALERT = 'Failed to connect to device';

/**
 * Create the operator controls
 *
 * @param deps - Shared device, store, engine, gate, poller, channel and logger
 * @returns Operator controls
 *
 * @example
 * ```typescript
 * const controls = createOperatorControls({ device, store, engine, gate, poller, channel, logger });
 * if (await controls.connect()) {
 *   void controls.toggleRun();
 * }
 * ```
 */
export function createOperatorControls(deps: OperatorControlsDependencies): OperatorControls {
  const { device, store, engine, gate, poller, channel, logger } = deps;

  let connected = false;
  let togglesInFlight = 0;

  async function closeDevice(): Promise<void> {
    try {
      await device.close();
    } catch (err) {
      logger.warning('Device close failed: ' + errorMessage(err));
    }
  }

  async function connect(): Promise<boolean> {
    if (connected) return true;

    try {
      await device.open();
      const info = await device.getDeviceInfo();
      connected = true;
      logger.info('Connected to ' + formatDeviceInfo(info));
      channel.emit(EVENT_NAMES.DEVICE_INFO, { info });
      store.setValveStates(await readAllValves(device));
      return true;
    } catch (err) {
      logger.warning('Device connection failed: ' + errorMessage(err));
      await closeDevice();
      channel.alert(CONNECT_FAILED_ALERT);
      return false;
    }
  }

  async function disconnect(): Promise<void> {
    engine.stop();
    if (!connected) return;

    connected = false;
    await closeDevice();
    store.clearValveStates();
    channel.emit(EVENT_NAMES.DEVICE_INFO, { info: null });
    logger.info('Disconnected');
  }

  async function toggleValve(port: ValvePortId): Promise<boolean> {
    if (engine.isRunning()) {
      logger.warning(valveLabel(port) + ' not toggled: a sequence is running');
      return false;
    }
    if (!connected) {
      logger.warning(valveLabel(port) + ' not toggled: device not connected');
      return false;
    }

    togglesInFlight++;
    try {
      return await flipValve(port);
    } finally {
      togglesInFlight--;
    }
  }

  async function flipValve(port: ValvePortId): Promise<boolean> {
    const current = await readValveState(device, port);
    if (current === null) {
      store.setValveState(port, null);
      logger.warning(valveLabel(port) + ' not toggled: state could not be read');
      return false;
    }
    if (engine.isRunning()) {
      logger.warning(valveLabel(port) + ' not toggled: a sequence is running');
      return false;
    }

    try {
      await setValveState(device, port, toggledState(current));
    } catch (err) {
      logger.warning(valveLabel(port) + ' not toggled: ' + errorMessage(err));
      store.setValveState(port, null);
      return false;
    }
    store.setValveState(port, await readValveState(device, port));
    return true;
  }

  return {
    connect,
    disconnect,

    isConnected() {
      return connected;
    },

    toggleRun() {
      if (engine.isRunning()) {
        engine.stop();
        return null;
      }
      if (togglesInFlight > 0) {
        logger.warning('Sequence not started: a valve toggle is in progress');
        return null;
      }
      return engine.run();
    },

    toggleValve,

    answerParameter(kind, value) {
      return gate.answer(kind, value);
    },

    cancelParameter(kind) {
      return gate.cancel(kind);
    },

    async shutdown() {
      logger.info('Shutting down');
      engine.stop();
      await poller.stop();
      if (connected) {
        connected = false;
        await closeDevice();
      }
    },
  };
}
