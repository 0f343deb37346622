/**
 * Tests for the operator controls
 */

import type { DeviceInterface } from '$types/device';
import { createOperatorChannel } from '@events';
import type { DeviceInfoEvent, OperatorChannel } from '@events';
import { createSerializedDevice, createSimulatedDevice } from '@hardware/device';
import type { Logger, LogLevel } from '@logging';
import { createSequenceEngine } from '@system/engine';
import type { SequenceEngine } from '@system/engine';
import type { EventLog } from '@system/event-log';
import { createParameterGate } from '@system/gate';
import type { ParameterGate } from '@system/gate';
import type { DevicePoller } from '@system/poller';
import { createStatusStore } from '@system/state';
import type { StatusStore } from '@system/state';
import { createOperatorControls } from './control';
import type { OperatorControls } from './types';

function createMockLogger(): Logger {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn((): LogLevel => 1),
  };
}

describe('createOperatorControls', () => {
  let device: DeviceInterface;
  let store: StatusStore;
  let channel: OperatorChannel;
  let gate: ParameterGate;
  let engine: SequenceEngine;
  let poller: DevicePoller;
  let logger: Logger;
  let alerts: string[];
  let deviceEvents: DeviceInfoEvent[];

  function buildControls(connected = true): OperatorControls {
    device = createSerializedDevice(createSimulatedDevice({ connected, random: () => 0.5 }));
    const eventLog: EventLog = {
      logState: vi.fn(() => Promise.resolve()),
      getFilePath: () => '/data/run.csv',
    };
    gate = createParameterGate({
      channel,
      timeoutMs: 0,
      defaults: { logPath: '', sampleName: 'sample_name', stepInterval: '180', loopCount: '6' },
    });
    engine = createSequenceEngine({
      device,
      store,
      gate,
      channel,
      logger,
      openEventLog: () => eventLog,
      sleep: () => Promise.resolve(),
      clock: () => new Date(2024, 2, 1, 10, 0, 0),
    });
    return createOperatorControls({ device, store, engine, gate, poller, channel, logger });
  }

  beforeEach(() => {
    store = createStatusStore();
    channel = createOperatorChannel(vi.fn());
    logger = createMockLogger();
    poller = {
      start: vi.fn(),
      stop: vi.fn(() => Promise.resolve()),
      isRunning: vi.fn(() => true),
    };

    alerts = [];
    deviceEvents = [];
    channel.subscribe('alert', (event) => {
      alerts.push(event.message);
    });
    channel.subscribe('device_info', (event) => {
      deviceEvents.push(event);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // CONNECT / DISCONNECT
  // ═══════════════════════════════════════════════════════════════

  describe('connect', () => {
    it('should publish device info and read the valve states', async () => {
      const controls = buildControls();

      await expect(controls.connect()).resolves.toBe(true);

      expect(controls.isConnected()).toBe(true);
      expect(deviceEvents).toEqual([
        { info: { name: 'U3-HV', serialNumber: 320048582, firmwareVersion: '1.46' } },
      ]);
      expect(store.getSnapshot().valves).toEqual({ 1: 'closed', 2: 'closed', 3: 'closed', 4: 'closed' });
      expect(logger.info).toHaveBeenCalledWith('Connected to U3-HV (serial 320048582, firmware 1.46)');
    });

    it('should alert and return false when no device is found', async () => {
      const controls = buildControls(false);

      await expect(controls.connect()).resolves.toBe(false);

      expect(controls.isConnected()).toBe(false);
      expect(alerts).toEqual(['Failed to connect to device']);
      expect(deviceEvents).toEqual([]);
      expect(logger.warning).toHaveBeenCalledWith(
        'Device connection failed: Device unavailable during open: No device found'
      );
    });

    it('should not reconnect when already connected', async () => {
      const controls = buildControls();
      await controls.connect();

      await expect(controls.connect()).resolves.toBe(true);

      expect(deviceEvents).toHaveLength(1);
    });
  });

  describe('disconnect', () => {
    it('should close the device and forget the valve states', async () => {
      const controls = buildControls();
      await controls.connect();

      await controls.disconnect();

      expect(controls.isConnected()).toBe(false);
      expect(store.getSnapshot().valves).toEqual({ 1: null, 2: null, 3: null, 4: null });
      expect(deviceEvents[1]).toEqual({ info: null });
      await expect(device.getPortState(4)).rejects.toThrow('Device unavailable during getPortState');
    });

    it('should stop a running sequence', async () => {
      const controls = buildControls();
      await controls.connect();
      const running = controls.toggleRun();

      await controls.disconnect();

      await expect(running).resolves.toMatchObject({
        state: 'aborted',
        reason: 'no output file specified. not starting',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // RUN / PARAMETERS
  // ═══════════════════════════════════════════════════════════════

  describe('toggleRun', () => {
    it('should start a run and stop it on the next toggle', async () => {
      const controls = buildControls();
      await controls.connect();

      const running = controls.toggleRun();
      expect(running).not.toBeNull();
      expect(engine.isRunning()).toBe(true);

      expect(controls.toggleRun()).toBeNull();
      await expect(running).resolves.toMatchObject({ state: 'aborted' });
      expect(engine.isRunning()).toBe(false);
    });

    it('should complete a run answered through the controls', async () => {
      const controls = buildControls();
      await controls.connect();
      const answers = { logPath: '/data/run.csv', sampleName: 'quartz', stepInterval: '5', loopCount: '1' };
      channel.subscribe('parameter_request', (event) => {
        controls.answerParameter(event.kind, answers[event.kind]);
      });

      const outcome = await controls.toggleRun();

      expect(outcome).toEqual({
        state: 'completed',
        loopsCompleted: 1,
        stepsExecuted: 17,
        snapshotsWritten: 6,
        reason: null,
      });
    });
  });

  describe('answerParameter / cancelParameter', () => {
    it('should forward answers and cancellations to the gate', async () => {
      const controls = buildControls();
      await controls.connect();
      const running = controls.toggleRun();

      expect(controls.answerParameter('sampleName', 'x')).toBe(false);
      expect(controls.answerParameter('logPath', '/data/run.csv')).toBe(true);
      await vi.waitFor(() => {
        expect(gate.pending()).toBe('sampleName');
      });
      expect(controls.cancelParameter('sampleName')).toBe(true);

      await expect(running).resolves.toMatchObject({ reason: 'no sample name specified. not starting' });
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // MANUAL VALVES
  // ═══════════════════════════════════════════════════════════════

  describe('toggleValve', () => {
    it('should flip the valve and store the state read back', async () => {
      const controls = buildControls();
      await controls.connect();

      await expect(controls.toggleValve(2)).resolves.toBe(true);
      expect(store.getValveState(2)).toBe('open');
      await expect(device.getPortState(5)).resolves.toBe(0);

      await expect(controls.toggleValve(2)).resolves.toBe(true);
      expect(store.getValveState(2)).toBe('closed');
    });

    it('should refuse while disconnected', async () => {
      const controls = buildControls();

      await expect(controls.toggleValve(1)).resolves.toBe(false);
      expect(logger.warning).toHaveBeenCalledWith('Valve 1 not toggled: device not connected');
    });

    it('should refuse while a sequence is running', async () => {
      const controls = buildControls();
      await controls.connect();
      const running = controls.toggleRun();

      await expect(controls.toggleValve(1)).resolves.toBe(false);
      expect(logger.warning).toHaveBeenCalledWith('Valve 1 not toggled: a sequence is running');
      expect(store.getValveState(1)).toBe('closed');

      controls.toggleRun();
      await running;
    });

    it('should not start a run while a toggle is in flight', async () => {
      const controls = buildControls();
      await controls.connect();

      const toggling = controls.toggleValve(1);
      expect(controls.toggleRun()).toBeNull();
      expect(engine.isRunning()).toBe(false);
      expect(logger.warning).toHaveBeenCalledWith('Sequence not started: a valve toggle is in progress');

      await expect(toggling).resolves.toBe(true);
      expect(store.getValveState(1)).toBe('open');
    });

    it('should not write when a run starts during the read', async () => {
      const controls = buildControls();
      await controls.connect();

      const toggling = controls.toggleValve(1);
      const running = engine.run();

      await expect(toggling).resolves.toBe(false);
      expect(logger.warning).toHaveBeenCalledWith('Valve 1 not toggled: a sequence is running');
      await expect(device.getPortState(4)).resolves.toBe(1);
      expect(store.getValveState(1)).toBe('closed');

      engine.stop();
      await running;
    });

    it('should mark the valve unknown when the write fails', async () => {
      const controls = buildControls();
      await controls.connect();
      device.setPortState = () => Promise.reject(new Error('line driver fault'));

      await expect(controls.toggleValve(3)).resolves.toBe(false);
      expect(store.getValveState(3)).toBeNull();
      expect(logger.warning).toHaveBeenCalledWith(
        'Valve 3 not toggled: Device unavailable during setPortState: line driver fault'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // SHUTDOWN
  // ═══════════════════════════════════════════════════════════════

  describe('shutdown', () => {
    it('should stop the pollers and close the device', async () => {
      const controls = buildControls();
      await controls.connect();

      await controls.shutdown();

      expect(poller.stop).toHaveBeenCalledTimes(1);
      expect(controls.isConnected()).toBe(false);
      await expect(device.readTemperature()).rejects.toThrow('Device unavailable during readTemperature');
    });
  });
});
