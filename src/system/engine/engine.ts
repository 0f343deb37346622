/**
 * Sequence engine
 * Validates preconditions, gathers run parameters and executes the step list
 */

import type { EngineState, ParameterKind } from '$types/common';
import { buildSequence, createLoopOpener } from '@core/sequence';
import type { ActuationStep, SetValveStep } from '@core/sequence';
import { APP_CONSTANTS } from '@boot/config';
import { EVENT_NAMES } from '@events';
import { setValveState } from '@hardware/valves';
import type { EventLog } from '@system/event-log';
import type { ParameterValueMap } from '@system/gate';
import { TIME_CONSTANTS } from '@utils/constants';
import { errorMessage } from '@utils/error';
import { formatTimestamp } from '@utils/time';
import {
  FINISHED_MESSAGE,
  MISSING_PARAMETER_MESSAGES,
  PRECONDITION_MISMATCH_MESSAGE,
  STOPPED_MESSAGE,
  formatLoopStart,
  formatRequiredStateAlert,
  matchesRequiredState,
} from './helpers';
import type {
  SequenceConfig,
  SequenceEngine,
  SequenceEngineDependencies,
  SequenceOutcome,
  TerminalState,
} from './types';

interface RunCounters {
  loopsCompleted: number;
  stepsExecuted: number;
  snapshotsWritten: number;
}

interface RunContext {
  config: SequenceConfig;
  eventLog: EventLog;
  counters: RunCounters;
}

/**
 * Create the sequence engine
 *
 * State machine: idle → checking_preconditions → awaiting_config →
 * running → completed | cancelled | aborted → idle. Every transition is
 * published as a `run_state` event.
 *
 * Cancellation is sampled before each loop and before each step. A wait
 * already in progress always runs to its end.
 *
 * @param deps - Device, store, gate, operator channel, logger and time sources
 * @returns Sequence engine
 *
 * @example
 * ```typescript
 * const engine = createSequenceEngine({ device, store, gate, channel, logger,
 *   openEventLog: (path) => createEventLog(path, store, eventLogOptions),
 *   sleep, clock: () => new Date() });
 * const outcome = await engine.run();
 * ```
 */
export function createSequenceEngine(deps: SequenceEngineDependencies): SequenceEngine {
  const { device, store, gate, channel, logger, openEventLog, sleep, clock } = deps;

  let state: EngineState = 'idle';
  let cancelRequested = false;
  let abortController: AbortController | null = null;
  let lastOutcome: SequenceOutcome | null = null;

  function transition(next: EngineState): void {
    const previous = state;
    state = next;
    logger.debug('Engine ' + previous + ' -> ' + next);
    channel.emit(EVENT_NAMES.RUN_STATE, { state: next, previous });
  }

  function timestamp(): string {
    return formatTimestamp(clock());
  }

  function end(terminal: TerminalState, counters: RunCounters, reason: string | null): SequenceOutcome {
    return { state: terminal, ...counters, reason };
  }

  // ═══════════════════════════════════════════════════════════════
  // PRECONDITIONS
  // ═══════════════════════════════════════════════════════════════

  function checkInitialState(): boolean {
    const required = APP_CONSTANTS.REQUIRED_INITIAL_STATE;
    if (matchesRequiredState(store.getSnapshot().valves, required)) {
      return true;
    }
    channel.alert(formatRequiredStateAlert(required));
    channel.logLine(timestamp(), PRECONDITION_MISMATCH_MESSAGE);
    return false;
  }

  // ═══════════════════════════════════════════════════════════════
  // PARAMETERS
  // ═══════════════════════════════════════════════════════════════

  async function ask<K extends ParameterKind>(
    kind: K,
    signal: AbortSignal
  ): Promise<ParameterValueMap[K] | null> {
    const result = await gate.request(kind, signal);
    if (result.status === 'answered') {
      return result.value;
    }
    logger.info('Parameter ' + kind + ' ' + result.status);
    return null;
  }

  /**
   * Ask for the four run parameters in order
   * @returns Config, or the first parameter that was not supplied
   */
  async function collectConfig(signal: AbortSignal): Promise<SequenceConfig | ParameterKind> {
    const logPath = await ask('logPath', signal);
    if (logPath === null) return 'logPath';
    const sampleName = await ask('sampleName', signal);
    if (sampleName === null) return 'sampleName';
    const stepIntervalSec = await ask('stepInterval', signal);
    if (stepIntervalSec === null) return 'stepInterval';
    const loopCount = await ask('loopCount', signal);
    if (loopCount === null) return 'loopCount';
    return { logPath, sampleName, stepIntervalSec, loopCount };
  }

  // ═══════════════════════════════════════════════════════════════
  // STEPS
  // ═══════════════════════════════════════════════════════════════

  async function writeSnapshot(ctx: RunContext, stamp: string): Promise<void> {
    try {
      await ctx.eventLog.logState(stamp, ctx.config.sampleName);
      ctx.counters.snapshotsWritten++;
    } catch (err) {
      const message = errorMessage(err);
      logger.warning(message);
      channel.alert(message);
      channel.logLine(timestamp(), 'failed to log state: ' + message);
    }
  }

  async function actuate(step: SetValveStep): Promise<void> {
    try {
      await setValveState(device, step.port, step.state);
      store.setValveState(step.port, step.state);
    } catch (err) {
      store.setValveState(step.port, null);
      const message = errorMessage(err);
      logger.warning('Valve ' + step.port + ' not set: ' + message);
      channel.logLine(timestamp(), 'failed ' + step.message + ': ' + message);
    }
  }

  async function executeStep(step: ActuationStep, ctx: RunContext): Promise<void> {
    const stamp = timestamp();
    channel.logLine(stamp, step.message);

    if (step.snapshotBeforeChange) {
      await writeSnapshot(ctx, stamp);
    }

    switch (step.kind) {
      case 'wait':
        await sleep(step.durationSec * TIME_CONSTANTS.MS_PER_SECOND);
        break;
      case 'set-valve':
        await actuate(step);
        break;
      case 'log-only':
        break;
    }
  }

  /**
   * Run every loop
   * @returns True when all loops ran, false when cancelled
   */
  async function executeLoops(ctx: RunContext): Promise<boolean> {
    const { loopCount, stepIntervalSec } = ctx.config;
    const steps = [createLoopOpener(), ...buildSequence(stepIntervalSec)];

    for (let loop = 1; loop <= loopCount; loop++) {
      if (cancelRequested) return false;
      channel.logLine(timestamp(), formatLoopStart(loop, loopCount));

      for (const step of steps) {
        if (cancelRequested) return false;
        await executeStep(step, ctx);
        if (step.kind !== 'log-only') {
          ctx.counters.stepsExecuted++;
        }
      }
      ctx.counters.loopsCompleted++;
    }
    return true;
  }

  // ═══════════════════════════════════════════════════════════════
  // RUN
  // ═══════════════════════════════════════════════════════════════

  async function execute(counters: RunCounters, signal: AbortSignal): Promise<SequenceOutcome> {
    transition('checking_preconditions');
    if (!checkInitialState()) {
      return end('aborted', counters, PRECONDITION_MISMATCH_MESSAGE);
    }

    transition('awaiting_config');
    const config = await collectConfig(signal);
    if (typeof config === 'string') {
      const message = MISSING_PARAMETER_MESSAGES[config];
      channel.logLine(timestamp(), message);
      return end('aborted', counters, message);
    }
    // Valves may have been moved while the operator answered
    if (!checkInitialState()) {
      return end('aborted', counters, PRECONDITION_MISMATCH_MESSAGE);
    }

    transition('running');
    logger.info(
      'Sequence started: ' + config.loopCount + ' loop(s), ' + config.stepIntervalSec + ' s interval, log ' + config.logPath
    );
    const ctx: RunContext = { config, eventLog: openEventLog(config.logPath), counters };

    if (await executeLoops(ctx)) {
      channel.logLine(timestamp(), FINISHED_MESSAGE);
      return end('completed', counters, null);
    }
    channel.logLine(timestamp(), STOPPED_MESSAGE);
    return end('cancelled', counters, STOPPED_MESSAGE);
  }

  async function run(): Promise<SequenceOutcome | null> {
    if (state !== 'idle') {
      logger.warning('Sequence already running, run request ignored');
      return null;
    }

    cancelRequested = false;
    const controller = new AbortController();
    abortController = controller;
    store.setRunFlag(true);

    const counters: RunCounters = { loopsCompleted: 0, stepsExecuted: 0, snapshotsWritten: 0 };
    let outcome: SequenceOutcome;
    try {
      outcome = await execute(counters, controller.signal);
    } catch (err) {
      const message = 'sequence failed: ' + errorMessage(err);
      logger.critical(message);
      channel.logLine(timestamp(), message);
      outcome = end('aborted', counters, message);
    } finally {
      store.setRunFlag(false);
      abortController = null;
    }

    lastOutcome = outcome;
    logger.info(
      'Sequence ' + outcome.state + ': ' + outcome.loopsCompleted + ' loop(s), ' +
      outcome.stepsExecuted + ' step(s), ' + outcome.snapshotsWritten + ' snapshot(s)'
    );
    transition(outcome.state);
    transition('idle');
    return outcome;
  }

  return {
    run,

    stop() {
      if (state === 'idle') return false;
      if (!cancelRequested) {
        logger.info('Sequence stop requested');
      }
      cancelRequested = true;
      abortController?.abort();
      return true;
    },

    checkInitialState,

    getState() {
      return state;
    },

    isRunning() {
      return state !== 'idle';
    },

    getLastOutcome() {
      return lastOutcome;
    },
  };
}
