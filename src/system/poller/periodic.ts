/**
 * Self-rescheduling periodic task
 */

import { errorMessage } from '@utils/error';
import type { PeriodicTask, PeriodicTaskOptions } from './types';

/**
 * Create a periodic task
 *
 * The next tick is scheduled only after the current one has finished, so
 * ticks never overlap. A tick that throws is logged and the task keeps
 * going.
 *
 * @param options - Name, interval, tick function and logger
 * @returns Stoppable task
 */
export function createPeriodicTask(options: PeriodicTaskOptions): PeriodicTask {
  const { name, intervalMs, tick, logger } = options;

  let running = false;
  let generation = 0;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: Promise<void> | null = null;

  async function runTick(): Promise<void> {
    try {
      await tick();
    } catch (err) {
      logger.warning(name + ' tick failed: ' + errorMessage(err));
    }
  }

  // A chain only reschedules while its generation is current
  function fire(gen: number): void {
    timer = null;
    const current = runTick();
    inFlight = current;
    void current.then(() => {
      if (inFlight === current) {
        inFlight = null;
      }
      if (running && gen === generation) {
        timer = setTimeout(() => fire(gen), intervalMs);
      }
    });
  }

  return {
    start() {
      if (running) {
        logger.debug(name + ' already running');
        return;
      }
      running = true;
      generation++;
      const gen = generation;
      logger.debug(name + ' started (every ' + intervalMs + ' ms)');

      if (inFlight === null) {
        fire(gen);
        return;
      }
      // Restarted while a stopped chain is still ticking
      void inFlight.then(() => {
        if (running && gen === generation) {
          fire(gen);
        }
      });
    },

    async stop() {
      if (!running) return;
      running = false;
      if (timer !== null) {
        clearTimeout(timer);
        timer = null;
      }
      if (inFlight !== null) {
        await inFlight;
      }
      logger.debug(name + ' stopped');
    },

    isRunning() {
      return running;
    },
  };
}
