/**
 * Operator channel
 * Typed wrapper around Node's EventEmitter
 */

import { EventEmitter } from 'node:events';
import type { OperatorChannel, OperatorEventName, OperatorEventMap, OperatorListener } from './types';
import { EVENT_NAMES } from './types';

/**
 * Create the operator channel
 *
 * Listeners run synchronously in subscription order. A listener that
 * throws is reported through onListenerError and does not stop the
 * emitter or the remaining listeners.
 *
 * @param onListenerError - Receives errors thrown by listeners
 * @returns Operator channel
 *
 * @example
 * const channel = createOperatorChannel((err) => logger.warning('Operator listener failed: ' + String(err)));
 * const off = channel.subscribe('log_line', (event) => console.log(event.line));
 * off();
 */
export function createOperatorChannel(onListenerError: (err: unknown) => void): OperatorChannel {
  const emitter = new EventEmitter();

  function emit<K extends OperatorEventName>(name: K, event: OperatorEventMap[K]): void {
    emitter.emit(name, event);
  }

  function subscribe<K extends OperatorEventName>(name: K, listener: OperatorListener<K>): () => void {
    const wrapped = (event: OperatorEventMap[K]): void => {
      try {
        listener(event);
      } catch (err) {
        onListenerError(err);
      }
    };
    emitter.on(name, wrapped);
    return () => {
      emitter.off(name, wrapped);
    };
  }

  return {
    emit,
    subscribe,

    logLine(timestamp, message) {
      emit(EVENT_NAMES.LOG_LINE, { line: timestamp + ' : ' + message, timestamp, message });
    },

    alert(message) {
      emit(EVENT_NAMES.ALERT, { message });
    },
  };
}
