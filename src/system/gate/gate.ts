/**
 * Parameter gate
 * Request/response handshake between the sequence engine and the operator
 */

import type { ParameterKind } from '$types/common';
import { EVENT_NAMES } from '@events';
import type { GateResult, ParameterGate, ParameterGateOptions } from './types';
import { PARAMETER_PROMPTS, normalizeAnswer } from './helpers';

type Settlement =
  | { status: 'answered'; raw: string | number }
  | { status: 'cancelled' | 'timeout' | 'aborted' };

interface PendingRequest {
  kind: ParameterKind;
  settle(settlement: Settlement): void;
}

/**
 * Create a parameter gate
 *
 * At most one request is outstanding. Each request emits a
 * `parameter_request` event and resolves exactly once: with the operator's
 * answer, on cancel, on timeout, or when the caller's signal aborts. The
 * last accepted answer of each kind becomes its next default.
 *
 * @param options - Operator channel, timeout and initial defaults
 * @returns Parameter gate
 *
 * @example
 * ```typescript
 * const gate = createParameterGate({ channel, timeoutMs: 0, defaults });
 * const result = await gate.request('loopCount');
 * if (result.status === 'answered') console.log(result.value); // number
 * ```
 */
export function createParameterGate(options: ParameterGateOptions): ParameterGate {
  const lastAccepted: Record<ParameterKind, string> = { ...options.defaults };
  let current: PendingRequest | null = null;

  function request<K extends ParameterKind>(kind: K, signal?: AbortSignal): Promise<GateResult<K>> {
    if (current !== null) {
      return Promise.reject(new Error('Parameter request already pending: ' + current.kind));
    }
    if (signal?.aborted) {
      return Promise.resolve<GateResult<K>>({ status: 'aborted', kind });
    }

    return new Promise<GateResult<K>>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const onAbort = (): void => {
        settle({ status: 'aborted' });
      };

      function settle(settlement: Settlement): void {
        if (timer !== null) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        current = null;

        if (settlement.status !== 'answered') {
          resolve({ status: settlement.status, kind });
          return;
        }

        const value = normalizeAnswer(kind, settlement.raw);
        if (value === null) {
          resolve({ status: 'cancelled', kind });
          return;
        }
        lastAccepted[kind] = String(value);
        resolve({ status: 'answered', kind, value });
      }

      current = { kind, settle };

      if (options.timeoutMs > 0) {
        timer = setTimeout(() => {
          settle({ status: 'timeout' });
        }, options.timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      options.channel.emit(EVENT_NAMES.PARAMETER_REQUEST, {
        kind,
        prompt: PARAMETER_PROMPTS[kind],
        defaultValue: lastAccepted[kind],
      });
    });
  }

  function pendingFor(kind: ParameterKind): PendingRequest | null {
    return current !== null && current.kind === kind ? current : null;
  }

  return {
    request,

    answer(kind, value) {
      const pending = pendingFor(kind);
      if (pending === null) return false;
      pending.settle({ status: 'answered', raw: value });
      return true;
    },

    cancel(kind) {
      const pending = pendingFor(kind);
      if (pending === null) return false;
      pending.settle({ status: 'cancelled' });
      return true;
    },

    pending() {
      return current !== null ? current.kind : null;
    },
  };
}
