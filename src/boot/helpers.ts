/**
 * Terminal front end helpers
 */

import type { ParameterKind } from '$types/common';
import { VALVE_PORTS } from '$types/common';
import type { ParameterRequestEvent } from '@events';
import { formatValveState, valveLabel } from '@hardware/valves';
import { fmtReading } from '@logging';
import type { StatusSnapshot } from '@system/state';
import type { TerminalCommand } from './types';

export const HELP_TEXT = [
  'Commands:',
  '  run          start a sequence (or stop the running one)',
  '  stop         stop the running sequence',
  '  valve <1-4>  toggle one valve by hand',
  '  connect      connect to the device',
  '  disconnect   disconnect from the device',
  '  status       show the latest readings',
  '  quit         stop everything and exit',
].join('\n');

/**
 * Parse one line typed at the terminal
 * @param line - Raw input
 * @returns Command; unrecognised input is returned as `unknown`
 */
export function parseCommand(line: string): TerminalCommand {
  const words = line.trim().toLowerCase().split(/\s+/);
  switch (words[0]) {
    case 'run':
      return { kind: 'run' };
    case 'stop':
      return { kind: 'stop' };
    case 'connect':
      return { kind: 'connect' };
    case 'disconnect':
      return { kind: 'disconnect' };
    case 'status':
      return { kind: 'status' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    case 'valve': {
      const port = VALVE_PORTS.find((candidate) => String(candidate) === words[1]);
      if (port !== undefined && words.length === 2) {
        return { kind: 'valve', port };
      }
      break;
    }
  }
  return { kind: 'unknown', text: line.trim() };
}

/**
 * Answer typed at a parameter prompt
 *
 * A blank line accepts the offered default; a single "." cancels.
 *
 * @returns Answer to forward, or null to cancel
 */
export function resolvePromptInput(input: string, defaultValue: string): string | null {
  const trimmed = input.trim();
  if (trimmed === '.') return null;
  return trimmed === '' ? defaultValue : trimmed;
}

/**
 * Prompt the next typed line answers, if the gate still waits for it
 *
 * A prompt goes stale when its request times out or the run is stopped
 * before the operator types anything.
 *
 * @param prompt - Last prompt shown
 * @param pending - Kind the gate is waiting for
 * @returns The prompt, or null when the line is a command
 */
export function activePrompt(
  prompt: ParameterRequestEvent | null,
  pending: ParameterKind | null
): ParameterRequestEvent | null {
  return prompt !== null && prompt.kind === pending ? prompt : null;
}

/**
 * Multi-line status display
 *
 * @example
 * Temperature  : 26.85 °C
 * Voltage 0    : 2.50000 V
 * ...
 */
export function formatStatus(snapshot: StatusSnapshot, marker: string): string {
  const lines = [
    'Temperature  : ' + fmtReading(snapshot.temperature, '°C', 2),
    'Voltage 0    : ' + fmtReading(snapshot.ain0, 'V', 5),
    'Voltage 1    : ' + fmtReading(snapshot.ain1, 'V', 5),
    'Voltage Diff : ' + fmtReading(snapshot.voltageDiff, 'V', 5),
    'Pressure     : ' + fmtReading(snapshot.pressure, 'psig', 2),
  ];
  for (const port of VALVE_PORTS) {
    const state = snapshot.valves[port];
    lines.push(valveLabel(port) + '      : ' + (state === null ? marker : formatValveState(state)));
  }
  lines.push('Running      : ' + (snapshot.runFlag ? 'yes' : 'no'));
  return lines.join('\n');
}
