/**
 * Parameter gate helper functions
 */

import type { ParameterKind } from '$types/common';
import { MAX_STEP_INTERVAL_SEC } from '@core/sequence';
import { parsePositiveInteger } from '@utils/number';
import type { ParameterValueMap } from './types';

export const PARAMETER_PROMPTS: Readonly<Record<ParameterKind, string>> = {
  logPath: 'Select Output File',
  sampleName: 'Sample name:',
  stepInterval: 'Sequence time step interval (seconds):',
  loopCount: 'Sequence loop count:',
};

function normalizeText(raw: string): string | null {
  const value = raw.trim();
  return value === '' ? null : value;
}

function normalizeSampleName(raw: string): string | null {
  const value = normalizeText(raw);
  // The name is written unquoted into a CSV field
  return value !== null && value.indexOf(',') === -1 ? value : null;
}

function normalizeStepInterval(raw: string): number | null {
  const value = parsePositiveInteger(raw);
  return value !== null && value <= MAX_STEP_INTERVAL_SEC ? value : null;
}

/**
 * Validation for each parameter kind; null means the answer is unusable
 */
export const PARAMETER_NORMALIZERS: { readonly [K in ParameterKind]: (raw: string) => ParameterValueMap[K] | null } = {
  logPath: normalizeText,
  sampleName: normalizeSampleName,
  stepInterval: normalizeStepInterval,
  loopCount: parsePositiveInteger,
};

/**
 * Normalise an operator answer
 *
 * Strings are trimmed; intervals and loop counts must be positive
 * integers (numeric strings accepted). Intervals are capped at
 * MAX_STEP_INTERVAL_SEC.
 *
 * @param kind - Parameter kind
 * @param raw - Answer as typed or picked
 * @returns Normalised value, or null for an empty or invalid answer
 *
 * @example
 * normalizeAnswer('stepInterval', ' 180 '); // 180
 * normalizeAnswer('loopCount', '0');       // null
 */
export function normalizeAnswer<K extends ParameterKind>(kind: K, raw: string | number): ParameterValueMap[K] | null {
  const normalize = PARAMETER_NORMALIZERS[kind];
  return normalize(typeof raw === 'number' ? String(raw) : raw);
}
