/**
 * Pressure calibration
 * Converts the AIN1 − AIN0 voltage differential into pressure
 */

import { readFile } from 'node:fs/promises';
import { isFiniteNumber } from '@utils/number';
import { errorMessage } from '@utils/error';
import { CalibrationParseError } from '$types/errors';
import type { Calibration, CalibrationOptions, CompiledFormula, FallbackReason } from './types';
import { compileFormula } from './parser';
import { extractFormula } from './helpers';

/**
 * Create a calibration from an optional override formula
 *
 * The default formula is used when there is no override or the override
 * does not parse. The first time the override produces a non-finite
 * result (e.g. division by zero) it is dropped for good and the default
 * result is returned instead.
 *
 * @param options - Override, default and fallback notification
 * @returns Calibration
 * @throws {CalibrationParseError} When the default formula itself does not parse
 *
 * @example
 * const calibration = createCalibration({ formula: '(2 * v) + 1', defaultFormula: '(5.0221 * v) - 24.036' });
 * calibration.pressure(3); // 7
 */
export function createCalibration(options: CalibrationOptions): Calibration {
  const fallbackFormula = compileFormula(options.defaultFormula);
  let override: CompiledFormula | null = null;

  function fallBack(reason: FallbackReason, detail: string): void {
    override = null;
    if (options.onFallback) {
      options.onFallback(reason, detail);
    }
  }

  if (options.formula !== null) {
    try {
      override = compileFormula(options.formula);
    } catch (err) {
      if (!(err instanceof CalibrationParseError)) throw err;
      fallBack('parse-error', err.message);
    }
  }

  return {
    pressure(v) {
      if (override !== null) {
        const result = override.evaluate(v);
        if (isFiniteNumber(result)) {
          return result;
        }
        fallBack('evaluation', 'formula "' + override.source + '" gave ' + result + ' for v = ' + v);
      }
      return fallbackFormula.evaluate(v);
    },

    getFormula() {
      return override !== null ? override.source : fallbackFormula.source;
    },

    isUsingDefault() {
      return override === null;
    },
  };
}

/**
 * Read the calibration file once and build the calibration
 *
 * A missing or unreadable file, or one without a `p = ...` line, yields
 * the default formula.
 *
 * @param filePath - Calibration file location
 * @param defaultFormula - Built-in formula
 * @param onFallback - Notified whenever the default takes over
 * @returns Calibration
 */
export async function loadCalibration(
  filePath: string,
  defaultFormula: string,
  onFallback?: (reason: FallbackReason, detail: string) => void
): Promise<Calibration> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (onFallback) {
      onFallback('missing-file', errorMessage(err));
    }
    return createCalibration({ formula: null, defaultFormula, onFallback });
  }

  const formula = extractFormula(text);
  if (formula === null && onFallback) {
    onFallback('no-formula', 'no "p = <expression>" line in ' + filePath);
  }
  return createCalibration({ formula, defaultFormula, onFallback });
}
