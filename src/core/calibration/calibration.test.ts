/**
 * Tests for pressure calibration
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createCalibration, loadCalibration } from './calibration';

const DEFAULT_FORMULA = '(5.0221 * v) - 24.036';

describe('Calibration', () => {
  // ═══════════════════════════════════════════════════════════════
  // createCalibration()
  // ═══════════════════════════════════════════════════════════════

  describe('createCalibration', () => {
    it('should use the override formula', () => {
      const calibration = createCalibration({ formula: '(2 * v) + 1', defaultFormula: DEFAULT_FORMULA });

      expect(calibration.pressure(3)).toBe(7);
      expect(calibration.getFormula()).toBe('(2 * v) + 1');
      expect(calibration.isUsingDefault()).toBe(false);
    });

    it('should use the default formula without an override', () => {
      const calibration = createCalibration({ formula: null, defaultFormula: DEFAULT_FORMULA });

      expect(calibration.pressure(0)).toBe(-24.036);
      expect(calibration.isUsingDefault()).toBe(true);
    });

    it('should fall back to the default when the override does not parse', () => {
      const onFallback = vi.fn();
      const calibration = createCalibration({ formula: 'v ** 2', defaultFormula: DEFAULT_FORMULA, onFallback });

      expect(calibration.pressure(0)).toBe(-24.036);
      expect(calibration.getFormula()).toBe(DEFAULT_FORMULA);
      expect(onFallback).toHaveBeenCalledWith('parse-error', 'Unexpected "*" at position 3');
    });

    it('should drop the override for good after a non-finite result', () => {
      const onFallback = vi.fn();
      const calibration = createCalibration({ formula: '1 / v', defaultFormula: DEFAULT_FORMULA, onFallback });

      expect(calibration.pressure(2)).toBe(0.5);
      expect(calibration.pressure(0)).toBe(-24.036);
      expect(calibration.isUsingDefault()).toBe(true);

      // Sticky: v = 2 now goes through the default too
      expect(calibration.pressure(2)).toBeCloseTo(5.0221 * 2 - 24.036, 10);
      expect(onFallback).toHaveBeenCalledTimes(1);
      expect(onFallback).toHaveBeenCalledWith('evaluation', 'formula "1 / v" gave Infinity for v = 0');
    });

    it('should treat NaN like any other non-finite result', () => {
      const calibration = createCalibration({ formula: 'v / v', defaultFormula: DEFAULT_FORMULA });

      expect(calibration.pressure(0)).toBe(-24.036);
      expect(calibration.isUsingDefault()).toBe(true);
    });

    it('should never throw from pressure()', () => {
      const calibration = createCalibration({ formula: '0 / 0', defaultFormula: DEFAULT_FORMULA });

      expect(() => calibration.pressure(1)).not.toThrow();
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // loadCalibration()
  // ═══════════════════════════════════════════════════════════════

  describe('loadCalibration', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'calibration-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load the formula from the file', async () => {
      const file = join(dir, 'calibration.txt');
      await writeFile(file, '# bench unit\np = (2 * v) + 1\n');

      const calibration = await loadCalibration(file, DEFAULT_FORMULA);

      expect(calibration.pressure(3)).toBe(7);
    });

    it('should use the default when the file is missing', async () => {
      const onFallback = vi.fn();

      const calibration = await loadCalibration(join(dir, 'missing.txt'), DEFAULT_FORMULA, onFallback);

      expect(calibration.isUsingDefault()).toBe(true);
      expect(onFallback).toHaveBeenCalledTimes(1);
      expect(onFallback.mock.calls[0][0]).toBe('missing-file');
    });

    it('should use the default when no formula line exists', async () => {
      const file = join(dir, 'calibration.txt');
      await writeFile(file, 'offset = 3\n');
      const onFallback = vi.fn();

      const calibration = await loadCalibration(file, DEFAULT_FORMULA, onFallback);

      expect(calibration.isUsingDefault()).toBe(true);
      expect(onFallback).toHaveBeenCalledWith('no-formula', 'no "p = <expression>" line in ' + file);
    });

    it('should use the default when the formula does not parse', async () => {
      const file = join(dir, 'calibration.txt');
      await writeFile(file, 'p = require("fs")\n');

      const calibration = await loadCalibration(file, DEFAULT_FORMULA);

      expect(calibration.isUsingDefault()).toBe(true);
      expect(calibration.pressure(0)).toBe(-24.036);
    });
  });
});
