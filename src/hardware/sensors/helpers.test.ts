/**
 * Tests for sensor helper functions
 */

import { isValidReading, kelvinToCelsius, computeVoltageDiff } from './helpers';

describe('Sensor Helpers', () => {
  describe('isValidReading', () => {
    it('should accept finite numbers including zero and negatives', () => {
      expect(isValidReading(0)).toBe(true);
      expect(isValidReading(-0.75)).toBe(true);
    });

    it('should reject null, undefined, NaN and Infinity', () => {
      expect(isValidReading(null)).toBe(false);
      expect(isValidReading(undefined)).toBe(false);
      expect(isValidReading(NaN)).toBe(false);
      expect(isValidReading(Infinity)).toBe(false);
    });
  });

  describe('kelvinToCelsius', () => {
    it('should subtract 273.15', () => {
      expect(kelvinToCelsius(273.15)).toBe(0);
      expect(kelvinToCelsius(300)).toBeCloseTo(26.85, 10);
    });
  });

  describe('computeVoltageDiff', () => {
    it('should return AIN1 minus AIN0', () => {
      expect(computeVoltageDiff(1, 3.5)).toBe(2.5);
      expect(computeVoltageDiff(4, 1)).toBe(-3);
    });

    it('should be null when either input is unavailable', () => {
      expect(computeVoltageDiff(null, 1)).toBeNull();
      expect(computeVoltageDiff(1, null)).toBeNull();
      expect(computeVoltageDiff(null, null)).toBeNull();
    });
  });
});
