/**
 * Tests for calibration helper functions
 */

import { extractFormula } from './helpers';

describe('extractFormula', () => {
  it('should read a single formula line', () => {
    expect(extractFormula('p = (2 * v) + 1\n')).toBe('(2 * v) + 1');
  });

  it('should allow whitespace around p and =', () => {
    expect(extractFormula('   p=v*3   ')).toBe('v*3');
  });

  it('should let the last formula line win', () => {
    const text = ['p = v', '# replaced after recalibration', 'p = 2 * v'].join('\n');
    expect(extractFormula(text)).toBe('2 * v');
  });

  it('should handle Windows line endings', () => {
    expect(extractFormula('p = v + 1\r\np = v + 2\r\n')).toBe('v + 2');
  });

  it('should ignore lines that are not assignments to p', () => {
    expect(extractFormula('pressure = v\nq = v\n')).toBeNull();
  });

  it('should return null for an empty expression', () => {
    expect(extractFormula('p =   \n')).toBeNull();
  });

  it('should return null for an empty file', () => {
    expect(extractFormula('')).toBeNull();
  });
});
