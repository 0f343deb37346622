/**
 * Tests for time utility functions
 */

import { now, sleep } from './time';

describe('Time Utilities', () => {
  describe('now', () => {
    it('should return current Unix timestamp in seconds', () => {
      const before = Math.floor(Date.now() / 1000);
      const result = now();
      const after = Math.floor(Date.now() / 1000);

      expect(result).toBeGreaterThanOrEqual(before);
      expect(result).toBeLessThanOrEqual(after);
    });

    it('should return an integer', () => {
      const result = now();
      expect(Number.isInteger(result)).toBe(true);
    });

    it('should be consistent with Date.now()', () => {
      const dateNowSec = Math.floor(Date.now() / 1000);
      const result = now();
      expect(Math.abs(result - dateNowSec)).toBeLessThanOrEqual(1);
    });

    it('should return positive number', () => {
      const result = now();
      expect(result).toBeGreaterThan(0);
    });

    it('should return reasonable Unix timestamp (after year 2020)', () => {
      const result = now();
      const year2020 = 1577836800; // Jan 1, 2020
      expect(result).toBeGreaterThan(year2020);
    });
  });

  describe('sleep', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should resolve only after the delay has elapsed', async () => {
      let done = false;
      const pending = sleep(1000).then(() => {
        done = true;
      });

      await vi.advanceTimersByTimeAsync(999);
      expect(done).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toBe(true);
    });
  });
});
