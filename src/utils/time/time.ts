/**
 * Time utility functions
 */

/**
 * Get current Unix timestamp in seconds
 * @returns Current time in seconds since epoch
 */
export function now(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Resolve after the given number of milliseconds
 * @param ms - Delay in milliseconds
 * @returns Promise resolved once the delay has elapsed
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
