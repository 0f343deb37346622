/**
 * Error utilities
 */

/**
 * Message of an unknown thrown value
 * @param err - Caught value
 * @returns The error message, or the value as a string
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
