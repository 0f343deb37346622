/**
 * Time helper functions
 */

function pad2(value: number): string {
  return value < 10 ? '0' + value : String(value);
}

/**
 * Format a date as local wall-clock time, `YYYY-MM-DD HH:MM:SS`
 *
 * This is the timestamp used on operator log lines and event-log records.
 *
 * @param date - Moment to format
 * @returns Formatted local timestamp
 */
export function formatTimestamp(date: Date): string {
  return (
    date.getFullYear() + '-' +
    pad2(date.getMonth() + 1) + '-' +
    pad2(date.getDate()) + ' ' +
    pad2(date.getHours()) + ':' +
    pad2(date.getMinutes()) + ':' +
    pad2(date.getSeconds())
  );
}
