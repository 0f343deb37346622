/**
 * Event log types
 */

export interface EventLogOptions {
  /** First line of a new or empty file */
  header: string;
  /** Written in place of unavailable readings and unknown valve states */
  unavailableMarker: string;
}

export interface EventLog {
  /**
   * Append one record built from the status store as it is right now
   * @param timestamp - Formatted step timestamp (`YYYY-MM-DD HH:MM:SS`)
   * @param sampleName - Sample name of the current run
   * @throws {EventLogWriteError} When the file cannot be written
   */
  logState(timestamp: string, sampleName: string): Promise<void>;
  getFilePath(): string;
}
