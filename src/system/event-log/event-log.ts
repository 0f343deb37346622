/**
 * Event log
 * Append-only CSV record of status snapshots taken during a run
 */

import { appendFile, stat } from 'node:fs/promises';
import { EventLogWriteError } from '$types/errors';
import type { StatusStore } from '@system/state';
import type { EventLog, EventLogOptions } from './types';
import { formatRecord, isMissingFileError } from './helpers';

/**
 * Create an event log writer for one file
 *
 * The snapshot is taken when logState() is called, not when the write
 * reaches the disk. Writes on one instance are applied in call order; the
 * header goes in first whenever the file is missing or empty at that point.
 *
 * @param filePath - CSV file to append to (created on first write)
 * @param store - Status store to snapshot
 * @param options - Header line and unavailable marker
 * @returns Event log writer
 *
 * @example
 * ```typescript
 * const eventLog = createEventLog('/data/run-12.csv', store, {
 *   header: CONFIG.EVENT_LOG_HEADER,
 *   unavailableMarker: CONFIG.UNAVAILABLE_MARKER,
 * });
 * await eventLog.logState('2024-03-01 10:00:00', 'sample_a');
 * ```
 */
export function createEventLog(filePath: string, store: StatusStore, options: EventLogOptions): EventLog {
  let tail: Promise<void> = Promise.resolve();

  async function needsHeader(): Promise<boolean> {
    try {
      const info = await stat(filePath);
      return info.size === 0;
    } catch (err) {
      if (isMissingFileError(err)) return true;
      throw err;
    }
  }

  async function append(record: string): Promise<void> {
    try {
      const prefix = (await needsHeader()) ? options.header + '\n' : '';
      await appendFile(filePath, prefix + record + '\n', 'utf8');
    } catch (err) {
      throw new EventLogWriteError(filePath, err);
    }
  }

  return {
    logState(timestamp, sampleName) {
      const record = formatRecord(timestamp, sampleName, store.getSnapshot(), options.unavailableMarker);
      const result = tail.then(() => append(record));
      // The caller sees the rejection; later writes still run
      tail = result.catch(() => undefined);
      return result;
    },

    getFilePath() {
      return filePath;
    },
  };
}
