/**
 * Tests for the event log writer
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventLogWriteError } from '$types/errors';
import { createStatusStore } from '@system/state';
import type { StatusStore } from '@system/state';
import { createEventLog } from './event-log';

const HEADER =
  'date,sample_name,pressure,voltage_0,voltage_1,voltage_diffvalve_state_1,valve_state_2,valve_state_3,valve_state_4';
const OPTIONS = { header: HEADER, unavailableMarker: 'None' };

describe('createEventLog', () => {
  let dir: string;
  let store: StatusStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'event-log-'));
    store = createStatusStore();
    store.setValveStates({ 1: 'closed', 2: 'closed', 3: 'closed', 4: 'closed' });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  // ═══════════════════════════════════════════════════════════════
  // HEADER
  // ═══════════════════════════════════════════════════════════════

  describe('header', () => {
    it('should write the header before the first record of a new file', async () => {
      const file = join(dir, 'run.csv');
      const eventLog = createEventLog(file, store, OPTIONS);

      await eventLog.logState('2024-03-01 10:00:00', 'sample_a');

      expect(await readFile(file, 'utf8')).toBe(
        HEADER + '\n' +
        '2024-03-01 10:00:00,sample_a,None,None,None,None,Closed,Closed,Closed,Closed\n'
      );
    });

    it('should write the header into an existing empty file', async () => {
      const file = join(dir, 'empty.csv');
      await writeFile(file, '');
      const eventLog = createEventLog(file, store, OPTIONS);

      await eventLog.logState('t1', 's');

      const lines = (await readFile(file, 'utf8')).split('\n');
      expect(lines[0]).toBe(HEADER);
    });

    it('should never rewrite the header of a non-empty file', async () => {
      const file = join(dir, 'existing.csv');
      await writeFile(file, HEADER + '\nold,row\n');
      const eventLog = createEventLog(file, store, OPTIONS);

      await eventLog.logState('t1', 's');
      await eventLog.logState('t2', 's');

      const content = await readFile(file, 'utf8');
      expect(content.split(HEADER)).toHaveLength(2);
      expect(content.split('\n')).toEqual([
        HEADER,
        'old,row',
        't1,s,None,None,None,None,Closed,Closed,Closed,Closed',
        't2,s,None,None,None,None,Closed,Closed,Closed,Closed',
        '',
      ]);
    });

    it('should write the header once across two writers on the same file', async () => {
      const file = join(dir, 'shared.csv');

      await createEventLog(file, store, OPTIONS).logState('t1', 'run1');
      await createEventLog(file, store, OPTIONS).logState('t2', 'run2');

      const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
      expect(lines).toHaveLength(3);
      expect(lines.filter((line) => line === HEADER)).toHaveLength(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // RECORDS
  // ═══════════════════════════════════════════════════════════════

  describe('records', () => {
    it('should snapshot the store when logState is called', async () => {
      const file = join(dir, 'run.csv');
      const eventLog = createEventLog(file, store, OPTIONS);

      const pending = eventLog.logState('t1', 's');
      store.setValveState(2, 'open');
      await pending;

      const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
      expect(lines[1]).toBe('t1,s,None,None,None,None,Closed,Closed,Closed,Closed');
    });

    it('should keep call order for concurrent writes', async () => {
      const file = join(dir, 'run.csv');
      const eventLog = createEventLog(file, store, OPTIONS);

      await Promise.all([
        eventLog.logState('t1', 's'),
        eventLog.logState('t2', 's'),
        eventLog.logState('t3', 's'),
      ]);

      const stamps = (await readFile(file, 'utf8'))
        .trimEnd()
        .split('\n')
        .slice(1)
        .map((line) => line.split(',')[0]);
      expect(stamps).toEqual(['t1', 't2', 't3']);
    });

    it('should write readings with their exact values', async () => {
      const file = join(dir, 'run.csv');
      store.setAnalog({ ain0: 0.5, ain1: 2, voltageDiff: 1.5, pressure: -16.50285 });
      store.setValveState(4, null);
      const eventLog = createEventLog(file, store, OPTIONS);

      await eventLog.logState('2024-03-01 10:00:05', 'bench');

      const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
      expect(lines[1]).toBe('2024-03-01 10:00:05,bench,-16.50285,0.5,2,1.5,Closed,Closed,Closed,None');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // FAILURES
  // ═══════════════════════════════════════════════════════════════

  describe('failures', () => {
    it('should raise EventLogWriteError when the directory does not exist', async () => {
      const file = join(dir, 'missing', 'run.csv');
      const eventLog = createEventLog(file, store, OPTIONS);

      const error = await eventLog.logState('t1', 's').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EventLogWriteError);
      expect(error).toHaveProperty('filePath', file);
    });

    it('should keep writing after a failed write', async () => {
      const sub = join(dir, 'later');
      const file = join(sub, 'run.csv');
      const eventLog = createEventLog(file, store, OPTIONS);

      await expect(eventLog.logState('t1', 's')).rejects.toThrow(EventLogWriteError);
      await mkdir(sub);
      await eventLog.logState('t2', 's');

      const lines = (await readFile(file, 'utf8')).trimEnd().split('\n');
      expect(lines).toEqual([HEADER, 't2,s,None,None,None,None,Closed,Closed,Closed,Closed']);
    });

    it('should report its file path', () => {
      expect(createEventLog('/data/x.csv', store, OPTIONS).getFilePath()).toBe('/data/x.csv');
    });
  });
});
