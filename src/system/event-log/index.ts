export { createEventLog } from './event-log';
export { formatRecord, formatField } from './helpers';
export type { EventLog, EventLogOptions } from './types';
