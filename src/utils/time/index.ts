export { now, sleep } from './time';
export { formatTimestamp } from './helpers';
