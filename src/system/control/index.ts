export { createOperatorControls, CONNECT_FAILED_ALERT } from './control';
export { formatDeviceInfo } from './helpers';
export type { OperatorControls, OperatorControlsDependencies } from './types';
