export { createOperatorChannel } from './channel';
export { EVENT_NAMES } from './types';
export type {
  OperatorChannel,
  OperatorEventMap,
  OperatorEventName,
  OperatorListener,
  LogLineEvent,
  AlertEvent,
  ParameterRequestEvent,
  RunStateEvent,
  DeviceInfoEvent,
} from './types';
