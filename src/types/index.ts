export type { Reading, ValvePortId, ValveState, ValveStates, ParameterKind, EngineState } from './common';
export { VALVE_PORTS } from './common';
export type { DigitalLevel, DeviceInfo, DeviceInterface } from './device';
export type { LabUserConfig, LabAppConstants, LabConfig } from './config';
export {
  ValidationError,
  SequenceValidationError,
  CalibrationParseError,
  DeviceUnavailableError,
  EventLogWriteError
} from './errors';
