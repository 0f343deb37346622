export { readTemperature, readAnalogInputs } from './sensors';
export { isValidReading, kelvinToCelsius, computeVoltageDiff } from './helpers';
export type { AnalogReadings, AnalogSample } from './types';
