/**
 * Global error types for the valve sequencer
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a sequence cannot be built from the given step interval
 */
export class SequenceValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'SequenceValidationError';
  }
}

/**
 * Error thrown when a calibration expression cannot be parsed
 */
export class CalibrationParseError extends ValidationError {
  /** Zero-based character offset of the offending token */
  readonly position: number;

  constructor(message: string, position: number) {
    super(message + ' at position ' + position);
    this.name = 'CalibrationParseError';
    this.position = position;
  }
}

/**
 * Error raised when the device cannot be reached or a call to it fails
 */
export class DeviceUnavailableError extends Error {
  constructor(operation: string, cause?: unknown) {
    super('Device unavailable during ' + operation + (cause instanceof Error ? ': ' + cause.message : ''));
    this.name = 'DeviceUnavailableError';
  }
}

/**
 * Error raised when a record cannot be appended to the event log file
 */
export class EventLogWriteError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super('Failed to write event log ' + filePath + (cause instanceof Error ? ': ' + cause.message : ''));
    this.name = 'EventLogWriteError';
    this.filePath = filePath;
  }
}
