/**
 * Tests for error types
 */

import {
  ValidationError,
  SequenceValidationError,
  CalibrationParseError,
  DeviceUnavailableError,
  EventLogWriteError
} from './errors';

describe('Error Types', () => {
  describe('ValidationError', () => {
    it('should create error with correct message and name', () => {
      const error = new ValidationError('Test error message');
      expect(error.message).toBe('Test error message');
      expect(error.name).toBe('ValidationError');
    });

    it('should be instance of Error', () => {
      expect(new ValidationError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('SequenceValidationError', () => {
    it('should extend ValidationError', () => {
      const error = new SequenceValidationError('Step interval must be a positive integer');
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.name).toBe('SequenceValidationError');
      expect(error.message).toBe('Step interval must be a positive integer');
    });
  });

  describe('CalibrationParseError', () => {
    it('should append the position to the message', () => {
      const error = new CalibrationParseError('Unexpected character "x"', 4);
      expect(error.message).toBe('Unexpected character "x" at position 4');
      expect(error.position).toBe(4);
      expect(error.name).toBe('CalibrationParseError');
    });

    it('should extend ValidationError', () => {
      expect(new CalibrationParseError('Bad', 0)).toBeInstanceOf(ValidationError);
    });
  });

  describe('DeviceUnavailableError', () => {
    it('should name the failed operation', () => {
      const error = new DeviceUnavailableError('open');
      expect(error.message).toBe('Device unavailable during open');
      expect(error.name).toBe('DeviceUnavailableError');
    });

    it('should include the cause message when the cause is an Error', () => {
      const error = new DeviceUnavailableError('readAnalog', new Error('USB reset'));
      expect(error.message).toBe('Device unavailable during readAnalog: USB reset');
    });

    it('should ignore non-Error causes', () => {
      const error = new DeviceUnavailableError('close', 'gone');
      expect(error.message).toBe('Device unavailable during close');
    });

    it('should not be a ValidationError', () => {
      expect(new DeviceUnavailableError('open')).not.toBeInstanceOf(ValidationError);
    });
  });

  describe('EventLogWriteError', () => {
    it('should carry the file path and cause', () => {
      const error = new EventLogWriteError('/tmp/run.csv', new Error('EACCES'));
      expect(error.message).toBe('Failed to write event log /tmp/run.csv: EACCES');
      expect(error.filePath).toBe('/tmp/run.csv');
      expect(error.name).toBe('EventLogWriteError');
    });
  });
});
