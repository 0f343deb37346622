/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with coloured level tags (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, levelTag, fmtReading } from './helpers';
export { createConsoleSink } from './console/console-sink';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FilterContext
} from './types';
