/**
 * Console output sink
 *
 * Writes formatted log lines to the console. WARNING and CRITICAL go to
 * stderr, everything else to stdout. The level tag is coloured when enabled.
 */

import { Chalk } from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogLevels, LogSink } from '../types';

/**
 * Create a console sink
 *
 * @param consoleApi - Console API for output (global console object)
 * @param config - Sink configuration
 * @param logLevels - Log level constants object
 * @returns Console sink instance
 *
 * @example
 * ```typescript
 * const consoleSink = createConsoleSink(console, { colors: true }, LOG_LEVELS);
 * consoleSink.write("[INFO]     Hello world", LOG_LEVELS.INFO);
 * ```
 */
export function createConsoleSink(
  consoleApi: ConsoleAPI,
  config: ConsoleSinkConfig,
  logLevels: LogLevels
): LogSink {
  const chalk = new Chalk({ level: config.colors ? 1 : 0 });

  function colorize(formattedMessage: string, level: LogLevel): string {
    if (level === logLevels.CRITICAL) return chalk.red.bold(formattedMessage);
    if (level === logLevels.WARNING) return chalk.yellow(formattedMessage);
    if (level === logLevels.DEBUG) return chalk.gray(formattedMessage);
    return formattedMessage;
  }

  function write(formattedMessage: string, level: LogLevel): void {
    const line = colorize(formattedMessage, level);

    if (level >= logLevels.WARNING) {
      consoleApi.error(line);
    } else {
      consoleApi.log(line);
    }
  }

  return {
    write: write
  };
}
