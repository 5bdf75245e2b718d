import pino from 'pino';
import type { DestinationStream, LevelWithSilent, Logger, LoggerOptions } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = LevelWithSilent;

export type CreateLoggerOptions = {
  level: LogLevel;
  name?: string;
  /**
   * Where entries are written. Defaults to stderr so that stdout stays
   * reserved for normalized output.
   */
  destination?: DestinationStream;
  timestamp?: boolean;
};

export const createLoggerOptions = (level: LogLevel, name?: string): LoggerOptions => ({
  level,
  name,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions = createLoggerOptions(options.level, options.name);
  if (options.timestamp === false) {
    loggerOptions.timestamp = false;
  }
  return pino(loggerOptions, options.destination ?? pino.destination(2));
}

export type { DestinationStream, Logger };
