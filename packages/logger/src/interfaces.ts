import type { LogFormat, LogLevel, LogMetadataRecord } from './types';

// Base fields always present
export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  err?: Error;
}

export type LogMessage = BaseLogMessage & LogMetadataRecord;

export interface Loggable {
  toLog(): LogMetadataRecord; // Custom serialization hook
}

/**
 * Anything pino can write lines to. `process.stdout` by default.
 */
export interface LogDestination {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info' (or `LOG_LEVEL`)
   */
  level?: LogLevel;
  /**
   * Log format.
   * @default 'pretty' outside production, 'json' in production
   */
  format?: LogFormat;
  destination?: LogDestination;
  prettyOptions?: {
    colorize?: boolean;
    translateTime?: string;
  };
}
