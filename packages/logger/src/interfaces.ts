import type { Color, LogArgument, LogFormat, LogLevel, LogMetadataRecord } from './types';

export interface BaseLogMessage {
  level: LogLevel;
  msg: string;
  time: number;
  context?: string;
  reqId?: string;
  err?: Error | Loggable;
}

export type LogMessage = BaseLogMessage & LogMetadataRecord;

export interface Loggable {
  toLog(): LogMetadataRecord;
}

/**
 * The sink components receive by injection. `Logger` satisfies it; tests pass a recorder.
 */
export interface LoggerLike {
  log(level: LogLevel, msg: string, ...args: LogArgument[]): void;
}

export interface Transport {
  log(message: LogMessage): void;
}

export interface LoggerOptions {
  /**
   * Minimum log level to print.
   * @default 'info'
   */
  level?: LogLevel;
  /**
   * @default 'json' when NODE_ENV is production, 'pretty' otherwise
   */
  format?: LogFormat;
  prettyOptions?: {
    colors?: Partial<Record<LogLevel, Color>>;
  };
  /**
   * Replaces the console transport.
   */
  transport?: Transport;
}
