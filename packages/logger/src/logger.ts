import { LOG_LEVELS } from './constants';
import type { Loggable, LoggerLike, LoggerOptions, LogMessage, Transport } from './interfaces';
import { LogContext } from './log-context';
import { ConsoleTransport } from './transports/console';
import type { LogArgument, LogLevel } from './types';

export class Logger implements LoggerLike {
  private static globalOptions: LoggerOptions = {
    level: 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
  };
  private static transport: Transport = new ConsoleTransport(Logger.globalOptions);

  private readonly context?: string;

  constructor(context?: string | { readonly name: string }) {
    this.context = typeof context === 'string' ? context : context?.name;
  }

  static configure(options: LoggerOptions): void {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.transport = this.globalOptions.transport ?? new ConsoleTransport(this.globalOptions);
  }

  static isLevelEnabled(level: LogLevel): boolean {
    const configuredLevel = this.globalOptions.level ?? 'info';

    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(configuredLevel);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]): void {
    this.log('trace', msg, ...args);
  }

  debug(msg: string, ...args: LogArgument[]): void {
    this.log('debug', msg, ...args);
  }

  info(msg: string, ...args: LogArgument[]): void {
    this.log('info', msg, ...args);
  }

  notice(msg: string, ...args: LogArgument[]): void {
    this.log('notice', msg, ...args);
  }

  warn(msg: string, ...args: LogArgument[]): void {
    this.log('warn', msg, ...args);
  }

  error(msg: string, ...args: LogArgument[]): void {
    this.log('error', msg, ...args);
  }

  fatal(msg: string, ...args: LogArgument[]): void {
    this.log('fatal', msg, ...args);
  }

  log(level: LogLevel, msg: string, ...args: LogArgument[]): void {
    if (!Logger.isLevelEnabled(level)) {
      return;
    }

    const message: LogMessage = {
      level,
      msg,
      time: Date.now(),
      context: this.context,
      reqId: LogContext.getRequestId(),
    };

    for (const arg of args) {
      if (arg instanceof Error) {
        message.err = arg;
      } else if (this.isLoggable(arg)) {
        Object.assign(message, arg.toLog());
      } else {
        Object.assign(message, arg);
      }
    }

    Logger.transport.log(message);
  }

  private isLoggable(arg: LogArgument): arg is Loggable {
    return 'toLog' in arg && typeof arg.toLog === 'function';
  }
}
