import pino from 'pino';

import type { Loggable, LoggerOptions } from './interfaces';
import { createConsoleDestination } from './transports/console';
import type { LogArgument, LogLevel, LogMetadataRecord } from './types';

const LOG_LEVELS: ReadonlyArray<LogLevel> = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function defaultOptions(): LoggerOptions {
  const envLevel = process.env.LOG_LEVEL;
  return {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : undefined,
  };
}

export class Logger {
  private static globalOptions: LoggerOptions = defaultOptions();
  private static root: pino.Logger = Logger.createRoot(Logger.globalOptions);

  private readonly context?: string;
  private boundRoot?: pino.Logger;
  private bound?: pino.Logger;

  constructor(context?: string | Function | object) {
    if (typeof context === 'function') {
      this.context = context.name;
    } else if (typeof context === 'object' && context !== null) {
      this.context = context.constructor.name;
    } else if (typeof context === 'string') {
      this.context = context;
    }
  }

  static configure(options: LoggerOptions): void {
    this.globalOptions = { ...this.globalOptions, ...options };
    this.root = this.createRoot(this.globalOptions);
  }

  static reset(): void {
    this.globalOptions = defaultOptions();
    this.root = this.createRoot(this.globalOptions);
  }

  static getLevel(): LogLevel {
    return this.globalOptions.level ?? 'info';
  }

  private static createRoot(options: LoggerOptions): pino.Logger {
    return pino(
      {
        level: options.level ?? 'info',
        base: null,
        formatters: {
          level: label => ({ level: label }),
        },
      },
      createConsoleDestination(options),
    );
  }

  /* -------------------------------------------------------------------------- */
  /*                               Logging Methods                              */
  /* -------------------------------------------------------------------------- */

  trace(msg: string, ...args: LogArgument[]): void {
    this.log('trace', msg, args);
  }

  debug(msg: string, ...args: LogArgument[]): void {
    this.log('debug', msg, args);
  }

  info(msg: string, ...args: LogArgument[]): void {
    this.log('info', msg, args);
  }

  warn(msg: string, ...args: LogArgument[]): void {
    this.log('warn', msg, args);
  }

  error(msg: string, ...args: LogArgument[]): void {
    this.log('error', msg, args);
  }

  fatal(msg: string, ...args: LogArgument[]): void {
    this.log('fatal', msg, args);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.target().isLevelEnabled(level);
  }

  /* -------------------------------------------------------------------------- */
  /*                               Internal Logic                               */
  /* -------------------------------------------------------------------------- */

  private log(level: LogLevel, msg: string, args: LogArgument[]): void {
    const target = this.target();
    if (!target.isLevelEnabled(level)) {
      return;
    }

    const record: LogMetadataRecord = {};
    for (const arg of args) {
      if (arg instanceof Error) {
        record.err = arg;
      } else if (isLoggable(arg)) {
        Object.assign(record, arg.toLog());
      } else {
        Object.assign(record, arg);
      }
    }

    target[level](record, msg);
  }

  // Children are rebuilt lazily after `Logger.configure` swaps the root.
  private target(): pino.Logger {
    if (this.bound && this.boundRoot === Logger.root) {
      return this.bound;
    }
    this.boundRoot = Logger.root;
    this.bound = this.context ? Logger.root.child({ context: this.context }) : Logger.root;
    return this.bound;
  }
}

function isLoggable(arg: unknown): arg is Loggable {
  return typeof arg === 'object' && arg !== null && 'toLog' in arg && typeof arg.toLog === 'function';
}
