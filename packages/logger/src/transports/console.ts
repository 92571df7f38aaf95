import type pino from 'pino';
import pretty from 'pino-pretty';

import type { LoggerOptions } from '../interfaces';
import type { LogFormat } from '../types';

export function resolveFormat(options: LoggerOptions): LogFormat {
  return options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
}

/**
 * Builds the stream the root pino logger writes to.
 * JSON goes straight to the destination; pretty output is formatted in-process, no worker thread.
 */
export function createConsoleDestination(options: LoggerOptions): pino.DestinationStream {
  const destination = options.destination ?? process.stdout;

  if (resolveFormat(options) === 'json') {
    return destination;
  }

  return pretty({
    colorize: options.prettyOptions?.colorize ?? Boolean(process.stdout.isTTY),
    translateTime: options.prettyOptions?.translateTime ?? 'SYS:HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{if context}[{context}] {end}{msg}',
    destination,
  });
}
