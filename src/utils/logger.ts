/**
 * Pino logger factory
 *
 * The process logger is built once in the entry point and handed down; core
 * modules receive it as a parameter.
 */

import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  level: LevelWithSilent;
  /** Colored console output through pino-pretty */
  pretty?: boolean;
  /** Also append JSON lines to this file */
  file?: string;
  name?: string;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const { level, pretty = false, file, name = 'indeks-scraper' } = options;

  // Silent loggers skip the transport worker
  if (level === 'silent') {
    return pino({ name, level });
  }

  const transport = pino.transport({
    targets: [
      pretty
        ? {
            target: 'pino-pretty',
            level,
            options: {
              colorize: true,
              translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
              ignore: 'pid,hostname,name',
            },
          }
        : { target: 'pino/file', level, options: { destination: 1 } },
      ...(file ? [{ target: 'pino/file', level, options: { destination: file, mkdir: true } }] : []),
    ],
  });

  return pino({ name, level }, transport);
}
