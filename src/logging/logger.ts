// Logger factory.
//
// Logs go to stderr: stdout carries the JSON and PKG-INFO output of the CLI.

import { destination, pino, type Logger } from 'pino';

import type { LoggingConfig } from '../config/index.js';

export type { Logger } from 'pino';

const STDERR_FD = 2;

export function createLogger(config: LoggingConfig): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: STDERR_FD,
        },
      },
    });
  }

  return pino({ level: config.level }, destination({ dest: STDERR_FD, sync: true }));
}

/** Logger that discards everything; used where no logger is supplied */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
