/**
 * Logger utility using pino
 *
 * Writes to stderr so command output on stdout stays machine-readable.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function createLogger(config: { level: LogLevel; pretty: boolean }): Logger {
  if (config.level === 'silent') {
    return pino({ level: 'silent' });
  }

  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ level: config.level }, pino.destination(2));
}

export type { Logger };
