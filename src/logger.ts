import { pino } from 'pino';
import type { Logger } from 'pino';

import type { Config } from './config/index.js';

/**
 * Root logger. Components receive it (or a child of it) at construction;
 * nothing logs through a global instance.
 */
export function createLogger(logging: Config['logging']): Logger {
  return pino({
    level: logging.level,
    transport: logging.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  });
}
