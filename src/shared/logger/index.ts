import { pino, type Logger, type LoggerOptions } from 'pino';

import { config } from '../config/index.js';

export type { Logger };

export function buildLoggerOptions(): LoggerOptions {
  return {
    level: config.LOG_LEVEL,
    transport:
      config.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export const logger = pino(buildLoggerOptions());
