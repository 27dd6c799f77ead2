/**
 * Logger
 *
 * Pino-based structured logger shared by the apps.
 * The options are exported on their own so Fastify can build
 * its request logger with the same format.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerSettings {
  service: string;
  level?: LogLevel;
  env?: string;
}

export function createLoggerOptions(settings: LoggerSettings): LoggerOptions {
  const env = settings.env ?? process.env['NODE_ENV'] ?? 'development';

  return {
    level: settings.level ?? 'info',
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: settings.service,
      env,
    },
    transport: env === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  };
}

export function createLogger(settings: LoggerSettings): Logger {
  return pino(createLoggerOptions(settings));
}

export type { Logger };
