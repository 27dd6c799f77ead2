/**
 * Pino Logger Settings
 *
 * Structured JSON logging for production observability. Fastify builds its
 * request logger from the same options so both share one format.
 */

import { createLogger, createLoggerOptions, type Logger } from '@syncprobe/utils';
import type { LoggerOptions } from 'pino';
import type { ApiConfig } from '../config/index.js';

const SERVICE_NAME = 'syncprobe-api';

export function apiLoggerOptions(config: ApiConfig): LoggerOptions {
  return createLoggerOptions({
    service: SERVICE_NAME,
    level: config.logLevel,
    env: config.nodeEnv,
  });
}

export function createApiLogger(config: ApiConfig): Logger {
  return createLogger({
    service: SERVICE_NAME,
    level: config.logLevel,
    env: config.nodeEnv,
  });
}
