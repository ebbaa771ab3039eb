/**
 * Pino Logger
 *
 * Structured JSON logging. The same options feed fastify's request logger.
 */

import { pino, type Logger, type LoggerOptions } from 'pino';
import type { ApiConfig } from '../config/index.js';

export function buildLoggerOptions(config: Pick<ApiConfig, 'logLevel' | 'nodeEnv'>): LoggerOptions {
  return {
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'splitwave-api',
      env: config.nodeEnv,
    },
  };
}

export function createApiLogger(config: Pick<ApiConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino(buildLoggerOptions(config));
}
