/**
 * Logger
 *
 * Pino logger shared by the engine packages. Every module logs through a
 * child tagged with its `component`, so one job can be followed from probe
 * to encode by `jobId` and filtered by stage.
 */

import pino from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] ?? (NODE_ENV === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'splitwave',
    env: NODE_ENV,
    component: 'engine',
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      messageFormat: '[{component}] {msg}',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Child logger for one engine component
 */
export function createLogger(component: string, context: Record<string, unknown> = {}): Logger {
  return logger.child({ ...context, component });
}
