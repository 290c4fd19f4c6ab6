/**
 * Library logger
 *
 * JSON lines in production, pino-pretty in development, silent under test.
 * LOG_LEVEL overrides the level in every environment.
 */

import pino, { type Logger as PinoLogger } from 'pino';
import pinoPretty from 'pino-pretty';

const isDevelopment =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === 'production') {
    return 'info';
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'debug';
}

export const pinoConfig = {
  level: resolveLevel(),
  base: { service: 'webtables' },
  serializers: { err: pino.stdSerializers.err },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
};

// table and module bindings lead each pretty line
const prettyStream = () =>
  pinoPretty({
    colorize: true,
    translateTime: 'HH:MM:ss.l',
    ignore: 'pid,hostname,service',
    messageFormat: '{if module}[{module}]{end} {if table}({table}) {end}{msg}',
    sync: true,
  });

export const logger: PinoLogger = isDevelopment
  ? pino(pinoConfig, prettyStream())
  : pino(pinoConfig);

/**
 * Child logger carrying `context` on every line
 *
 * @example
 * const log = createLogger({ module: 'web-table', table: 'Users' });
 * log.debug({ criteria }, 'Set search criteria');
 */
export function createLogger(context: Record<string, unknown>): PinoLogger {
  return logger.child(context);
}

export type Logger = PinoLogger;
