export { logger, createLogger, pinoConfig } from './pino-config';
export type { Logger } from './pino-config';
