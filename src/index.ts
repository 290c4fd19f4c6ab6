/**
 * Lazy-waiting element collections and paginated table traversal for
 * browser UI tests.
 */

export * from './collections';
export * from './common/constants';
export * from './common/errors';
export { ErrorHandler } from './common/utils/error-handler';
export { pollUntil, sleep, type Condition, type PollOptions } from './common/utils/poll.util';
export { getWebConfig, loadWebConfig, resetWebConfig, type WebConfig } from './config/web.config';
export * from './controls';
export * from './engine';
export { createLogger, logger, type Logger } from './lib/logger';
export * from './selectors';
export * from './tables';
