/**
 * Jest setup for library tests
 * Keeps pino quiet unless a run asks for a level explicitly
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

afterEach(() => {
  jest.restoreAllMocks();
});
