export * from './web-errors';
