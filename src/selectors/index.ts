export * from './locator-expression';
export * from './xpath-escape';
