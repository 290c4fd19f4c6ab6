export * from './indexed-collection';
export * from './wait-policy';
export * from './web-list';
