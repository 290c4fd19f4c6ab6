export * from './multi-page-table';
export * from './web-table';
export * from './web-table-row';
