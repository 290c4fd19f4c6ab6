export * from './element-probe';
export * from './web-element';
