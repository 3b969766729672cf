export * from './errors/index.js';
export * from './utils/abort-utils.js';
export * from './utils/type-guard-utils.js';
