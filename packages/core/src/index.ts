export * from './errors/index.js';
export * from './files/file-status.js';
export * from './files/types.js';
export * from './money.js';
export * from './transactions/types.js';
export * from './utils/type-guard-utils.js';
export * from './validation/validation-issue.js';
