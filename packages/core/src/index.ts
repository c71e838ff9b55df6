export * from './errors/index.js';
export * from './types/outcome.js';
export * from './types/rule-parameters.js';
export * from './types/rule-result.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
