export { createHandlerRegistry, HandlerRegistry } from './registry/handler-registry.js';
export type {
  HandlerContext,
  HandlerRegistration,
  HandlerTable,
  RuleHandler,
  SealedHandlerRegistry,
  SealOptions,
} from './registry/types.js';

export { RuleDispatcher } from './dispatcher/dispatcher.js';
export type { Dispatch, DispatcherOptions, DispatchOptions } from './dispatcher/types.js';

export { BatchExecutor } from './batch/batch-executor.js';
export type {
  BatchCompleted,
  BatchExecutorOptions,
  BatchFailed,
  BatchRejected,
  BatchRunResult,
  RejectionPolicy,
  RunAllOptions,
} from './batch/types.js';

export {
  readSetting,
  ruleConfigSchema,
  StaticRuleConfigSource,
  whenEnforced,
  type RuleConfigDocument,
  type RuleConfigInput,
  type RuleConfigSource,
} from './config-source/rule-config-source.js';
