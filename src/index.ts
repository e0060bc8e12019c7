export * from './memory/index.js';
export * from './consolidation/index.js';
export { MemoryRuntime, openRuntime, createExtractor } from './core/runtime.js';
export type { RuntimeOptions, BeliefProvenance } from './core/runtime.js';
export {
  ContextBuilder,
  DEFAULT_CONTEXT_BUDGET,
  buildMemoryContext,
  estimateTokens,
  formatResultForContext,
} from './core/context-builder.js';
export type { BuiltContext, ContextBudget, MemoryBlock } from './core/context-builder.js';
export { createLogger, setLogLevel, getLogLevel } from './core/logger.js';
export type { Logger, LogLevel } from './core/logger.js';
export {
  ConfigSchema,
  defaultConfig,
  findProjectRoot,
  initProject,
  loadConfig,
  saveConfig,
} from './config/index.js';
export type { Config } from './config/index.js';
export { OllamaAdapter, createAdapter, parseModelString } from './adapters/index.js';
export type { CompletionRequest, CompletionResponse, Message, ModelAdapter } from './adapters/index.js';
