export * from './extraction.js';
export * from './replay-miner.js';
export * from './contradiction-resolver.js';
export * from './forgetting.js';
export * from './consolidator.js';
export * from './scheduler.js';
