export * from './types.js';
export * from './errors.js';
export * from './validation.js';
export * from './provenance.js';
export * from './store.js';
export * from './embeddings.js';
export * from './scoring.js';
export * from './retriever.js';
