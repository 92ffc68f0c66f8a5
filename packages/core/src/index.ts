// Types
export * from './types/pattern.js';
export * from './types/query.js';
export * from './errors.js';

// Matching and dispatch
export * from './services/pattern.js';
export * from './services/matcher.js';
export * from './services/tokenizer.js';
export * from './services/pattern-table.js';
export * from './services/dispatcher.js';

// Actions
export * from './actions/index.js';
