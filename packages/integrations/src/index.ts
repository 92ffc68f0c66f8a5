// Field lookup contract
export * from './types.js';
export * from './errors.js';

// Wikipedia integration
export * from './wikipedia/index.js';
