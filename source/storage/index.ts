export * from './types.js';
export * from './schema.js';
export * from './lance.js';
export * from './memory.js';
