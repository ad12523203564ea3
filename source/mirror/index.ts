export * from './types.js';
export * from './diff.js';
export * from './filter.js';
export * from './git.js';
