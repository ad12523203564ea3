export * from './types.js';
export * from './api-utils.js';
export * from './client.js';
export * from './mock.js';
export * from './openai.js';
export * from './text.js';
