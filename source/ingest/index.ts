export * from './types.js';
export * from './orchestrator.js';
export * from './webhook.js';
export * from './engine.js';
