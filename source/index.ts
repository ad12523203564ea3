export * from './types.js';
export * from './errors.js';
export * from './constants.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './lock/index.js';
export * from './mirror/index.js';
export * from './chunker/index.js';
export {TreeSitterParser} from './chunker/parser.js';
export * from './embeddings/index.js';
export * from './storage/index.js';
export * from './state/index.js';
export * from './ingest/index.js';
