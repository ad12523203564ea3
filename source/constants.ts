import path from 'node:path';
import type {Language} from './types.js';

/**
 * Default name of the working-data directory.
 * Holds repository state, the LanceDB database, logs and lock files.
 */
export const DATA_DIR_NAME = '.repo-ingest';

/**
 * Get the path to the per-repository state directory.
 */
export function getStateDir(dataDir: string): string {
	return path.join(dataDir, 'state');
}

/**
 * Get the path to the LanceDB database directory.
 */
export function getLanceDbPath(dataDir: string): string {
	return path.join(dataDir, 'lancedb');
}

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(dataDir: string): string {
	return path.join(dataDir, 'logs');
}

/**
 * Get the path to the lock directory.
 */
export function getLocksDir(dataDir: string): string {
	return path.join(dataDir, 'locks');
}

/**
 * LanceDB table names.
 */
export const TABLE_NAMES = {
	CODE_CHUNKS: 'code_chunks',
} as const;

/** Default embedding model and its vector size. */
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

/** Chunking defaults, in characters. */
export const DEFAULT_MAX_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_MIN_CHUNK_SIZE = 10;

/** Branch used when a repository does not name one. */
export const DEFAULT_BRANCH = 'master';

/**
 * File-system-safe form of a repository name, used for state and lock files.
 */
export function toFileSafeName(repoName: string): string {
	return encodeURIComponent(repoName);
}

/**
 * File extensions supported for ingestion.
 * Maps extension to language identifier.
 */
export const EXTENSION_TO_LANGUAGE: Record<string, Language> = {
	'.cs': 'csharp',
	'.py': 'python',
	'.js': 'javascript',
	'.jsx': 'javascript',
	'.mjs': 'javascript',
	'.cjs': 'javascript',
	'.ts': 'typescript',
	'.tsx': 'typescript',
	'.mts': 'typescript',
	'.cts': 'typescript',
	'.java': 'java',
	'.go': 'go',
};
