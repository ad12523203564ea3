import {z} from 'zod';
import type {Chunk, ChunkType} from '../chunker/types.js';
import {SUPPORTED_LANGUAGES, type Language} from '../types.js';

/**
 * A chunk with its embedding, as held by a vector index.
 */
export interface CodeChunk extends Chunk {
	embedding: number[];
	/** ISO timestamp */
	createdAt: string;
}

export interface DeleteFilter {
	repoName: string;
	filePaths: string[];
}

export interface QueryFilters {
	repoNames?: string[];
	languages?: Language[];
	chunkTypes?: ChunkType[];
	filePaths?: string[];
}

export interface ScoredChunk {
	chunk: CodeChunk;
	/** Cosine distance; smaller is closer */
	distance: number;
}

/**
 * Persistent key-addressed vector storage.
 * Write failures surface as IndexWriteFailureError.
 */
export interface VectorIndex {
	/** Insert or replace by id */
	upsert(chunks: CodeChunk[]): Promise<void>;
	/** @returns number of chunks removed */
	deleteWhere(filter: DeleteFilter): Promise<number>;
	/** @returns number of chunks removed */
	deleteRepository(repoName: string): Promise<number>;
	/** Distinct file paths holding chunks for a repository */
	listFilePaths(repoName: string): Promise<string[]>;
	query(
		vector: number[],
		topK: number,
		filters?: QueryFilters,
	): Promise<ScoredChunk[]>;
	count(repoName?: string): Promise<number>;
	close(): Promise<void>;
}

// ============================================================================
// Row mapping
// ============================================================================

/**
 * Row format for the code_chunks table.
 * Uses snake_case to match Arrow/LanceDB conventions.
 */
export type CodeChunkRow = {
	id: string;
	vector: number[];
	repo_name: string;
	file_path: string;
	language: string;
	content: string;
	start_line: number;
	end_line: number;
	chunk_type: string;
	/** JSON-encoded ChunkMetadata */
	metadata: string;
	content_hash: string;
	created_at: string;
};

const CHUNK_TYPES = [
	'class',
	'interface',
	'struct',
	'enum',
	'type',
	'function',
	'method',
	'constructor',
	'property',
	'fallback-window',
] as const satisfies readonly ChunkType[];

const metadataSchema = z.object({
	name: z.string().optional(),
	parent: z.string().optional(),
	part: z.number().int().optional(),
	parts: z.number().int().optional(),
});

// Arrow returns FixedSizeList cells as iterable vectors, not arrays
const vectorSchema = z.custom<Iterable<number>>(
	value =>
		Array.isArray(value) ||
		(typeof value === 'object' && value !== null && Symbol.iterator in value),
	'vector must be iterable',
);

const storedRowSchema = z.object({
	id: z.string(),
	vector: vectorSchema,
	repo_name: z.string(),
	file_path: z.string(),
	language: z.enum(SUPPORTED_LANGUAGES),
	content: z.string(),
	start_line: z.coerce.number(),
	end_line: z.coerce.number(),
	chunk_type: z.enum(CHUNK_TYPES),
	metadata: z.string(),
	content_hash: z.string(),
	created_at: z.string(),
});

/**
 * Convert a CodeChunk to a LanceDB row format.
 */
export function chunkToRow(chunk: CodeChunk): CodeChunkRow {
	return {
		id: chunk.id,
		vector: chunk.embedding,
		repo_name: chunk.repoName,
		file_path: chunk.filePath,
		language: chunk.language,
		content: chunk.content,
		start_line: chunk.startLine,
		end_line: chunk.endLine,
		chunk_type: chunk.chunkType,
		metadata: JSON.stringify(chunk.metadata),
		content_hash: chunk.contentHash,
		created_at: chunk.createdAt,
	};
}

/**
 * Convert a LanceDB row back to a CodeChunk.
 * @throws if the row does not have the expected shape
 */
export function rowToChunk(row: unknown): CodeChunk {
	const parsed = storedRowSchema.parse(row);
	return {
		id: parsed.id,
		embedding: Array.from(parsed.vector, Number),
		repoName: parsed.repo_name,
		filePath: parsed.file_path,
		language: parsed.language,
		content: parsed.content,
		startLine: parsed.start_line,
		endLine: parsed.end_line,
		chunkType: parsed.chunk_type,
		metadata: metadataSchema.parse(JSON.parse(parsed.metadata)),
		contentHash: parsed.content_hash,
		createdAt: parsed.created_at,
	};
}

/**
 * Escape a string literal for a LanceDB filter expression.
 */
export function escapeString(value: string): string {
	return value.replace(/'/g, "''");
}

export function sqlList(values: readonly string[]): string {
	return values.map(v => `'${escapeString(v)}'`).join(', ');
}

/**
 * Build a filter expression; undefined when nothing is filtered.
 */
export function buildWhere(filters: QueryFilters = {}): string | undefined {
	const clauses: string[] = [];
	if (filters.repoNames?.length) {
		clauses.push(`repo_name IN (${sqlList(filters.repoNames)})`);
	}
	if (filters.languages?.length) {
		clauses.push(`language IN (${sqlList(filters.languages)})`);
	}
	if (filters.chunkTypes?.length) {
		clauses.push(`chunk_type IN (${sqlList(filters.chunkTypes)})`);
	}
	if (filters.filePaths?.length) {
		clauses.push(`file_path IN (${sqlList(filters.filePaths)})`);
	}
	return clauses.length > 0 ? clauses.join(' AND ') : undefined;
}
