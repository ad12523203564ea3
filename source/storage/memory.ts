import {IndexWriteFailureError} from '../errors.js';
import type {
	CodeChunk,
	DeleteFilter,
	QueryFilters,
	ScoredChunk,
	VectorIndex,
} from './types.js';

/**
 * In-process vector index with the same contract as LanceVectorIndex.
 * Used by tests and by embedders that need no persistence.
 */
export class InMemoryVectorIndex implements VectorIndex {
	private readonly rows = new Map<string, CodeChunk>();
	private closed = false;

	async upsert(chunks: CodeChunk[]): Promise<void> {
		this.ensureOpen();
		for (const chunk of chunks) {
			this.rows.set(chunk.id, structuredClone(chunk));
		}
	}

	async deleteWhere(filter: DeleteFilter): Promise<number> {
		this.ensureOpen();
		const paths = new Set(filter.filePaths);
		return this.removeIf(
			row => row.repoName === filter.repoName && paths.has(row.filePath),
		);
	}

	async deleteRepository(repoName: string): Promise<number> {
		this.ensureOpen();
		return this.removeIf(row => row.repoName === repoName);
	}

	async listFilePaths(repoName: string): Promise<string[]> {
		const paths = new Set<string>();
		for (const row of this.rows.values()) {
			if (row.repoName === repoName) {
				paths.add(row.filePath);
			}
		}
		return [...paths].sort();
	}

	async query(
		vector: number[],
		topK: number,
		filters: QueryFilters = {},
	): Promise<ScoredChunk[]> {
		return [...this.rows.values()]
			.filter(row => matches(row, filters))
			.map(row => ({
				chunk: structuredClone(row),
				distance: cosineDistance(vector, row.embedding),
			}))
			.sort((a, b) => a.distance - b.distance || a.chunk.id.localeCompare(b.chunk.id))
			.slice(0, topK);
	}

	async count(repoName?: string): Promise<number> {
		if (repoName === undefined) {
			return this.rows.size;
		}
		let total = 0;
		for (const row of this.rows.values()) {
			if (row.repoName === repoName) total++;
		}
		return total;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	/**
	 * Every stored chunk, ordered by id.
	 */
	all(): CodeChunk[] {
		return [...this.rows.values()]
			.map(row => structuredClone(row))
			.sort((a, b) => a.id.localeCompare(b.id));
	}

	private ensureOpen() {
		if (this.closed) {
			throw new IndexWriteFailureError('Vector index is closed');
		}
	}

	private removeIf(predicate: (row: CodeChunk) => boolean): number {
		let removed = 0;
		for (const [id, row] of this.rows) {
			if (predicate(row)) {
				this.rows.delete(id);
				removed++;
			}
		}
		return removed;
	}
}

function matches(row: CodeChunk, filters: QueryFilters): boolean {
	if (filters.repoNames?.length && !filters.repoNames.includes(row.repoName)) {
		return false;
	}
	if (filters.languages?.length && !filters.languages.includes(row.language)) {
		return false;
	}
	if (filters.chunkTypes?.length && !filters.chunkTypes.includes(row.chunkType)) {
		return false;
	}
	if (filters.filePaths?.length && !filters.filePaths.includes(row.filePath)) {
		return false;
	}
	return true;
}

export function cosineDistance(a: number[], b: number[]): number {
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < Math.min(a.length, b.length); i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		normA += x * x;
		normB += y * y;
	}
	if (normA === 0 || normB === 0) {
		return 1;
	}
	return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
