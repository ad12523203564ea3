/**
 * Mock embedding provider for testing.
 *
 * Generates deterministic hash-based unit vectors: same input, same output,
 * no network.
 */

import type {EmbeddingProvider} from './types.js';

const DEFAULT_DIMENSIONS = 32;

export class MockEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	readonly maxBatchSize: number;
	/** Number of embed() calls made, for assertions */
	calls = 0;

	constructor(dimensions: number = DEFAULT_DIMENSIONS, maxBatchSize = 16) {
		this.dimensions = dimensions;
		this.maxBatchSize = maxBatchSize;
	}

	async initialize(): Promise<void> {
		// No initialization needed
	}

	async embed(texts: string[]): Promise<number[][]> {
		this.calls++;
		return texts.map(t => this.hashToVector(t));
	}

	/**
	 * Convert text to a deterministic unit vector.
	 */
	hashToVector(text: string): number[] {
		const seed = this.hash(text);

		// LCG-like pseudo-random values from seed and index
		const vec = new Array<number>(this.dimensions).fill(0).map((_, i) => {
			const state =
				(((seed * (i + 1) * 1103515245 + 12345) >>> 0) % 0x7fffffff) /
				0x7fffffff;
			return state * 2 - 1; // Range [-1, 1]
		});

		// Normalize to unit length
		const magnitude = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
		return vec.map(v => (magnitude > 0 ? v / magnitude : 0));
	}

	/**
	 * Simple string hash function (djb2).
	 */
	private hash(str: string): number {
		let h = 5381;
		for (let i = 0; i < str.length; i++) {
			h = (h * 33) ^ str.charCodeAt(i);
			h = h >>> 0;
		}
		return h;
	}

	close(): void {
		// Nothing to close
	}
}
