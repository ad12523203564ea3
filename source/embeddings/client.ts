/**
 * Batching, retrying embedding client over a single provider.
 */

import pLimit from 'p-limit';
import {EmbeddingUnavailableError, errorMessage} from '../errors.js';
import {isAbortError} from '../lib/abort.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {
	CONCURRENCY,
	INITIAL_BACKOFF_MS,
	MAX_BACKOFF_MS,
	MAX_RETRIES,
	chunk,
	withRetry,
} from './api-utils.js';
import type {EmbeddingClient, EmbeddingProvider} from './types.js';

export interface BatchingEmbeddingClientOptions {
	maxRetries?: number;
	concurrency?: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	logger?: Logger;
}

export class BatchingEmbeddingClient implements EmbeddingClient {
	private readonly provider: EmbeddingProvider;
	private readonly maxRetries: number;
	private readonly concurrency: number;
	private readonly initialBackoffMs: number;
	private readonly maxBackoffMs: number;
	private readonly logger: Logger;
	private initPromise: Promise<void> | null = null;

	constructor(
		provider: EmbeddingProvider,
		options: BatchingEmbeddingClientOptions = {},
	) {
		this.provider = provider;
		this.maxRetries = options.maxRetries ?? MAX_RETRIES;
		this.concurrency = options.concurrency ?? CONCURRENCY;
		this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
		this.maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
		this.logger = options.logger ?? createNullLogger();
	}

	get dimensions(): number {
		return this.provider.dimensions;
	}

	async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}
		await this.initialize();

		const limit = pLimit(this.concurrency);
		const batches = chunk(texts, Math.max(1, this.provider.maxBatchSize));
		const results = await Promise.all(
			batches.map((batch, index) =>
				limit(() => this.embedBatch(batch, index, batches.length, signal)),
			),
		);
		return results.flat();
	}

	close(): void {
		this.provider.close();
		this.initPromise = null;
	}

	private initialize(): Promise<void> {
		if (!this.initPromise) {
			this.initPromise = this.provider.initialize().catch((error: unknown) => {
				this.initPromise = null;
				throw new EmbeddingUnavailableError(
					`Embedding provider failed to initialize: ${errorMessage(error)}`,
					0,
					error,
				);
			});
		}
		return this.initPromise;
	}

	private async embedBatch(
		batch: string[],
		index: number,
		total: number,
		signal?: AbortSignal,
	): Promise<number[][]> {
		let attempts = 0;
		let vectors: number[][];

		try {
			vectors = await withRetry(
				() => {
					attempts++;
					return this.provider.embed(batch, {signal});
				},
				{
					maxRetries: this.maxRetries,
					initialBackoffMs: this.initialBackoffMs,
					maxBackoffMs: this.maxBackoffMs,
					signal,
					onRetry: (attempt, delayMs, error) => {
						this.logger.warn(
							'embeddings',
							`Batch ${index + 1}/${total} failed, retry ${attempt}/${this.maxRetries} in ${delayMs}ms`,
							{error: errorMessage(error)},
						);
					},
				},
			);
		} catch (error) {
			if (signal?.aborted && isAbortError(error)) {
				throw error;
			}
			this.logger.error('embeddings', `Batch ${index + 1}/${total} failed`, {
				size: batch.length,
				attempts,
				error: errorMessage(error),
			});
			throw new EmbeddingUnavailableError(
				`Embedding failed after ${attempts} attempt(s): ${errorMessage(error)}`,
				attempts,
				error,
			);
		}

		if (vectors.length !== batch.length) {
			throw new EmbeddingUnavailableError(
				`Provider returned ${vectors.length} vectors for ${batch.length} texts`,
				attempts,
			);
		}
		const wrongSize = vectors.find(v => v.length !== this.provider.dimensions);
		if (wrongSize) {
			throw new EmbeddingUnavailableError(
				`Provider returned ${wrongSize.length}-dimensional vectors, expected ${this.provider.dimensions}`,
				attempts,
			);
		}
		return vectors;
	}
}
