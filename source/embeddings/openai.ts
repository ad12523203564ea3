/**
 * OpenAI embedding provider using the OpenAI HTTP API.
 *
 * Default model text-embedding-3-small (1536 dimensions).
 * Any OpenAI-compatible endpoint works through baseUrl.
 */

import {z} from 'zod';
import {DEFAULT_EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_MODEL} from '../constants.js';
import {ProviderHttpError, type EmbedOptions, type EmbeddingProvider} from './types.js';

const OPENAI_API_BASE = 'https://api.openai.com/v1';
// OpenAI limits: 8,191 tokens/text, 300,000 tokens/batch, 2,048 texts/batch
// With avg ~1000 tokens/chunk, safe limit is 300 texts. Use 256 for margin.
const BATCH_SIZE = 256;
const DEFAULT_TIMEOUT_MS = 60_000;

const embeddingResponseSchema = z.object({
	data: z.array(
		z.object({
			embedding: z.array(z.number()),
			index: z.number().int().nonnegative(),
		}),
	),
});

const errorResponseSchema = z.object({
	error: z.object({message: z.string()}).partial().optional(),
});

export interface OpenAIEmbeddingOptions {
	apiKey?: string;
	baseUrl?: string;
	model?: string;
	dimensions?: number;
	/** Per-request timeout */
	timeoutMs?: number;
	batchSize?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	readonly maxBatchSize: number;
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly model: string;
	private readonly timeoutMs: number;

	constructor(options: OpenAIEmbeddingOptions = {}) {
		// Trim the key to remove any accidental whitespace
		this.apiKey = (options.apiKey ?? '').trim();
		this.baseUrl = (options.baseUrl ?? OPENAI_API_BASE).replace(/\/+$/, '');
		this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
		this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.maxBatchSize = options.batchSize ?? BATCH_SIZE;
	}

	async initialize(): Promise<void> {
		if (!this.apiKey) {
			throw new Error('OpenAI API key required. Set OPENAI_API_KEY.');
		}
	}

	async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const timeout = AbortSignal.timeout(this.timeoutMs);
		const signal = options.signal
			? AbortSignal.any([options.signal, timeout])
			: timeout;

		const response = await fetch(`${this.baseUrl}/embeddings`, {
			method: 'POST',
			headers: {
				'Content-Type': 'application/json',
				Authorization: `Bearer ${this.apiKey}`,
			},
			body: JSON.stringify({
				model: this.model,
				input: texts,
				// Only the text-embedding-3 family accepts a dimensions override
				...(this.model.startsWith('text-embedding-3')
					? {dimensions: this.dimensions}
					: {}),
			}),
			signal,
		});

		if (!response.ok) {
			const errorText = await response.text();
			let errorMessage = errorText;
			try {
				const parsed = errorResponseSchema.safeParse(JSON.parse(errorText));
				if (parsed.success && parsed.data.error?.message) {
					errorMessage = parsed.data.error.message;
				}
			} catch {
				errorMessage = errorText;
			}

			if (response.status === 401) {
				throw new ProviderHttpError(
					401,
					`OpenAI API authentication failed (401): ${errorMessage}`,
				);
			}
			throw new ProviderHttpError(
				response.status,
				`OpenAI API error (${response.status}): ${errorMessage}`,
			);
		}

		const parsed = embeddingResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new Error(
				`Unexpected OpenAI embeddings response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
			);
		}

		// Sort by index to ensure correct order
		return parsed.data.data
			.sort((a, b) => a.index - b.index)
			.map(d => d.embedding);
	}

	close(): void {
		// Nothing to release; requests are stateless
	}
}
