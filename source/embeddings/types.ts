/**
 * Embedding provider interface for generating vector embeddings.
 * Providers do one request per call; batching and retry live in the client.
 */
export interface EmbeddingProvider {
	/** Number of dimensions in the embedding vectors */
	readonly dimensions: number;

	/** Largest number of texts accepted by one embed() call */
	readonly maxBatchSize: number;

	/**
	 * Validate credentials, load models, etc.
	 * Called once before the first embed().
	 */
	initialize(): Promise<void>;

	/**
	 * Generate embeddings for at most maxBatchSize texts.
	 * @returns One vector per text, in input order
	 */
	embed(texts: string[], options?: EmbedOptions): Promise<number[][]>;

	close(): void;
}

export interface EmbedOptions {
	signal?: AbortSignal;
}

/**
 * What the orchestrator consumes: any number of texts in, the same number of
 * vectors out, in order.
 */
export interface EmbeddingClient {
	readonly dimensions: number;
	/** @throws EmbeddingUnavailableError once retries are exhausted */
	embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
	close(): void;
}

/**
 * Non-2xx response from a provider's HTTP API.
 */
export class ProviderHttpError extends Error {
	readonly status: number;

	constructor(status: number, message: string) {
		super(message);
		this.name = 'ProviderHttpError';
		this.status = status;
	}
}
