/**
 * Batching embedding client and the OpenAI provider.
 */

import {describe, it, expect, afterEach, vi} from 'vitest';
import {BatchingEmbeddingClient} from '../embeddings/client.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {OpenAIEmbeddingProvider} from '../embeddings/openai.js';
import {prepareChunkText} from '../embeddings/text.js';
import {ProviderHttpError, type EmbeddingProvider} from '../embeddings/types.js';
import {EmbeddingUnavailableError} from '../errors.js';

class ScriptedProvider implements EmbeddingProvider {
	readonly dimensions = 3;
	readonly maxBatchSize = 2;
	readonly batches: string[][] = [];
	private failures: Error[];

	constructor(failures: Error[] = []) {
		this.failures = [...failures];
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.batches.push(texts);
		const failure = this.failures.shift();
		if (failure) throw failure;
		return texts.map(t => [t.length, 0, 1]);
	}

	close(): void {}
}

describe('BatchingEmbeddingClient', () => {
	it('splits input into provider-sized batches and keeps order', async () => {
		const provider = new ScriptedProvider();
		const client = new BatchingEmbeddingClient(provider, {concurrency: 1});

		const vectors = await client.embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

		expect(provider.batches).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
		expect(vectors.map(v => v[0])).toEqual([1, 2, 3, 4, 5]);
	});

	it('retries transient failures', async () => {
		const provider = new ScriptedProvider([new ProviderHttpError(503, 'unavailable')]);
		const client = new BatchingEmbeddingClient(provider, {initialBackoffMs: 1});

		expect(await client.embed(['a'])).toEqual([[1, 0, 1]]);
		expect(provider.batches).toEqual([['a'], ['a']]);
	});

	it('raises EmbeddingUnavailableError once retries run out', async () => {
		const provider = new ScriptedProvider([
			new ProviderHttpError(503, 'unavailable'),
			new ProviderHttpError(503, 'unavailable'),
			new ProviderHttpError(503, 'still unavailable'),
		]);
		const client = new BatchingEmbeddingClient(provider, {
			maxRetries: 2,
			initialBackoffMs: 1,
		});

		const error = await client.embed(['a']).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(EmbeddingUnavailableError);
		expect(error instanceof EmbeddingUnavailableError ? error.attempts : 0).toBe(3);
		expect(error instanceof Error ? error.message : '').toBe(
			'Embedding failed after 3 attempt(s): still unavailable',
		);
	});

	it('rejects vectors of the wrong size', async () => {
		const provider: EmbeddingProvider = {
			dimensions: 5,
			maxBatchSize: 4,
			initialize: async () => {},
			embed: async texts => texts.map(() => [1, 2, 3, 4]),
			close: () => {},
		};
		const client = new BatchingEmbeddingClient(provider);

		await expect(client.embed(['a'])).rejects.toThrow(
			'Provider returned 4-dimensional vectors, expected 5',
		);
	});

	it('makes no call for empty input', async () => {
		const provider = new MockEmbeddingProvider();
		const client = new BatchingEmbeddingClient(provider);

		expect(await client.embed([])).toEqual([]);
		expect(provider.calls).toBe(0);
	});
});

describe('MockEmbeddingProvider', () => {
	it('returns deterministic unit vectors', async () => {
		const provider = new MockEmbeddingProvider(8);
		const [first] = await provider.embed(['def f(): pass']);
		const [second] = await provider.embed(['def f(): pass']);

		expect(first).toEqual(second);
		const norm = Math.sqrt((first ?? []).reduce((sum, v) => sum + v * v, 0));
		expect(norm).toBeCloseTo(1, 6);
	});
});

describe('OpenAIEmbeddingProvider', () => {
	afterEach(() => {
		vi.unstubAllGlobals();
	});

	it('posts the batch and orders vectors by index', async () => {
		const fetchMock = vi.fn(async () =>
			Response.json({
				data: [
					{embedding: [0, 1], index: 1},
					{embedding: [1, 0], index: 0},
				],
			}),
		);
		vi.stubGlobal('fetch', fetchMock);
		const provider = new OpenAIEmbeddingProvider({
			apiKey: 'test-secret',
			baseUrl: 'https://embeddings.test/v1/',
			dimensions: 2,
		});

		const vectors = await provider.embed(['first', 'second']);

		expect(vectors).toEqual([
			[1, 0],
			[0, 1],
		]);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(fetchMock).toHaveBeenCalledWith(
			'https://embeddings.test/v1/embeddings',
			expect.objectContaining({
				method: 'POST',
				body: JSON.stringify({
					model: 'text-embedding-3-small',
					input: ['first', 'second'],
					dimensions: 2,
				}),
			}),
		);
	});

	it('surfaces the API error message with its status', async () => {
		vi.stubGlobal(
			'fetch',
			vi.fn(async () =>
				Response.json({error: {message: 'Rate limit reached'}}, {status: 429}),
			),
		);
		const provider = new OpenAIEmbeddingProvider({apiKey: 'test-secret'});

		const error = await provider.embed(['x']).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ProviderHttpError);
		expect(error instanceof ProviderHttpError ? error.status : 0).toBe(429);
		expect(error instanceof Error ? error.message : '').toBe(
			'OpenAI API error (429): Rate limit reached',
		);
	});

	it('requires an API key', async () => {
		await expect(new OpenAIEmbeddingProvider().initialize()).rejects.toThrow(
			'OpenAI API key required',
		);
	});
});

describe('prepareChunkText', () => {
	it('prefixes the code with where it lives', () => {
		const text = prepareChunkText({
			id: 'demo:src/box.py#1',
			repoName: 'demo',
			filePath: 'src/box.py',
			language: 'python',
			content: 'def open(self):\n    return 1',
			startLine: 2,
			endLine: 3,
			chunkType: 'method',
			metadata: {name: 'open', parent: 'Box'},
			contentHash: 'hash',
		});

		expect(text).toBe(
			[
				'Repository: demo',
				'File: src/box.py',
				'Language: python',
				'Type: method',
				'Name: open',
				'Context: Box',
				'',
				'Code:',
				'def open(self):',
				'    return 1',
			].join('\n'),
		);
	});
});
