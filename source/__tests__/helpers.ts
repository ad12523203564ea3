/**
 * Shared fixtures: temp directories, a scripted mirror and embedding
 * providers that fail on demand.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {StructuralChunker} from '../chunker/index.js';
import type {StructuralParser} from '../chunker/types.js';
import {BatchingEmbeddingClient} from '../embeddings/client.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {ProviderHttpError, type EmbeddingProvider} from '../embeddings/types.js';
import {HistoryDivergedError, SourceUnavailableError} from '../errors.js';
import {IngestionOrchestrator} from '../ingest/orchestrator.js';
import {createPathFilter} from '../mirror/filter.js';
import type {RepositoryMirror} from '../mirror/types.js';
import {FileStateStore} from '../state/index.js';
import {InMemoryVectorIndex} from '../storage/memory.js';
import type {ChangeSet, RepositoryDescriptor} from '../types.js';

// ============================================================================
// Temp directories
// ============================================================================

export interface TempDir {
	dir: string;
	cleanup: () => Promise<void>;
}

export async function createTempDir(prefix = 'repo-ingest-test-'): Promise<TempDir> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
	return {
		dir,
		cleanup: () => fs.rm(dir, {recursive: true, force: true}),
	};
}

// ============================================================================
// Descriptors
// ============================================================================

export function makeDescriptor(
	overrides: Partial<RepositoryDescriptor> = {},
): RepositoryDescriptor {
	const name = overrides.name ?? 'demo';
	return {
		name,
		url: `https://git.example.com/acme/${name}.git`,
		branch: 'main',
		localPath: path.join(os.tmpdir(), 'repo-ingest-mirrors', name),
		languages: [],
		excludePatterns: [],
		enabled: true,
		...overrides,
	};
}

// ============================================================================
// Scripted mirror
// ============================================================================

export type Snapshot = Record<string, string>;

/**
 * In-memory mirror. Each revision is a full snapshot of the tree; `push`
 * adds one and moves the branch head to it.
 */
export class FakeMirror implements RepositoryMirror {
	private readonly revisions = new Map<string, Snapshot>();
	private readonly order: string[] = [];
	private head: string | null = null;
	syncCalls = 0;
	/** Paths whose reads fail */
	readonly unreadable = new Set<string>();
	/** Error thrown by the next sync, if any */
	syncError: Error | null = null;

	push(revision: string, snapshot: Snapshot): this {
		this.revisions.set(revision, {...snapshot});
		this.order.push(revision);
		this.head = revision;
		return this;
	}

	/** Drop every revision but the head, as a force push would */
	rewriteHistory(revision: string, snapshot: Snapshot): this {
		this.revisions.clear();
		this.order.length = 0;
		return this.push(revision, snapshot);
	}

	async sync(descriptor: RepositoryDescriptor): Promise<string> {
		this.syncCalls++;
		if (this.syncError) {
			const error = this.syncError;
			this.syncError = null;
			throw error;
		}
		if (!this.head) {
			throw new SourceUnavailableError(`Nothing to clone for ${descriptor.name}`);
		}
		return this.head;
	}

	async diff(
		descriptor: RepositoryDescriptor,
		from: string | null,
		to: string,
	): Promise<ChangeSet> {
		const target = this.snapshot(to);
		if (from === null) {
			return {added: this.filter(descriptor, Object.keys(target)), modified: [], deleted: []};
		}
		const base = this.revisions.get(from);
		if (!base) {
			throw new HistoryDivergedError(descriptor.name, `unknown revision ${from}`);
		}

		const added: string[] = [];
		const modified: string[] = [];
		const deleted: string[] = [];
		for (const [filePath, content] of Object.entries(target)) {
			if (!(filePath in base)) added.push(filePath);
			else if (base[filePath] !== content) modified.push(filePath);
		}
		for (const filePath of Object.keys(base)) {
			if (!(filePath in target)) deleted.push(filePath);
		}
		return {
			added: this.filter(descriptor, added),
			modified: this.filter(descriptor, modified),
			deleted: this.filter(descriptor, deleted),
		};
	}

	async listFiles(descriptor: RepositoryDescriptor, revision: string): Promise<string[]> {
		return this.filter(descriptor, Object.keys(this.snapshot(revision)));
	}

	async readFile(_descriptor: RepositoryDescriptor, filePath: string): Promise<string> {
		if (this.unreadable.has(filePath)) {
			throw new Error(`ENOENT: ${filePath}`);
		}
		const content = this.head ? this.snapshot(this.head)[filePath] : undefined;
		if (content === undefined) {
			throw new Error(`ENOENT: ${filePath}`);
		}
		return content;
	}

	private snapshot(revision: string): Snapshot {
		const snapshot = this.revisions.get(revision);
		if (!snapshot) {
			throw new Error(`Unknown revision ${revision}`);
		}
		return snapshot;
	}

	private filter(descriptor: RepositoryDescriptor, paths: string[]): string[] {
		const filter = createPathFilter(descriptor);
		return paths.filter(p => filter.includes(p)).sort();
	}
}

// ============================================================================
// Embedding providers
// ============================================================================

/**
 * Mock provider that rejects any batch containing a marker string, with a
 * non-retriable status so tests never wait on backoff.
 */
export class FlakyEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	readonly maxBatchSize: number;
	private readonly inner: MockEmbeddingProvider;
	failMarker: string | null = null;
	calls = 0;

	constructor(dimensions = 16, maxBatchSize = 8) {
		this.dimensions = dimensions;
		this.maxBatchSize = maxBatchSize;
		this.inner = new MockEmbeddingProvider(dimensions, maxBatchSize);
	}

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.calls++;
		const marker = this.failMarker;
		if (marker !== null && texts.some(t => t.includes(marker))) {
			throw new ProviderHttpError(400, 'embedding rejected');
		}
		return this.inner.embed(texts);
	}

	close(): void {}
}

// ============================================================================
// Harness
// ============================================================================

/**
 * Chunker that never parses, so every file is windowed.
 */
export function createWindowChunker(parser: StructuralParser | null = null) {
	return new StructuralChunker({
		parser,
		maxChunkSize: 200,
		chunkOverlap: 40,
		minChunkSize: 1,
	});
}

export interface Harness {
	mirror: FakeMirror;
	provider: FlakyEmbeddingProvider;
	index: InMemoryVectorIndex;
	state: FileStateStore;
	orchestrator: IngestionOrchestrator;
	descriptor: RepositoryDescriptor;
	temp: TempDir;
}

export async function createHarness(
	descriptor: RepositoryDescriptor = makeDescriptor(),
	index: InMemoryVectorIndex = new InMemoryVectorIndex(),
): Promise<Harness> {
	const temp = await createTempDir();
	const mirror = new FakeMirror();
	const provider = new FlakyEmbeddingProvider();
	const state = new FileStateStore(path.join(temp.dir, 'state'));
	const orchestrator = new IngestionOrchestrator({
		mirror,
		chunker: createWindowChunker(),
		embeddings: new BatchingEmbeddingClient(provider, {maxRetries: 0}),
		index,
		state,
		fileConcurrency: 2,
	});
	return {mirror, provider, index, state, orchestrator, descriptor, temp};
}
