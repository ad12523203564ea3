/**
 * IngestionEngine: single and bulk ingest, state, reset, push webhooks.
 */

import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {loadSettings} from '../config/index.js';
import {BatchingEmbeddingClient} from '../embeddings/client.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import {
	IndexWriteFailureError,
	IngestionInProgressError,
	RepositoryNotFoundError,
	StateCommitError,
	WebhookError,
} from '../errors.js';
import {isAbortError} from '../lib/abort.js';
import {IngestionEngine, createEngine} from '../ingest/engine.js';
import {signGithubPayload} from '../ingest/webhook.js';
import {InProcessRepositoryLock} from '../lock/index.js';
import {createNullLogger} from '../logger/index.js';
import type {RepositoryMirror} from '../mirror/types.js';
import {FileStateStore} from '../state/index.js';
import {InMemoryVectorIndex} from '../storage/memory.js';
import type {ChangeSet, RepositoryDescriptor} from '../types.js';
import {
	FakeMirror,
	createTempDir,
	createWindowChunker,
	makeDescriptor,
	type TempDir,
} from './helpers.js';

/**
 * One scripted mirror per repository name.
 */
class RoutingMirror implements RepositoryMirror {
	readonly mirrors = new Map<string, FakeMirror>();

	for(name: string): FakeMirror {
		let mirror = this.mirrors.get(name);
		if (!mirror) {
			mirror = new FakeMirror();
			this.mirrors.set(name, mirror);
		}
		return mirror;
	}

	sync(d: RepositoryDescriptor): Promise<string> {
		return this.for(d.name).sync(d);
	}

	diff(d: RepositoryDescriptor, from: string | null, to: string): Promise<ChangeSet> {
		return this.for(d.name).diff(d, from, to);
	}

	listFiles(d: RepositoryDescriptor, revision: string): Promise<string[]> {
		return this.for(d.name).listFiles(d, revision);
	}

	readFile(d: RepositoryDescriptor, filePath: string): Promise<string> {
		return this.for(d.name).readFile(d, filePath);
	}
}

class UndeletableIndex extends InMemoryVectorIndex {
	override async deleteRepository(repoName: string): Promise<number> {
		throw new IndexWriteFailureError(`Vector index delete repository failed for ${repoName}`);
	}
}

class UndeletableStateStore extends FileStateStore {
	override async delete(repoName: string): Promise<void> {
		throw new StateCommitError(`Cannot delete state for ${repoName}`);
	}
}

describe('IngestionEngine', () => {
	let temp: TempDir;
	let mirror: RoutingMirror;
	let index: InMemoryVectorIndex;
	let state: FileStateStore;
	let engine: IngestionEngine;

	const repositories = [
		makeDescriptor({name: 'alpha'}),
		makeDescriptor({name: 'beta'}),
		makeDescriptor({name: 'gamma', enabled: false}),
	];

	function buildEngine(lock = new InProcessRepositoryLock()) {
		return new IngestionEngine({
			repositories,
			mirror,
			chunker: createWindowChunker(),
			embeddings: new BatchingEmbeddingClient(new MockEmbeddingProvider(8)),
			index,
			state,
			lock,
			webhookSecret: 'test-secret',
		});
	}

	beforeEach(async () => {
		temp = await createTempDir();
		mirror = new RoutingMirror();
		index = new InMemoryVectorIndex();
		state = new FileStateStore(path.join(temp.dir, 'state'));
		engine = buildEngine();
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	it('ingests one repository by name', async () => {
		mirror.for('alpha').push('a1', {'main.py': 'print(1)'});

		const report = await engine.ingest({repoName: 'alpha'});

		expect(report).toMatchObject({repoName: 'alpha', revision: 'a1', filesAdded: 1});
		expect(await index.listFilePaths('alpha')).toEqual(['main.py']);
	});

	it('rejects an unknown repository', async () => {
		await expect(engine.ingest({repoName: 'nope'})).rejects.toBeInstanceOf(
			RepositoryNotFoundError,
		);
		await expect(engine.reset('nope')).rejects.toBeInstanceOf(RepositoryNotFoundError);
	});

	it('runs every enabled repository and collects failures', async () => {
		mirror.for('alpha').push('a1', {'main.py': 'print(1)'});
		mirror.for('gamma').push('g1', {'main.py': 'print(3)'});

		const result = await engine.ingest();

		expect('reports' in result && result.reports.map(r => r.repoName)).toEqual(['alpha']);
		expect('failures' in result && result.failures).toEqual([
			{repoName: 'beta', kind: 'SourceUnavailable', message: 'Nothing to clone for beta'},
		]);
		expect(await index.count('gamma')).toBe(0);
	});

	it('ingests a disabled repository when named', async () => {
		mirror.for('gamma').push('g1', {'main.py': 'print(3)'});

		const report = await engine.ingest({repoName: 'gamma'});

		expect(report.filesAdded).toBe(1);
	});

	it('returns state for one or every repository', async () => {
		mirror.for('alpha').push('a1', {'main.py': 'print(1)'});
		await engine.ingest({repoName: 'alpha'});

		expect((await engine.getState('alpha'))?.lastRevision).toBe('a1');
		const all = await engine.getState();
		expect(Object.keys(all)).toEqual(['alpha', 'beta', 'gamma']);
		expect(all['beta']).toBeNull();
		expect(all['alpha']?.lastRevision).toBe('a1');
	});

	it('reset drops chunks and state so the next run is a full one', async () => {
		mirror.for('alpha').push('a1', {'main.py': 'print(1)', 'util.py': 'X = 1'});
		await engine.ingest({repoName: 'alpha'});

		expect(await engine.reset('alpha')).toEqual({chunksDeleted: 2});
		expect(await engine.getState('alpha')).toBeNull();
		expect(await index.count('alpha')).toBe(0);

		const report = await engine.ingest({repoName: 'alpha'});
		expect(report).toMatchObject({previousRevision: null, filesAdded: 2, noop: false});
	});

	it('reset leaves the repository fully re-ingestable when the chunk delete fails', async () => {
		index = new UndeletableIndex();
		engine = buildEngine();
		mirror.for('alpha').push('a1', {'main.py': 'print(1)', 'util.py': 'X = 1'});
		await engine.ingest({repoName: 'alpha'});

		await expect(engine.reset('alpha')).rejects.toBeInstanceOf(IndexWriteFailureError);
		expect(await engine.getState('alpha')).toBeNull();

		const report = await engine.ingest({repoName: 'alpha'});
		expect(report).toMatchObject({previousRevision: null, filesAdded: 2, noop: false});
		expect(await index.listFilePaths('alpha')).toEqual(['main.py', 'util.py']);
		expect(await index.count('alpha')).toBe(2);
	});

	it('reset keeps the chunks when the state cannot be deleted', async () => {
		state = new UndeletableStateStore(path.join(temp.dir, 'state'));
		engine = buildEngine();
		mirror.for('alpha').push('a1', {'main.py': 'print(1)'});
		await engine.ingest({repoName: 'alpha'});

		await expect(engine.reset('alpha')).rejects.toBeInstanceOf(StateCommitError);

		expect(await index.count('alpha')).toBe(1);
		expect((await engine.getState('alpha'))?.lastRevision).toBe('a1');
	});

	it('waits for every repository before surfacing a cancellation', async () => {
		const controller = new AbortController();
		let betaSynced = false;
		const alpha = mirror.for('alpha').push('a1', {'main.py': 'print(1)'});
		const beta = mirror.for('beta').push('b1', {'main.py': 'print(2)'});
		const alphaSync = alpha.sync.bind(alpha);
		alpha.sync = async descriptor => {
			controller.abort();
			return alphaSync(descriptor);
		};
		const betaSync = beta.sync.bind(beta);
		beta.sync = async descriptor => {
			await new Promise(resolve => setTimeout(resolve, 20));
			betaSynced = true;
			return betaSync(descriptor);
		};

		const outcome = await engine.ingestAll({signal: controller.signal}).then(
			() => null,
			(error: unknown) => error,
		);

		expect(isAbortError(outcome)).toBe(true);
		expect(betaSynced).toBe(true);
		expect(await index.count()).toBe(0);
		expect(await engine.getState('beta')).toBeNull();
	});

	it('reports per-repository statistics', async () => {
		mirror.for('alpha').push('a1', {'main.py': 'print(1)', 'util.py': 'X = 1'});
		await engine.ingest({repoName: 'alpha'});

		const stats = await engine.stats();

		expect(stats.map(s => [s.repoName, s.chunkCount, s.fileCount, s.lastRevision])).toEqual([
			['alpha', 2, 2, 'a1'],
			['beta', 0, 0, null],
			['gamma', 0, 0, null],
		]);
	});

	it('rejects an overlapping run under the reject policy', async () => {
		engine = buildEngine(new InProcessRepositoryLock('reject'));
		mirror.for('alpha').push('a1', {'main.py': 'print(1)'});

		const first = engine.ingest({repoName: 'alpha'});
		await expect(engine.ingest({repoName: 'alpha'})).rejects.toBeInstanceOf(
			IngestionInProgressError,
		);
		await expect(first).resolves.toMatchObject({revision: 'a1'});
	});

	describe('ingestFromPush', () => {
		function pushBody(ref: string) {
			return JSON.stringify({
				ref,
				repository: {clone_url: 'https://git.example.com/acme/alpha.git'},
			});
		}

		it('ingests the pushed repository', async () => {
			mirror.for('alpha').push('a1', {'main.py': 'print(1)'});
			const body = pushBody('refs/heads/main');

			const result = await engine.ingestFromPush(body, {
				'x-github-event': 'push',
				'x-hub-signature-256': signGithubPayload(body, 'test-secret'),
			});

			expect(result.status).toBe('ingested');
			expect(result.status === 'ingested' && result.report.repoName).toBe('alpha');
		});

		it('ignores pushes to untracked branches', async () => {
			const body = pushBody('refs/heads/feature');

			expect(
				await engine.ingestFromPush(body, {
					'x-github-event': 'push',
					'x-hub-signature-256': signGithubPayload(body, 'test-secret'),
				}),
			).toEqual({
				status: 'ignored',
				reason: 'Push to refs/heads/feature does not touch a tracked branch',
			});
		});

		it('rejects unsigned pushes', async () => {
			await expect(
				engine.ingestFromPush(pushBody('refs/heads/main'), {'x-github-event': 'push'}),
			).rejects.toBeInstanceOf(WebhookError);
		});
	});
});

describe('createEngine', () => {
	let temp: TempDir;

	beforeEach(async () => {
		temp = await createTempDir();
	});

	afterEach(async () => {
		await temp.cleanup();
	});

	it('ingests a Python repository end to end with the default chunker', async () => {
		const settings = loadSettings({DATA_DIR: temp.dir});
		const mirror = new FakeMirror().push('c1', {
			'a.py': 'class A: def m(): pass',
			'b.py': 'x=1',
		});
		const index = new InMemoryVectorIndex();
		const engine = createEngine(
			settings,
			[makeDescriptor({name: 'demo'})],
			{
				mirror,
				index,
				embeddings: new BatchingEmbeddingClient(new MockEmbeddingProvider(8)),
				logger: createNullLogger(),
			},
		);

		const first = await engine.ingest({repoName: 'demo'});
		expect(first).toMatchObject({filesAdded: 2, revision: 'c1', errors: []});
		expect(await index.count('demo')).toBeGreaterThanOrEqual(2);
		expect((await engine.getState('demo'))?.lastRevision).toBe('c1');

		mirror.push('c2', {'a.py': 'class A: def m(): pass'});
		const second = await engine.ingest({repoName: 'demo'});
		expect(second.filesDeleted).toBe(1);
		expect(await index.query(new Array<number>(8).fill(1), 10, {filePaths: ['b.py']})).toEqual(
			[],
		);

		await engine.close();
	});
});
