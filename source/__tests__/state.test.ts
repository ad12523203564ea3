/**
 * FileStateStore: round trip, atomic replace and corruption handling.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import {StateCommitError} from '../errors.js';
import {computeFingerprint} from '../lib/hash.js';
import {FileStateStore} from '../state/index.js';
import type {RepositoryState} from '../types.js';
import {createTempDir, type TempDir} from './helpers.js';

function makeState(overrides: Partial<RepositoryState> = {}): RepositoryState {
	return {
		repoName: 'demo',
		lastRevision: 'abc123',
		fileFingerprints: {'a.py': computeFingerprint('x = 1\n')},
		lastIngestedAt: '2026-01-02T03:04:05.000Z',
		...overrides,
	};
}

describe('FileStateStore', () => {
	let temp: TempDir;
	let store: FileStateStore;

	beforeEach(async () => {
		temp = await createTempDir();
		store = new FileStateStore(path.join(temp.dir, 'state'));
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await temp.cleanup();
	});

	it('returns null for a repository never ingested', async () => {
		expect(await store.load('demo')).toBeNull();
	});

	it('round-trips a committed state', async () => {
		const state = makeState();
		await store.commit(state);

		expect(await store.load('demo')).toEqual(state);
		expect(await store.list()).toEqual(['demo']);
	});

	it('replaces the prior state wholesale', async () => {
		await store.commit(makeState());
		const next = makeState({lastRevision: 'def456', fileFingerprints: {}});
		await store.commit(next);

		expect(await store.load('demo')).toEqual(next);
	});

	it('keeps the prior state when the rename fails', async () => {
		const prior = makeState();
		await store.commit(prior);
		vi.spyOn(fs, 'rename').mockRejectedValueOnce(new Error('disk full'));

		await expect(
			store.commit(makeState({lastRevision: 'def456'})),
		).rejects.toBeInstanceOf(StateCommitError);

		expect(await store.load('demo')).toEqual(prior);
		expect(await fs.readdir(path.join(temp.dir, 'state'))).toEqual(['demo.json']);
	});

	it('refuses to commit malformed fingerprints', async () => {
		await expect(
			store.commit(makeState({fileFingerprints: {'a.py': 'not-a-hash'}})),
		).rejects.toBeInstanceOf(StateCommitError);
		expect(await store.load('demo')).toBeNull();
	});

	it('reports a corrupt state file', async () => {
		await fs.mkdir(path.join(temp.dir, 'state'), {recursive: true});
		await fs.writeFile(store.getStatePath('demo'), '{"version": 1');

		await expect(store.load('demo')).rejects.toBeInstanceOf(StateCommitError);
	});

	it('deletes the state of one repository', async () => {
		await store.commit(makeState({repoName: 'team.api'}));
		await store.commit(makeState({repoName: 'demo'}));
		await store.delete('team.api');

		expect(await store.list()).toEqual(['demo']);
		expect(await store.load('team.api')).toBeNull();
	});
});
