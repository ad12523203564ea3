/**
 * Per-repository mutual exclusion.
 *
 * At most one ingestion run (or reset) may touch a repository at a time.
 * The capability is an interface so a multi-instance deployment can back it
 * with something other than this process or this machine.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';
import {toFileSafeName} from '../constants.js';
import {IngestionInProgressError} from '../errors.js';
import {createNullLogger, type Logger} from '../logger/index.js';

/**
 * What to do when the repository is already held.
 * - queue: wait for the holder to finish
 * - reject: fail immediately with IngestionInProgressError
 */
export type LockPolicy = 'queue' | 'reject';

export interface RepositoryLock {
	runExclusive<T>(repoName: string, fn: () => Promise<T>): Promise<T>;
	isLocked(repoName: string): boolean;
}

// ============================================================================
// In-process lock
// ============================================================================

/**
 * Keyed promise chain. Callers for the same name run one after another;
 * different names never wait on each other.
 */
export class InProcessRepositoryLock implements RepositoryLock {
	private readonly tails = new Map<string, Promise<void>>();
	private readonly policy: LockPolicy;

	constructor(policy: LockPolicy = 'queue') {
		this.policy = policy;
	}

	isLocked(repoName: string): boolean {
		return this.tails.has(repoName);
	}

	async runExclusive<T>(repoName: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(repoName);
		if (previous && this.policy === 'reject') {
			throw new IngestionInProgressError(repoName);
		}

		let release: () => void = () => {};
		const current = new Promise<void>(resolve => {
			release = resolve;
		});
		const tail = previous ? previous.then(() => current) : current;
		this.tails.set(repoName, tail);

		try {
			if (previous) {
				await previous;
			}
			return await fn();
		} finally {
			release();
			if (this.tails.get(repoName) === tail) {
				this.tails.delete(repoName);
			}
		}
	}
}

// ============================================================================
// File lock
// ============================================================================

export interface FileRepositoryLockOptions {
	locksDir: string;
	policy?: LockPolicy;
	/** Lock is stale after this long without an mtime update (default: 30s) */
	staleMs?: number;
	logger?: Logger;
}

/**
 * Cross-process lock backed by proper-lockfile, one lock file per repository.
 * Same-process callers are serialized first by an in-process lock.
 */
export class FileRepositoryLock implements RepositoryLock {
	private readonly locksDir: string;
	private readonly policy: LockPolicy;
	private readonly staleMs: number;
	private readonly logger: Logger;
	private readonly local: InProcessRepositoryLock;

	constructor(options: FileRepositoryLockOptions) {
		this.locksDir = options.locksDir;
		this.policy = options.policy ?? 'queue';
		this.staleMs = options.staleMs ?? 30_000;
		this.logger = options.logger ?? createNullLogger();
		this.local = new InProcessRepositoryLock(this.policy);
	}

	isLocked(repoName: string): boolean {
		return this.local.isLocked(repoName);
	}

	getLockPath(repoName: string): string {
		return path.join(this.locksDir, `${toFileSafeName(repoName)}.lock`);
	}

	async runExclusive<T>(repoName: string, fn: () => Promise<T>): Promise<T> {
		return this.local.runExclusive(repoName, async () => {
			const release = await this.acquire(repoName);
			try {
				return await fn();
			} finally {
				await release();
			}
		});
	}

	private async acquire(repoName: string): Promise<() => Promise<void>> {
		await fs.mkdir(this.locksDir, {recursive: true});

		try {
			return await lockfile.lock(this.locksDir, {
				lockfilePath: this.getLockPath(repoName),
				realpath: false,
				stale: this.staleMs,
				update: Math.floor(this.staleMs / 3),
				retries:
					this.policy === 'queue'
						? {retries: 1000, factor: 1.5, minTimeout: 100, maxTimeout: 5000}
						: 0,
				onCompromised: err => {
					this.logger.error('lock', `Lock for ${repoName} compromised`, err);
				},
			});
		} catch (err) {
			if (err instanceof Error && 'code' in err && err.code === 'ELOCKED') {
				throw new IngestionInProgressError(repoName);
			}
			throw err;
		}
	}
}
