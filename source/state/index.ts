/**
 * Durable per-repository ingestion state.
 *
 * One JSON file per repository. Commits replace the file wholesale through a
 * temp file + fsync + rename, so a reader sees either the prior state or the
 * new one.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {toFileSafeName} from '../constants.js';
import {StateCommitError, errorMessage} from '../errors.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import type {RepositoryState} from '../types.js';

export interface StateStore {
	/** Null when the repository was never ingested (or was reset) */
	load(repoName: string): Promise<RepositoryState | null>;
	/** All-or-nothing replace */
	commit(state: RepositoryState): Promise<void>;
	delete(repoName: string): Promise<void>;
	/** Names of repositories with stored state */
	list(): Promise<string[]>;
}

export const STATE_FILE_VERSION = 1;

const stateFileSchema = z.object({
	version: z.literal(STATE_FILE_VERSION),
	repoName: z.string().min(1),
	lastRevision: z.string().min(1).nullable(),
	fileFingerprints: z.record(z.string(), z.string().regex(/^[0-9a-f]{64}$/)),
	lastIngestedAt: z.string().datetime(),
});

type StateFile = z.infer<typeof stateFileSchema>;

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
	private readonly stateDir: string;
	private readonly logger: Logger;
	private tempCounter = 0;

	constructor(stateDir: string, logger: Logger = createNullLogger()) {
		this.stateDir = stateDir;
		this.logger = logger;
	}

	getStatePath(repoName: string): string {
		return path.join(this.stateDir, `${toFileSafeName(repoName)}.json`);
	}

	async load(repoName: string): Promise<RepositoryState | null> {
		const statePath = this.getStatePath(repoName);

		let content: string;
		try {
			content = await fs.readFile(statePath, 'utf-8');
		} catch (error) {
			if (isMissingFile(error)) {
				return null;
			}
			throw new StateCommitError(
				`Cannot read state for ${repoName}: ${errorMessage(error)}`,
				error,
			);
		}

		let parsed: StateFile;
		try {
			parsed = stateFileSchema.parse(JSON.parse(content));
		} catch (error) {
			throw new StateCommitError(
				`State file ${statePath} is corrupt: ${errorMessage(error)}`,
				error,
			);
		}

		return {
			repoName: parsed.repoName,
			lastRevision: parsed.lastRevision,
			fileFingerprints: parsed.fileFingerprints,
			lastIngestedAt: parsed.lastIngestedAt,
		};
	}

	async commit(state: RepositoryState): Promise<void> {
		const statePath = this.getStatePath(state.repoName);
		const tempPath = `${statePath}.${process.pid}.${this.tempCounter++}.tmp`;

		const result = stateFileSchema.safeParse({
			version: STATE_FILE_VERSION,
			...state,
		});
		if (!result.success) {
			throw new StateCommitError(
				`Refusing to commit invalid state for ${state.repoName}: ${result.error.issues[0]?.message ?? 'invalid'}`,
			);
		}

		try {
			await fs.mkdir(this.stateDir, {recursive: true});
			const handle = await fs.open(tempPath, 'w');
			try {
				await handle.writeFile(JSON.stringify(result.data, null, '\t') + '\n');
				await handle.sync();
			} finally {
				await handle.close();
			}
			await fs.rename(tempPath, statePath);
		} catch (error) {
			await fs.rm(tempPath, {force: true}).catch((cleanupError: unknown) => {
				this.logger.warn('state', `Cannot remove ${tempPath}`, {
					error: errorMessage(cleanupError),
				});
			});
			throw new StateCommitError(
				`Cannot commit state for ${state.repoName}: ${errorMessage(error)}`,
				error,
			);
		}

		this.logger.debug('state', `Committed state for ${state.repoName}`, {
			lastRevision: state.lastRevision,
			files: Object.keys(state.fileFingerprints).length,
		});
	}

	async delete(repoName: string): Promise<void> {
		try {
			await fs.rm(this.getStatePath(repoName), {force: true});
		} catch (error) {
			throw new StateCommitError(
				`Cannot delete state for ${repoName}: ${errorMessage(error)}`,
				error,
			);
		}
	}

	async list(): Promise<string[]> {
		let entries: string[];
		try {
			entries = await fs.readdir(this.stateDir);
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}
		return entries
			.filter(name => name.endsWith('.json'))
			.map(name => decodeURIComponent(name.slice(0, -'.json'.length)))
			.sort();
	}
}
