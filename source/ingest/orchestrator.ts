/**
 * Ingestion orchestrator.
 *
 * One run per repository: sync the mirror, compute the change set, reconcile
 * the vector index file by file, then commit the new state in one write.
 *
 * Per-file reconciliation is embed first, then delete old chunks, then upsert
 * new chunks. A file whose embedding fails keeps its old chunks and old
 * fingerprint. State is committed once, at the end; `lastRevision` advances
 * only when every file succeeded, so the next diff covers the failures again.
 */

import pLimit from 'p-limit';
import type {Chunker} from '../chunker/types.js';
import type {EmbeddingClient} from '../embeddings/types.js';
import {prepareChunkText} from '../embeddings/text.js';
import {errorMessage} from '../errors.js';
import {isAbortError, throwIfAborted} from '../lib/abort.js';
import {TypedEmitter} from '../lib/events.js';
import {computeFingerprint} from '../lib/hash.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {detectLanguage} from '../mirror/filter.js';
import type {RepositoryMirror} from '../mirror/types.js';
import type {StateStore} from '../state/index.js';
import type {CodeChunk, VectorIndex} from '../storage/types.js';
import type {
	ChangeSet,
	RepositoryDescriptor,
	RepositoryState,
} from '../types.js';
import type {
	FileError,
	IngestionReport,
	OrchestratorEvents,
	RunOptions,
} from './types.js';

export interface OrchestratorDeps {
	mirror: RepositoryMirror;
	chunker: Chunker;
	embeddings: EmbeddingClient;
	index: VectorIndex;
	state: StateStore;
	logger?: Logger;
	/** Files processed in parallel within one run (default: 4) */
	fileConcurrency?: number;
	now?: () => Date;
}

/**
 * Mutable tallies for one run.
 */
interface RunTally {
	fingerprints: Record<string, string>;
	errors: FileError[];
	filesUnchanged: number;
	chunksWritten: number;
	chunksDeleted: number;
}

export class IngestionOrchestrator extends TypedEmitter<OrchestratorEvents> {
	private readonly mirror: RepositoryMirror;
	private readonly chunker: Chunker;
	private readonly embeddings: EmbeddingClient;
	private readonly index: VectorIndex;
	private readonly state: StateStore;
	private readonly logger: Logger;
	private readonly fileConcurrency: number;
	private readonly now: () => Date;

	constructor(deps: OrchestratorDeps) {
		super();
		this.mirror = deps.mirror;
		this.chunker = deps.chunker;
		this.embeddings = deps.embeddings;
		this.index = deps.index;
		this.state = deps.state;
		this.logger = deps.logger ?? createNullLogger();
		this.fileConcurrency = Math.max(1, deps.fileConcurrency ?? 4);
		this.now = deps.now ?? (() => new Date());
	}

	/**
	 * Bring the index and state of one repository up to date.
	 *
	 * @throws SourceUnavailableError, HistoryDivergedError, StateCommitError,
	 * IndexWriteFailureError when the index cannot be listed on a full run,
	 * or an AbortError. Per-file failures are reported, never thrown.
	 */
	async run(
		descriptor: RepositoryDescriptor,
		options: RunOptions = {},
	): Promise<IngestionReport> {
		const {name} = descriptor;
		const force = options.force ?? false;
		const signal = options.signal;
		const startedAt = this.now();

		const stored = await this.state.load(name);
		const prior = force ? null : stored;

		const revision = await this.mirror.sync(descriptor);
		const previousRevision = prior?.lastRevision ?? null;

		if (prior && previousRevision === revision) {
			this.logger.info('orchestrator', `${name} is up to date at ${revision}`);
			const report = this.buildReport(descriptor, {
				revision,
				previousRevision,
				force,
				noop: true,
				startedAt,
				changes: {added: [], modified: [], deleted: []},
				tally: emptyTally({}),
			});
			this.emit('run-complete', report);
			return report;
		}

		throwIfAborted(signal, `Ingestion of ${name} cancelled`);

		const baseline = prior?.fileFingerprints ?? {};
		const changes = await this.computeChanges(
			descriptor,
			previousRevision,
			revision,
			baseline,
		);
		this.logger.info('orchestrator', `Ingesting ${name}`, {
			from: previousRevision,
			to: revision,
			force,
			added: changes.added.length,
			modified: changes.modified.length,
			deleted: changes.deleted.length,
		});

		const tally = emptyTally(baseline);

		for (const filePath of changes.deleted) {
			throwIfAborted(signal, `Ingestion of ${name} cancelled`);
			await this.removeFile(name, filePath, tally);
		}

		const limit = pLimit(this.fileConcurrency);
		const outcomes = await Promise.allSettled(
			[...changes.added, ...changes.modified].map(filePath =>
				limit(async () => {
					throwIfAborted(signal, `Ingestion of ${name} cancelled`);
					await this.reconcileFile(descriptor, filePath, baseline, tally, signal);
				}),
			),
		);
		// Every in-flight file has settled; only now surface a cancellation
		for (const outcome of outcomes) {
			if (outcome.status === 'rejected') {
				throw outcome.reason;
			}
		}

		const succeeded = tally.errors.length === 0;
		const nextState: RepositoryState = {
			repoName: name,
			lastRevision: succeeded ? revision : previousRevision,
			fileFingerprints: sortRecord(tally.fingerprints),
			lastIngestedAt: startedAt.toISOString(),
		};
		await this.state.commit(nextState);

		const report = this.buildReport(descriptor, {
			revision,
			previousRevision,
			force,
			noop: false,
			startedAt,
			changes,
			tally,
		});

		if (succeeded) {
			this.logger.info('orchestrator', `Ingested ${name} at ${revision}`, {
				chunksWritten: report.chunksWritten,
				chunksDeleted: report.chunksDeleted,
				durationMs: report.durationMs,
			});
		} else {
			this.logger.warn(
				'orchestrator',
				`Ingested ${name} with ${tally.errors.length} failed file(s); revision stays at ${previousRevision ?? 'none'}`,
				{errors: tally.errors},
			);
		}
		this.emit('run-complete', report);
		return report;
	}

	/**
	 * Diff against the recorded revision, then reconcile it with the
	 * fingerprints and the current listing:
	 * - a recorded file missing from the listing is deleted
	 * - a listed file with no fingerprint is (re)added
	 * - an "added" file that already has a fingerprint is modified
	 * On a run with no recorded revision, indexed files missing from the
	 * listing are deleted too (orphans of an earlier state).
	 */
	private async computeChanges(
		descriptor: RepositoryDescriptor,
		from: string | null,
		to: string,
		baseline: Record<string, string>,
	): Promise<ChangeSet> {
		const diff = await this.mirror.diff(descriptor, from, to);
		const listing =
			from === null ? diff.added : await this.mirror.listFiles(descriptor, to);
		const listed = new Set(listing);
		const known = new Set(Object.keys(baseline));

		const modified = new Set(diff.modified.filter(p => listed.has(p)));
		const added = new Set<string>();
		for (const filePath of diff.added) {
			if (!listed.has(filePath)) continue;
			if (known.has(filePath)) modified.add(filePath);
			else added.add(filePath);
		}
		for (const filePath of listing) {
			if (!known.has(filePath) && !modified.has(filePath)) {
				added.add(filePath);
			}
		}

		const deleted = new Set(diff.deleted.filter(p => !listed.has(p)));
		for (const filePath of known) {
			if (!listed.has(filePath)) deleted.add(filePath);
		}
		if (from === null) {
			for (const filePath of await this.index.listFilePaths(descriptor.name)) {
				if (!listed.has(filePath)) deleted.add(filePath);
			}
		}

		return {
			added: [...added].sort(),
			modified: [...modified].sort(),
			deleted: [...deleted].sort(),
		};
	}

	private async removeFile(repoName: string, filePath: string, tally: RunTally) {
		try {
			const removed = await this.index.deleteWhere({repoName, filePaths: [filePath]});
			tally.chunksDeleted += removed;
			delete tally.fingerprints[filePath];
			this.emit('file-deleted', {repoName, filePath, chunks: removed});
		} catch (error) {
			this.recordFailure(repoName, tally, {
				filePath,
				kind: 'IndexWriteFailure',
				message: errorMessage(error),
			});
		}
	}

	private async reconcileFile(
		descriptor: RepositoryDescriptor,
		filePath: string,
		baseline: Record<string, string>,
		tally: RunTally,
		signal?: AbortSignal,
	): Promise<void> {
		const repoName = descriptor.name;
		const language = detectLanguage(filePath);
		if (!language) {
			this.logger.debug('orchestrator', `Skipping unsupported ${filePath}`);
			return;
		}

		let content: string;
		try {
			content = await this.mirror.readFile(descriptor, filePath);
		} catch (error) {
			this.recordFailure(repoName, tally, {
				filePath,
				kind: 'ReadFailure',
				message: errorMessage(error),
			});
			return;
		}

		const fingerprint = computeFingerprint(content);
		if (baseline[filePath] === fingerprint) {
			tally.filesUnchanged++;
			return;
		}

		const chunks = await this.chunker.chunk({
			repoName,
			filePath,
			content,
			language,
		});

		let vectors: number[][];
		try {
			vectors = await this.embeddings.embed(chunks.map(prepareChunkText), signal);
		} catch (error) {
			if (signal?.aborted && isAbortError(error)) {
				throw error;
			}
			this.recordFailure(repoName, tally, {
				filePath,
				kind: 'EmbeddingUnavailable',
				message: errorMessage(error),
			});
			return;
		}

		const createdAt = this.now().toISOString();
		const rows: CodeChunk[] = chunks.map((chunk, i) => ({
			...chunk,
			embedding: vectors[i] ?? [],
			createdAt,
		}));

		// Delete strictly before upsert: old and new chunks never coexist
		try {
			const removed = await this.index.deleteWhere({repoName, filePaths: [filePath]});
			tally.chunksDeleted += removed;
			await this.index.upsert(rows);
		} catch (error) {
			// Old chunks may be gone; forget the fingerprint so the file is redone
			delete tally.fingerprints[filePath];
			this.recordFailure(repoName, tally, {
				filePath,
				kind: 'IndexWriteFailure',
				message: errorMessage(error),
			});
			return;
		}

		tally.chunksWritten += rows.length;
		tally.fingerprints[filePath] = fingerprint;
		this.emit('file-indexed', {repoName, filePath, chunks: rows.length});
	}

	private recordFailure(repoName: string, tally: RunTally, error: FileError) {
		tally.errors.push(error);
		this.logger.warn('orchestrator', `${repoName}:${error.filePath} failed`, {
			kind: error.kind,
			message: error.message,
		});
		this.emit('file-failed', {repoName, error});
	}

	private buildReport(
		descriptor: RepositoryDescriptor,
		run: {
			revision: string;
			previousRevision: string | null;
			force: boolean;
			noop: boolean;
			startedAt: Date;
			changes: ChangeSet;
			tally: RunTally;
		},
	): IngestionReport {
		return {
			repoName: descriptor.name,
			revision: run.revision,
			previousRevision: run.previousRevision,
			forced: run.force,
			noop: run.noop,
			filesAdded: run.changes.added.length,
			filesModified: run.changes.modified.length,
			filesDeleted: run.changes.deleted.length,
			filesUnchanged: run.tally.filesUnchanged,
			chunksWritten: run.tally.chunksWritten,
			chunksDeleted: run.tally.chunksDeleted,
			errors: [...run.tally.errors].sort((a, b) =>
				a.filePath.localeCompare(b.filePath),
			),
			startedAt: run.startedAt.toISOString(),
			durationMs: Math.max(0, this.now().getTime() - run.startedAt.getTime()),
		};
	}
}

function emptyTally(baseline: Record<string, string>): RunTally {
	return {
		fingerprints: {...baseline},
		errors: [],
		filesUnchanged: 0,
		chunksWritten: 0,
		chunksDeleted: 0,
	};
}

function sortRecord(record: Record<string, string>): Record<string, string> {
	const sorted: Record<string, string> = {};
	for (const key of Object.keys(record).sort()) {
		const value = record[key];
		if (value !== undefined) sorted[key] = value;
	}
	return sorted;
}
