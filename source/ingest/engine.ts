/**
 * IngestionEngine - the exposed ingest / getState / reset API.
 *
 * Owns the configured repositories and the collaborators shared by every
 * run, and serializes work per repository through a RepositoryLock.
 */

import pLimit from 'p-limit';
import {StructuralChunker} from '../chunker/index.js';
import {TreeSitterParser} from '../chunker/parser.js';
import type {Chunker} from '../chunker/types.js';
import type {Settings} from '../config/index.js';
import {
	getLanceDbPath,
	getLocksDir,
	getStateDir,
} from '../constants.js';
import {BatchingEmbeddingClient} from '../embeddings/client.js';
import {OpenAIEmbeddingProvider} from '../embeddings/openai.js';
import type {EmbeddingClient} from '../embeddings/types.js';
import {
	RepositoryNotFoundError,
	errorMessage,
	isIngestError,
	type IngestErrorKind,
} from '../errors.js';
import {isAbortError} from '../lib/abort.js';
import {
	FileRepositoryLock,
	InProcessRepositoryLock,
	type RepositoryLock,
} from '../lock/index.js';
import {createLogger, createNullLogger, type Logger} from '../logger/index.js';
import {GitMirror} from '../mirror/git.js';
import type {RepositoryMirror} from '../mirror/types.js';
import {FileStateStore, type StateStore} from '../state/index.js';
import {LanceVectorIndex} from '../storage/lance.js';
import type {VectorIndex} from '../storage/types.js';
import type {RepositoryDescriptor, RepositoryState} from '../types.js';
import {IngestionOrchestrator} from './orchestrator.js';
import type {IngestionReport} from './types.js';
import {
	matchPushEvent,
	parsePushEvent,
	type WebhookHeaders,
} from './webhook.js';

export interface IngestOptions {
	/** Run one repository; omitted means every enabled repository */
	repoName?: string;
	force?: boolean;
	signal?: AbortSignal;
}

export interface RepositoryFailure {
	repoName: string;
	kind: IngestErrorKind | 'Unknown';
	message: string;
}

export interface IngestAllResult {
	reports: IngestionReport[];
	failures: RepositoryFailure[];
}

export type PushResult =
	| {status: 'ingested'; report: IngestionReport}
	| {status: 'ignored'; reason: string};

export interface RepositoryStats {
	repoName: string;
	enabled: boolean;
	chunkCount: number;
	fileCount: number;
	lastRevision: string | null;
	lastIngestedAt: string | null;
}

export interface IngestionEngineDeps {
	repositories: RepositoryDescriptor[];
	mirror: RepositoryMirror;
	chunker: Chunker;
	embeddings: EmbeddingClient;
	index: VectorIndex;
	state: StateStore;
	lock?: RepositoryLock;
	logger?: Logger;
	fileConcurrency?: number;
	repoConcurrency?: number;
	/** Shared secret for push webhooks; unset skips verification */
	webhookSecret?: string;
	now?: () => Date;
}

export class IngestionEngine {
	readonly orchestrator: IngestionOrchestrator;
	private readonly repositories: Map<string, RepositoryDescriptor>;
	private readonly index: VectorIndex;
	private readonly state: StateStore;
	private readonly embeddings: EmbeddingClient;
	private readonly lock: RepositoryLock;
	private readonly logger: Logger;
	private readonly repoConcurrency: number;
	private readonly webhookSecret: string | undefined;

	constructor(deps: IngestionEngineDeps) {
		this.repositories = new Map(deps.repositories.map(r => [r.name, r]));
		this.index = deps.index;
		this.state = deps.state;
		this.embeddings = deps.embeddings;
		this.lock = deps.lock ?? new InProcessRepositoryLock();
		this.logger = deps.logger ?? createNullLogger();
		this.repoConcurrency = Math.max(1, deps.repoConcurrency ?? 2);
		this.webhookSecret = deps.webhookSecret;
		this.orchestrator = new IngestionOrchestrator({
			mirror: deps.mirror,
			chunker: deps.chunker,
			embeddings: deps.embeddings,
			index: deps.index,
			state: deps.state,
			logger: this.logger,
			fileConcurrency: deps.fileConcurrency,
			now: deps.now,
		});
	}

	listRepositories(): RepositoryDescriptor[] {
		return [...this.repositories.values()];
	}

	/**
	 * Ingest one repository (throws its failure) or every enabled repository
	 * (collects failures).
	 */
	ingest(options: IngestOptions & {repoName: string}): Promise<IngestionReport>;
	ingest(options?: IngestOptions): Promise<IngestionReport | IngestAllResult>;
	async ingest(
		options: IngestOptions = {},
	): Promise<IngestionReport | IngestAllResult> {
		if (options.repoName !== undefined) {
			return this.ingestOne(this.getDescriptor(options.repoName), options);
		}
		return this.ingestAll(options);
	}

	async ingestAll(options: Omit<IngestOptions, 'repoName'> = {}): Promise<IngestAllResult> {
		const enabled = this.listRepositories().filter(r => r.enabled);
		const limit = pLimit(this.repoConcurrency);
		const reports: IngestionReport[] = [];
		const failures: RepositoryFailure[] = [];

		const outcomes = await Promise.allSettled(
			enabled.map(descriptor =>
				limit(async () => {
					try {
						reports.push(await this.ingestOne(descriptor, options));
					} catch (error) {
						if (options.signal?.aborted && isAbortError(error)) {
							throw error;
						}
						failures.push({
							repoName: descriptor.name,
							kind: isIngestError(error) ? error.kind : 'Unknown',
							message: errorMessage(error),
						});
					}
				}),
			),
		);

		// Every repository has settled; only now surface a cancellation
		for (const outcome of outcomes) {
			if (outcome.status === 'rejected') {
				throw outcome.reason;
			}
		}

		const byName = (a: {repoName: string}, b: {repoName: string}) =>
			a.repoName.localeCompare(b.repoName);
		return {reports: reports.sort(byName), failures: failures.sort(byName)};
	}

	/**
	 * Stored state for one repository, or for every configured repository.
	 */
	getState(repoName: string): Promise<RepositoryState | null>;
	getState(): Promise<Record<string, RepositoryState | null>>;
	async getState(
		repoName?: string,
	): Promise<RepositoryState | null | Record<string, RepositoryState | null>> {
		if (repoName !== undefined) {
			return this.state.load(this.getDescriptor(repoName).name);
		}

		const states: Record<string, RepositoryState | null> = {};
		for (const name of [...this.repositories.keys()].sort()) {
			states[name] = await this.state.load(name);
		}
		return states;
	}

	/**
	 * Remove a repository's state, then its chunks. The next ingest is a full
	 * one, and it purges any chunks left behind by a failed delete.
	 */
	async reset(repoName: string): Promise<{chunksDeleted: number}> {
		const descriptor = this.getDescriptor(repoName);
		return this.lock.runExclusive(descriptor.name, async () => {
			await this.state.delete(descriptor.name);
			const chunksDeleted = await this.index.deleteRepository(descriptor.name);
			this.logger.info('engine', `Reset ${descriptor.name}`, {chunksDeleted});
			return {chunksDeleted};
		});
	}

	/**
	 * Verify a push webhook and run an incremental ingest of the repository
	 * it names.
	 *
	 * @throws WebhookError on a bad signature or payload
	 */
	async ingestFromPush(
		rawBody: string,
		headers: WebhookHeaders,
		signal?: AbortSignal,
	): Promise<PushResult> {
		const event = parsePushEvent(rawBody, headers, this.webhookSecret);
		const match = matchPushEvent(event, this.listRepositories());
		if (!match.matched) {
			this.logger.info('engine', `Ignoring ${event.provider} push`, {
				ref: event.ref,
				reason: match.reason,
			});
			return {status: 'ignored', reason: match.reason};
		}

		const report = await this.ingestOne(match.descriptor, {signal});
		return {status: 'ingested', report};
	}

	async stats(): Promise<RepositoryStats[]> {
		const stats: RepositoryStats[] = [];
		for (const descriptor of this.listRepositories()) {
			const state = await this.state.load(descriptor.name);
			stats.push({
				repoName: descriptor.name,
				enabled: descriptor.enabled,
				chunkCount: await this.index.count(descriptor.name),
				fileCount: state ? Object.keys(state.fileFingerprints).length : 0,
				lastRevision: state?.lastRevision ?? null,
				lastIngestedAt: state?.lastIngestedAt ?? null,
			});
		}
		return stats.sort((a, b) => a.repoName.localeCompare(b.repoName));
	}

	async close(): Promise<void> {
		this.embeddings.close();
		await this.index.close();
	}

	private getDescriptor(repoName: string): RepositoryDescriptor {
		const descriptor = this.repositories.get(repoName);
		if (!descriptor) {
			throw new RepositoryNotFoundError(repoName);
		}
		return descriptor;
	}

	private async ingestOne(
		descriptor: RepositoryDescriptor,
		options: Omit<IngestOptions, 'repoName'>,
	): Promise<IngestionReport> {
		return this.lock.runExclusive(descriptor.name, async () => {
			try {
				return await this.orchestrator.run(descriptor, {
					force: options.force,
					signal: options.signal,
				});
			} catch (error) {
				this.logger.error(
					'engine',
					`Ingestion of ${descriptor.name} failed`,
					error instanceof Error ? error : {error: String(error)},
				);
				throw error;
			}
		});
	}
}

// ============================================================================
// Wiring
// ============================================================================

export type EngineOverrides = Partial<
	Omit<IngestionEngineDeps, 'repositories'>
>;

/**
 * Build an engine from settings with the default collaborators:
 * git mirror, tree-sitter chunker, OpenAI embeddings, LanceDB index and
 * file state. Any collaborator can be replaced through overrides.
 */
export function createEngine(
	settings: Settings,
	repositories: RepositoryDescriptor[],
	overrides: EngineOverrides = {},
): IngestionEngine {
	const logger =
		overrides.logger ?? createLogger(settings.dataDir, {level: settings.logLevel});

	const lock =
		overrides.lock ??
		(settings.lockMode === 'file'
			? new FileRepositoryLock({
					locksDir: getLocksDir(settings.dataDir),
					policy: settings.lockPolicy,
					logger,
				})
			: new InProcessRepositoryLock(settings.lockPolicy));

	return new IngestionEngine({
		repositories,
		logger,
		lock,
		mirror:
			overrides.mirror ??
			new GitMirror({
				token: settings.gitToken,
				timeoutMs: settings.gitTimeoutMs,
				logger,
			}),
		chunker:
			overrides.chunker ??
			new StructuralChunker({
				parser: new TreeSitterParser(),
				maxChunkSize: settings.maxChunkSize,
				chunkOverlap: settings.chunkOverlap,
				minChunkSize: settings.minChunkSize,
				logger,
			}),
		embeddings:
			overrides.embeddings ??
			new BatchingEmbeddingClient(
				new OpenAIEmbeddingProvider({
					apiKey: settings.openaiApiKey,
					baseUrl: settings.openaiBaseUrl,
					model: settings.embeddingModel,
					dimensions: settings.embeddingDimensions,
					timeoutMs: settings.embeddingTimeoutMs,
				}),
				{maxRetries: settings.embeddingMaxRetries, logger},
			),
		index:
			overrides.index ??
			new LanceVectorIndex({
				dbPath: getLanceDbPath(settings.dataDir),
				dimensions: settings.embeddingDimensions,
				logger,
			}),
		state: overrides.state ?? new FileStateStore(getStateDir(settings.dataDir), logger),
		fileConcurrency: overrides.fileConcurrency ?? settings.fileConcurrency,
		repoConcurrency: overrides.repoConcurrency ?? settings.repoConcurrency,
		webhookSecret: overrides.webhookSecret ?? settings.webhookSecret,
		now: overrides.now,
	});
}
