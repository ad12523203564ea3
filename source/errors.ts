/**
 * Error taxonomy for ingestion.
 *
 * Repository-scoped errors are thrown from a run. File-scoped errors are
 * collected into the run's report and never thrown past the orchestrator.
 */

// ============================================================================
// Kinds
// ============================================================================

export type IngestErrorKind =
	| 'SourceUnavailable'
	| 'HistoryDiverged'
	| 'EmbeddingUnavailable'
	| 'IndexWriteFailure'
	| 'StateCommitFailure'
	| 'IngestionInProgress'
	| 'RepositoryNotFound'
	| 'ConfigInvalid'
	| 'WebhookRejected';

/**
 * Kinds recorded per file in an IngestionReport.
 * ReadFailure covers a file listed by the diff that could not be read.
 */
export type FileErrorKind =
	| 'EmbeddingUnavailable'
	| 'IndexWriteFailure'
	| 'ReadFailure';

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for every error raised by this package.
 */
export class IngestError extends Error {
	readonly kind: IngestErrorKind;

	constructor(kind: IngestErrorKind, message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : {cause});
		this.name = 'IngestError';
		this.kind = kind;
	}
}

/**
 * The remote could not be reached, or rejected our credentials.
 */
export class SourceUnavailableError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('SourceUnavailable', message, cause);
		this.name = 'SourceUnavailableError';
	}
}

/**
 * Local history is incompatible with the remote (force push, rewritten base).
 * Recovery is a forced full re-index.
 */
export class HistoryDivergedError extends IngestError {
	readonly repoName: string;

	constructor(repoName: string, detail: string, cause?: unknown) {
		super(
			'HistoryDiverged',
			`History of ${repoName} diverged from the remote (${detail}); run with force to re-index`,
			cause,
		);
		this.name = 'HistoryDivergedError';
		this.repoName = repoName;
	}
}

export class EmbeddingUnavailableError extends IngestError {
	readonly attempts: number;

	constructor(message: string, attempts: number, cause?: unknown) {
		super('EmbeddingUnavailable', message, cause);
		this.name = 'EmbeddingUnavailableError';
		this.attempts = attempts;
	}
}

export class IndexWriteFailureError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('IndexWriteFailure', message, cause);
		this.name = 'IndexWriteFailureError';
	}
}

/**
 * Persisting (or reading back) repository state failed.
 * The prior state on disk is untouched.
 */
export class StateCommitError extends IngestError {
	constructor(message: string, cause?: unknown) {
		super('StateCommitFailure', message, cause);
		this.name = 'StateCommitError';
	}
}

export class IngestionInProgressError extends IngestError {
	readonly repoName: string;

	constructor(repoName: string) {
		super(
			'IngestionInProgress',
			`An ingestion run for ${repoName} is already in progress`,
		);
		this.name = 'IngestionInProgressError';
		this.repoName = repoName;
	}
}

export class RepositoryNotFoundError extends IngestError {
	readonly repoName: string;

	constructor(repoName: string) {
		super('RepositoryNotFound', `Repository not configured: ${repoName}`);
		this.name = 'RepositoryNotFoundError';
		this.repoName = repoName;
	}
}

export class ConfigError extends IngestError {
	readonly issues: string[];

	constructor(message: string, issues: string[] = [], cause?: unknown) {
		super(
			'ConfigInvalid',
			issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
			cause,
		);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export class WebhookError extends IngestError {
	constructor(message: string) {
		super('WebhookRejected', message);
		this.name = 'WebhookError';
	}
}

// ============================================================================
// Helpers
// ============================================================================

export function isIngestError(error: unknown): error is IngestError {
	return error instanceof IngestError;
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
