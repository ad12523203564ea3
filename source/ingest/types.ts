import type {FileErrorKind} from '../errors.js';

/**
 * A file that could not be brought up to date in this run.
 * It is retried on the next run.
 */
export interface FileError {
	filePath: string;
	kind: FileErrorKind;
	message: string;
}

export interface IngestionReport {
	repoName: string;
	/** Revision the mirror was at for this run */
	revision: string;
	/** Recorded revision the change set was computed from (null: full run) */
	previousRevision: string | null;
	forced: boolean;
	/** True when the revision had not moved and nothing was done */
	noop: boolean;
	filesAdded: number;
	filesModified: number;
	filesDeleted: number;
	/** Listed for processing but content matched the recorded fingerprint */
	filesUnchanged: number;
	chunksWritten: number;
	chunksDeleted: number;
	errors: FileError[];
	/** ISO timestamp */
	startedAt: string;
	durationMs: number;
}

export interface RunOptions {
	/** Ignore prior state and re-index every file */
	force?: boolean;
	signal?: AbortSignal;
}

export type OrchestratorEvents = {
	'file-indexed': [{repoName: string; filePath: string; chunks: number}];
	'file-deleted': [{repoName: string; filePath: string; chunks: number}];
	'file-failed': [{repoName: string; error: FileError}];
	'run-complete': [IngestionReport];
};
