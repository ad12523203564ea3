/**
 * Core data model shared by the mirror, chunker, orchestrator and engine.
 */

export const SUPPORTED_LANGUAGES = [
	'csharp',
	'python',
	'javascript',
	'typescript',
	'java',
	'go',
] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

/**
 * Identity and policy for one tracked repository.
 * Immutable for the duration of a run.
 */
export interface RepositoryDescriptor {
	/** Unique name; keys state, locks and index rows */
	name: string;
	/** Remote location (https or ssh URL, or a local path) */
	url: string;
	/** Tracked branch */
	branch: string;
	/** Local mirror (working copy) path */
	localPath: string;
	/** Languages to process; empty means all supported languages */
	languages: Language[];
	/** Gitignore-style patterns for paths to skip */
	excludePatterns: string[];
	enabled: boolean;
}

/**
 * Persisted per repository. Replaced wholesale on every commit.
 */
export interface RepositoryState {
	repoName: string;
	/** Last revision at which every file in the change set succeeded */
	lastRevision: string | null;
	/** Repository-relative path -> content fingerprint */
	fileFingerprints: Record<string, string>;
	lastIngestedAt: string;
}

/**
 * Disjoint sets of repository-relative paths for one run.
 */
export interface ChangeSet {
	added: string[];
	modified: string[];
	deleted: string[];
}

export function emptyChangeSet(): ChangeSet {
	return {added: [], modified: [], deleted: []};
}
