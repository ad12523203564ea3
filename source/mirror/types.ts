import type {ChangeSet, RepositoryDescriptor} from '../types.js';

/**
 * Local working copy of a remote repository.
 *
 * Every path returned is repository-relative, uses forward slashes and has
 * already passed the descriptor's language and exclusion filters.
 */
export interface RepositoryMirror {
	/**
	 * Clone or fast-forward the tracked branch.
	 * @returns the current revision
	 * @throws SourceUnavailableError, HistoryDivergedError
	 */
	sync(descriptor: RepositoryDescriptor): Promise<string>;

	/**
	 * Paths changed between two revisions. With `from` null, every tracked
	 * file at `to` is added.
	 * @throws HistoryDivergedError if `from` is no longer known
	 */
	diff(
		descriptor: RepositoryDescriptor,
		from: string | null,
		to: string,
	): Promise<ChangeSet>;

	/** Every tracked file at a revision */
	listFiles(descriptor: RepositoryDescriptor, revision: string): Promise<string[]>;

	/** Current content of a file in the working copy */
	readFile(descriptor: RepositoryDescriptor, filePath: string): Promise<string>;
}
