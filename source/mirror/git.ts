/**
 * Git-backed repository mirror.
 *
 * Drives the git CLI through execFile. The runner is injectable so the
 * command flow can be exercised without a git binary or a remote.
 */

import {execFile} from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import {promisify} from 'node:util';
import {
	HistoryDivergedError,
	IngestError,
	SourceUnavailableError,
	errorMessage,
} from '../errors.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import type {ChangeSet, RepositoryDescriptor} from '../types.js';
import {parseFileList, parseNameStatus} from './diff.js';
import {createPathFilter} from './filter.js';
import type {RepositoryMirror} from './types.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// Git runner
// ============================================================================

export interface GitRunOptions {
	cwd?: string;
	timeoutMs: number;
}

/**
 * Run git with the given arguments and return stdout.
 * Must throw GitCommandError on a non-zero exit.
 */
export type GitRunner = (
	args: string[],
	options: GitRunOptions,
) => Promise<string>;

export class GitCommandError extends Error {
	readonly exitCode: number | null;
	readonly stderr: string;
	readonly timedOut: boolean;

	constructor(
		message: string,
		exitCode: number | null,
		stderr: string,
		timedOut: boolean,
	) {
		super(message);
		this.name = 'GitCommandError';
		this.exitCode = exitCode;
		this.stderr = stderr;
		this.timedOut = timedOut;
	}
}

function readStringField(value: object, key: string): string {
	const field: unknown = key in value ? Reflect.get(value, key) : undefined;
	return typeof field === 'string' ? field : '';
}

/**
 * Default runner: the git binary on PATH, never prompting for credentials.
 */
export const execGit: GitRunner = async (args, {cwd, timeoutMs}) => {
	try {
		const {stdout} = await execFileAsync('git', args, {
			cwd,
			timeout: timeoutMs,
			maxBuffer: 256 * 1024 * 1024,
			encoding: 'utf8',
			env: {...process.env, GIT_TERMINAL_PROMPT: '0'},
		});
		return stdout;
	} catch (error) {
		if (!(error instanceof Error)) {
			throw error;
		}
		const code: unknown = 'code' in error ? error.code : undefined;
		const killed = 'killed' in error && error.killed === true;
		throw new GitCommandError(
			`git ${args[0] ?? ''} failed: ${readStringField(error, 'stderr').trim() || error.message}`,
			typeof code === 'number' ? code : null,
			readStringField(error, 'stderr'),
			killed,
		);
	}
};

// ============================================================================
// Credentials
// ============================================================================

/**
 * Insert an access token into an https remote URL.
 * URLs that already carry credentials, and non-https URLs, are unchanged.
 */
export function withAccessToken(url: string, token?: string): string {
	if (!token || !url.startsWith('https://')) {
		return url;
	}
	const parsed = new URL(url);
	if (parsed.username) {
		return url;
	}
	parsed.username = token;
	return parsed.toString();
}

/**
 * Remove a token (raw or URL-encoded) from text bound for logs or errors.
 */
export function redactToken(text: string, token?: string): string {
	if (!token) {
		return text;
	}
	return text
		.split(token)
		.join('***')
		.split(encodeURIComponent(token))
		.join('***');
}

// ============================================================================
// Mirror
// ============================================================================

export interface GitMirrorOptions {
	token?: string;
	timeoutMs?: number;
	logger?: Logger;
	runner?: GitRunner;
}

export class GitMirror implements RepositoryMirror {
	private readonly token: string | undefined;
	private readonly timeoutMs: number;
	private readonly logger: Logger;
	private readonly runner: GitRunner;

	constructor(options: GitMirrorOptions = {}) {
		this.token = options.token;
		this.timeoutMs = options.timeoutMs ?? 300_000;
		this.logger = options.logger ?? createNullLogger();
		this.runner = options.runner ?? execGit;
	}

	async sync(descriptor: RepositoryDescriptor): Promise<string> {
		const {name, branch, localPath} = descriptor;
		const remote = withAccessToken(descriptor.url, this.token);

		try {
			if (await this.hasWorkingCopy(localPath)) {
				this.logger.info('mirror', `Fetching ${name} (${branch})`);
				await this.git(['fetch', '--quiet', remote, branch], localPath);

				const fastForward = await this.isAncestor(
					localPath,
					'HEAD',
					'FETCH_HEAD',
				);
				if (!fastForward) {
					throw new HistoryDivergedError(
						name,
						`local HEAD is not an ancestor of remote ${branch}`,
					);
				}
				await this.git(['merge', '--ff-only', '--quiet', 'FETCH_HEAD'], localPath);
			} else {
				this.logger.info('mirror', `Cloning ${name} (${branch})`);
				await fs.mkdir(path.dirname(localPath), {recursive: true});
				await this.git([
					'clone',
					'--quiet',
					'--branch',
					branch,
					'--single-branch',
					remote,
					localPath,
				]);
			}

			const revision = (await this.git(['rev-parse', 'HEAD'], localPath)).trim();
			this.logger.debug('mirror', `Synced ${name}`, {revision});
			return revision;
		} catch (error) {
			if (error instanceof IngestError) {
				throw error;
			}
			throw new SourceUnavailableError(
				`Cannot sync ${name}: ${errorMessage(error)}`,
				error,
			);
		}
	}

	async diff(
		descriptor: RepositoryDescriptor,
		from: string | null,
		to: string,
	): Promise<ChangeSet> {
		if (from === null) {
			const files = await this.listFiles(descriptor, to);
			return {added: files, modified: [], deleted: []};
		}

		if (!(await this.hasCommit(descriptor.localPath, from))) {
			throw new HistoryDivergedError(
				descriptor.name,
				`recorded revision ${from} is no longer in the mirror`,
			);
		}

		const filter = createPathFilter(descriptor);
		try {
			const output = await this.git(
				['diff', '--name-status', '-z', '--no-renames', from, to],
				descriptor.localPath,
			);
			return parseNameStatus(output, filter.includes);
		} catch (error) {
			throw new SourceUnavailableError(
				`Cannot diff ${descriptor.name} ${from}..${to}: ${errorMessage(error)}`,
				error,
			);
		}
	}

	async listFiles(
		descriptor: RepositoryDescriptor,
		revision: string,
	): Promise<string[]> {
		const filter = createPathFilter(descriptor);
		try {
			const output = await this.git(
				['ls-tree', '-r', '--name-only', '-z', revision],
				descriptor.localPath,
			);
			return parseFileList(output, filter.includes);
		} catch (error) {
			throw new SourceUnavailableError(
				`Cannot list files of ${descriptor.name} at ${revision}: ${errorMessage(error)}`,
				error,
			);
		}
	}

	async readFile(
		descriptor: RepositoryDescriptor,
		filePath: string,
	): Promise<string> {
		const root = path.resolve(descriptor.localPath);
		const fullPath = path.resolve(root, filePath);
		if (!fullPath.startsWith(root + path.sep)) {
			throw new Error(`Path escapes repository: ${filePath}`);
		}
		return fs.readFile(fullPath, 'utf-8');
	}

	private async git(args: string[], cwd?: string): Promise<string> {
		this.logger.debug('mirror', 'git', {
			args: args.map(arg => redactToken(arg, this.token)),
		});
		try {
			return await this.runner(args, {cwd, timeoutMs: this.timeoutMs});
		} catch (error) {
			if (error instanceof GitCommandError) {
				throw new GitCommandError(
					redactToken(error.message, this.token),
					error.exitCode,
					redactToken(error.stderr, this.token),
					error.timedOut,
				);
			}
			throw new Error(redactToken(errorMessage(error), this.token));
		}
	}

	private async hasWorkingCopy(localPath: string): Promise<boolean> {
		try {
			await fs.access(path.join(localPath, '.git'));
			return true;
		} catch {
			return false;
		}
	}

	private async isAncestor(
		cwd: string,
		ancestor: string,
		descendant: string,
	): Promise<boolean> {
		try {
			await this.git(['merge-base', '--is-ancestor', ancestor, descendant], cwd);
			return true;
		} catch (error) {
			if (error instanceof GitCommandError && error.exitCode === 1) {
				return false;
			}
			throw error;
		}
	}

	private async hasCommit(cwd: string, revision: string): Promise<boolean> {
		try {
			await this.git(['cat-file', '-e', `${revision}^{commit}`], cwd);
			return true;
		} catch (error) {
			if (error instanceof GitCommandError && !error.timedOut) {
				return false;
			}
			throw new SourceUnavailableError(
				`Cannot inspect ${cwd}: ${errorMessage(error)}`,
				error,
			);
		}
	}
}
