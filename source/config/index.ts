import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {
	DATA_DIR_NAME,
	DEFAULT_BRANCH,
	DEFAULT_CHUNK_OVERLAP,
	DEFAULT_EMBEDDING_DIMENSIONS,
	DEFAULT_EMBEDDING_MODEL,
	DEFAULT_MAX_CHUNK_SIZE,
	DEFAULT_MIN_CHUNK_SIZE,
} from '../constants.js';
import {ConfigError} from '../errors.js';
import {SUPPORTED_LANGUAGES, type RepositoryDescriptor} from '../types.js';

// ============================================================================
// Settings
// ============================================================================

const settingsSchema = z
	.object({
		openaiApiKey: z.string().optional(),
		openaiBaseUrl: z.string().url().default('https://api.openai.com/v1'),
		embeddingModel: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
		embeddingDimensions: z.coerce
			.number()
			.int()
			.positive()
			.default(DEFAULT_EMBEDDING_DIMENSIONS),
		gitToken: z.string().optional(),
		reposConfigPath: z.string().min(1).default('./config/repos.json'),
		reposBasePath: z.string().min(1).default('./data/repos'),
		dataDir: z.string().min(1).default(path.join('./data', DATA_DIR_NAME)),
		webhookSecret: z.string().optional(),
		maxChunkSize: z.coerce
			.number()
			.int()
			.positive()
			.default(DEFAULT_MAX_CHUNK_SIZE),
		chunkOverlap: z.coerce
			.number()
			.int()
			.nonnegative()
			.default(DEFAULT_CHUNK_OVERLAP),
		minChunkSize: z.coerce
			.number()
			.int()
			.nonnegative()
			.default(DEFAULT_MIN_CHUNK_SIZE),
		fileConcurrency: z.coerce.number().int().min(1).max(64).default(4),
		repoConcurrency: z.coerce.number().int().min(1).max(16).default(2),
		embeddingMaxRetries: z.coerce.number().int().min(0).max(20).default(5),
		gitTimeoutMs: z.coerce.number().int().positive().default(300_000),
		embeddingTimeoutMs: z.coerce.number().int().positive().default(60_000),
		logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
		lockMode: z.enum(['process', 'file']).default('process'),
		lockPolicy: z.enum(['queue', 'reject']).default('queue'),
	})
	.refine(s => s.chunkOverlap < s.maxChunkSize, {
		message: 'must be smaller than MAX_CHUNK_SIZE',
		path: ['chunkOverlap'],
	});

export type Settings = z.infer<typeof settingsSchema>;

/**
 * Environment variable backing each setting.
 */
export const SETTING_ENV_NAMES: Record<keyof Settings, string> = {
	openaiApiKey: 'OPENAI_API_KEY',
	openaiBaseUrl: 'OPENAI_BASE_URL',
	embeddingModel: 'EMBEDDING_MODEL',
	embeddingDimensions: 'EMBEDDING_DIMENSIONS',
	gitToken: 'GIT_TOKEN',
	reposConfigPath: 'REPOS_CONFIG_PATH',
	reposBasePath: 'REPOS_BASE_PATH',
	dataDir: 'DATA_DIR',
	webhookSecret: 'WEBHOOK_SECRET',
	maxChunkSize: 'MAX_CHUNK_SIZE',
	chunkOverlap: 'CHUNK_OVERLAP',
	minChunkSize: 'MIN_CHUNK_SIZE',
	fileConcurrency: 'FILE_CONCURRENCY',
	repoConcurrency: 'REPO_CONCURRENCY',
	embeddingMaxRetries: 'EMBEDDING_MAX_RETRIES',
	gitTimeoutMs: 'GIT_TIMEOUT_MS',
	embeddingTimeoutMs: 'EMBEDDING_TIMEOUT_MS',
	logLevel: 'LOG_LEVEL',
	lockMode: 'LOCK_MODE',
	lockPolicy: 'LOCK_POLICY',
};

function describeIssues(error: z.ZodError, names?: Record<string, string>) {
	return error.issues.map(issue => {
		const key = issue.path.join('.');
		const label = (names && names[key]) ?? (key || '(root)');
		return `${label}: ${issue.message}`;
	});
}

/**
 * Load settings from environment variables, applying defaults.
 * Empty variables count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
	const raw: Record<string, string> = {};
	for (const [key, envName] of Object.entries(SETTING_ENV_NAMES)) {
		const value = env[envName]?.trim();
		if (value) {
			raw[key] = value;
		}
	}

	const result = settingsSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			'Invalid settings',
			describeIssues(result.error, SETTING_ENV_NAMES),
		);
	}
	return result.data;
}

// ============================================================================
// Repositories
// ============================================================================

const repositorySchema = z.object({
	name: z
		.string()
		.regex(/^[A-Za-z0-9._-]+$/, 'use letters, digits, ".", "_" or "-"')
		.refine(name => !/^\.+$/.test(name), 'must not be made only of dots'),
	url: z.string().min(1),
	branch: z.string().min(1).default(DEFAULT_BRANCH),
	localPath: z.string().min(1).optional(),
	languages: z.array(z.enum(SUPPORTED_LANGUAGES)).default([]),
	excludePatterns: z.array(z.string()).default([]),
	enabled: z.boolean().default(true),
});

const repositoriesFileSchema = z.object({
	repositories: z.array(repositorySchema),
});

export type RepositoryConfigInput = z.input<typeof repositorySchema>;

/**
 * Validate repository entries and resolve their local mirror paths.
 */
export function parseRepositories(
	input: unknown,
	basePath: string,
): RepositoryDescriptor[] {
	const result = repositoriesFileSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(
			'Invalid repositories config',
			describeIssues(result.error),
		);
	}

	const seen = new Set<string>();
	const duplicates: string[] = [];
	for (const repo of result.data.repositories) {
		if (seen.has(repo.name)) {
			duplicates.push(`repositories: duplicate name ${repo.name}`);
		}
		seen.add(repo.name);
	}
	if (duplicates.length > 0) {
		throw new ConfigError('Invalid repositories config', duplicates);
	}

	return result.data.repositories.map(repo => ({
		name: repo.name,
		url: repo.url,
		branch: repo.branch,
		localPath: path.resolve(basePath, repo.localPath ?? repo.name),
		languages: repo.languages,
		excludePatterns: repo.excludePatterns,
		enabled: repo.enabled,
	}));
}

/**
 * Load repositories from a JSON file of the form {"repositories": [...]}.
 * Returns an empty list if the file does not exist.
 */
export async function loadRepositories(
	configPath: string,
	basePath: string,
): Promise<RepositoryDescriptor[]> {
	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
			return [];
		}
		throw new ConfigError(`Cannot read ${configPath}`, [], error);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new ConfigError(`${configPath} is not valid JSON`, [], error);
	}

	return parseRepositories(parsed, basePath);
}
