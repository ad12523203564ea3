/**
 * Path filtering: language by extension, then gitignore-style exclusions.
 */

import path from 'node:path';
import {createRequire} from 'node:module';
import {EXTENSION_TO_LANGUAGE} from '../constants.js';
import {SUPPORTED_LANGUAGES, type Language, type RepositoryDescriptor} from '../types.js';

// ignore is a CJS module, use createRequire to import it
const require = createRequire(import.meta.url);
const ignore: () => Ignore = require('ignore');

interface Ignore {
	add(patterns: string | string[]): this;
	ignores(pathname: string): boolean;
}

/**
 * Patterns that are always excluded, regardless of configuration.
 */
const ALWAYS_IGNORED = ['.git'];

/**
 * Language for a path, or null if its extension is not supported.
 */
export function detectLanguage(filePath: string): Language | null {
	const ext = path.extname(filePath).toLowerCase();
	return EXTENSION_TO_LANGUAGE[ext] ?? null;
}

export interface PathFilter {
	/** Language for an included path, or null if the path is filtered out */
	classify(filePath: string): Language | null;
	includes(filePath: string): boolean;
}

/**
 * Build the filter for one repository.
 */
export function createPathFilter(
	descriptor: Pick<RepositoryDescriptor, 'languages' | 'excludePatterns'>,
): PathFilter {
	const languages = new Set<Language>(
		descriptor.languages.length > 0 ? descriptor.languages : SUPPORTED_LANGUAGES,
	);
	const ig = ignore().add(ALWAYS_IGNORED).add(descriptor.excludePatterns);

	const classify = (filePath: string): Language | null => {
		const normalized = filePath.split(path.sep).join('/');
		const language = detectLanguage(normalized);
		if (!language || !languages.has(language)) {
			return null;
		}
		if (ig.ignores(normalized)) {
			return null;
		}
		return language;
	};

	return {
		classify,
		includes: filePath => classify(filePath) !== null,
	};
}
