import type {Chunk} from '../chunker/types.js';

/**
 * Text sent to the embedding provider for a chunk: a short header naming
 * where the code lives, then the code itself. Only the raw content is stored.
 */
export function prepareChunkText(chunk: Chunk): string {
	const header = [
		`Repository: ${chunk.repoName}`,
		`File: ${chunk.filePath}`,
		`Language: ${chunk.language}`,
		`Type: ${chunk.chunkType}`,
	];
	if (chunk.metadata.name) {
		header.push(`Name: ${chunk.metadata.name}`);
	}
	if (chunk.metadata.parent) {
		header.push(`Context: ${chunk.metadata.parent}`);
	}
	return `${header.join('\n')}\n\nCode:\n${chunk.content}`;
}
