import type {Language} from '../types.js';

/**
 * Kinds of chunks. Structural kinds come from syntax nodes; fallback windows
 * cover files that could not be parsed.
 */
export type ChunkType =
	| 'class'
	| 'interface'
	| 'struct'
	| 'enum'
	| 'type'
	| 'function'
	| 'method'
	| 'constructor'
	| 'property'
	| 'fallback-window';

export interface ChunkMetadata {
	/** Identifier of the unit (class, method, function name) */
	name?: string;
	/** Enclosing type, for members emitted on their own */
	parent?: string;
	/** Window index (1-based) when a unit was split */
	part?: number;
	/** Total windows for the split unit */
	parts?: number;
}

/**
 * A chunk as produced by the chunker, before embedding.
 */
export interface Chunk {
	/** `${repoName}:${filePath}#${sequence}` */
	id: string;
	repoName: string;
	filePath: string;
	language: Language;
	content: string;
	/** 1-based, inclusive */
	startLine: number;
	/** 1-based, inclusive */
	endLine: number;
	chunkType: ChunkType;
	metadata: ChunkMetadata;
	/** SHA256 of content */
	contentHash: string;
}

export interface ChunkInput {
	repoName: string;
	filePath: string;
	content: string;
	language: Language;
}

/**
 * Converts one file into an ordered sequence of chunks.
 * Never fails on malformed source.
 */
export interface Chunker {
	chunk(input: ChunkInput): Promise<Chunk[]>;
}

// ============================================================================
// Parser seam
// ============================================================================

/**
 * Grammar identifiers. TSX needs its own grammar.
 */
export type GrammarKey = Language | 'tsx';

export interface Point {
	row: number;
	column: number;
}

/**
 * The subset of a tree-sitter node the chunker reads.
 */
export interface SyntaxNode {
	readonly type: string;
	readonly text: string;
	readonly startPosition: Point;
	readonly endPosition: Point;
	readonly hasError: boolean;
	readonly namedChildren: ReadonlyArray<SyntaxNode | null>;
	childForFieldName(fieldName: string): SyntaxNode | null;
}

export interface ParsedTree {
	readonly rootNode: SyntaxNode;
	delete(): void;
}

/**
 * Grammar-aware parser, one grammar per language.
 */
export interface StructuralParser {
	supports(grammar: GrammarKey): boolean;
	/** Null when the parser produced no tree */
	parse(grammar: GrammarKey, content: string): Promise<ParsedTree | null>;
}

export function createChunkId(
	repoName: string,
	filePath: string,
	sequence: number,
): string {
	return `${repoName}:${filePath}#${sequence}`;
}
