/**
 * Structural chunker.
 *
 * Emits one chunk per top-level structural unit (type, function, method) when
 * a grammar is available and the file parses cleanly. Oversized types are
 * split into their members; any other oversized unit is windowed over its own
 * line range. Everything else goes through deterministic fallback windowing.
 */

import {
	DEFAULT_CHUNK_OVERLAP,
	DEFAULT_MAX_CHUNK_SIZE,
	DEFAULT_MIN_CHUNK_SIZE,
} from '../constants.js';
import {errorMessage} from '../errors.js';
import {computeStringHash} from '../lib/hash.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {splitLines, windowContent, windowLines} from './fallback.js';
import {
	GRAMMAR_RULES,
	TYPE_CHUNK_TYPES,
	grammarFor,
	type GrammarRules,
} from './grammars.js';
import {
	createChunkId,
	type Chunk,
	type ChunkInput,
	type ChunkMetadata,
	type ChunkType,
	type Chunker,
	type GrammarKey,
	type StructuralParser,
	type SyntaxNode,
} from './types.js';

export * from './types.js';
export * from './fallback.js';
export * from './grammars.js';

export interface StructuralChunkerOptions {
	/** Null disables structural parsing; every file is windowed */
	parser: StructuralParser | null;
	maxChunkSize?: number;
	chunkOverlap?: number;
	minChunkSize?: number;
	logger?: Logger;
}

/**
 * A chunk before ids are assigned.
 */
interface Piece {
	content: string;
	startLine: number;
	endLine: number;
	chunkType: ChunkType;
	metadata: ChunkMetadata;
}

/**
 * A matched syntax unit. `node` spans the full text (decorators, export
 * keyword); `declaration` is the node that carries name and body.
 */
interface Unit {
	node: SyntaxNode;
	declaration: SyntaxNode;
	chunkType: ChunkType;
	name: string | undefined;
	parent: string | undefined;
}

const FUNCTION_VALUE_TYPES = new Set([
	'arrow_function',
	'function_expression',
	'function',
	'generator_function',
]);

export class StructuralChunker implements Chunker {
	private readonly parser: StructuralParser | null;
	private readonly maxChunkSize: number;
	private readonly chunkOverlap: number;
	private readonly minChunkSize: number;
	private readonly logger: Logger;

	constructor(options: StructuralChunkerOptions) {
		this.parser = options.parser;
		this.maxChunkSize = options.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
		this.chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
		this.minChunkSize = options.minChunkSize ?? DEFAULT_MIN_CHUNK_SIZE;
		this.logger = options.logger ?? createNullLogger();

		if (this.chunkOverlap >= this.maxChunkSize) {
			throw new RangeError('chunkOverlap must be smaller than maxChunkSize');
		}
	}

	async chunk(input: ChunkInput): Promise<Chunk[]> {
		if (input.content.trim().length === 0) {
			return [];
		}

		const grammar = grammarFor(input.language, input.filePath);
		let pieces: Piece[] | null = null;

		if (this.parser?.supports(grammar)) {
			try {
				pieces = await this.chunkStructurally(this.parser, grammar, input.content);
				if (pieces === null) {
					this.logger.warn(
						'chunker',
						`Syntax errors in ${input.repoName}:${input.filePath}, using fallback windows`,
					);
				}
			} catch (error) {
				this.logger.warn(
					'chunker',
					`Parser failed on ${input.repoName}:${input.filePath}, using fallback windows`,
					{error: errorMessage(error)},
				);
			}
		}

		if (pieces === null || pieces.length === 0) {
			pieces = this.fallbackPieces(input.content);
		}

		return pieces.map((piece, sequence) => ({
			id: createChunkId(input.repoName, input.filePath, sequence),
			repoName: input.repoName,
			filePath: input.filePath,
			language: input.language,
			content: piece.content,
			startLine: piece.startLine,
			endLine: piece.endLine,
			chunkType: piece.chunkType,
			metadata: piece.metadata,
			contentHash: computeStringHash(piece.content),
		}));
	}

	/**
	 * Deterministic windowing over the raw content.
	 */
	private fallbackPieces(content: string): Piece[] {
		return windowContent(content, this.maxChunkSize, this.chunkOverlap).map(
			(window): Piece => ({
				...window,
				chunkType: 'fallback-window',
				metadata: {},
			}),
		);
	}

	/**
	 * @returns null when the file did not parse cleanly
	 */
	private async chunkStructurally(
		parser: StructuralParser,
		grammar: GrammarKey,
		content: string,
	): Promise<Piece[] | null> {
		const tree = await parser.parse(grammar, content);
		if (!tree) {
			return null;
		}

		try {
			if (tree.rootNode.hasError) {
				return null;
			}
			const rules = GRAMMAR_RULES[grammar];
			const lines = splitLines(content);
			const units: Unit[] = [];
			this.collectUnits(tree.rootNode, rules, units);
			return units.flatMap(unit => this.emitUnit(unit, rules, lines));
		} finally {
			tree.delete();
		}
	}

	private collectUnits(node: SyntaxNode, rules: GrammarRules, out: Unit[]) {
		for (const child of node.namedChildren) {
			if (!child) continue;
			const unit = matchUnit(child, rules.units);
			if (unit) {
				out.push(unit);
			} else if (rules.containers.has(child.type)) {
				this.collectUnits(child, rules, out);
			}
		}
	}

	private emitUnit(unit: Unit, rules: GrammarRules, lines: string[]): Piece[] {
		const startRow = unit.node.startPosition.row;
		const endRow = unit.node.endPosition.row;
		const unitLines = lines.slice(startRow, endRow + 1);
		const content = unitLines.join('\n');

		if (content.trim().length < this.minChunkSize) {
			return [];
		}

		const metadata: ChunkMetadata = {};
		if (unit.name) metadata.name = unit.name;
		if (unit.parent) metadata.parent = unit.parent;

		if (content.length <= this.maxChunkSize) {
			return [
				{
					content,
					startLine: startRow + 1,
					endLine: endRow + 1,
					chunkType: unit.chunkType,
					metadata,
				},
			];
		}

		if (TYPE_CHUNK_TYPES.has(unit.chunkType)) {
			const members = collectMembers(unit, rules);
			if (members.length > 0) {
				return members.flatMap(member => this.emitUnit(member, rules, lines));
			}
		}

		const windows = windowLines(
			unitLines,
			this.maxChunkSize,
			this.chunkOverlap,
			startRow + 1,
		);
		return windows.map((window, index): Piece => ({
			...window,
			chunkType: unit.chunkType,
			metadata: {...metadata, part: index + 1, parts: windows.length},
		}));
	}
}

// ============================================================================
// Node matching
// ============================================================================

function matchUnit(
	node: SyntaxNode,
	types: Record<string, ChunkType>,
	parent?: string,
): Unit | null {
	// Python decorators and JS/TS export keywords belong to the unit's text
	if (node.type === 'decorated_definition' || node.type === 'export_statement') {
		const inner =
			node.childForFieldName('definition') ??
			node.childForFieldName('declaration');
		const unit = inner ? matchUnit(inner, types, parent) : null;
		return unit ? {...unit, node} : null;
	}

	if (
		(node.type === 'lexical_declaration' || node.type === 'variable_declaration') &&
		'function_declaration' in types
	) {
		return matchFunctionVariable(node, parent);
	}

	const chunkType = types[node.type];
	if (!chunkType) {
		return null;
	}
	return {
		node,
		declaration: node,
		chunkType,
		name: extractName(node),
		parent: parent ?? extractReceiver(node),
	};
}

/**
 * `const handler = () => {...}` and `let f = function () {...}`.
 */
function matchFunctionVariable(node: SyntaxNode, parent?: string): Unit | null {
	for (const child of node.namedChildren) {
		if (!child || child.type !== 'variable_declarator') continue;
		const value = child.childForFieldName('value');
		if (value && FUNCTION_VALUE_TYPES.has(value.type)) {
			return {
				node,
				declaration: value,
				chunkType: 'function',
				name: child.childForFieldName('name')?.text,
				parent,
			};
		}
	}
	return null;
}

function collectMembers(unit: Unit, rules: GrammarRules): Unit[] {
	const body = unit.declaration.childForFieldName('body');
	if (!body) {
		return [];
	}
	const members: Unit[] = [];
	for (const child of body.namedChildren) {
		if (!child) continue;
		const member = matchUnit(child, rules.members, unit.name);
		if (member) {
			members.push(member);
		}
	}
	return members;
}

function extractName(node: SyntaxNode): string | undefined {
	const name = node.childForFieldName('name');
	if (name) {
		return name.text;
	}
	// Go: type_declaration -> type_spec -> name
	for (const child of node.namedChildren) {
		if (child?.type === 'type_spec' || child?.type === 'type_alias') {
			return child.childForFieldName('name')?.text;
		}
	}
	return undefined;
}

/**
 * Go methods: the receiver type is the enclosing type.
 */
function extractReceiver(node: SyntaxNode): string | undefined {
	if (node.type !== 'method_declaration') {
		return undefined;
	}
	const receiver = node.childForFieldName('receiver');
	for (const param of receiver?.namedChildren ?? []) {
		const type = param?.childForFieldName('type');
		if (type) {
			return type.text.replace(/^\*/, '');
		}
	}
	return undefined;
}
