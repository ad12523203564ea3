/**
 * Grammar support matrix for the chunker.
 *
 * Kept free of `web-tree-sitter` imports so it can be read without loading
 * any WASM.
 */

import type {Language} from '../types.js';
import type {ChunkType, GrammarKey} from './types.js';

/**
 * WASM grammar module specifiers, resolved from node_modules at load time.
 * C# comes from tree-sitter-wasms for web-tree-sitter compatibility.
 */
export const GRAMMAR_WASM_MODULES: Record<GrammarKey, string> = {
	javascript: 'tree-sitter-javascript/tree-sitter-javascript.wasm',
	typescript: 'tree-sitter-typescript/tree-sitter-typescript.wasm',
	tsx: 'tree-sitter-typescript/tree-sitter-tsx.wasm',
	python: 'tree-sitter-python/tree-sitter-python.wasm',
	go: 'tree-sitter-go/tree-sitter-go.wasm',
	java: 'tree-sitter-java/tree-sitter-java.wasm',
	csharp: 'tree-sitter-wasms/out/tree-sitter-c_sharp.wasm',
};

/**
 * Grammar for a file. TypeScript files ending in .tsx use the TSX grammar.
 */
export function grammarFor(language: Language, filePath: string): GrammarKey {
	if (language === 'typescript' && filePath.toLowerCase().endsWith('.tsx')) {
		return 'tsx';
	}
	return language;
}

/**
 * Node types the chunker understands, per grammar.
 */
export interface GrammarRules {
	/** Top-level unit node type -> chunk type */
	units: Record<string, ChunkType>;
	/** Nodes walked through when looking for units */
	containers: ReadonlySet<string>;
	/** Member node type -> chunk type, used to split oversized types */
	members: Record<string, ChunkType>;
}

const SCRIPT_RULES: GrammarRules = {
	units: {
		class_declaration: 'class',
		abstract_class_declaration: 'class',
		function_declaration: 'function',
		generator_function_declaration: 'function',
		interface_declaration: 'interface',
		enum_declaration: 'enum',
		type_alias_declaration: 'type',
	},
	containers: new Set([
		'program',
		'export_statement',
		'expression_statement',
		'internal_module',
		'module',
		'statement_block',
	]),
	members: {
		method_definition: 'method',
		public_field_definition: 'property',
		field_definition: 'property',
	},
};

export const GRAMMAR_RULES: Record<GrammarKey, GrammarRules> = {
	javascript: SCRIPT_RULES,
	typescript: SCRIPT_RULES,
	tsx: SCRIPT_RULES,
	python: {
		units: {
			class_definition: 'class',
			function_definition: 'function',
		},
		containers: new Set(['module']),
		members: {
			function_definition: 'method',
			class_definition: 'class',
		},
	},
	java: {
		units: {
			class_declaration: 'class',
			record_declaration: 'class',
			interface_declaration: 'interface',
			annotation_type_declaration: 'interface',
			enum_declaration: 'enum',
		},
		containers: new Set(['program']),
		members: {
			method_declaration: 'method',
			constructor_declaration: 'constructor',
			class_declaration: 'class',
			record_declaration: 'class',
			interface_declaration: 'interface',
			enum_declaration: 'enum',
		},
	},
	csharp: {
		units: {
			class_declaration: 'class',
			record_declaration: 'class',
			interface_declaration: 'interface',
			struct_declaration: 'struct',
			enum_declaration: 'enum',
		},
		containers: new Set([
			'compilation_unit',
			'namespace_declaration',
			'file_scoped_namespace_declaration',
			'declaration_list',
		]),
		members: {
			method_declaration: 'method',
			constructor_declaration: 'constructor',
			property_declaration: 'property',
			class_declaration: 'class',
			record_declaration: 'class',
			interface_declaration: 'interface',
			struct_declaration: 'struct',
			enum_declaration: 'enum',
		},
	},
	go: {
		units: {
			function_declaration: 'function',
			method_declaration: 'method',
			type_declaration: 'type',
		},
		containers: new Set(['source_file']),
		members: {},
	},
};

/** Chunk types that may be split into their members when oversized */
export const TYPE_CHUNK_TYPES: ReadonlySet<ChunkType> = new Set([
	'class',
	'interface',
	'struct',
	'enum',
]);
