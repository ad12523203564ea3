/**
 * web-tree-sitter backed structural parser.
 *
 * Grammars load lazily on first use of a language. Loads are serialized:
 * web-tree-sitter keeps global state that is corrupted by loading several
 * WASM modules in parallel.
 */

import {createRequire} from 'node:module';
import {Language as Grammar, Parser} from 'web-tree-sitter';
import {GRAMMAR_WASM_MODULES} from './grammars.js';
import type {GrammarKey, ParsedTree, StructuralParser} from './types.js';

// Use require to resolve paths to wasm files in node_modules
const require = createRequire(import.meta.url);

export class TreeSitterParser implements StructuralParser {
	private parserPromise: Promise<Parser> | null = null;
	private readonly grammars = new Map<GrammarKey, Promise<Grammar>>();
	private loadQueue: Promise<void> = Promise.resolve();
	private readonly wasmPaths: Partial<Record<GrammarKey, string>>;

	/**
	 * @param wasmPaths - Override grammar locations (absolute .wasm paths)
	 */
	constructor(wasmPaths: Partial<Record<GrammarKey, string>> = {}) {
		this.wasmPaths = wasmPaths;
	}

	supports(grammar: GrammarKey): boolean {
		return grammar in GRAMMAR_WASM_MODULES;
	}

	async parse(grammar: GrammarKey, content: string): Promise<ParsedTree | null> {
		const parser = await this.getParser();
		const language = await this.getGrammar(grammar);
		// No await between these two: concurrent callers share one parser
		parser.setLanguage(language);
		return parser.parse(content);
	}

	private getParser(): Promise<Parser> {
		if (!this.parserPromise) {
			this.parserPromise = Parser.init().then(() => new Parser());
		}
		return this.parserPromise;
	}

	private getGrammar(grammar: GrammarKey): Promise<Grammar> {
		const cached = this.grammars.get(grammar);
		if (cached) {
			return cached;
		}

		const wasmPath =
			this.wasmPaths[grammar] ?? require.resolve(GRAMMAR_WASM_MODULES[grammar]);
		const loading = this.loadQueue.then(() => Grammar.load(wasmPath));
		this.loadQueue = loading.then(
			() => undefined,
			() => undefined,
		);
		this.grammars.set(grammar, loading);
		return loading;
	}
}
