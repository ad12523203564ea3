import {Field, FixedSizeList, Float32, Int32, Schema, Utf8} from 'apache-arrow';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';

/**
 * Arrow schema for the code_chunks table.
 *
 * One row per chunk, tagged with repo_name and file_path for filtered
 * deletion and filtered search.
 */
export function createCodeChunksSchema(
	dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS,
): Schema {
	return new Schema([
		new Field('id', new Utf8(), false), // "{repo}:{path}#{seq}"
		new Field(
			'vector',
			new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
			false,
		),
		new Field('repo_name', new Utf8(), false),
		new Field('file_path', new Utf8(), false),
		new Field('language', new Utf8(), false),
		new Field('content', new Utf8(), false),
		new Field('start_line', new Int32(), false),
		new Field('end_line', new Int32(), false),
		new Field('chunk_type', new Utf8(), false),
		new Field('metadata', new Utf8(), false), // JSON
		new Field('content_hash', new Utf8(), false),
		new Field('created_at', new Utf8(), false), // ISO timestamp
	]);
}
