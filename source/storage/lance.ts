import * as lancedb from '@lancedb/lancedb';
import {makeArrowTable} from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {DataType} from 'apache-arrow';
import {TABLE_NAMES} from '../constants.js';
import {IndexWriteFailureError, errorMessage} from '../errors.js';
import {chunk} from '../embeddings/api-utils.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {createCodeChunksSchema} from './schema.js';
import {
	buildWhere,
	chunkToRow,
	escapeString,
	rowToChunk,
	sqlList,
	type CodeChunk,
	type DeleteFilter,
	type QueryFilters,
	type ScoredChunk,
	type VectorIndex,
} from './types.js';

/** Paths or ids per delete statement */
const DELETE_BATCH_SIZE = 500;

export interface LanceVectorIndexOptions {
	dbPath: string;
	dimensions: number;
	tableName?: string;
	logger?: Logger;
}

/**
 * Vector index wrapping LanceDB. One table for every repository; rows are
 * tagged with repo_name and file_path.
 *
 * Writes are serialized within this process.
 */
export class LanceVectorIndex implements VectorIndex {
	private readonly dbPath: string;
	private readonly dimensions: number;
	private readonly tableName: string;
	private readonly logger: Logger;
	private db: Connection | null = null;
	private table: Table | null = null;
	private connecting: Promise<Table> | null = null;
	private writeChain: Promise<void> = Promise.resolve();

	constructor(options: LanceVectorIndexOptions) {
		this.dbPath = options.dbPath;
		this.dimensions = options.dimensions;
		this.tableName = options.tableName ?? TABLE_NAMES.CODE_CHUNKS;
		this.logger = options.logger ?? createNullLogger();
	}

	/**
	 * Connect to the LanceDB database.
	 * Creates the table if it doesn't exist.
	 */
	async connect(): Promise<void> {
		await this.getTable();
	}

	async close(): Promise<void> {
		this.table?.close();
		this.db?.close();
		this.table = null;
		this.db = null;
		this.connecting = null;
	}

	// ============================================================
	// Writes
	// ============================================================

	/**
	 * Replace rows by id: delete the ids present, then append an Arrow table
	 * built against the table schema.
	 */
	async upsert(chunks: CodeChunk[]): Promise<void> {
		if (chunks.length === 0) return;

		const rows = chunks.map(chunkToRow);
		const ids = [...new Set(rows.map(row => row.id))];
		await this.write('upsert', async table => {
			const arrowTable = makeArrowTable(rows, {
				schema: createCodeChunksSchema(this.dimensions),
			});
			for (const batch of chunk(ids, DELETE_BATCH_SIZE)) {
				await table.delete(`id IN (${sqlList(batch)})`);
			}
			await table.add(arrowTable);
		});
	}

	async deleteWhere(filter: DeleteFilter): Promise<number> {
		if (filter.filePaths.length === 0) return 0;

		return this.write('delete', async table => {
			let removed = 0;
			for (const paths of chunk(filter.filePaths, DELETE_BATCH_SIZE)) {
				const predicate = `repo_name = '${escapeString(filter.repoName)}' AND file_path IN (${sqlList(paths)})`;
				const matching = await table.countRows(predicate);
				if (matching > 0) {
					await table.delete(predicate);
					removed += matching;
				}
			}
			return removed;
		});
	}

	async deleteRepository(repoName: string): Promise<number> {
		return this.write('delete repository', async table => {
			const predicate = `repo_name = '${escapeString(repoName)}'`;
			const matching = await table.countRows(predicate);
			if (matching > 0) {
				await table.delete(predicate);
			}
			return matching;
		});
	}

	// ============================================================
	// Reads
	// ============================================================

	async listFilePaths(repoName: string): Promise<string[]> {
		const table = await this.getTable();
		const predicate = `repo_name = '${escapeString(repoName)}'`;
		// Queries stop at 10 rows unless given a limit
		const total = await table.countRows(predicate);
		if (total === 0) return [];

		const rows: Array<{file_path: string}> = await table
			.query()
			.where(predicate)
			.select(['file_path'])
			.limit(total)
			.toArray();

		return [...new Set(rows.map(row => row.file_path))].sort();
	}

	async query(
		vector: number[],
		topK: number,
		filters?: QueryFilters,
	): Promise<ScoredChunk[]> {
		const table = await this.getTable();
		let search = table.vectorSearch(vector).distanceType('cosine').limit(topK);
		const where = buildWhere(filters);
		if (where) {
			search = search.where(where);
		}
		const rows: Array<Record<string, unknown>> = await search.toArray();

		return rows.map(row => ({
			chunk: rowToChunk(row),
			distance: typeof row['_distance'] === 'number' ? row['_distance'] : 0,
		}));
	}

	async count(repoName?: string): Promise<number> {
		const table = await this.getTable();
		return repoName === undefined
			? table.countRows()
			: table.countRows(`repo_name = '${escapeString(repoName)}'`);
	}

	// ============================================================
	// Internals
	// ============================================================

	private getTable(): Promise<Table> {
		if (this.table) {
			return Promise.resolve(this.table);
		}
		if (!this.connecting) {
			this.connecting = this.open().catch((error: unknown) => {
				this.connecting = null;
				throw new IndexWriteFailureError(
					`Cannot open vector index at ${this.dbPath}: ${errorMessage(error)}`,
					error,
				);
			});
		}
		return this.connecting;
	}

	private async open(): Promise<Table> {
		const db = await lancedb.connect(this.dbPath);
		const tableNames = await db.tableNames();

		let table: Table;
		if (tableNames.includes(this.tableName)) {
			table = await db.openTable(this.tableName);
			await this.checkDimensions(table);
		} else {
			table = await db.createEmptyTable(
				this.tableName,
				createCodeChunksSchema(this.dimensions),
			);
			this.logger.info('index', `Created table ${this.tableName}`, {
				dimensions: this.dimensions,
			});
		}

		this.db = db;
		this.table = table;
		return table;
	}

	private async checkDimensions(table: Table): Promise<void> {
		const schema = await table.schema();
		const vectorType = schema.fields.find(f => f.name === 'vector')?.type;
		if (
			DataType.isFixedSizeList(vectorType) &&
			vectorType.listSize !== this.dimensions
		) {
			throw new Error(
				`table stores ${vectorType.listSize}-dimensional vectors but the embedding model produces ${this.dimensions}; reset every repository to rebuild`,
			);
		}
	}

	/**
	 * Run a write after every earlier write has settled.
	 */
	private write<T>(label: string, fn: (table: Table) => Promise<T>): Promise<T> {
		const run = this.writeChain.then(async () => {
			const table = await this.getTable();
			try {
				return await fn(table);
			} catch (error) {
				this.logger.error('index', `LanceDB ${label} failed`, {
					error: errorMessage(error),
				});
				throw new IndexWriteFailureError(
					`Vector index ${label} failed: ${errorMessage(error)}`,
					error,
				);
			}
		});
		this.writeChain = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}
}
