import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import Database from 'better-sqlite3'
import { describeError, StoreError } from '../errors.js'
import { NullLogger } from '../logger.js'
import type { ChunkMetadata, EmbeddedChunk, ILogger, RetrievalResult, RetrievedChunk, SourceType } from '../types.js'
import { WriteLock } from './write-lock.js'

export const INDEX_FILE_NAME = 'index.sqlite3'

export interface VectorIndex {
	upsert: (chunks: readonly EmbeddedChunk[]) => Promise<number>
	query: (vector: readonly number[], topK: number) => Promise<RetrievalResult>
	persist: () => Promise<void>
	load: () => Promise<void>
	count: () => number
}

export interface SqliteVectorIndexOptions {
	/** Directory of the backing store; created when missing. */
	directory: string
	/** @default 'legal_judgments' */
	collection?: string
	/** Fixes the vector dimension up front. Otherwise the first upsert decides it. */
	dimension?: number
	logger?: ILogger
	/**
	 * Whether to enable WAL mode for concurrent readers.
	 * @default true
	 */
	walMode?: boolean
}

interface IndexEntry {
	chunk: EmbeddedChunk
	norm: number
}

interface ChunkRow {
	document_id: string
	chunk_index: number
	text: string
	token_count: number
	page_numbers: string
	overlap_tokens: number
	char_start: number
	char_end: number
	source_file: string
	source_type: SourceType
	page_number: number
	case_name: string | null
	court: string | null
	judgement_date: string | null
	url: string | null
	citation: string | null
	vector: Buffer
}

/**
 * Vector index persisted in one SQLite file, keyed by (document id, chunk index) within a collection.
 *
 * Writes go through a {@link WriteLock} and one transaction each, then swap in a new in-memory
 * snapshot. Queries scan whichever snapshot is current when they start, so they never block on
 * writers and never observe half a write.
 */
export class SqliteVectorIndex implements VectorIndex {
	readonly collection: string
	readonly directory: string
	private db: Database.Database
	private readonly lock = new WriteLock()
	private readonly logger: ILogger
	private snapshot: ReadonlyMap<string, IndexEntry> = new Map()
	private dimension: number | null

	constructor(options: SqliteVectorIndexOptions) {
		this.directory = options.directory
		this.collection = options.collection ?? 'legal_judgments'
		this.logger = options.logger ?? new NullLogger()

		try {
			mkdirSync(this.directory, { recursive: true })
			this.db = new Database(join(this.directory, INDEX_FILE_NAME))
			if (options.walMode !== false) {
				this.db.pragma('journal_mode = WAL')
			}
			this.initializeTables()
		}
		catch (error) {
			throw new StoreError(`Could not open the vector index in '${this.directory}': ${describeError(error)}`, { cause: error })
		}

		this.dimension = this.readDimension()
		if (options.dimension !== undefined) {
			if (this.dimension !== null && this.dimension !== options.dimension) {
				this.db.close()
				throw new StoreError(
					`Collection '${this.collection}' holds ${this.dimension}-dimensional vectors, not ${options.dimension}.`,
				)
			}
			this.dimension = options.dimension
			this.writeDimension(options.dimension)
		}
		this.snapshot = this.readSnapshot()
	}

	private initializeTables(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS collections (
				name TEXT PRIMARY KEY,
				dimension INTEGER,
				created_at DATETIME DEFAULT CURRENT_TIMESTAMP
			)
		`)

		this.db.exec(`
			CREATE TABLE IF NOT EXISTS chunks (
				collection TEXT NOT NULL,
				document_id TEXT NOT NULL,
				chunk_index INTEGER NOT NULL,
				text TEXT NOT NULL,
				token_count INTEGER NOT NULL,
				page_numbers TEXT NOT NULL,
				overlap_tokens INTEGER NOT NULL,
				char_start INTEGER NOT NULL,
				char_end INTEGER NOT NULL,
				source_file TEXT NOT NULL,
				source_type TEXT NOT NULL,
				page_number INTEGER NOT NULL,
				case_name TEXT,
				court TEXT,
				judgement_date TEXT,
				url TEXT,
				citation TEXT,
				vector BLOB NOT NULL,
				updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
				PRIMARY KEY (collection, document_id, chunk_index)
			)
		`)

		this.db.prepare('INSERT OR IGNORE INTO collections (name) VALUES (?)').run(this.collection)
	}

	/**
	 * Inserts or replaces chunks keyed by (document id, chunk index).
	 * @returns the number of chunks written.
	 * @throws {StoreError} on a dimension mismatch or a failed write; nothing is written then.
	 */
	upsert(chunks: readonly EmbeddedChunk[]): Promise<number> {
		return this.write(() => {
			this.writeChunks(chunks)
			return chunks.length
		})
	}

	/**
	 * Upserts the chunks of one document and removes any of its chunks beyond the new ones.
	 * Used for re-ingestion, where a changed document may now produce fewer chunks.
	 */
	replaceDocument(documentId: string, chunks: readonly EmbeddedChunk[]): Promise<number> {
		for (const chunk of chunks) {
			if (chunk.documentId !== documentId) {
				return Promise.reject(new StoreError(`Chunk of '${chunk.documentId}' passed while replacing '${documentId}'.`))
			}
		}
		return this.write(() => {
			this.writeChunks(chunks)
			const stale = this.db
				.prepare('DELETE FROM chunks WHERE collection = ? AND document_id = ? AND chunk_index >= ?')
				.run(this.collection, documentId, chunks.length)
			if (stale.changes > 0) {
				this.logger.debug(`[SqliteVectorIndex] Removed ${stale.changes} stale chunks of '${documentId}'.`)
			}
			return chunks.length
		})
	}

	/** @returns the number of chunks removed. */
	deleteDocument(documentId: string): Promise<number> {
		return this.write(() => {
			const result = this.db
				.prepare('DELETE FROM chunks WHERE collection = ? AND document_id = ?')
				.run(this.collection, documentId)
			return result.changes
		})
	}

	/** Removes every chunk of the collection (useful for testing). */
	clear(): Promise<void> {
		return this.write(() => {
			this.db.prepare('DELETE FROM chunks WHERE collection = ?').run(this.collection)
		})
	}

	/**
	 * Returns up to `topK` chunks by cosine similarity, ties broken by ascending chunk index and
	 * then document id. An empty index yields an empty result.
	 */
	async query(vector: readonly number[], topK: number): Promise<RetrievalResult> {
		if (!Number.isInteger(topK) || topK <= 0) {
			throw new RangeError(`topK must be a positive integer, got ${topK}.`)
		}
		const entries = this.snapshot
		if (entries.size === 0) {
			return []
		}
		if (vector.length !== this.dimension) {
			throw new StoreError(`Query vector has ${vector.length} dimensions; the index holds ${this.dimension}.`)
		}

		const queryNorm = magnitude(vector)
		const scored: RetrievedChunk[] = []
		for (const { chunk, norm } of entries.values()) {
			scored.push({
				id: chunkId(chunk.documentId, chunk.chunkIndex),
				documentId: chunk.documentId,
				chunkIndex: chunk.chunkIndex,
				text: chunk.text,
				metadata: { ...chunk.metadata },
				score: cosine(vector, chunk.vector, queryNorm, norm),
			})
		}

		scored.sort((a, b) =>
			b.score - a.score
			|| a.chunkIndex - b.chunkIndex
			|| (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : 0),
		)
		return scored.slice(0, topK)
	}

	/** Flushes the write-ahead log into the database file. */
	async persist(): Promise<void> {
		await this.lock.runExclusive(() => {
			try {
				this.db.pragma('wal_checkpoint(TRUNCATE)')
			}
			catch (error) {
				throw new StoreError(`Could not persist the vector index: ${describeError(error)}`, { cause: error })
			}
		})
	}

	/** Rebuilds the in-memory snapshot from the backing store. */
	async load(): Promise<void> {
		await this.lock.runExclusive(() => {
			this.dimension = this.readDimension()
			this.snapshot = this.readSnapshot()
		})
		this.logger.debug(`[SqliteVectorIndex] Loaded ${this.snapshot.size} chunks from '${this.collection}'.`)
	}

	count(): number {
		return this.snapshot.size
	}

	get vectorDimension(): number | null {
		return this.dimension
	}

	/** Every stored chunk, ordered by document id and chunk index. */
	list(): EmbeddedChunk[] {
		return [...this.snapshot.values()]
			.map(entry => entry.chunk)
			.sort((a, b) => (a.documentId < b.documentId ? -1 : a.documentId > b.documentId ? 1 : a.chunkIndex - b.chunkIndex))
	}

	getStats(): { chunks: number, documents: number, dimension: number | null } {
		const documents = new Set([...this.snapshot.values()].map(entry => entry.chunk.documentId))
		return { chunks: this.snapshot.size, documents: documents.size, dimension: this.dimension }
	}

	close(): void {
		this.db.close()
	}

	private async write<T>(mutation: () => T): Promise<T> {
		return this.lock.runExclusive(() => {
			let result: T
			try {
				result = this.db.transaction(mutation)()
			}
			catch (error) {
				// the rolled-back transaction may have recorded a dimension
				this.dimension = this.readDimension()
				if (error instanceof StoreError) throw error
				throw new StoreError(`Vector index write failed: ${describeError(error)}`, { cause: error })
			}
			this.snapshot = this.readSnapshot()
			return result
		})
	}

	private writeChunks(chunks: readonly EmbeddedChunk[]): void {
		const statement = this.db.prepare(`
			INSERT OR REPLACE INTO chunks (
				collection, document_id, chunk_index, text, token_count, page_numbers, overlap_tokens,
				char_start, char_end, source_file, source_type, page_number, case_name, court,
				judgement_date, url, citation, vector, updated_at
			) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, CURRENT_TIMESTAMP)
		`)

		for (const chunk of chunks) {
			this.checkDimension(chunk)
			const { metadata } = chunk
			statement.run(
				this.collection,
				chunk.documentId,
				chunk.chunkIndex,
				chunk.text,
				chunk.tokenCount,
				JSON.stringify(chunk.pageNumbers),
				chunk.overlapTokens,
				chunk.charStart,
				chunk.charEnd,
				metadata.sourceFile,
				metadata.sourceType,
				metadata.pageNumber,
				metadata.caseName,
				metadata.court,
				metadata.judgementDate,
				metadata.url,
				metadata.citation,
				encodeVector(chunk.vector),
			)
		}
	}

	private checkDimension(chunk: EmbeddedChunk): void {
		if (this.dimension === null) {
			this.dimension = chunk.vector.length
			this.writeDimension(chunk.vector.length)
			return
		}
		if (chunk.vector.length !== this.dimension) {
			throw new StoreError(
				`Chunk ${chunk.chunkIndex} of '${chunk.documentId}' has ${chunk.vector.length} dimensions; the index holds ${this.dimension}.`,
			)
		}
	}

	private readDimension(): number | null {
		const row = this.db.prepare('SELECT dimension FROM collections WHERE name = ?').get(this.collection) as
			| { dimension: number | null }
			| undefined
		return row?.dimension ?? null
	}

	private writeDimension(dimension: number): void {
		this.db.prepare('UPDATE collections SET dimension = ? WHERE name = ?').run(dimension, this.collection)
	}

	private readSnapshot(): Map<string, IndexEntry> {
		const rows = this.db
			.prepare('SELECT * FROM chunks WHERE collection = ? ORDER BY document_id, chunk_index')
			.all(this.collection) as ChunkRow[]

		const snapshot = new Map<string, IndexEntry>()
		for (const row of rows) {
			const chunk = rowToChunk(row)
			snapshot.set(chunkId(chunk.documentId, chunk.chunkIndex), { chunk, norm: magnitude(chunk.vector) })
		}
		return snapshot
	}
}

export function chunkId(documentId: string, chunkIndex: number): string {
	return `${documentId}_${chunkIndex}`
}

function rowToChunk(row: ChunkRow): EmbeddedChunk {
	const metadata: ChunkMetadata = {
		sourceFile: row.source_file,
		sourceType: row.source_type,
		pageNumber: row.page_number,
		chunkIndex: row.chunk_index,
		caseName: row.case_name,
		court: row.court,
		judgementDate: row.judgement_date,
		url: row.url,
		citation: row.citation,
	}
	return {
		documentId: row.document_id,
		chunkIndex: row.chunk_index,
		text: row.text,
		tokenCount: row.token_count,
		pageNumbers: parsePageNumbers(row.page_numbers),
		overlapTokens: row.overlap_tokens,
		charStart: row.char_start,
		charEnd: row.char_end,
		metadata,
		vector: decodeVector(row.vector),
	}
}

function parsePageNumbers(value: string): number[] {
	const parsed: unknown = JSON.parse(value)
	if (!Array.isArray(parsed)) return []
	return parsed.filter((page): page is number => typeof page === 'number')
}

/** Vectors are stored as little-endian float64 so they round-trip bit for bit. */
function encodeVector(vector: readonly number[]): Buffer {
	const buffer = Buffer.alloc(vector.length * 8)
	vector.forEach((value, i) => buffer.writeDoubleLE(value, i * 8))
	return buffer
}

function decodeVector(buffer: Buffer): number[] {
	const vector = new Array<number>(buffer.length / 8)
	for (let i = 0; i < vector.length; i++) {
		vector[i] = buffer.readDoubleLE(i * 8)
	}
	return vector
}

function magnitude(vector: readonly number[]): number {
	let sum = 0
	for (const value of vector) sum += value * value
	return Math.sqrt(sum)
}

function cosine(a: readonly number[], b: readonly number[], normA: number, normB: number): number {
	if (normA === 0 || normB === 0) return 0
	let dot = 0
	for (let i = 0; i < a.length; i++) {
		dot += (a[i] ?? 0) * (b[i] ?? 0)
	}
	return dot / (normA * normB)
}
