import { readdir, readFile, stat } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import type { ChunkerOptions } from './chunker.js'
import { chunkDocument } from './chunker.js'
import { DEFAULT_CONFIG } from './config.js'
import { describeError, IngestError, isLexciteError } from './errors.js'
import { NullLogger } from './logger.js'
import type { NormalizeOptions } from './normalizer/normalizer.js'
import { DocumentNormalizer } from './normalizer/normalizer.js'
import type { SqliteVectorIndex } from './store/sqlite-index.js'
import type { EmbeddedChunk, EmbeddingProvider, IEventBus, ILogger, SourceType } from './types.js'

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt']
export const MANIFEST_FILE_NAME = 'manifest.json'

/** Corpus subdirectories and the source type of the documents they hold. */
export const CORPUS_LAYOUT: ReadonlyArray<[directory: string, sourceType: SourceType]> = [
	['acts', 'act'],
	['judgments', 'judgment'],
	['raw', 'raw'],
]

export interface IngestionPipelineOptions {
	embeddings: EmbeddingProvider
	index: Pick<SqliteVectorIndex, 'replaceDocument' | 'persist'>
	normalizer?: DocumentNormalizer
	chunking?: ChunkerOptions
	/** Documents processed at once by `ingestDirectory`. */
	concurrency?: number
	logger?: ILogger
	eventBus?: IEventBus
}

export interface IngestDirectoryOptions {
	sourceType?: SourceType
	concurrency?: number
}

export interface IngestedDocument {
	sourceFile: string
	documentId: string
	chunks: number
	skippedPages: number[]
}

export interface IngestFailure {
	sourceFile: string
	error: IngestError
}

export interface IngestReport {
	documents: IngestedDocument[]
	failures: IngestFailure[]
	totalChunks: number
}

interface ManifestEntry {
	filename: string
	url: string
}

/**
 * Normalizes, chunks, embeds and indexes documents. Re-ingesting a document replaces its
 * chunks instead of adding to them.
 */
export class IngestionPipeline {
	private readonly embeddings: EmbeddingProvider
	private readonly index: IngestionPipelineOptions['index']
	private readonly normalizer: DocumentNormalizer
	private readonly chunking: ChunkerOptions
	private readonly concurrency: number
	private readonly logger: ILogger
	private readonly eventBus?: IEventBus

	constructor(options: IngestionPipelineOptions) {
		this.embeddings = options.embeddings
		this.index = options.index
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus
		this.normalizer = options.normalizer ?? new DocumentNormalizer({ logger: this.logger, eventBus: this.eventBus })
		this.chunking = options.chunking ?? DEFAULT_CONFIG.chunking
		this.concurrency = options.concurrency ?? DEFAULT_CONFIG.ingestion.concurrency
	}

	/**
	 * @returns the number of chunks indexed for the document.
	 * @throws {IngestError} wrapping the extraction, embedding or store failure.
	 */
	async ingest(path: string, options: NormalizeOptions = {}): Promise<number> {
		return (await this.ingestDocument(path, options)).chunks
	}

	private async ingestDocument(path: string, options: NormalizeOptions): Promise<IngestedDocument> {
		const sourceFile = basename(path)
		await this.eventBus?.emit({ type: 'ingest:start', payload: { sourceFile } })

		try {
			const document = await this.normalizer.normalize(path, options)
			if (document.pages.length === 0) {
				throw new IngestError(`'${sourceFile}' has no extractable text.`, sourceFile)
			}

			const chunks = chunkDocument(document, this.chunking)
			const vectors = await this.embeddings.embed(chunks.map(chunk => chunk.text))
			const embedded: EmbeddedChunk[] = chunks.map((chunk, i) => ({ ...chunk, vector: vectors[i] ?? [] }))
			await this.index.replaceDocument(document.id, embedded)

			this.logger.info(`[IngestionPipeline] Indexed ${embedded.length} chunks from '${sourceFile}'.`, {
				pages: document.pages.length,
				skippedPages: document.diagnostics.length,
			})
			await this.eventBus?.emit({
				type: 'ingest:finish',
				payload: { sourceFile, documentId: document.id, chunks: embedded.length },
			})
			return {
				sourceFile,
				documentId: document.id,
				chunks: embedded.length,
				skippedPages: document.diagnostics.map(diagnostic => diagnostic.pageNumber),
			}
		}
		catch (error) {
			if (error instanceof IngestError) throw error
			throw new IngestError(`Failed to ingest '${sourceFile}': ${describeError(error)}`, sourceFile, {
				cause: error,
				isFatal: isLexciteError(error) && error.isFatal,
			})
		}
	}

	/**
	 * Ingests every `.pdf` and `.txt` file under `directory`, recursively, in batches of
	 * `concurrency` documents. A `manifest.json` in the directory supplies source URLs.
	 * Failures are collected per file; the index is persisted once at the end.
	 */
	async ingestDirectory(directory: string, options: IngestDirectoryOptions = {}): Promise<IngestReport> {
		const files = await findDocuments(directory)
		const urls = await readManifest(directory, this.logger)
		const concurrency = options.concurrency ?? this.concurrency
		const report: IngestReport = { documents: [], failures: [], totalChunks: 0 }

		this.logger.info(`[IngestionPipeline] Found ${files.length} documents in '${directory}'.`)

		for (let i = 0; i < files.length; i += concurrency) {
			const batch = files.slice(i, i + concurrency)
			const settled = await Promise.allSettled(
				batch.map(file => this.ingestDocument(file, { sourceType: options.sourceType, url: urls.get(basename(file)) })),
			)

			for (const [j, result] of settled.entries()) {
				if (result.status === 'fulfilled') {
					report.documents.push(result.value)
					report.totalChunks += result.value.chunks
					continue
				}
				const sourceFile = basename(batch[j] ?? '')
				const error = result.reason instanceof IngestError
					? result.reason
					: new IngestError(describeError(result.reason), sourceFile, { cause: result.reason })
				this.logger.error(`[IngestionPipeline] ${error.message}`)
				report.failures.push({ sourceFile, error })
			}
		}

		await this.index.persist()
		return report
	}

	/** Ingests the `acts`, `judgments` and `raw` subdirectories of a corpus that exist. */
	async ingestCorpus(dataDir: string, options: Omit<IngestDirectoryOptions, 'sourceType'> = {}): Promise<Map<SourceType, IngestReport>> {
		const reports = new Map<SourceType, IngestReport>()
		for (const [name, sourceType] of CORPUS_LAYOUT) {
			const directory = join(dataDir, name)
			if (!(await isDirectory(directory))) {
				this.logger.debug(`[IngestionPipeline] No '${name}' directory in '${dataDir}'.`)
				continue
			}
			reports.set(sourceType, await this.ingestDirectory(directory, { ...options, sourceType }))
		}
		return reports
	}
}

/** Supported documents under `directory`, sorted by path. */
export async function findDocuments(directory: string): Promise<string[]> {
	const entries = await readdir(directory, { recursive: true })
	return entries
		.filter(entry => SUPPORTED_EXTENSIONS.includes(extname(entry).toLowerCase()))
		.map(entry => join(directory, entry))
		.sort()
}

/** Maps file names to source URLs. A missing or malformed manifest yields an empty map. */
export async function readManifest(directory: string, logger: ILogger = new NullLogger()): Promise<Map<string, string>> {
	const urls = new Map<string, string>()
	const path = join(directory, MANIFEST_FILE_NAME)
	if (!(await isFile(path))) return urls

	let parsed: unknown
	try {
		parsed = JSON.parse(await readFile(path, 'utf-8'))
	}
	catch (error) {
		logger.warn(`[IngestionPipeline] Ignoring unreadable manifest '${path}': ${describeError(error)}`)
		return urls
	}

	const downloads = typeof parsed === 'object' && parsed !== null && 'downloads' in parsed ? parsed.downloads : undefined
	if (!Array.isArray(downloads)) {
		logger.warn(`[IngestionPipeline] Manifest '${path}' has no downloads list.`)
		return urls
	}
	for (const entry of downloads) {
		if (isManifestEntry(entry)) urls.set(entry.filename, entry.url)
	}
	return urls
}

function isManifestEntry(value: unknown): value is ManifestEntry {
	return typeof value === 'object'
		&& value !== null
		&& 'filename' in value
		&& typeof value.filename === 'string'
		&& 'url' in value
		&& typeof value.url === 'string'
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory()
	}
	catch {
		return false
	}
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile()
	}
	catch {
		return false
	}
}
