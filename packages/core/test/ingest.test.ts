import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { HashingEmbeddingProvider } from '../src/embeddings/hashing.js'
import { IngestError } from '../src/errors.js'
import { findDocuments, IngestionPipeline, readManifest } from '../src/ingest.js'
import { SqliteVectorIndex } from '../src/store/sqlite-index.js'
import { InMemoryEventLogger } from '../src/testing/index.js'
import { createTempDir, words } from './helpers.js'

describe('IngestionPipeline', () => {
	let temp: ReturnType<typeof createTempDir>
	let corpus: string
	let index: SqliteVectorIndex
	let events: InMemoryEventLogger
	let pipeline: IngestionPipeline

	beforeEach(() => {
		temp = createTempDir()
		corpus = join(temp.path, 'corpus')
		mkdirSync(corpus)
		index = new SqliteVectorIndex({ directory: join(temp.path, 'index') })
		events = new InMemoryEventLogger()
		pipeline = new IngestionPipeline({
			embeddings: new HashingEmbeddingProvider({ dimension: 64 }),
			index,
			eventBus: events,
		})
	})

	afterEach(() => {
		index.close()
		temp.cleanup()
	})

	function writeDocument(relativePath: string, content: string): string {
		const path = join(corpus, relativePath)
		mkdirSync(join(path, '..'), { recursive: true })
		writeFileSync(path, content)
		return path
	}

	it('should index the chunks of a document and report their number', async () => {
		const path = writeDocument('2019_SC_1234.txt', words(1000))

		await expect(pipeline.ingest(path)).resolves.toBe(2)
		expect(index.count()).toBe(2)
		expect(index.list().map(chunk => chunk.metadata.court)).toEqual(['SC', 'SC'])
		expect(events.events.map(event => event.type)).toEqual(['ingest:start', 'ingest:finish'])
		expect(events.find('ingest:finish')?.payload).toEqual({ sourceFile: '2019_SC_1234.txt', documentId: '2019_SC_1234', chunks: 2 })
	})

	it('should replace the chunks of a re-ingested document', async () => {
		const path = writeDocument('act.txt', words(1000))
		await pipeline.ingest(path)
		await pipeline.ingest(path)
		expect(index.count()).toBe(2)

		writeDocument('act.txt', words(300))
		await expect(pipeline.ingest(path)).resolves.toBe(1)
		expect(index.count()).toBe(1)
	})

	it('should fail documents without extractable text', async () => {
		const path = writeDocument('blank.txt', '   \f  ')

		const ingest = pipeline.ingest(path)

		await expect(ingest).rejects.toBeInstanceOf(IngestError)
		await expect(ingest).rejects.toThrow("'blank.txt' has no extractable text.")
		expect(events.filter('ingest:page-skipped').map(event => event.payload.pageNumber)).toEqual([1, 2])
	})

	it('should wrap other failures with the file name', async () => {
		await expect(pipeline.ingest(join(corpus, 'missing.txt'))).rejects.toThrow(
			`Failed to ingest 'missing.txt': Could not read '${join(corpus, 'missing.txt')}'.`,
		)
	})

	it('should ingest a directory in batches, collect failures and apply manifest urls', async () => {
		writeDocument('a.txt', 'Section 302 defines murder.')
		writeDocument('empty.txt', ' ')
		writeDocument('nested/b.txt', 'Section 420 defines cheating.')
		writeDocument('notes.md', 'not a document')
		writeDocument('manifest.json', JSON.stringify({ downloads: [{ filename: 'a.txt', url: 'https://example.org/a.pdf' }, { filename: 3 }] }))

		const report = await pipeline.ingestDirectory(corpus, { sourceType: 'act', concurrency: 2 })

		expect(report.documents).toEqual([
			{ sourceFile: 'a.txt', documentId: 'a', chunks: 1, skippedPages: [] },
			{ sourceFile: 'b.txt', documentId: 'b', chunks: 1, skippedPages: [] },
		])
		expect(report.totalChunks).toBe(2)
		expect(report.failures.map(failure => failure.sourceFile)).toEqual(['empty.txt'])
		expect(report.failures[0]?.error.message).toBe("'empty.txt' has no extractable text.")
		expect(index.list().map(chunk => [chunk.documentId, chunk.metadata.sourceType, chunk.metadata.url])).toEqual([
			['a', 'act', 'https://example.org/a.pdf'],
			['b', 'act', null],
		])
	})

	it('should ingest each corpus subdirectory with its source type', async () => {
		writeDocument('acts/IPC_1860.txt', 'Section 302. Punishment for murder.')
		writeDocument('judgments/2019_SC_1.txt', 'RAM v. STATE\nThe appeal is dismissed.')

		const reports = await pipeline.ingestCorpus(corpus)

		expect([...reports.keys()]).toEqual(['act', 'judgment'])
		expect(index.list().map(chunk => [chunk.documentId, chunk.metadata.sourceType, chunk.metadata.caseName])).toEqual([
			['2019_SC_1', 'judgment', 'RAM v. STATE'],
			['IPC_1860', 'act', null],
		])
	})
})

describe('findDocuments', () => {
	it('should list pdf and txt files recursively in path order', async () => {
		const temp = createTempDir()
		try {
			mkdirSync(join(temp.path, 'sub'))
			writeFileSync(join(temp.path, 'b.PDF'), '')
			writeFileSync(join(temp.path, 'a.txt'), '')
			writeFileSync(join(temp.path, 'sub', 'c.txt'), '')
			writeFileSync(join(temp.path, 'd.docx'), '')

			await expect(findDocuments(temp.path)).resolves.toEqual([
				join(temp.path, 'a.txt'),
				join(temp.path, 'b.PDF'),
				join(temp.path, 'sub', 'c.txt'),
			])
		}
		finally {
			temp.cleanup()
		}
	})
})

describe('readManifest', () => {
	it('should tolerate a missing or malformed manifest', async () => {
		const temp = createTempDir()
		try {
			await expect(readManifest(temp.path)).resolves.toEqual(new Map())

			writeFileSync(join(temp.path, 'manifest.json'), '{ not json')
			await expect(readManifest(temp.path)).resolves.toEqual(new Map())

			writeFileSync(join(temp.path, 'manifest.json'), JSON.stringify({ files: [] }))
			await expect(readManifest(temp.path)).resolves.toEqual(new Map())
		}
		finally {
			temp.cleanup()
		}
	})
})
