import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ExtractionError } from '../src/errors.js'
import { parseFilenameMetadata, parseHeaderMetadata } from '../src/normalizer/metadata.js'
import { DocumentNormalizer } from '../src/normalizer/normalizer.js'
import { FileTypePageSource, NoOcrEngine, TextPageSource } from '../src/normalizer/sources.js'
import { cleanPageText, normalizeWhitespace } from '../src/normalizer/text.js'
import { FakeOcrEngine, InMemoryEventLogger, StaticPageSource } from '../src/testing/index.js'
import { createTempDir } from './helpers.js'

describe('Document Normalizer', () => {
	describe('cleanPageText', () => {
		it('should collapse spaces, drop page numbers and rules, and keep paragraph breaks', () => {
			const raw = '  Section 302   IPC \r\n\r\n\r\n\r\nPage 3 of 10\n----------\nMurder  is defined '

			expect(cleanPageText(raw)).toBe('Section 302 IPC\n\nMurder is defined')
		})

		it('should drop lines that only hold a page number', () => {
			expect(cleanPageText('12\nText\n- 4 -\n3/9')).toBe('Text')
		})

		it('should collapse all whitespace on request', () => {
			expect(normalizeWhitespace(' a\n\n b\tc ')).toBe('a b c')
		})
	})

	describe('parseHeaderMetadata', () => {
		it('should read case name, bench, date and reporter citation', () => {
			const header = [
				'IN THE SUPREME COURT OF INDIA',
				'RAM KUMAR vs. STATE OF KERALA',
				'BENCH: Justice A. Sharma',
				'JUDGMENT DATE: 12/03/2019',
				'Cited as (2019) 3 SCC 45',
			].join('\n')

			expect(parseHeaderMetadata(header)).toEqual({
				caseName: 'RAM KUMAR v. STATE OF KERALA',
				bench: 'Justice A. Sharma',
				judgementDate: '12/03/2019',
				citation: '(2019) 3 SCC 45',
			})
		})

		it('should leave fields unset when nothing matches', () => {
			expect(parseHeaderMetadata('An ordinary paragraph of text.')).toEqual({})
		})
	})

	describe('parseFilenameMetadata', () => {
		it('should read court, year and case number from judgment file names', () => {
			expect(parseFilenameMetadata('2019_SC_1234.pdf')).toEqual({ court: 'SC', year: '2019', caseNumber: '2019_SC_1234' })
		})

		it('should recognize act names', () => {
			expect(parseFilenameMetadata('IPC_1860.pdf')).toEqual({ actName: 'IPC' })
			expect(parseFilenameMetadata('Evidence_Act_1872.txt')).toEqual({ actName: 'Evidence Act' })
		})
	})

	describe('DocumentNormalizer', () => {
		const path = '/corpus/2019_SC_1234.pdf'

		it('should fall back to OCR and skip pages that fail both ways', async () => {
			const events = new InMemoryEventLogger()
			const ocr = new FakeOcrEngine({ 2: 'Recognized text.' })
			const normalizer = new DocumentNormalizer({
				pageSource: new StaticPageSource({
					[path]: [
						{ pageNumber: 1, text: 'RAM v. STATE\nSection 302 defines murder.' },
						{ pageNumber: 2, text: '' },
						{ pageNumber: 3, text: '  ' },
					],
				}),
				ocr,
				eventBus: events,
			})

			const document = await normalizer.normalize(path, { url: 'https://example.org/2019_SC_1234.pdf' })

			expect(document.id).toBe('2019_SC_1234')
			expect(document.sourceFile).toBe('2019_SC_1234.pdf')
			expect(document.pages).toEqual([
				{ pageNumber: 1, text: 'RAM v. STATE\nSection 302 defines murder.', method: 'direct' },
				{ pageNumber: 2, text: 'Recognized text.', method: 'ocr' },
			])
			expect(document.metadata).toEqual({
				sourceType: 'judgment',
				caseName: 'RAM v. STATE',
				court: 'SC',
				year: '2019',
				url: 'https://example.org/2019_SC_1234.pdf',
			})
			expect(document.diagnostics.map(d => d.pageNumber)).toEqual([3])
			expect(document.diagnostics[0]?.error).toBeInstanceOf(ExtractionError)
			expect(ocr.requests.map(r => r.pageNumber)).toEqual([2, 3])
			expect(events.filter('ingest:page-skipped')).toEqual([
				{
					type: 'ingest:page-skipped',
					payload: {
						sourceFile: '2019_SC_1234.pdf',
						pageNumber: 3,
						reason: 'Page 3 has no text layer and OCR failed: No OCR text for page 3 of 2019_SC_1234.pdf.',
					},
				},
			])
		})

		it('should skip a page when OCR finds no text', async () => {
			const normalizer = new DocumentNormalizer({
				pageSource: new StaticPageSource({ [path]: [{ pageNumber: 1, text: '' }] }),
				ocr: new FakeOcrEngine({ 1: '   ' }),
			})

			const document = await normalizer.normalize(path)

			expect(document.pages).toEqual([])
			expect(document.diagnostics[0]?.error.message).toBe('Page 1 has no text layer and OCR found no text.')
		})

		it('should fail with an ExtractionError when the file cannot be opened', async () => {
			const normalizer = new DocumentNormalizer({ pageSource: new StaticPageSource({}) })

			await expect(normalizer.normalize('/corpus/missing.pdf')).rejects.toThrow(
				"Could not extract pages from 'missing.pdf': No such document: /corpus/missing.pdf",
			)
		})

		it('should use the given source type', async () => {
			const normalizer = new DocumentNormalizer({
				pageSource: new StaticPageSource({ '/acts/IPC_1860.txt': [{ pageNumber: 1, text: 'Section 302. Punishment for murder.' }] }),
			})

			const document = await normalizer.normalize('/acts/IPC_1860.txt', { sourceType: 'act' })

			expect(document.metadata).toEqual({ sourceType: 'act', actName: 'IPC' })
		})
	})

	describe('page sources', () => {
		let temp: ReturnType<typeof createTempDir>

		beforeEach(() => {
			temp = createTempDir()
		})

		afterEach(() => {
			temp.cleanup()
		})

		it('should split text files into pages at form feeds', async () => {
			const file = join(temp.path, 'act.txt')
			writeFileSync(file, 'first page\fsecond page')

			const pages = await new TextPageSource().readPages(file)

			expect(pages).toEqual([
				{ pageNumber: 1, text: 'first page' },
				{ pageNumber: 2, text: 'second page' },
			])
		})

		it('should route text files to the text reader', async () => {
			const file = join(temp.path, 'notes.txt')
			writeFileSync(file, 'only page')

			await expect(new FileTypePageSource().readPages(file)).resolves.toEqual([{ pageNumber: 1, text: 'only page' }])
		})

		it('should fail to read a missing text file', async () => {
			await expect(new TextPageSource().readPages(join(temp.path, 'none.txt'))).rejects.toBeInstanceOf(ExtractionError)
		})

		it('should fail every OCR request without an engine', async () => {
			await expect(new NoOcrEngine().recognize({ sourceFile: 'a.pdf', pageNumber: 1 })).rejects.toThrow(
				"No OCR engine configured; page 1 of 'a.pdf' has no text layer.",
			)
		})
	})
})
