import { basename, extname } from 'node:path'
import { describeError, ExtractionError } from '../errors.js'
import { NullLogger } from '../logger.js'
import type {
	DocumentMetadata,
	ExtractionDiagnostic,
	IEventBus,
	ILogger,
	LegalDocument,
	OcrEngine,
	Page,
	PageSource,
	RawPage,
	SourceType,
} from '../types.js'
import { parseFilenameMetadata, parseHeaderMetadata } from './metadata.js'
import { FileTypePageSource, NoOcrEngine } from './sources.js'
import { cleanPageText } from './text.js'

export interface NormalizerOptions {
	pageSource?: PageSource
	ocr?: OcrEngine
	logger?: ILogger
	eventBus?: IEventBus
}

export interface NormalizeOptions {
	sourceType?: SourceType
	url?: string
}

/**
 * Turns a source file into cleaned, numbered pages plus heuristic metadata.
 * Pages without a text layer go through OCR one at a time; a page that fails both is skipped
 * and recorded in `diagnostics`.
 */
export class DocumentNormalizer {
	private readonly pageSource: PageSource
	private readonly ocr: OcrEngine
	private readonly logger: ILogger
	private readonly eventBus?: IEventBus

	constructor(options: NormalizerOptions = {}) {
		this.pageSource = options.pageSource ?? new FileTypePageSource()
		this.ocr = options.ocr ?? new NoOcrEngine()
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus
	}

	/**
	 * @throws {ExtractionError} when the file itself cannot be opened.
	 */
	async normalize(path: string, options: NormalizeOptions = {}): Promise<LegalDocument> {
		const sourceFile = basename(path)
		let rawPages: RawPage[]
		try {
			rawPages = await this.pageSource.readPages(path)
		}
		catch (error) {
			if (error instanceof ExtractionError) throw error
			throw new ExtractionError(`Could not extract pages from '${sourceFile}': ${describeError(error)}`, sourceFile, undefined, { cause: error })
		}

		const pages: Page[] = []
		const rawTexts: string[] = []
		const diagnostics: ExtractionDiagnostic[] = []

		for (const rawPage of rawPages) {
			try {
				const { text, method } = await this.extractPage(sourceFile, rawPage)
				rawTexts.push(text)
				const cleaned = cleanPageText(text)
				if (cleaned) {
					pages.push({ pageNumber: rawPage.pageNumber, text: cleaned, method })
				}
			}
			catch (error) {
				const extractionError = error instanceof ExtractionError
					? error
					: new ExtractionError(describeError(error), sourceFile, rawPage.pageNumber, { cause: error })
				diagnostics.push({ pageNumber: rawPage.pageNumber, error: extractionError })
				this.logger.warn(`[DocumentNormalizer] Skipping page ${rawPage.pageNumber} of '${sourceFile}'.`, {
					reason: extractionError.message,
				})
				await this.eventBus?.emit({
					type: 'ingest:page-skipped',
					payload: { sourceFile, pageNumber: rawPage.pageNumber, reason: extractionError.message },
				})
			}
		}

		this.logger.debug(`[DocumentNormalizer] Extracted ${pages.length}/${rawPages.length} pages from '${sourceFile}'.`)

		return {
			id: basename(sourceFile, extname(sourceFile)),
			sourceFile,
			pages,
			metadata: buildMetadata(sourceFile, rawTexts.join('\n\n'), options),
			diagnostics,
		}
	}

	private async extractPage(sourceFile: string, rawPage: RawPage): Promise<{ text: string, method: Page['method'] }> {
		if (rawPage.text.trim()) {
			return { text: rawPage.text, method: 'direct' }
		}

		let text: string
		try {
			text = await this.ocr.recognize({ sourceFile, pageNumber: rawPage.pageNumber, image: rawPage.image })
		}
		catch (error) {
			throw new ExtractionError(
				`Page ${rawPage.pageNumber} has no text layer and OCR failed: ${describeError(error)}`,
				sourceFile,
				rawPage.pageNumber,
				{ cause: error },
			)
		}

		if (!text.trim()) {
			throw new ExtractionError(`Page ${rawPage.pageNumber} has no text layer and OCR found no text.`, sourceFile, rawPage.pageNumber, {
				cause: rawPage.textLayerError,
			})
		}
		return { text, method: 'ocr' }
	}
}

function buildMetadata(sourceFile: string, rawText: string, options: NormalizeOptions): DocumentMetadata {
	const fromName = parseFilenameMetadata(sourceFile)
	const fromHeader = parseHeaderMetadata(rawText)
	const metadata: DocumentMetadata = { sourceType: options.sourceType ?? 'judgment' }

	const court = fromName.court ?? fromHeader.bench
	if (fromHeader.caseName) metadata.caseName = fromHeader.caseName
	if (fromHeader.bench) metadata.bench = fromHeader.bench
	if (court) metadata.court = court
	if (fromHeader.judgementDate) metadata.judgementDate = fromHeader.judgementDate
	if (fromHeader.citation) metadata.citation = fromHeader.citation
	if (fromName.year) metadata.year = fromName.year
	if (fromName.actName) metadata.actName = fromName.actName
	if (options.url) metadata.url = options.url
	return metadata
}
