import { readFile } from 'node:fs/promises'
import { extname } from 'node:path'
import type { PDFDocumentProxy } from 'pdfjs-dist'
import { ExtractionError, OcrError } from '../errors.js'
import type { OcrEngine, OcrRequest, PageSource, RawPage } from '../types.js'

/** Plain-text documents; a form feed separates pages. */
export class TextPageSource implements PageSource {
	async readPages(path: string): Promise<RawPage[]> {
		let content: string
		try {
			content = await readFile(path, 'utf-8')
		}
		catch (error) {
			throw new ExtractionError(`Could not read '${path}'.`, path, undefined, { cause: error })
		}
		return content.split('\f').map((text, i) => ({ pageNumber: i + 1, text }))
	}
}

/** Text layer of PDF files, read with pdfjs-dist. Pages are never rendered, so no image is attached. */
export class PdfPageSource implements PageSource {
	async readPages(path: string): Promise<RawPage[]> {
		let data: Uint8Array
		try {
			data = new Uint8Array(await readFile(path))
		}
		catch (error) {
			throw new ExtractionError(`Could not read '${path}'.`, path, undefined, { cause: error })
		}

		const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs')
		let pdf: PDFDocumentProxy
		try {
			pdf = await pdfjs.getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise
		}
		catch (error) {
			throw new ExtractionError(`'${path}' is not a readable PDF.`, path, undefined, { cause: error })
		}

		const pages: RawPage[] = []
		try {
			for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
				pages.push(await this.readPage(pdf, pageNumber))
			}
		}
		finally {
			await pdf.destroy()
		}
		return pages
	}

	private async readPage(pdf: PDFDocumentProxy, pageNumber: number): Promise<RawPage> {
		try {
			const page = await pdf.getPage(pageNumber)
			const content = await page.getTextContent()
			let text = ''
			for (const item of content.items) {
				if ('str' in item) {
					text += item.str
					if (item.hasEOL) text += '\n'
					else if (item.str && !item.str.endsWith(' ')) text += ' '
				}
			}
			page.cleanup()
			return { pageNumber, text }
		}
		catch (error) {
			// an unreadable text layer counts as empty, which sends the page to OCR
			return { pageNumber, text: '', textLayerError: error }
		}
	}
}

/** Picks the PDF reader for `.pdf` files and the text reader for everything else. */
export class FileTypePageSource implements PageSource {
	constructor(
		private readonly pdf: PageSource = new PdfPageSource(),
		private readonly text: PageSource = new TextPageSource(),
	) {}

	readPages(path: string): Promise<RawPage[]> {
		return extname(path).toLowerCase() === '.pdf' ? this.pdf.readPages(path) : this.text.readPages(path)
	}
}

/** The default engine when none is configured: every page sent to OCR fails. */
export class NoOcrEngine implements OcrEngine {
	async recognize(request: OcrRequest): Promise<string> {
		throw new OcrError(`No OCR engine configured; page ${request.pageNumber} of '${request.sourceFile}' has no text layer.`)
	}
}
