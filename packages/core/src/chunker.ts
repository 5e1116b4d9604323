import { ConfigError } from './errors.js'
import type { Chunk, ChunkMetadata, LegalDocument } from './types.js'

export interface ChunkerOptions {
	/** Target chunk size in tokens. */
	chunkSize: number
	/** At a page boundary the buffer is cut once it holds at least this many tokens. */
	minChunkSize: number
	/** Fraction of the previous chunk's tokens carried into the next chunk. */
	overlap: number
}

export interface Token {
	start: number
	end: number
	pageNumber: number
}

/** Separator placed between pages when they are joined into the document text. */
export const PAGE_SEPARATOR = '\n\n'

/** Tokens are maximal runs of non-whitespace characters. */
export function tokenize(text: string, pageNumber = 1, offset = 0): Token[] {
	const tokens: Token[] = []
	for (const match of text.matchAll(/\S+/g)) {
		const start = offset + (match.index ?? 0)
		tokens.push({ start, end: start + match[0].length, pageNumber })
	}
	return tokens
}

export function countTokens(text: string): number {
	return text.match(/\S+/g)?.length ?? 0
}

/** Joins the pages of a document into the text that chunk offsets refer to. */
export function documentText(document: LegalDocument): string {
	return document.pages.map(page => page.text).join(PAGE_SEPARATOR)
}

/**
 * Splits a document into overlapping, token-bounded chunks that keep their page provenance.
 *
 * Tokens accumulate in a buffer that is emitted when it reaches `chunkSize`, or at a page
 * boundary once it holds `minChunkSize` tokens. Each new buffer starts with the trailing
 * `overlap` fraction of the previous chunk.
 */
export function chunkDocument(document: LegalDocument, options: ChunkerOptions): Chunk[] {
	validateChunkerOptions(options)

	const text = documentText(document)
	const tokens: Token[] = []
	// index of the first token of every page after the first
	const pageStarts = new Set<number>()
	let offset = 0
	for (const [i, page] of document.pages.entries()) {
		if (i > 0) {
			pageStarts.add(tokens.length)
			offset += PAGE_SEPARATOR.length
		}
		tokens.push(...tokenize(page.text, page.pageNumber, offset))
		offset += page.text.length
	}

	const chunks: Chunk[] = []
	let start = 0
	let overlapTokens = 0

	while (start < tokens.length) {
		let end = start
		while (end < tokens.length) {
			end++
			const size = end - start
			if (size >= options.chunkSize) break
			if (pageStarts.has(end) && size >= options.minChunkSize) break
		}

		chunks.push(buildChunk(document, text, tokens.slice(start, end), chunks.length, overlapTokens))
		if (end >= tokens.length) break

		const size = end - start
		overlapTokens = Math.min(Math.floor(options.overlap * size), size - 1)
		start = end - overlapTokens
	}

	return chunks
}

/**
 * Concatenates the first chunk with the non-overlapping tail of every following chunk.
 * For the overlapping chunks of one document this yields the document text from its first to
 * its last token.
 */
export function reconstructText(chunks: readonly Chunk[]): string {
	let result = ''
	let previousEnd: number | undefined
	for (const chunk of chunks) {
		if (previousEnd === undefined) {
			result = chunk.text
		}
		else if (previousEnd > chunk.charStart) {
			result += chunk.text.slice(previousEnd - chunk.charStart)
		}
		else {
			// no overlap: the whitespace between the two chunks is not part of either
			result += ` ${chunk.text}`
		}
		previousEnd = chunk.charEnd
	}
	return result
}

function buildChunk(
	document: LegalDocument,
	text: string,
	tokens: Token[],
	chunkIndex: number,
	overlapTokens: number,
): Chunk {
	const first = tokens[0]
	const last = tokens[tokens.length - 1]
	if (!first || !last) {
		throw new Error(`Chunk ${chunkIndex} of '${document.id}' has no tokens.`)
	}
	const pageNumbers = [...new Set(tokens.map(token => token.pageNumber))].sort((a, b) => a - b)
	const metadata: ChunkMetadata = {
		sourceFile: document.sourceFile,
		sourceType: document.metadata.sourceType,
		pageNumber: first.pageNumber,
		chunkIndex,
		caseName: document.metadata.caseName ?? null,
		court: document.metadata.court ?? null,
		judgementDate: document.metadata.judgementDate ?? null,
		url: document.metadata.url ?? null,
		citation: document.metadata.citation ?? null,
	}

	return {
		documentId: document.id,
		chunkIndex,
		text: text.slice(first.start, last.end),
		tokenCount: tokens.length,
		pageNumbers,
		overlapTokens,
		charStart: first.start,
		charEnd: last.end,
		metadata,
	}
}

function validateChunkerOptions(options: ChunkerOptions): void {
	if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
		throw new ConfigError(`chunkSize must be a positive integer, got ${options.chunkSize}.`)
	}
	if (!Number.isInteger(options.minChunkSize) || options.minChunkSize <= 0 || options.minChunkSize > options.chunkSize) {
		throw new ConfigError(`minChunkSize must be a positive integer no larger than chunkSize, got ${options.minChunkSize}.`)
	}
	if (!(options.overlap >= 0 && options.overlap < 1)) {
		throw new ConfigError(`overlap must be a fraction in [0, 1), got ${options.overlap}.`)
	}
}
