import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { DocumentMetadata, EmbeddedChunk, LegalDocument, RetrievedChunk } from '../src/types.js'

export function makeDocument(id: string, pages: string[], metadata: Partial<DocumentMetadata> = {}): LegalDocument {
	return {
		id,
		sourceFile: `${id}.txt`,
		pages: pages.map((text, i) => ({ pageNumber: i + 1, text, method: 'direct' })),
		metadata: { sourceType: 'judgment', ...metadata },
		diagnostics: [],
	}
}

/** `count` distinct words, `w0 w1 ...`, starting at `from`. */
export function words(count: number, from = 0): string {
	return Array.from({ length: count }, (_, i) => `w${from + i}`).join(' ')
}

export function makeEmbeddedChunk(documentId: string, chunkIndex: number, vector: number[], text = `chunk ${chunkIndex} of ${documentId}`): EmbeddedChunk {
	return {
		documentId,
		chunkIndex,
		text,
		tokenCount: text.split(' ').length,
		pageNumbers: [1],
		overlapTokens: 0,
		charStart: 0,
		charEnd: text.length,
		metadata: {
			sourceFile: `${documentId}.txt`,
			sourceType: 'judgment',
			pageNumber: 1,
			chunkIndex,
			caseName: null,
			court: null,
			judgementDate: null,
			url: null,
			citation: null,
		},
		vector,
	}
}

export function makeRetrieved(count: number, caseNames: Array<string | null> = [], citations: Array<string | null> = []): RetrievedChunk[] {
	return Array.from({ length: count }, (_, i) => ({
		id: `doc_${i}`,
		documentId: 'doc',
		chunkIndex: i,
		text: `Passage ${i + 1}`,
		score: 1 - i / 10,
		metadata: {
			sourceFile: 'doc.txt',
			sourceType: 'judgment',
			pageNumber: i + 1,
			chunkIndex: i,
			caseName: caseNames[i] ?? null,
			court: null,
			judgementDate: null,
			url: null,
			citation: citations[i] ?? null,
		},
	}))
}

export function createTempDir(prefix = 'lexcite-test-'): { path: string, cleanup: () => void } {
	const path = mkdtempSync(join(tmpdir(), prefix))
	return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) }
}
