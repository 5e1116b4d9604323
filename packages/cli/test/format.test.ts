import type { IngestReport, RetrievedChunk } from '@lexcite/core'
import { ConfigError, IngestError } from '@lexcite/core'
import chalk from 'chalk'
import { InvalidArgumentError } from 'commander'
import { beforeAll, describe, expect, it } from 'vitest'
import { parseInteger, parseTemperature } from '../src/context.js'
import { formatAnswer, formatError, formatVerification, ingestRows, retrievalRows } from '../src/format.js'

function retrieved(caseName: string | null, score: number, pageNumber: number): RetrievedChunk {
	return {
		id: `doc_${pageNumber}`,
		documentId: 'doc',
		chunkIndex: pageNumber,
		text: `Passage on page ${pageNumber}`,
		score,
		metadata: {
			sourceFile: '2019_SC_1.pdf',
			sourceType: 'judgment',
			pageNumber,
			chunkIndex: pageNumber,
			caseName,
			court: 'SC',
			judgementDate: null,
			url: null,
			citation: null,
		},
	}
}

describe('CLI Formatting', () => {
	beforeAll(() => {
		chalk.level = 0
	})

	it('should build one row per retrieved chunk under a header', () => {
		expect(retrievalRows([retrieved('Ram v. State', 0.91234, 3), retrieved(null, 0.5, 7)])).toEqual([
			['#', 'Score', 'Source', 'Page', 'Case'],
			['1', '0.912', '2019_SC_1.pdf', '3', 'Ram v. State'],
			['2', '0.500', '2019_SC_1.pdf', '7', '-'],
		])
	})

	it('should list ingested documents with their skipped pages', () => {
		const report: IngestReport = {
			documents: [
				{ sourceFile: 'a.pdf', documentId: 'a', chunks: 4, skippedPages: [2, 5] },
				{ sourceFile: 'b.txt', documentId: 'b', chunks: 1, skippedPages: [] },
			],
			failures: [{ sourceFile: 'c.pdf', error: new IngestError("'c.pdf' has no extractable text.", 'c.pdf') }],
			totalChunks: 5,
		}

		expect(ingestRows(report)).toEqual([
			['Document', 'Chunks', 'Skipped pages'],
			['a.pdf', '4', '2, 5'],
			['b.txt', '1', '-'],
		])
	})

	it('should summarize the verification result', () => {
		expect(formatVerification({ valid: [1, 2], invalid: [7], unverified: ['Shyam v. Union of India'], malformed: [] })).toBe(
			'Valid citations: [1] [2]\nInvalid citations: [7]\nUnverified references: Shyam v. Union of India',
		)
		expect(formatVerification({ valid: [], invalid: [], unverified: [], malformed: [] })).toBe('Valid citations: none')
	})

	it('should lead with the disclaimer and flag degraded answers', () => {
		const output = formatAnswer({
			mode: 'research',
			text: '  See [9].  ',
			verification: { valid: [], invalid: [9], unverified: [], malformed: [] },
			retrieved: [],
			status: 'degraded',
			attempts: 3,
			disclaimer: 'For research/educational use only.',
		})

		expect(output.split('\n\n')).toEqual([
			'For research/educational use only.',
			'See [9].',
			'─'.repeat(50),
			'Valid citations: none\nInvalid citations: [9]',
			'Citations still out of range after 3 attempts.',
		])
	})

	it('should name pipeline errors', () => {
		expect(formatError(new ConfigError('Bad value.'))).toBe('ConfigError: Bad value.')
		expect(formatError(new Error('plain'))).toBe('plain')
		expect(formatError('text')).toBe('text')
	})

	it('should parse numeric arguments', () => {
		expect(parseInteger('3')).toBe(3)
		expect(() => parseInteger('0')).toThrow(InvalidArgumentError)
		expect(() => parseInteger('2.5')).toThrow('Expected a positive integer.')
		expect(parseTemperature('0.3')).toBe(0.3)
		expect(() => parseTemperature('3')).toThrow('Expected a number between 0 and 2.')
	})
})
