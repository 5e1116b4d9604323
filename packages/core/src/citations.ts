import { VerificationError } from './errors.js'
import type { RetrievalResult, VerificationResult } from './types.js'

/** A bracket whose content starts with a digit is read as a citation marker. */
const MARKER = /\[(\d[^\]]*)\]/g
const WELL_FORMED = /^\d+(?:\s*,\s*\d+)*$/

const NAME_WORD = `[A-Z][\\w.&']*`
const CONNECTOR = `(?:of|and|the|for|in)`
const PARTY = `${NAME_WORD}(?:\\s+(?:${CONNECTOR}\\s+)*${NAME_WORD})*`
const CASE_MENTION = new RegExp(`(${PARTY})\\s+(?:v\\.|vs\\.?|versus)\\s+(${PARTY})`, 'g')
const REPORTER_MENTION = /\(\d{4}\)\s+\d+\s+[A-Z]+\s+\d+/g

/**
 * Checks bracket-numbered citations in generated text against the retrieved passages they must
 * refer to. Only well-formed markers decide `valid` and `invalid`; everything else is advisory.
 */
export class CitationVerifier {
	verify(text: string, retrieved: RetrievalResult): VerificationResult {
		const valid = new Set<number>()
		const invalid = new Set<number>()
		const malformed: VerificationError[] = []

		for (const match of text.matchAll(MARKER)) {
			const content = match[1] ?? ''
			if (!WELL_FORMED.test(content.trim())) {
				malformed.push(new VerificationError(`Unparseable citation marker '${match[0]}'.`, match[0]))
				continue
			}
			for (const part of content.split(',')) {
				const n = Number.parseInt(part.trim(), 10)
				if (n >= 1 && n <= retrieved.length) valid.add(n)
				else invalid.add(n)
			}
		}

		return {
			valid: sorted(valid),
			invalid: sorted(invalid),
			unverified: [
				...malformed.map(error => error.marker),
				...findUnverifiedCaseNames(text, retrieved),
				...findUnverifiedReporterCitations(text, retrieved),
			],
			malformed,
		}
	}
}

/**
 * Case names written out in the text (`Ram v. State of Kerala`) that no retrieved passage carries.
 * A mention matches when, normalized, it contains a retrieved case name.
 */
export function findUnverifiedCaseNames(text: string, retrieved: RetrievalResult): string[] {
	const known = retrieved
		.map(item => item.metadata.caseName)
		.filter((name): name is string => typeof name === 'string' && name.length > 0)
		.map(normalizeCaseName)

	const unverified: string[] = []
	for (const match of text.matchAll(CASE_MENTION)) {
		const mention = match[0].replace(/\s+/g, ' ').trim()
		const normalized = normalizeCaseName(mention)
		if (!known.some(name => normalized.includes(name)) && !unverified.includes(mention)) {
			unverified.push(mention)
		}
	}
	return unverified
}

export function findUnverifiedReporterCitations(text: string, retrieved: RetrievalResult): string[] {
	const known = new Set(
		retrieved
			.map(item => item.metadata.citation)
			.filter((citation): citation is string => typeof citation === 'string')
			.map(collapseWhitespace),
	)

	const unverified: string[] = []
	for (const match of text.matchAll(REPORTER_MENTION)) {
		const citation = collapseWhitespace(match[0])
		if (!known.has(citation) && !unverified.includes(citation)) {
			unverified.push(citation)
		}
	}
	return unverified
}

/** Lower-cases, unifies the `v.`/`vs`/`versus` separator and drops punctuation. */
export function normalizeCaseName(name: string): string {
	return collapseWhitespace(
		name
			.toLowerCase()
			.replace(/\s+(?:v\.|vs\.?|versus)\s+/g, ' v ')
			.replace(/[^\p{L}\p{N}\s]/gu, ' '),
	)
}

function collapseWhitespace(value: string): string {
	return value.replace(/\s+/g, ' ').trim()
}

function sorted(values: Set<number>): number[] {
	return [...values].sort((a, b) => a - b)
}
