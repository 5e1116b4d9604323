import { basename, extname } from 'node:path'

export interface HeaderMetadata {
	caseName?: string
	bench?: string
	judgementDate?: string
	citation?: string
}

export interface FilenameMetadata {
	court?: string
	year?: string
	caseNumber?: string
	actName?: string
}

const HEADER_LENGTH = 2000

const CASE_NAME = /^([A-Z][A-Z &.,()']*?)\s+(?:vs?\.?|versus|VS?\.|VERSUS)\s+([A-Z][A-Z &.,()']*)$/m
const BENCH = /BENCH:\s*(.+?)\s*(?:\n|$)/i
const JUDGEMENT_DATE = /(?:JUDG(?:E)?MENT DATE|DECIDED ON|DATE):\s*(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})/i
export const REPORTER_CITATION = /\((\d{4})\)\s+(\d+)\s+([A-Z]+)\s+(\d+)/

const ACT_PATTERNS: Array<[string, RegExp]> = [
	['IPC', /(?:^|[^a-z])IPC(?:[^a-z]|$)/i],
	['CrPC', /(?:^|[^a-z])CrPC(?:[^a-z]|$)/i],
	['Evidence Act', /Evidence[\s_-]*Act/i],
	['Constitution', /Constitution/i],
]

/** Best-effort parse of the judgment header. Fields without a matching pattern stay unset. */
export function parseHeaderMetadata(rawText: string): HeaderMetadata {
	const header = rawText.slice(0, HEADER_LENGTH)
	const metadata: HeaderMetadata = {}

	const caseName = CASE_NAME.exec(header)
	if (caseName?.[1] && caseName[2]) {
		metadata.caseName = `${caseName[1].trim()} v. ${caseName[2].trim()}`
	}

	const bench = BENCH.exec(header)
	if (bench?.[1]) {
		metadata.bench = bench[1]
	}

	const date = JUDGEMENT_DATE.exec(header)
	if (date?.[1]) {
		metadata.judgementDate = date[1]
	}

	const citation = REPORTER_CITATION.exec(header)
	if (citation) {
		metadata.citation = `(${citation[1]}) ${citation[2]} ${citation[3]} ${citation[4]}`
	}

	return metadata
}

/**
 * Reads court, year, case number and act name from names such as `2019_SC_1234.pdf`
 * or `IPC_1860.pdf`. Underscores and hyphens count as word separators.
 */
export function parseFilenameMetadata(fileName: string): FilenameMetadata {
	const stem = basename(fileName, extname(fileName))
	const words = stem.replace(/[_-]+/g, ' ')
	const metadata: FilenameMetadata = {}

	const court = /\b(SC|HC|DC)\b/i.exec(words)
	if (court?.[1]) {
		metadata.court = court[1].toUpperCase()
	}

	const year = /\b(?:19|20)\d{2}\b/.exec(words)
	if (year) {
		metadata.year = year[0]
	}

	const caseNumber = /\d{4}_[A-Z]+_\d+/.exec(stem)
	if (caseNumber) {
		metadata.caseNumber = caseNumber[0]
	}

	for (const [actName, pattern] of ACT_PATTERNS) {
		if (pattern.test(words)) {
			metadata.actName = actName
			break
		}
	}

	return metadata
}
