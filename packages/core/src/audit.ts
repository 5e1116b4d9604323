import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { AnswerMode, AuditRecord, AuditSink, GenerationOutcome, RetrievalResult } from './types.js'

const INPUT_LIMIT = 1000
const TEXT_LIMIT = 2000

export interface AuditRecordInput {
	mode: AnswerMode
	userInput: string
	retrieved: RetrievalResult
	temperature: number
	outcome: GenerationOutcome
	timestamp?: Date
}

export function truncate(text: string, maxLength: number): string {
	return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text
}

/** Builds the record written once per answered request. Long fields are truncated. */
export function createAuditRecord(input: AuditRecordInput): AuditRecord {
	const { outcome } = input
	return {
		timestamp: (input.timestamp ?? new Date()).toISOString(),
		mode: input.mode,
		userInput: truncate(input.userInput, INPUT_LIMIT),
		retrievedCount: input.retrieved.length,
		retrieved: input.retrieved.map(item => ({
			id: item.id,
			sourceFile: item.metadata.sourceFile,
			pageNumber: item.metadata.pageNumber,
			chunkIndex: item.chunkIndex,
			caseName: item.metadata.caseName,
			score: item.score,
		})),
		prompt: truncate(outcome.prompt, TEXT_LIMIT),
		temperature: input.temperature,
		response: truncate(outcome.text, TEXT_LIMIT),
		fullResponseLength: outcome.text.length,
		verification: {
			valid: outcome.verification.valid,
			invalid: outcome.verification.invalid,
			unverified: outcome.verification.unverified,
			malformed: outcome.verification.malformed.map(error => error.marker),
		},
		status: outcome.status,
		attempts: outcome.attempts,
	}
}

/** `yyyyMMdd_HHmmss_SSS` in local time. */
export function formatFileTimestamp(date: Date): string {
	const pad = (value: number, width = 2) => String(value).padStart(width, '0')
	return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
		+ `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
		+ `_${pad(date.getMilliseconds(), 3)}`
}

/**
 * Writes each record to `<directory>/<mode>_<timestamp>_<seq>.json`.
 * The sequence number keeps records written within the same millisecond apart.
 */
export class JsonFileAuditSink implements AuditSink {
	private sequence = 0
	private lastPath?: string

	constructor(private readonly directory: string) {}

	async write(record: AuditRecord): Promise<void> {
		await mkdir(this.directory, { recursive: true })
		const fileName = `${record.mode}_${formatFileTimestamp(new Date(record.timestamp))}_${this.sequence++}.json`
		const path = join(this.directory, fileName)
		await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8')
		this.lastPath = path
	}

	/** Path of the most recently written record. */
	get lastFile(): string | undefined {
		return this.lastPath
	}
}
