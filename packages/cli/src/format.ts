import type { AnswerResponse, IngestReport, RetrievalResult, VerificationResult } from '@lexcite/core'
import { isLexciteError } from '@lexcite/core'
import chalk from 'chalk'
import { table } from 'table'

/** One row per retrieved chunk: rank, score, source, page and case name. */
export function retrievalRows(results: RetrievalResult): string[][] {
	return [
		['#', 'Score', 'Source', 'Page', 'Case'],
		...results.map((item, i) => [
			String(i + 1),
			item.score.toFixed(3),
			item.metadata.sourceFile,
			String(item.metadata.pageNumber),
			item.metadata.caseName ?? '-',
		]),
	]
}

export function formatRetrieval(results: RetrievalResult): string {
	return table(retrievalRows(results), {
		columns: {
			0: { alignment: 'right' },
			1: { alignment: 'right' },
			4: { width: 40, wrapWord: true },
		},
	})
}

export function formatVerification(verification: VerificationResult): string {
	const lines = [
		`${chalk.bold('Valid citations:')} ${verification.valid.length > 0 ? verification.valid.map(n => `[${n}]`).join(' ') : 'none'}`,
	]
	if (verification.invalid.length > 0) {
		lines.push(chalk.red(`${chalk.bold('Invalid citations:')} ${verification.invalid.map(n => `[${n}]`).join(' ')}`))
	}
	if (verification.unverified.length > 0) {
		lines.push(chalk.yellow(`${chalk.bold('Unverified references:')} ${verification.unverified.join('; ')}`))
	}
	return lines.join('\n')
}

export function formatAnswer(response: AnswerResponse): string {
	const sections: string[] = []
	if (response.disclaimer) {
		sections.push(chalk.bold.yellow(response.disclaimer))
	}
	sections.push(response.text.trim())
	sections.push(chalk.gray('─'.repeat(50)))
	sections.push(formatVerification(response.verification))
	if (response.status === 'degraded') {
		sections.push(chalk.red(`Citations still out of range after ${response.attempts} attempts.`))
	}
	if (response.retrieved.length > 0) {
		sections.push(formatRetrieval(response.retrieved))
	}
	return sections.join('\n\n')
}

export function ingestRows(report: IngestReport): string[][] {
	return [
		['Document', 'Chunks', 'Skipped pages'],
		...report.documents.map(document => [
			document.sourceFile,
			String(document.chunks),
			document.skippedPages.length > 0 ? document.skippedPages.join(', ') : '-',
		]),
	]
}

/** `Name: message` for errors of the pipeline, the message alone otherwise. */
export function formatError(error: unknown): string {
	if (isLexciteError(error)) return `${error.name}: ${error.message}`
	if (error instanceof Error) return error.message
	return String(error)
}
