import { stat } from 'node:fs/promises'
import type { SourceType } from '@lexcite/core'
import chalk from 'chalk'
import { Command, Option } from 'commander'
import ora from 'ora'
import { table } from 'table'
import { parseInteger, withAssistant } from '../context.js'
import { formatError, ingestRows } from '../format.js'

interface IngestOptions {
	sourceType?: SourceType
	url?: string
	concurrency?: number
	corpus?: boolean
}

export const ingestCommand = new Command('ingest')
	.description('Index a document, a directory of documents, or a whole corpus')
	.argument('<path>', 'A .pdf or .txt file, or a directory')
	.addOption(new Option('-s, --source-type <type>', 'Kind of documents').choices(['judgment', 'act', 'raw']))
	.option('--url <url>', 'Source URL recorded with a single document')
	.option('--concurrency <n>', 'Documents processed at once', parseInteger)
	.option('--corpus', 'Treat <path> as a corpus with acts/, judgments/ and raw/ subdirectories')
	.action(async (path: string, options: IngestOptions, command: Command) => {
		const spinner = ora(`Ingesting ${path}...`).start()

		try {
			await withAssistant(command, async (assistant) => {
				if (options.corpus) {
					const reports = await assistant.ingestCorpus(path, { concurrency: options.concurrency })
					spinner.succeed(`Ingested corpus at ${path}`)
					for (const [sourceType, report] of reports) {
						console.log(chalk.bold(`\n${sourceType}: ${report.totalChunks} chunks from ${report.documents.length} documents`))
						printFailures(report.failures)
					}
					return
				}

				if ((await stat(path)).isDirectory()) {
					const report = await assistant.ingestDirectory(path, {
						sourceType: options.sourceType,
						concurrency: options.concurrency,
					})
					spinner.succeed(`Indexed ${report.totalChunks} chunks from ${report.documents.length} documents`)
					if (report.documents.length > 0) {
						console.log(table(ingestRows(report)))
					}
					printFailures(report.failures)
					return
				}

				const chunks = await assistant.ingest(path, { sourceType: options.sourceType, url: options.url })
				spinner.succeed(`Indexed ${chunks} chunks from ${path}`)
			})
		}
		catch (error) {
			spinner.fail(formatError(error))
			process.exitCode = 1
		}
	})

function printFailures(failures: ReadonlyArray<{ sourceFile: string, error: Error }>): void {
	for (const failure of failures) {
		console.log(chalk.red(`✗ ${failure.sourceFile}: ${failure.error.message}`))
	}
}
