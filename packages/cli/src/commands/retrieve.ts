import type { AnswerMode } from '@lexcite/core'
import { Command, Option } from 'commander'
import ora from 'ora'
import { parseInteger, withAssistant } from '../context.js'
import { formatError, formatRetrieval } from '../format.js'

interface RetrieveOptions {
	topK?: number
	mode: AnswerMode
	json?: boolean
}

export const retrieveCommand = new Command('retrieve')
	.description('Show the chunks most similar to a query')
	.argument('<query>', 'Query text')
	.option('-k, --top-k <n>', 'Number of chunks', parseInteger)
	.addOption(new Option('-m, --mode <mode>', 'Mode whose default top-k applies').choices(['research', 'judgment', 'summarize']).default('research'))
	.option('--json', 'Output in JSON format')
	.action(async (query: string, options: RetrieveOptions, command: Command) => {
		const spinner = ora('Retrieving...').start()

		try {
			await withAssistant(command, async (assistant) => {
				const results = await assistant.retrieve(query, options.topK, options.mode)
				if (results.length === 0) {
					spinner.warn('No relevant material found.')
					return
				}
				spinner.succeed(`Retrieved ${results.length} chunks`)

				if (options.json) {
					console.log(JSON.stringify(results, null, 2))
					return
				}
				console.log(formatRetrieval(results))
				results.forEach((item, i) => {
					console.log(`[${i + 1}] ${item.text.slice(0, 300)}${item.text.length > 300 ? '...' : ''}\n`)
				})
			})
		}
		catch (error) {
			spinner.fail(formatError(error))
			process.exitCode = 1
		}
	})
