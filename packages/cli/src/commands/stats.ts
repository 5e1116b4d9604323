import chalk from 'chalk'
import { Command } from 'commander'
import { table } from 'table'
import { withAssistant } from '../context.js'
import { formatError } from '../format.js'

export const statsCommand = new Command('stats')
	.description('Show what the vector index holds')
	.option('--json', 'Output in JSON format')
	.action(async (options: { json?: boolean }, command: Command) => {
		try {
			await withAssistant(command, async (assistant) => {
				const stats = assistant.index.getStats()
				if (options.json) {
					console.log(JSON.stringify({ collection: assistant.index.collection, ...stats }, null, 2))
					return
				}

				console.log(chalk.bold.blue('\nVector Index'))
				console.log(table([
					['Directory', assistant.index.directory],
					['Collection', assistant.index.collection],
					['Documents', String(stats.documents)],
					['Chunks', String(stats.chunks)],
					['Dimension', stats.dimension === null ? '-' : String(stats.dimension)],
				]))
			})
		}
		catch (error) {
			console.error(chalk.red(formatError(error)))
			process.exitCode = 1
		}
	})
