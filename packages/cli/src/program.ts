import { Command, Option } from 'commander'
import { judgmentCommand, researchCommand, summarizeCommand } from './commands/answer.js'
import { ingestCommand } from './commands/ingest.js'
import { retrieveCommand } from './commands/retrieve.js'
import { statsCommand } from './commands/stats.js'

export function createProgram(): Command {
	const program = new Command()

	program
		.name('lexcite')
		.description('lexcite CLI - cited research over a legal document corpus')
		.version('0.1.0')
		.option('-c, --config <path>', 'Config file (JSON or YAML)')
		.option('--index-dir <dir>', 'Directory of the vector index')
		.option('--logs-dir <dir>', 'Directory receiving audit records')
		.addOption(new Option('--log-level <level>', 'Minimum log level').choices(['debug', 'info', 'warn', 'error']))
		.option('--no-audit', 'Do not write audit records')

	program.addCommand(ingestCommand)
	program.addCommand(retrieveCommand)
	program.addCommand(researchCommand)
	program.addCommand(judgmentCommand)
	program.addCommand(summarizeCommand)
	program.addCommand(statsCommand)
	return program
}
