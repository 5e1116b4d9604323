import { readFile } from 'node:fs/promises'
import type { AnswerRequest, AnswerResponse, JudgmentMode } from '@lexcite/core'
import { Command, Option } from 'commander'
import ora from 'ora'
import { parseInteger, parseTemperature, withAssistant } from '../context.js'
import { formatAnswer, formatError } from '../format.js'

interface AnswerOptions {
	topK?: number
	temperature?: number
	timeout?: number
	json?: boolean
}

function addAnswerOptions(command: Command): Command {
	return command
		.option('-k, --top-k <n>', 'Number of passages to retrieve', parseInteger)
		.option('-t, --temperature <value>', 'Sampling temperature', parseTemperature)
		.option('--timeout <ms>', 'Abort generation after this many milliseconds', parseInteger)
		.option('--json', 'Output in JSON format')
}

async function runAnswer(command: Command, request: AnswerRequest): Promise<void> {
	const spinner = ora(`Generating ${request.mode} answer...`).start()
	try {
		await withAssistant(command, async (assistant) => {
			const response = await assistant.answer(request)
			spinner.stop()
			console.log(command.opts<AnswerOptions>().json ? JSON.stringify(toJson(response), null, 2) : formatAnswer(response))
		})
	}
	catch (error) {
		spinner.fail(formatError(error))
		process.exitCode = 1
	}
}

function toJson(response: AnswerResponse) {
	return {
		...response,
		verification: {
			...response.verification,
			malformed: response.verification.malformed.map(error => error.marker),
		},
	}
}

function common(options: AnswerOptions) {
	return { topK: options.topK, temperature: options.temperature, timeoutMs: options.timeout }
}

export const researchCommand = addAnswerOptions(
	new Command('research')
		.description('Answer a research question with cited passages')
		.argument('<query>', 'Research question'),
).action(async (query: string, options: AnswerOptions, command: Command) => {
	await runAnswer(command, { mode: 'research', query, ...common(options) })
})

export const judgmentCommand = addAnswerOptions(
	new Command('judgment')
		.description('Simulate judicial reasoning over a set of facts')
		.argument('<facts>', 'Case facts')
		.addOption(new Option('--analysis <kind>', 'Header of the analysis').choices(['hypothetical', 'reference']).default('hypothetical')),
).action(async (facts: string, options: AnswerOptions & { analysis: JudgmentMode }, command: Command) => {
	await runAnswer(command, { mode: 'judgment', facts, judgmentMode: options.analysis, ...common(options) })
})

export const summarizeCommand = addAnswerOptions(
	new Command('summarize')
		.description('Write a headnote from retrieved passages or from a case file')
		.argument('[query]', 'Query selecting the passages to summarize')
		.option('-f, --case-file <path>', 'Summarize this text file directly, without retrieval'),
).action(async (query: string | undefined, options: AnswerOptions & { caseFile?: string }, command: Command) => {
	let caseText: string | undefined
	if (options.caseFile) {
		try {
			caseText = await readFile(options.caseFile, 'utf-8')
		}
		catch (error) {
			command.error(`Could not read '${options.caseFile}': ${formatError(error)}`)
		}
	}
	if (!caseText && !query) {
		command.error('Provide a query or --case-file.')
	}
	await runAnswer(command, { mode: 'summarize', query, caseText, ...common(options) })
})
