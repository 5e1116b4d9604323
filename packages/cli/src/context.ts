import type { LegalAssistant } from '@lexcite/core'
import { ConsoleLogger, createAssistant } from '@lexcite/core'
import type { Command } from 'commander'
import { InvalidArgumentError } from 'commander'
import { resolveConfig, resolveLogLevel } from './config.js'

export interface GlobalOptions {
	config?: string
	indexDir?: string
	logsDir?: string
	logLevel?: string
	audit: boolean
}

/** Builds an assistant from the global options and the configuration sources, runs `task`, then closes it. */
export async function withAssistant<T>(command: Command, task: (assistant: LegalAssistant) => Promise<T>): Promise<T> {
	const options = command.optsWithGlobals<GlobalOptions>()
	const config = resolveConfig({
		configPath: options.config,
		overrides: { indexDir: options.indexDir, logsDir: options.logsDir },
	})
	const logger = new ConsoleLogger({ level: resolveLogLevel(options.logLevel) })
	const assistant = createAssistant({ config, logger, auditSink: options.audit ? undefined : null })
	try {
		return await task(assistant)
	}
	finally {
		assistant.close()
	}
}

export function parseInteger(value: string): number {
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError('Expected a positive integer.')
	}
	return parsed
}

export function parseTemperature(value: string): number {
	const parsed = Number(value)
	if (Number.isNaN(parsed) || parsed < 0 || parsed > 2) {
		throw new InvalidArgumentError('Expected a number between 0 and 2.')
	}
	return parsed
}
