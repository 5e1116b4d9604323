import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { extname, join } from 'node:path'
import type { EmbeddingProviderKind, LexciteConfig, LexciteConfigInput, LogLevel } from '@lexcite/core'
import { ConfigError, defineConfig, describeError, isLogLevel } from '@lexcite/core'
import { parse as parseYaml } from 'yaml'

type Env = Record<string, string | undefined>

export interface ConfigSources {
	env?: Env
	cwd?: string
	home?: string
	/** Command-line values; they win over everything else. */
	overrides?: LexciteConfigInput
	/** An explicit config file, as given by `--config`. */
	configPath?: string
}

/** Candidate config files, highest precedence first. */
export function configFilePaths(sources: Pick<ConfigSources, 'env' | 'cwd' | 'home' | 'configPath'> = {}): string[] {
	const env = sources.env ?? process.env
	const cwd = sources.cwd ?? process.cwd()
	const home = sources.home ?? homedir()
	return [
		sources.configPath,
		env.LEXCITE_CONFIG,
		join(cwd, '.lexcite.json'),
		join(cwd, '.lexcite.yaml'),
		join(home, '.lexcite', 'config.json'),
	].filter((path): path is string => typeof path === 'string' && path.length > 0)
}

/**
 * Reads the first config file that exists. JSON and YAML are both accepted.
 * @throws {ConfigError} when that file cannot be parsed.
 */
export function loadConfigFile(paths: readonly string[]): LexciteConfigInput | null {
	for (const path of paths) {
		if (!existsSync(path)) continue

		let raw: unknown
		try {
			const content = readFileSync(path, 'utf-8')
			raw = ['.yaml', '.yml'].includes(extname(path).toLowerCase()) ? parseYaml(content) : JSON.parse(content)
		}
		catch (error) {
			throw new ConfigError(`Could not parse config file '${path}': ${describeError(error)}`, { cause: error })
		}
		return parseConfigInput(raw, path)
	}
	return null
}

/** Settings from `LEXCITE_*` variables, plus `OPENAI_API_KEY` and `OPENAI_BASE_URL`. */
export function configFromEnv(env: Env = process.env): LexciteConfigInput {
	const number = (name: string) => parseNumber(env[name], name)
	return {
		indexDir: env.LEXCITE_INDEX_DIR,
		logsDir: env.LEXCITE_LOGS_DIR,
		collectionName: env.LEXCITE_COLLECTION,
		chunking: {
			chunkSize: number('LEXCITE_CHUNK_SIZE'),
			minChunkSize: number('LEXCITE_MIN_CHUNK_SIZE'),
			overlap: number('LEXCITE_CHUNK_OVERLAP'),
		},
		embedding: {
			provider: parseProvider(env.LEXCITE_EMBEDDING_PROVIDER, 'LEXCITE_EMBEDDING_PROVIDER'),
			dimension: number('LEXCITE_EMBEDDING_DIMENSION'),
			model: env.LEXCITE_EMBEDDING_MODEL,
		},
		retrieval: {
			topK: {
				research: number('LEXCITE_RESEARCH_TOP_K'),
				judgment: number('LEXCITE_JUDGMENT_TOP_K'),
				summarize: number('LEXCITE_SUMMARIZE_TOP_K'),
			},
		},
		generation: {
			model: env.LEXCITE_MODEL,
			apiKey: env.LEXCITE_API_KEY ?? env.OPENAI_API_KEY,
			baseURL: env.LEXCITE_BASE_URL ?? env.OPENAI_BASE_URL,
			maxOutputTokens: number('LEXCITE_MAX_OUTPUT_TOKENS'),
			maxRetries: number('LEXCITE_MAX_RETRIES'),
			timeoutMs: number('LEXCITE_TIMEOUT_MS'),
			temperature: {
				research: number('LEXCITE_RESEARCH_TEMPERATURE'),
				judgment: number('LEXCITE_JUDGMENT_TEMPERATURE'),
				summarize: number('LEXCITE_SUMMARIZE_TEMPERATURE'),
			},
		},
		ingestion: {
			concurrency: number('LEXCITE_CONCURRENCY'),
		},
	}
}

/**
 * Builds the configuration from, in order of precedence: overrides, environment, the first
 * config file found, defaults.
 */
export function resolveConfig(sources: ConfigSources = {}): LexciteConfig {
	const env = sources.env ?? process.env
	const file = loadConfigFile(configFilePaths(sources)) ?? {}
	return defineConfig(mergeConfigInputs(file, configFromEnv(env), sources.overrides ?? {}))
}

export function resolveLogLevel(value: string | undefined, env: Env = process.env): LogLevel {
	const level = value ?? env.LEXCITE_LOG_LEVEL ?? 'warn'
	if (!isLogLevel(level)) {
		throw new ConfigError(`Unknown log level '${level}'. Use debug, info, warn or error.`)
	}
	return level
}

/** Later inputs win; `undefined` never overwrites a value. */
export function mergeConfigInputs(...inputs: LexciteConfigInput[]): LexciteConfigInput {
	const merged: LexciteConfigInput = {}
	for (const input of inputs) {
		assignDefined(merged, {
			indexDir: input.indexDir,
			logsDir: input.logsDir,
			collectionName: input.collectionName,
		})
		merged.chunking = assignDefined({ ...merged.chunking }, input.chunking ?? {})
		merged.embedding = assignDefined({ ...merged.embedding }, input.embedding ?? {})
		merged.retrieval = { topK: assignDefined({ ...merged.retrieval?.topK }, input.retrieval?.topK ?? {}) }
		const generationInput: NonNullable<LexciteConfigInput['generation']> = input.generation ?? {}
		const { temperature, ...generation } = generationInput
		merged.generation = {
			...assignDefined({ ...merged.generation }, generation),
			temperature: assignDefined({ ...merged.generation?.temperature }, temperature ?? {}),
		}
		merged.ingestion = assignDefined({ ...merged.ingestion }, input.ingestion ?? {})
	}
	return merged
}

/** Picks the known settings out of a parsed config file, checking their types. */
export function parseConfigInput(raw: unknown, source: string): LexciteConfigInput {
	if (!isRecord(raw)) {
		throw new ConfigError(`Config file '${source}' must contain an object.`)
	}
	const chunking = section(raw, 'chunking', source)
	const embedding = section(raw, 'embedding', source)
	const retrieval = section(raw, 'retrieval', source)
	const generation = section(raw, 'generation', source)
	const ingestion = section(raw, 'ingestion', source)
	const topK = section(retrieval, 'topK', source)
	const temperature = section(generation, 'temperature', source)

	return {
		indexDir: stringField(raw, 'indexDir', source),
		logsDir: stringField(raw, 'logsDir', source),
		collectionName: stringField(raw, 'collectionName', source),
		chunking: {
			chunkSize: numberField(chunking, 'chunkSize', source),
			minChunkSize: numberField(chunking, 'minChunkSize', source),
			overlap: numberField(chunking, 'overlap', source),
		},
		embedding: {
			provider: parseProvider(stringField(embedding, 'provider', source), `${source}: embedding.provider`),
			dimension: numberField(embedding, 'dimension', source),
			model: stringField(embedding, 'model', source),
			batchSize: numberField(embedding, 'batchSize', source),
		},
		retrieval: {
			topK: {
				research: numberField(topK, 'research', source),
				judgment: numberField(topK, 'judgment', source),
				summarize: numberField(topK, 'summarize', source),
			},
		},
		generation: {
			model: stringField(generation, 'model', source),
			apiKey: stringField(generation, 'apiKey', source),
			baseURL: stringField(generation, 'baseURL', source),
			maxOutputTokens: numberField(generation, 'maxOutputTokens', source),
			maxRetries: numberField(generation, 'maxRetries', source),
			timeoutMs: numberField(generation, 'timeoutMs', source),
			temperature: {
				research: numberField(temperature, 'research', source),
				judgment: numberField(temperature, 'judgment', source),
				summarize: numberField(temperature, 'summarize', source),
			},
		},
		ingestion: {
			concurrency: numberField(ingestion, 'concurrency', source),
		},
	}
}

function assignDefined<T extends object>(target: Partial<T>, values: Partial<T>): Partial<T> {
	for (const key in values) {
		const value = values[key]
		if (Object.hasOwn(values, key) && value !== undefined) {
			target[key] = value
		}
	}
	return target
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(parent: Record<string, unknown>, key: string, source: string): Record<string, unknown> {
	const value = parent[key]
	if (value === undefined || value === null) return {}
	if (!isRecord(value)) {
		throw new ConfigError(`'${key}' in '${source}' must be an object.`)
	}
	return value
}

function stringField(parent: Record<string, unknown>, key: string, source: string): string | undefined {
	const value = parent[key]
	if (value === undefined || value === null) return undefined
	if (typeof value !== 'string') {
		throw new ConfigError(`'${key}' in '${source}' must be a string.`)
	}
	return value
}

function numberField(parent: Record<string, unknown>, key: string, source: string): number | undefined {
	const value = parent[key]
	if (value === undefined || value === null) return undefined
	if (typeof value !== 'number') {
		throw new ConfigError(`'${key}' in '${source}' must be a number.`)
	}
	return value
}

function parseNumber(value: string | undefined, name: string): number | undefined {
	if (value === undefined || value.trim() === '') return undefined
	const parsed = Number(value)
	if (Number.isNaN(parsed)) {
		throw new ConfigError(`${name} must be a number, got '${value}'.`)
	}
	return parsed
}

function parseProvider(value: string | undefined, name: string): EmbeddingProviderKind | undefined {
	if (value === undefined) return undefined
	if (value === 'hashing' || value === 'openai') return value
	throw new ConfigError(`${name} must be 'hashing' or 'openai', got '${value}'.`)
}
