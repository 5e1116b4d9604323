import { ConfigError } from './errors.js'
import type { AnswerMode } from './types.js'

export type EmbeddingProviderKind = 'hashing' | 'openai'

export interface LexciteConfig {
	/** Directory holding the vector index database. */
	indexDir: string
	collectionName: string
	/** Directory receiving one JSON audit record per answered request. */
	logsDir: string
	chunking: {
		/** Target chunk size in tokens. */
		chunkSize: number
		/** A page boundary cuts the buffer once it holds this many tokens. */
		minChunkSize: number
		/** Fraction of the previous chunk carried into the next one. */
		overlap: number
	}
	embedding: {
		provider: EmbeddingProviderKind
		dimension: number
		/** Only used by the openai provider. */
		model: string
		batchSize: number
	}
	retrieval: {
		topK: Record<AnswerMode, number>
	}
	generation: {
		model: string
		apiKey?: string
		baseURL?: string
		temperature: Record<AnswerMode, number>
		maxOutputTokens: number
		/** Stricter-prompt retries after the first attempt when citations are out of range. */
		maxRetries: number
		/** Per-request deadline applied by `answer()` callers that do not pass their own signal. */
		timeoutMs?: number
	}
	ingestion: {
		concurrency: number
	}
}

export type LexciteConfigInput = Partial<Omit<LexciteConfig, 'chunking' | 'embedding' | 'retrieval' | 'generation' | 'ingestion'>> & {
	chunking?: Partial<LexciteConfig['chunking']>
	embedding?: Partial<LexciteConfig['embedding']>
	retrieval?: { topK?: Partial<Record<AnswerMode, number>> }
	generation?: Partial<Omit<LexciteConfig['generation'], 'temperature'>> & {
		temperature?: Partial<Record<AnswerMode, number>>
	}
	ingestion?: Partial<LexciteConfig['ingestion']>
}

export const DEFAULT_CONFIG: LexciteConfig = {
	indexDir: './data/index',
	collectionName: 'legal_judgments',
	logsDir: './logs',
	chunking: {
		chunkSize: 800,
		minChunkSize: 600,
		overlap: 0.2,
	},
	embedding: {
		provider: 'hashing',
		dimension: 384,
		model: 'text-embedding-3-small',
		batchSize: 32,
	},
	retrieval: {
		topK: { research: 6, judgment: 6, summarize: 3 },
	},
	generation: {
		model: 'gpt-4o-mini',
		temperature: { research: 0, judgment: 0.1, summarize: 0 },
		maxOutputTokens: 2048,
		maxRetries: 2,
	},
	ingestion: {
		concurrency: 4,
	},
}

/**
 * Merges `input` over the defaults and validates the result.
 * @throws {ConfigError} when a value is out of range.
 */
export function defineConfig(input: LexciteConfigInput = {}): LexciteConfig {
	const config: LexciteConfig = {
		...DEFAULT_CONFIG,
		...stripUndefined(input),
		chunking: { ...DEFAULT_CONFIG.chunking, ...stripUndefined(input.chunking ?? {}) },
		embedding: { ...DEFAULT_CONFIG.embedding, ...stripUndefined(input.embedding ?? {}) },
		retrieval: {
			topK: { ...DEFAULT_CONFIG.retrieval.topK, ...stripUndefined(input.retrieval?.topK ?? {}) },
		},
		generation: {
			...DEFAULT_CONFIG.generation,
			...stripUndefined(input.generation ?? {}),
			temperature: { ...DEFAULT_CONFIG.generation.temperature, ...stripUndefined(input.generation?.temperature ?? {}) },
		},
		ingestion: { ...DEFAULT_CONFIG.ingestion, ...stripUndefined(input.ingestion ?? {}) },
	}
	validateConfig(config)
	return config
}

export function validateConfig(config: LexciteConfig): void {
	const { chunking, embedding, retrieval, generation, ingestion } = config

	requirePositiveInteger('chunking.chunkSize', chunking.chunkSize)
	requirePositiveInteger('chunking.minChunkSize', chunking.minChunkSize)
	if (chunking.minChunkSize > chunking.chunkSize) {
		throw new ConfigError(`chunking.minChunkSize (${chunking.minChunkSize}) must not exceed chunking.chunkSize (${chunking.chunkSize}).`)
	}
	if (!(chunking.overlap >= 0 && chunking.overlap < 1)) {
		throw new ConfigError(`chunking.overlap must be a fraction in [0, 1), got ${chunking.overlap}.`)
	}

	if (embedding.provider !== 'hashing' && embedding.provider !== 'openai') {
		throw new ConfigError(`embedding.provider must be 'hashing' or 'openai', got '${String(embedding.provider)}'.`)
	}
	requirePositiveInteger('embedding.dimension', embedding.dimension)
	requirePositiveInteger('embedding.batchSize', embedding.batchSize)

	for (const [mode, topK] of Object.entries(retrieval.topK)) {
		requirePositiveInteger(`retrieval.topK.${mode}`, topK)
	}
	for (const [mode, temperature] of Object.entries(generation.temperature)) {
		if (!(temperature >= 0 && temperature <= 2)) {
			throw new ConfigError(`generation.temperature.${mode} must be within [0, 2], got ${temperature}.`)
		}
	}
	requirePositiveInteger('generation.maxOutputTokens', generation.maxOutputTokens)
	if (!Number.isInteger(generation.maxRetries) || generation.maxRetries < 0) {
		throw new ConfigError(`generation.maxRetries must be a non-negative integer, got ${generation.maxRetries}.`)
	}
	if (generation.timeoutMs !== undefined) {
		requirePositiveInteger('generation.timeoutMs', generation.timeoutMs)
	}
	requirePositiveInteger('ingestion.concurrency', ingestion.concurrency)

	if (!config.collectionName.trim()) {
		throw new ConfigError('collectionName must not be empty.')
	}
}

function requirePositiveInteger(name: string, value: number): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${name} must be a positive integer, got ${value}.`)
	}
}

function stripUndefined<T extends object>(value: T): Partial<T> {
	const result: Partial<T> = {}
	for (const key in value) {
		if (Object.hasOwn(value, key) && value[key] !== undefined) {
			result[key] = value[key]
		}
	}
	return result
}
