export type LexciteErrorCode =
	| 'EXTRACTION'
	| 'OCR'
	| 'EMBEDDING'
	| 'STORE'
	| 'LLM'
	| 'VERIFICATION'
	| 'INGEST'
	| 'NO_RELEVANT_MATERIAL'
	| 'TIMEOUT'
	| 'CONFIG'

export interface LexciteErrorOptions {
	cause?: unknown
	isFatal?: boolean
}

/**
 * Base class for every error raised by the pipeline.
 * The `code` lets callers branch without `instanceof` chains across package boundaries.
 */
export class LexciteError extends Error {
	public readonly code: LexciteErrorCode
	public readonly isFatal: boolean

	constructor(code: LexciteErrorCode, message: string, options: LexciteErrorOptions = {}) {
		super(message, { cause: options.cause })
		this.name = 'LexciteError'
		this.code = code
		this.isFatal = options.isFatal ?? false
	}
}

/** A page (or a whole file) could not be read. */
export class ExtractionError extends LexciteError {
	constructor(
		message: string,
		public readonly sourceFile: string,
		public readonly pageNumber?: number,
		options: LexciteErrorOptions = {},
	) {
		super('EXTRACTION', message, options)
		this.name = 'ExtractionError'
	}
}

/** The OCR fallback failed for a page. */
export class OcrError extends LexciteError {
	constructor(message: string, options: LexciteErrorOptions = {}) {
		super('OCR', message, options)
		this.name = 'OcrError'
	}
}

/** Bad input to, or failure of, an embedding provider. */
export class EmbeddingError extends LexciteError {
	constructor(message: string, options: LexciteErrorOptions = {}) {
		super('EMBEDDING', message, options)
		this.name = 'EmbeddingError'
	}
}

/** Vector index persistence failure. Always fatal to the calling operation. */
export class StoreError extends LexciteError {
	constructor(message: string, options: LexciteErrorOptions = {}) {
		super('STORE', message, { ...options, isFatal: true })
		this.name = 'StoreError'
	}
}

/** Transport or auth failure of the language model. Never retried by the orchestrator. */
export class LlmError extends LexciteError {
	constructor(
		message: string,
		public readonly status?: number,
		options: LexciteErrorOptions = {},
	) {
		super('LLM', message, options)
		this.name = 'LlmError'
	}
}

/** Malformed citation syntax. Recorded on the verification result, not thrown. */
export class VerificationError extends LexciteError {
	constructor(
		message: string,
		public readonly marker: string,
	) {
		super('VERIFICATION', message)
		this.name = 'VerificationError'
	}
}

export class IngestError extends LexciteError {
	constructor(
		message: string,
		public readonly sourceFile: string,
		options: LexciteErrorOptions = {},
	) {
		super('INGEST', message, options)
		this.name = 'IngestError'
	}
}

/** Retrieval returned nothing, so no answer is generated. */
export class NoRelevantMaterialError extends LexciteError {
	constructor(public readonly query: string) {
		super('NO_RELEVANT_MATERIAL', 'No relevant material found for the query.')
		this.name = 'NoRelevantMaterialError'
	}
}

export class GenerationTimeoutError extends LexciteError {
	constructor(message = 'Generation was aborted before it completed.', options: LexciteErrorOptions = {}) {
		super('TIMEOUT', message, options)
		this.name = 'GenerationTimeoutError'
	}
}

export class ConfigError extends LexciteError {
	constructor(message: string, options: LexciteErrorOptions = {}) {
		super('CONFIG', message, { ...options, isFatal: true })
		this.name = 'ConfigError'
	}
}

export function isLexciteError(error: unknown): error is LexciteError {
	return error instanceof LexciteError
}

/** Turns anything thrown into a readable message. */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
