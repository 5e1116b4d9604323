import type { ExtractionError, VerificationError } from './errors.js'

// =================================================================================
// Documents
// =================================================================================

export type ExtractionMethod = 'direct' | 'ocr'

export type SourceType = 'judgment' | 'act' | 'raw'

export interface Page {
	/** 1-based. */
	pageNumber: number
	text: string
	method: ExtractionMethod
}

/** Fields parsed heuristically from the file name and header text. Unmatched fields stay unset. */
export interface DocumentMetadata {
	sourceType: SourceType
	caseName?: string
	bench?: string
	court?: string
	judgementDate?: string
	citation?: string
	year?: string
	actName?: string
	url?: string
}

export interface ExtractionDiagnostic {
	pageNumber: number
	error: ExtractionError
}

export interface LegalDocument {
	/** The source file name without its extension. */
	readonly id: string
	readonly sourceFile: string
	readonly pages: readonly Page[]
	readonly metadata: DocumentMetadata
	readonly diagnostics: readonly ExtractionDiagnostic[]
}

// =================================================================================
// Chunks and the index
// =================================================================================

/** Metadata persisted with every vector in the `legal_judgments` collection. */
export interface ChunkMetadata {
	sourceFile: string
	sourceType: SourceType
	pageNumber: number
	chunkIndex: number
	caseName: string | null
	court: string | null
	judgementDate: string | null
	url: string | null
	citation: string | null
}

export interface Chunk {
	readonly documentId: string
	readonly chunkIndex: number
	readonly text: string
	readonly tokenCount: number
	readonly pageNumbers: readonly number[]
	/** Leading tokens shared with the previous chunk of the same document. */
	readonly overlapTokens: number
	/** Offsets of `text` within the document's normalized text. */
	readonly charStart: number
	readonly charEnd: number
	readonly metadata: ChunkMetadata
}

export interface EmbeddedChunk extends Chunk {
	readonly vector: readonly number[]
}

export interface RetrievedChunk {
	/** `${documentId}_${chunkIndex}` */
	id: string
	documentId: string
	chunkIndex: number
	text: string
	metadata: ChunkMetadata
	score: number
}

/** Ordered by descending score. */
export type RetrievalResult = readonly RetrievedChunk[]

// =================================================================================
// Verification and generation
// =================================================================================

export interface VerificationResult {
	/** Cited numbers within 1..retrieved.length, ascending, de-duplicated. */
	valid: number[]
	/** Cited numbers outside that range, ascending, de-duplicated. */
	invalid: number[]
	/** Bare-text citations not backed by retrieved metadata. Advisory only. */
	unverified: string[]
	/** Bracket markers whose content could not be parsed. */
	malformed: VerificationError[]
}

export type AnswerMode = 'research' | 'judgment' | 'summarize'

export type JudgmentMode = 'hypothetical' | 'reference'

export type GenerationState = 'initial' | 'generate' | 'verify' | 'decision' | 'accepted' | 'degraded'

export type GenerationStatus = Extract<GenerationState, 'accepted' | 'degraded'>

export interface GenerationOutcome {
	text: string
	verification: VerificationResult
	status: GenerationStatus
	/** Total language model calls, including the first. */
	attempts: number
	/** The prompt of the final attempt. */
	prompt: string
	/** Every state the request passed through, in order. */
	states: GenerationState[]
}

// =================================================================================
// Collaborators
// =================================================================================

export interface ILogger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** A page as read from storage, before cleaning and the OCR fallback. */
export interface RawPage {
	pageNumber: number
	text: string
	/** Rendered page image, when the source can produce one. */
	image?: Uint8Array
	/** Why the text layer could not be read, when it could not. */
	textLayerError?: unknown
}

export interface PageSource {
	readPages: (path: string) => Promise<RawPage[]>
}

export interface OcrRequest {
	sourceFile: string
	pageNumber: number
	image?: Uint8Array
}

export interface OcrEngine {
	/** Rejects with an `OcrError` when the page cannot be recognized. */
	recognize: (request: OcrRequest) => Promise<string>
}

export interface EmbeddingProvider {
	readonly dimension: number
	embed: (texts: readonly string[]) => Promise<number[][]>
	embedQuery: (text: string) => Promise<number[]>
}

export interface GenerateRequest {
	prompt: string
	temperature: number
	maxOutputTokens?: number
	signal?: AbortSignal
}

export interface LanguageModel {
	/** Rejects with an `LlmError` on transport or auth failure. Performs no retries. */
	generate: (request: GenerateRequest) => Promise<string>
}

export interface AuditRecord {
	timestamp: string
	mode: AnswerMode
	userInput: string
	retrievedCount: number
	retrieved: Array<{
		id: string
		sourceFile: string
		pageNumber: number
		chunkIndex: number
		caseName: string | null
		score: number
	}>
	prompt: string
	temperature: number
	response: string
	fullResponseLength: number
	verification: {
		valid: number[]
		invalid: number[]
		unverified: string[]
		malformed: string[]
	}
	status: GenerationStatus
	attempts: number
}

/** Fire-and-forget sink for one structured record per request. */
export interface AuditSink {
	write: (record: AuditRecord) => void | Promise<void>
}

/** Structured events for tracing ingestion and generation. */
export type LexciteEvent =
	| { type: 'ingest:start'; payload: { sourceFile: string } }
	| { type: 'ingest:page-skipped'; payload: { sourceFile: string; pageNumber: number; reason: string } }
	| { type: 'ingest:finish'; payload: { sourceFile: string; documentId: string; chunks: number } }
	| { type: 'generation:attempt'; payload: { mode: AnswerMode; attempt: number } }
	| { type: 'generation:retry'; payload: { mode: AnswerMode; retryCount: number; invalid: number[] } }
	| {
			type: 'generation:finish'
			payload: { mode: AnswerMode; status: GenerationStatus; attempts: number; invalid: number[] }
	  }

export interface IEventBus {
	emit: (event: LexciteEvent) => void | Promise<void>
}
