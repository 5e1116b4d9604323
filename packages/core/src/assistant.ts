import { JsonFileAuditSink } from './audit.js'
import { CitationVerifier } from './citations.js'
import type { LexciteConfig, LexciteConfigInput } from './config.js'
import { defineConfig } from './config.js'
import { createEmbeddingProvider } from './embeddings/index.js'
import { ConfigError, NoRelevantMaterialError, StoreError } from './errors.js'
import type { IngestDirectoryOptions, IngestReport } from './ingest.js'
import { IngestionPipeline } from './ingest.js'
import { OpenAILanguageModel } from './llm/openai.js'
import { NullLogger } from './logger.js'
import { DocumentNormalizer } from './normalizer/normalizer.js'
import type { NormalizeOptions } from './normalizer/normalizer.js'
import { GenerationOrchestrator } from './orchestrator.js'
import {
	buildJudgmentPrompt,
	buildResearchPrompt,
	buildSummarizePrompt,
	JUDGMENT_HEADERS,
	RESEARCH_DISCLAIMER,
} from './prompts.js'
import { Retriever } from './retriever.js'
import { SqliteVectorIndex } from './store/sqlite-index.js'
import type {
	AnswerMode,
	AuditSink,
	EmbeddingProvider,
	GenerationStatus,
	IEventBus,
	ILogger,
	JudgmentMode,
	LanguageModel,
	OcrEngine,
	PageSource,
	RetrievalResult,
	SourceType,
	VerificationResult,
} from './types.js'

interface AnswerRequestBase {
	topK?: number
	/** Overrides the configured temperature of the mode. */
	temperature?: number
	signal?: AbortSignal
	/** Overrides `generation.timeoutMs`. */
	timeoutMs?: number
}

export type AnswerRequest =
	| (AnswerRequestBase & { mode: 'research', query: string })
	| (AnswerRequestBase & { mode: 'judgment', facts: string, judgmentMode?: JudgmentMode })
	| (AnswerRequestBase & { mode: 'summarize', query?: string, caseText?: string })

export interface AnswerResponse {
	mode: AnswerMode
	text: string
	verification: VerificationResult
	retrieved: RetrievalResult
	status: GenerationStatus
	attempts: number
	disclaimer?: string
}

export interface LegalAssistantOptions {
	config: LexciteConfig
	embeddings: EmbeddingProvider
	index: SqliteVectorIndex
	model: LanguageModel
	pageSource?: PageSource
	ocr?: OcrEngine
	auditSink?: AuditSink
	logger?: ILogger
	eventBus?: IEventBus
}

/** What callers of the pipeline use: ingestion, retrieval and cited answers in three modes. */
export class LegalAssistant {
	readonly config: LexciteConfig
	readonly index: SqliteVectorIndex
	readonly retriever: Retriever
	readonly pipeline: IngestionPipeline
	private readonly orchestrator: GenerationOrchestrator
	private readonly logger: ILogger

	constructor(options: LegalAssistantOptions) {
		const { config } = options
		this.config = config
		this.index = options.index
		this.logger = options.logger ?? new NullLogger()

		if (options.index.vectorDimension !== null && options.index.vectorDimension !== options.embeddings.dimension) {
			throw new StoreError(
				`The index holds ${options.index.vectorDimension}-dimensional vectors but the embedding provider produces ${options.embeddings.dimension}.`,
			)
		}

		this.retriever = new Retriever(options.embeddings, options.index, config.retrieval.topK, this.logger)
		this.pipeline = new IngestionPipeline({
			embeddings: options.embeddings,
			index: options.index,
			normalizer: new DocumentNormalizer({
				pageSource: options.pageSource,
				ocr: options.ocr,
				logger: this.logger,
				eventBus: options.eventBus,
			}),
			chunking: config.chunking,
			concurrency: config.ingestion.concurrency,
			logger: this.logger,
			eventBus: options.eventBus,
		})
		this.orchestrator = new GenerationOrchestrator({
			model: options.model,
			verifier: new CitationVerifier(),
			maxRetries: config.generation.maxRetries,
			maxOutputTokens: config.generation.maxOutputTokens,
			logger: this.logger,
			eventBus: options.eventBus,
			auditSink: options.auditSink,
		})
	}

	/** @throws {IngestError} */
	async ingest(documentPath: string, options: NormalizeOptions = {}): Promise<number> {
		const count = await this.pipeline.ingest(documentPath, options)
		await this.index.persist()
		return count
	}

	ingestDirectory(directory: string, options: IngestDirectoryOptions = {}): Promise<IngestReport> {
		return this.pipeline.ingestDirectory(directory, options)
	}

	ingestCorpus(dataDir: string, options: Omit<IngestDirectoryOptions, 'sourceType'> = {}): Promise<Map<SourceType, IngestReport>> {
		return this.pipeline.ingestCorpus(dataDir, options)
	}

	retrieve(query: string, topK?: number, mode: AnswerMode = 'research'): Promise<RetrievalResult> {
		return this.retriever.retrieve(query, { topK, mode })
	}

	/**
	 * Retrieves supporting passages, generates a cited answer and verifies its citations.
	 * @throws {NoRelevantMaterialError} when retrieval finds nothing; no answer is generated then.
	 */
	async answer(request: AnswerRequest): Promise<AnswerResponse> {
		const temperature = request.temperature ?? this.config.generation.temperature[request.mode]
		const timeoutMs = request.timeoutMs ?? this.config.generation.timeoutMs

		let prompt: string
		let userInput: string
		let retrieved: RetrievalResult = []
		let disclaimer: string | undefined
		let verifyCitations = true

		switch (request.mode) {
			case 'research':
				retrieved = await this.retrieveOrFail(request.query, request.topK, 'research')
				prompt = buildResearchPrompt(request.query, retrieved)
				userInput = request.query
				disclaimer = RESEARCH_DISCLAIMER
				break

			case 'judgment': {
				const judgmentMode = request.judgmentMode ?? 'hypothetical'
				retrieved = await this.retrieveOrFail(request.facts, request.topK, 'judgment')
				prompt = buildJudgmentPrompt(request.facts, judgmentMode, retrieved)
				userInput = request.facts
				disclaimer = JUDGMENT_HEADERS[judgmentMode]
				break
			}

			case 'summarize':
				if (request.caseText?.trim()) {
					prompt = buildSummarizePrompt([], request.caseText)
					userInput = request.caseText
					verifyCitations = false
				}
				else if (request.query?.trim()) {
					retrieved = await this.retrieveOrFail(request.query, request.topK, 'summarize')
					prompt = buildSummarizePrompt(retrieved)
					userInput = request.query
				}
				else {
					throw new ConfigError('Summarize needs either a query or the case text.')
				}
				break
		}

		const outcome = await this.orchestrator.run({
			mode: request.mode,
			prompt,
			retrieved,
			temperature,
			userInput,
			verifyCitations,
			signal: request.signal,
			timeoutMs,
		})

		return {
			mode: request.mode,
			text: outcome.text,
			verification: outcome.verification,
			retrieved,
			status: outcome.status,
			attempts: outcome.attempts,
			disclaimer,
		}
	}

	close(): void {
		this.index.close()
	}

	private async retrieveOrFail(query: string, topK: number | undefined, mode: AnswerMode): Promise<RetrievalResult> {
		const retrieved = await this.retriever.retrieve(query, { topK, mode })
		if (retrieved.length === 0) {
			this.logger.warn(`[LegalAssistant] No relevant material for the ${mode} request.`)
			throw new NoRelevantMaterialError(query)
		}
		return retrieved
	}
}

export interface CreateAssistantOptions {
	config?: LexciteConfig | LexciteConfigInput
	embeddings?: EmbeddingProvider
	model?: LanguageModel
	pageSource?: PageSource
	ocr?: OcrEngine
	/** Defaults to JSON files in `config.logsDir`; pass `null` to disable auditing. */
	auditSink?: AuditSink | null
	logger?: ILogger
	eventBus?: IEventBus
}

/** Wires every component from one configuration object. */
export function createAssistant(options: CreateAssistantOptions = {}): LegalAssistant {
	const config = defineConfig(options.config ?? {})
	const embeddings = options.embeddings ?? createEmbeddingProvider(config)
	const index = new SqliteVectorIndex({
		directory: config.indexDir,
		collection: config.collectionName,
		logger: options.logger,
	})
	const model = options.model ?? new OpenAILanguageModel({
		model: config.generation.model,
		apiKey: config.generation.apiKey,
		baseURL: config.generation.baseURL,
		maxOutputTokens: config.generation.maxOutputTokens,
	})
	const auditSink = options.auditSink === null ? undefined : options.auditSink ?? new JsonFileAuditSink(config.logsDir)

	try {
		return new LegalAssistant({
			config,
			embeddings,
			index,
			model,
			pageSource: options.pageSource,
			ocr: options.ocr,
			auditSink,
			logger: options.logger,
			eventBus: options.eventBus,
		})
	}
	catch (error) {
		index.close()
		throw error
	}
}
