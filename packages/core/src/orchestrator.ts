import { createAuditRecord } from './audit.js'
import { CitationVerifier } from './citations.js'
import { describeError, GenerationTimeoutError, isLexciteError } from './errors.js'
import { NullLogger } from './logger.js'
import { buildRetryPrompt } from './prompts.js'
import type {
	AnswerMode,
	AuditSink,
	GenerationOutcome,
	GenerationState,
	GenerationStatus,
	IEventBus,
	ILogger,
	LanguageModel,
	RetrievalResult,
	VerificationResult,
} from './types.js'

export interface GenerationRequest {
	mode: AnswerMode
	/** The prompt of the first attempt, built for the mode. */
	prompt: string
	retrieved: RetrievalResult
	temperature: number
	/** Query, facts or case text, as recorded in the audit log. */
	userInput: string
	/**
	 * Whether bracket citations are checked against `retrieved`. Off for texts summarized
	 * directly, which have no numbered passages to cite.
	 * @default true
	 */
	verifyCitations?: boolean
	signal?: AbortSignal
	timeoutMs?: number
}

export interface GenerationOrchestratorOptions {
	model: LanguageModel
	verifier?: CitationVerifier
	/** @default 2 */
	maxRetries?: number
	maxOutputTokens?: number
	logger?: ILogger
	eventBus?: IEventBus
	auditSink?: AuditSink
}

const NO_CITATIONS_CHECKED: VerificationResult = { valid: [], invalid: [], unverified: [], malformed: [] }

/**
 * Runs one request through `initial → generate → verify → decision` until it is accepted, or
 * degraded once `maxRetries` stricter-prompt retries have not cleared the invalid citations.
 *
 * Language model errors propagate unchanged: only citation failures are retried.
 */
export class GenerationOrchestrator {
	private readonly model: LanguageModel
	private readonly verifier: CitationVerifier
	private readonly maxRetries: number
	private readonly maxOutputTokens?: number
	private readonly logger: ILogger
	private readonly eventBus?: IEventBus
	private readonly auditSink?: AuditSink

	constructor(options: GenerationOrchestratorOptions) {
		this.model = options.model
		this.verifier = options.verifier ?? new CitationVerifier()
		this.maxRetries = options.maxRetries ?? 2
		this.maxOutputTokens = options.maxOutputTokens
		this.logger = options.logger ?? new NullLogger()
		this.eventBus = options.eventBus
		this.auditSink = options.auditSink
	}

	async run(request: GenerationRequest): Promise<GenerationOutcome> {
		const signal = combineSignals(request.signal, request.timeoutMs)
		const states: GenerationState[] = []
		let state: GenerationState = 'initial'
		let prompt = request.prompt
		let text = ''
		let verification: VerificationResult = NO_CITATIONS_CHECKED
		let attempts = 0
		let retryCount = 0

		while (!isTerminal(state)) {
			states.push(state)
			switch (state) {
				case 'initial':
					state = 'generate'
					break

				case 'generate':
					if (signal?.aborted) {
						throw new GenerationTimeoutError(`Generation aborted after ${attempts} attempt(s).`, { cause: signal.reason })
					}
					attempts++
					await this.eventBus?.emit({ type: 'generation:attempt', payload: { mode: request.mode, attempt: attempts } })
					try {
						text = await this.model.generate({
							prompt,
							temperature: request.temperature,
							maxOutputTokens: this.maxOutputTokens,
							signal,
						})
					}
					catch (error) {
						if (signal?.aborted && !isLexciteError(error)) {
							throw new GenerationTimeoutError(`Generation aborted during attempt ${attempts}.`, { cause: error })
						}
						throw error
					}
					state = 'verify'
					break

				case 'verify':
					verification = request.verifyCitations === false
						? NO_CITATIONS_CHECKED
						: this.verifier.verify(text, request.retrieved)
					state = 'decision'
					break

				case 'decision':
					if (verification.invalid.length === 0) {
						state = 'accepted'
					}
					else if (retryCount < this.maxRetries) {
						retryCount++
						this.logger.warn(`[GenerationOrchestrator] Invalid citations ${formatNumbers(verification.invalid)}, retrying with a stricter prompt.`, {
							retryCount,
							allowed: request.retrieved.length,
						})
						await this.eventBus?.emit({
							type: 'generation:retry',
							payload: { mode: request.mode, retryCount, invalid: verification.invalid },
						})
						prompt = buildRetryPrompt(request.prompt, request.retrieved.length, verification.invalid)
						state = 'generate'
					}
					else {
						state = 'degraded'
					}
					break
			}
		}
		states.push(state)

		const outcome: GenerationOutcome = { text, verification, status: state, attempts, prompt, states }
		await this.finish(request, outcome)
		return outcome
	}

	private async finish(request: GenerationRequest, outcome: GenerationOutcome): Promise<void> {
		const log = outcome.status === 'accepted' ? this.logger.info.bind(this.logger) : this.logger.warn.bind(this.logger)
		log(`[GenerationOrchestrator] ${request.mode} request ${outcome.status} after ${outcome.attempts} attempt(s).`, {
			invalid: outcome.verification.invalid,
		})
		await this.eventBus?.emit({
			type: 'generation:finish',
			payload: { mode: request.mode, status: outcome.status, attempts: outcome.attempts, invalid: outcome.verification.invalid },
		})

		if (!this.auditSink) return
		try {
			await this.auditSink.write(createAuditRecord({
				mode: request.mode,
				userInput: request.userInput,
				retrieved: request.retrieved,
				temperature: request.temperature,
				outcome,
			}))
		}
		catch (error) {
			this.logger.warn(`[GenerationOrchestrator] Could not write the audit record: ${describeError(error)}`)
		}
	}
}

export function isTerminal(state: GenerationState): state is GenerationStatus {
	return state === 'accepted' || state === 'degraded'
}

function combineSignals(signal: AbortSignal | undefined, timeoutMs: number | undefined): AbortSignal | undefined {
	const signals = [signal, timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined]
		.filter((s): s is AbortSignal => s !== undefined)
	if (signals.length <= 1) return signals[0]
	return AbortSignal.any(signals)
}

function formatNumbers(numbers: readonly number[]): string {
	return numbers.map(n => `[${n}]`).join(', ')
}
