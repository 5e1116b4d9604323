import OpenAI from 'openai'
import { describeError, GenerationTimeoutError, LlmError } from '../errors.js'
import type { GenerateRequest, LanguageModel } from '../types.js'

export interface OpenAILanguageModelOptions {
	model: string
	apiKey?: string
	/** Any OpenAI-compatible chat completions endpoint. */
	baseURL?: string
	maxOutputTokens?: number
	/** Injected client, mainly for tests. */
	client?: OpenAI
}

/**
 * Chat-completions client. The SDK's own retries are turned off: a transport failure surfaces
 * as an `LlmError` right away and retrying is left to the caller.
 */
export class OpenAILanguageModel implements LanguageModel {
	private client?: OpenAI
	private readonly model: string
	private readonly maxOutputTokens?: number

	constructor(private readonly options: OpenAILanguageModelOptions) {
		this.client = options.client
		this.model = options.model
		this.maxOutputTokens = options.maxOutputTokens
	}

	/** Created on first use, so that configurations that never generate need no API key. */
	private getClient(): OpenAI {
		if (this.client) return this.client
		try {
			const client = new OpenAI({ apiKey: this.options.apiKey, baseURL: this.options.baseURL, maxRetries: 0 })
			this.client = client
			return client
		}
		catch (error) {
			throw new LlmError(`Could not create the language model client: ${describeError(error)}`, undefined, { cause: error })
		}
	}

	async generate(request: GenerateRequest): Promise<string> {
		let completion: OpenAI.Chat.Completions.ChatCompletion
		try {
			completion = await this.getClient().chat.completions.create(
				{
					model: this.model,
					messages: [{ role: 'user', content: request.prompt }],
					temperature: request.temperature,
					max_tokens: request.maxOutputTokens ?? this.maxOutputTokens,
				},
				{ signal: request.signal, maxRetries: 0 },
			)
		}
		catch (error) {
			if (request.signal?.aborted) {
				throw new GenerationTimeoutError('The language model call was aborted.', { cause: error })
			}
			const status = error instanceof OpenAI.APIError ? error.status : undefined
			throw new LlmError(`Language model request failed: ${describeError(error)}`, status, { cause: error })
		}

		const content = completion.choices[0]?.message.content
		if (typeof content !== 'string') {
			throw new LlmError('The language model returned no text.')
		}
		return content
	}
}
