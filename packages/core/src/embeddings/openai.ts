import OpenAI from 'openai'
import { describeError, EmbeddingError } from '../errors.js'
import type { EmbeddingProvider } from '../types.js'

export interface OpenAIEmbeddingOptions {
	model: string
	dimension: number
	batchSize?: number
	apiKey?: string
	baseURL?: string
	/** Injected client, mainly for tests. */
	client?: OpenAI
}

/** Embeddings from the OpenAI (or an OpenAI-compatible) embeddings endpoint. */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly dimension: number
	private readonly client: OpenAI
	private readonly model: string
	private readonly batchSize: number

	constructor(options: OpenAIEmbeddingOptions) {
		this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL })
		this.model = options.model
		this.dimension = options.dimension
		this.batchSize = options.batchSize ?? 32
	}

	async embed(texts: readonly string[]): Promise<number[][]> {
		for (const [i, text] of texts.entries()) {
			if (!text.trim()) {
				throw new EmbeddingError(`Cannot embed empty text at position ${i}.`)
			}
		}

		const vectors: number[][] = []
		for (let i = 0; i < texts.length; i += this.batchSize) {
			const batch = texts.slice(i, i + this.batchSize).map(text => text.replace(/\n/g, ' '))
			const response = await this.request(batch)
			const ordered = [...response.data].sort((a, b) => a.index - b.index)
			for (const item of ordered) {
				if (item.embedding.length !== this.dimension) {
					throw new EmbeddingError(`Expected ${this.dimension}-dimensional embeddings, got ${item.embedding.length}.`)
				}
				vectors.push(item.embedding)
			}
		}
		return vectors
	}

	private async request(input: string[]) {
		try {
			return await this.client.embeddings.create({ model: this.model, input, dimensions: this.dimension })
		}
		catch (error) {
			throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, { cause: error })
		}
	}

	async embedQuery(text: string): Promise<number[]> {
		const [vector] = await this.embed([text])
		if (!vector) {
			throw new EmbeddingError('The embeddings endpoint returned no vector.')
		}
		return vector
	}
}
